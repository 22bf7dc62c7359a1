/**
 * Error Signal Collector
 *
 * Fetches error-class span records for the analysis window.
 */

import { ValidationError } from "../../errors";
import { getLogger, type Logger } from "../../logger";
import { ERROR_SPANS_QUERY } from "../constants";
import { assertValidWindow } from "../time-window";
import type { LogRecord, QueryClient, QueryScope, TimeWindow } from "../types";

export interface CollectOptions {
  signal?: AbortSignal;
}

export class ErrorSignalCollector {
  constructor(
    private readonly client: QueryClient,
    private readonly scope: QueryScope,
    private readonly logger: Logger = getLogger()
  ) {}

  /**
   * Issues exactly one query capped at `limit` and returns the records in
   * backend order. Fewer than `limit` records is a complete result.
   * Query failures propagate unchanged.
   */
  async collectErrors(
    window: TimeWindow,
    limit: number,
    options: CollectOptions = {}
  ): Promise<LogRecord[]> {
    assertValidWindow(window);
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError(`Error record limit must be a positive integer, got ${limit}`, [
        "limit: must be a positive integer",
      ]);
    }

    const records = await this.client.query(ERROR_SPANS_QUERY, window, this.scope, {
      limit,
      signal: options.signal,
    });

    this.logger.debug("[collectErrors] Query complete", {
      records: records.length,
      limit,
    });

    return records;
  }
}
