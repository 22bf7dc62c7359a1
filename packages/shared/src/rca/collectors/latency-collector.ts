/**
 * Latency Signal Collector
 *
 * Fetches spans whose duration exceeds the violation threshold.
 */

import { ValidationError } from "../../errors";
import { getLogger, type Logger } from "../../logger";
import { latencyViolationsQuery } from "../constants";
import { assertValidWindow } from "../time-window";
import type { LogRecord, QueryClient, QueryScope, TimeWindow } from "../types";
import type { CollectOptions } from "./error-collector";

/**
 * Duration of a record in nanoseconds, or undefined when absent or not numeric.
 */
export function recordDurationNanos(record: LogRecord): number | undefined {
  const raw = record.fields.duration;
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export class LatencySignalCollector {
  constructor(
    private readonly client: QueryClient,
    private readonly scope: QueryScope,
    private readonly limit: number,
    private readonly logger: Logger = getLogger()
  ) {}

  /**
   * One query filtered server-side on `duration`, re-checked client-side so
   * only records strictly above the threshold are returned. An empty result
   * means no violations were observed.
   */
  async collectLatencyViolations(
    window: TimeWindow,
    durationThresholdNanos: number,
    options: CollectOptions = {}
  ): Promise<LogRecord[]> {
    assertValidWindow(window);
    if (!Number.isFinite(durationThresholdNanos) || durationThresholdNanos < 0) {
      throw new ValidationError(
        `Duration threshold must be a non-negative number of nanoseconds, got ${durationThresholdNanos}`,
        ["durationThresholdNanos: must be >= 0"]
      );
    }

    const records = await this.client.query(
      latencyViolationsQuery(durationThresholdNanos),
      window,
      this.scope,
      { limit: this.limit, signal: options.signal }
    );

    const violations = records.filter((record) => {
      const duration = recordDurationNanos(record);
      return duration !== undefined && duration > durationThresholdNanos;
    });

    this.logger.debug("[collectLatencyViolations] Query complete", {
      records: records.length,
      violations: violations.length,
      thresholdNanos: durationThresholdNanos,
    });

    return violations;
  }
}
