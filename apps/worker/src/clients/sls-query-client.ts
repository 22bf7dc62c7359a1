/**
 * SLS Query Client
 *
 * QueryClient over an Alibaba Cloud Simple Log Service logstore. Signs requests
 * with credentials from the injected provider, maps rows to LogRecords and
 * retries transient failures with bounded backoff.
 */

import * as $OpenApi from "@alicloud/openapi-client";
import Sls20201230, * as $Sls20201230 from "@alicloud/sls20201230";
import {
  abortable,
  getLogger,
  toUnixSeconds,
  withRetry,
  type CredentialProvider,
  type Credentials,
  type LogRecord,
  type Logger,
  type QueryClient,
  type QueryOptions,
  type QueryScope,
  type RetryOptions,
  type TimeWindow,
} from "@faultline/shared";
import { isExpiredTokenError, toQueryError } from "./sls-errors";

// ============================================
// Types
// ============================================

export interface GetLogsParams {
  query: string;
  /** Unix seconds */
  from: number;
  /** Unix seconds */
  to: number;
  line: number;
  reverse: boolean;
}

export type LogRow = Record<string, unknown>;

/** The one SLS call this client needs */
export interface LogsApi {
  getLogs(project: string, logstore: string, params: GetLogsParams): Promise<LogRow[]>;
}

export type LogsApiFactory = (credentials: Credentials, region: string) => LogsApi;

export interface SlsQueryClientOptions {
  retry?: Omit<RetryOptions, "signal" | "isRetryable" | "onRetry">;
  createApi?: LogsApiFactory;
  /** Records returned when the caller gives no limit */
  defaultLimit?: number;
  logger?: Logger;
}

const DEFAULT_LIMIT = 1000;

// ============================================
// SDK Adapter
// ============================================

/**
 * GetLogs through the official SLS SDK.
 */
export const createSlsApi: LogsApiFactory = (credentials, region) => {
  const client = new Sls20201230(
    new $OpenApi.Config({
      accessKeyId: credentials.accessKeyId,
      accessKeySecret: credentials.accessKeySecret,
      securityToken: credentials.securityToken,
      endpoint: `${region}.log.aliyuncs.com`,
    })
  );

  return {
    async getLogs(project, logstore, params) {
      const response = await client.getLogs(
        project,
        logstore,
        new $Sls20201230.GetLogsRequest(params)
      );
      return response.body ?? [];
    },
  };
};

// ============================================
// Row Mapping
// ============================================

function stringifyField(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/**
 * Evidence for a span row: its own `evidence` field when present, otherwise
 * the service and span names in `key="value"` form.
 */
export function evidenceOf(fields: Readonly<Record<string, string>>): string {
  if (fields.evidence) return fields.evidence;

  const parts: string[] = [];
  if (fields.serviceName) parts.push(`serviceName="${fields.serviceName}"`);
  if (fields.spanName) parts.push(`spanName="${fields.spanName}"`);
  return parts.length > 0 ? parts.join(" ") : (fields.message ?? "");
}

/**
 * Row timestamp in epoch ms: `__time__` (seconds), else span `startTime`
 * (microseconds), else 0.
 */
export function timestampOf(fields: Readonly<Record<string, string>>): number {
  const seconds = Number(fields.__time__);
  if (fields.__time__ && Number.isFinite(seconds)) return seconds * 1000;

  const micros = Number(fields.startTime);
  if (fields.startTime && Number.isFinite(micros)) return Math.floor(micros / 1000);

  return 0;
}

export function toLogRecord(row: LogRow): LogRecord {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    fields[key] = stringifyField(value);
  }
  return { evidence: evidenceOf(fields), timestamp: timestampOf(fields), fields };
}

// ============================================
// Client
// ============================================

export class SlsQueryClient implements QueryClient {
  private readonly createApi: LogsApiFactory;
  private readonly retryOptions: SlsQueryClientOptions["retry"];
  private readonly defaultLimit: number;
  private readonly logger: Logger;

  private api: { credentials: Credentials; region: string; api: LogsApi } | null = null;

  constructor(
    private readonly credentials: CredentialProvider,
    options: SlsQueryClientOptions = {}
  ) {
    this.createApi = options.createApi ?? createSlsApi;
    this.retryOptions = options.retry;
    this.defaultLimit = options.defaultLimit ?? DEFAULT_LIMIT;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Run one query. Transient QueryErrors are retried; permanent ones and
   * CredentialErrors surface on the first failure.
   */
  async query(
    expression: string,
    window: TimeWindow,
    scope: QueryScope,
    options: QueryOptions = {}
  ): Promise<LogRecord[]> {
    const limit = options.limit ?? this.defaultLimit;

    return withRetry(() => this.execute(expression, window, scope, limit, options.signal), {
      ...this.retryOptions,
      signal: options.signal,
      onRetry: (attempt, error, delayMs) => {
        this.logger.warn("[query] Transient failure, retrying", {
          attempt,
          delayMs: Math.round(delayMs),
          error: error.message,
        });
      },
    });
  }

  private async execute(
    expression: string,
    window: TimeWindow,
    scope: QueryScope,
    limit: number,
    signal?: AbortSignal
  ): Promise<LogRecord[]> {
    const credentials = await abortable(this.credentials.getValidCredentials(), signal);
    const api = this.apiFor(credentials, scope.region);

    let rows: LogRow[];
    try {
      // The SDK cannot cancel a request; stop waiting for it instead
      rows = await abortable(
        api.getLogs(scope.project, scope.logstore, {
          query: expression,
          from: toUnixSeconds(window.start),
          to: toUnixSeconds(window.end),
          line: limit,
          reverse: true,
        }),
        signal
      );
    } catch (error) {
      // Abort reasons pass through unclassified
      if (signal?.aborted) throw error;

      const queryError = toQueryError(error, expression);
      if (isExpiredTokenError(queryError)) {
        this.credentials.invalidate();
        this.api = null;
      }
      throw queryError;
    }

    this.logger.debug("[query] Rows received", {
      project: scope.project,
      logstore: scope.logstore,
      rows: rows.length,
    });

    return rows.map(toLogRecord);
  }

  private apiFor(credentials: Credentials, region: string): LogsApi {
    if (this.api?.credentials !== credentials || this.api.region !== region) {
      this.api = { credentials, region, api: this.createApi(credentials, region) };
    }
    return this.api.api;
  }
}
