/**
 * RCA Types
 *
 * Request-scoped entities and the collaborator contracts the analyzer depends on.
 */

// ============================================
// Entities
// ============================================

/** Query window in epoch milliseconds, `start < end`. Frozen once built. */
export interface TimeWindow {
  readonly start: number;
  readonly end: number;
}

/** Which collector produced a record */
export type SignalKind = "error" | "latency";

/** One retrieved log entry */
export interface LogRecord {
  /** Free text hinting at the originating service/operation */
  evidence: string;
  /** Epoch milliseconds */
  timestamp: number;
  fields: Readonly<Record<string, string>>;
}

/** Service/operation identifier extracted from evidence text */
export interface ParsedEvidence {
  serviceName: string;
  operation: string;
  rawMatch: string;
}

/** Evidence tallied for one candidate */
export interface RankedCause {
  candidate: string;
  evidenceCount: number;
  errorEvidence: number;
  latencyEvidence: number;
  /** Share of all matched records that point at this candidate (0-1) */
  confidence: number;
}

export interface AnalysisResult {
  readonly window: TimeWindow;
  readonly rootCauses: readonly string[];
  readonly causes: readonly RankedCause[];
  readonly errorRecordsExamined: number;
  readonly latencyViolations: number;
  readonly unmatchedRecords: number;
  /** Collectors that failed and were skipped in best-effort mode */
  readonly degraded: readonly SignalKind[];
}

// ============================================
// Collaborators
// ============================================

/** Project/logstore/region a query runs against */
export interface QueryScope {
  project: string;
  logstore: string;
  region: string;
}

export interface QueryOptions {
  /** Maximum records to return */
  limit?: number;
  signal?: AbortSignal;
}

/**
 * Query client over the managed log store.
 * Failures surface as QueryError (transient or permanent) or CredentialError.
 */
export interface QueryClient {
  query(
    expression: string,
    window: TimeWindow,
    scope: QueryScope,
    options?: QueryOptions
  ): Promise<LogRecord[]>;
}

/** Temporary credentials for the log store */
export interface Credentials {
  accessKeyId: string;
  accessKeySecret: string;
  securityToken: string;
  /** Epoch milliseconds, when known */
  expiresAt?: number;
}

/**
 * Source of valid credentials. Refreshes and caches as needed;
 * failures surface as CredentialError.
 */
export interface CredentialProvider {
  getValidCredentials(): Promise<Credentials>;
  /** Drop any cached credentials so the next call fetches fresh ones */
  invalidate(): void;
}
