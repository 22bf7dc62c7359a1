/**
 * RCA (Root Cause Analysis) Constants
 *
 * Default configuration values and query expressions for the analysis engine.
 * The analyzer never reads these directly: they seed AnalysisConfig.
 */

// ============================================
// Query Limits
// ============================================

/**
 * Maximum error records fetched per analysis.
 */
export const DEFAULT_ERROR_TRACES_LIMIT = 2000;

/**
 * Maximum latency records fetched per analysis.
 */
export const DEFAULT_LATENCY_TRACES_LIMIT = 2000;

// ============================================
// Latency
// ============================================

/**
 * Duration above which a span is a latency violation.
 * Nanoseconds, the trace logstore's native unit (2 seconds).
 */
export const DEFAULT_DURATION_THRESHOLD_NANOS = 2_000_000_000;

// ============================================
// Candidate Matching
// ============================================

/**
 * Fault kinds tried as `<service>.<kind>` after the exact service name,
 * in priority order, per signal.
 */
export const DEFAULT_FAULT_KINDS = {
  error: ["Failure", "Unreachable", "CacheFailure"],
  latency: ["cpu", "memory", "networkLatency", "latency", "LargeGc", "FloodHomepage"],
} as const;

// ============================================
// Query Expressions
// ============================================

/**
 * Error spans carry statusCode 2 (error) or 3 (unset/internal).
 */
export const ERROR_SPANS_QUERY = "statusCode>1";

/**
 * Latency violations, filtered server-side by duration.
 */
export function latencyViolationsQuery(thresholdNanos: number): string {
  return `duration > ${Math.floor(thresholdNanos)}`;
}

/**
 * Status codes at or above this value mark an error span.
 */
export const ERROR_STATUS_CODE_MIN = 2;

// ============================================
// Defaults
// ============================================

export const ANALYSIS_DEFAULTS = {
  errorTracesLimit: DEFAULT_ERROR_TRACES_LIMIT,
  latencyTracesLimit: DEFAULT_LATENCY_TRACES_LIMIT,
  durationThresholdNanos: DEFAULT_DURATION_THRESHOLD_NANOS,
  bestEffort: false,
  rootSpansOnly: true,
  exclusiveLatencyOnly: true,
} as const;
