/**
 * RCA (Root Cause Analysis) Module
 *
 * Turns log query results into a ranked set of confirmed root causes.
 */

// ============================================
// Analyzer
// ============================================

export { RootCauseAnalyzer, createRootCauseAnalyzer } from "./analyzer";
export type { RootCauseAnalyzerDeps, AnalyzeOptions, CandidateInput } from "./analyzer";

// ============================================
// Collectors
// ============================================

export { ErrorSignalCollector } from "./collectors/error-collector";
export type { CollectOptions } from "./collectors/error-collector";
export {
  LatencySignalCollector,
  recordDurationNanos,
} from "./collectors/latency-collector";

// ============================================
// Evidence & Matching
// ============================================

export {
  EvidenceParser,
  parseEvidence,
  DEFAULT_EVIDENCE_RULES,
  EMPTY_EVIDENCE,
} from "./evidence-parser";
export type { EvidenceRule } from "./evidence-parser";

export {
  normalizeCandidates,
  matchCandidate,
  rankCandidates,
  EvidenceTally,
} from "./matching";
export type { CandidateTally } from "./matching";

export { selectRootCauseSpans } from "./root-spans";
export { exclusiveDurations, selectBottleneckSpans } from "./exclusive-duration";

// ============================================
// Window & Configuration
// ============================================

export {
  createTimeWindow,
  assertValidWindow,
  toUnixSeconds,
  formatWindow,
} from "./time-window";
export type { TimeInput } from "./time-window";

export {
  QueryScopeSchema,
  FaultKindsSchema,
  AnalysisConfigSchema,
  resolveAnalysisConfig,
} from "./schemas";
export type { AnalysisConfig, AnalysisConfigInput, FaultKinds } from "./schemas";

export {
  ANALYSIS_DEFAULTS,
  DEFAULT_ERROR_TRACES_LIMIT,
  DEFAULT_LATENCY_TRACES_LIMIT,
  DEFAULT_DURATION_THRESHOLD_NANOS,
  DEFAULT_FAULT_KINDS,
  ERROR_SPANS_QUERY,
  ERROR_STATUS_CODE_MIN,
  latencyViolationsQuery,
} from "./constants";

// ============================================
// Types
// ============================================

export type {
  TimeWindow,
  SignalKind,
  LogRecord,
  ParsedEvidence,
  RankedCause,
  AnalysisResult,
  QueryScope,
  QueryOptions,
  QueryClient,
  Credentials,
  CredentialProvider,
} from "./types";
