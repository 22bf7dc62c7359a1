/**
 * RCA Configuration Schemas
 *
 * Zod schemas for the analysis configuration - source of truth for types.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import { ANALYSIS_DEFAULTS, DEFAULT_FAULT_KINDS } from "./constants";

// ============================================================
// QUERY SCOPE
// ============================================================

export const QueryScopeSchema = z.object({
  /** Log project name */
  project: z.string().min(1),
  /** Logstore holding trace spans */
  logstore: z.string().min(1),
  /** Region the project lives in, e.g. "cn-qingdao" */
  region: z.string().min(1),
});

// ============================================================
// ANALYSIS CONFIG
// ============================================================

export const FaultKindsSchema = z.object({
  error: z.array(z.string().min(1)),
  latency: z.array(z.string().min(1)),
});
export type FaultKinds = z.infer<typeof FaultKindsSchema>;

export const AnalysisConfigSchema = z.object({
  scope: QueryScopeSchema,
  /** Cap on error records per analysis */
  errorTracesLimit: z
    .number()
    .int()
    .positive()
    .default(ANALYSIS_DEFAULTS.errorTracesLimit),
  /** Cap on latency records per analysis */
  latencyTracesLimit: z
    .number()
    .int()
    .positive()
    .default(ANALYSIS_DEFAULTS.latencyTracesLimit),
  /** Latency violation cutoff in nanoseconds */
  durationThresholdNanos: z
    .number()
    .int()
    .nonnegative()
    .default(ANALYSIS_DEFAULTS.durationThresholdNanos),
  /** Tolerate one failed collector instead of failing the analysis */
  bestEffort: z.boolean().default(ANALYSIS_DEFAULTS.bestEffort),
  /** Keep only root-cause spans among error records */
  rootSpansOnly: z.boolean().default(ANALYSIS_DEFAULTS.rootSpansOnly),
  /** Count latency evidence on exclusive (self) duration instead of total */
  exclusiveLatencyOnly: z.boolean().default(ANALYSIS_DEFAULTS.exclusiveLatencyOnly),
  faultKinds: FaultKindsSchema.default({
    error: [...DEFAULT_FAULT_KINDS.error],
    latency: [...DEFAULT_FAULT_KINDS.latency],
  }),
});

/** Fully resolved configuration the analyzer runs with */
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
/** Configuration as supplied, defaults not yet applied */
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

/**
 * Resolve an analysis configuration, applying defaults.
 *
 * @throws ValidationError listing every invalid field
 */
export function resolveAnalysisConfig(input: AnalysisConfigInput): AnalysisConfig {
  const parsed = AnalysisConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
    );
    throw new ValidationError(
      `Invalid analysis configuration: ${issues.join(", ")}`,
      issues,
      parsed.error
    );
  }
  return parsed.data;
}
