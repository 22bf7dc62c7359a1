/**
 * Worker Configuration
 *
 * Environment schema plus the mapping from validated environment values to the
 * typed configuration objects handed to the engine and its collaborators.
 */

import { z } from "zod";
import {
  ANALYSIS_DEFAULTS,
  resolveAnalysisConfig,
  type AnalysisConfig,
  type LogLevel,
  type RetryOptions,
} from "@faultline/shared";

// ============================================================
// Environment Schema
// ============================================================

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

export const envSchema = {
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),

  // Main account used to assume the log-reader role
  ALIBABA_CLOUD_ACCESS_KEY_ID: z.string().min(1),
  ALIBABA_CLOUD_ACCESS_KEY_SECRET: z.string().min(1),
  ALIBABA_CLOUD_ROLE_ARN: z.string().min(1),
  ALIBABA_CLOUD_ROLE_SESSION_NAME: z.string().default("faultline-sls-access"),
  STS_DURATION_SECONDS: z.coerce.number().int().min(900).max(43_200).default(3600),

  // Log store scope
  SLS_PROJECT_NAME: z.string().min(1),
  SLS_LOGSTORE_NAME: z.string().min(1).default("logstore-tracing"),
  SLS_REGION: z.string().min(1).default("cn-qingdao"),

  // Analysis
  ERROR_TRACES_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(ANALYSIS_DEFAULTS.errorTracesLimit),
  HIGH_RT_TRACES_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(ANALYSIS_DEFAULTS.latencyTracesLimit),
  DURATION_THRESHOLD: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(ANALYSIS_DEFAULTS.durationThresholdNanos),
  ANALYSIS_BEST_EFFORT: booleanFlag(ANALYSIS_DEFAULTS.bestEffort),
  ROOT_SPANS_ONLY: booleanFlag(ANALYSIS_DEFAULTS.rootSpansOnly),
  EXCLUSIVE_LATENCY_ONLY: booleanFlag(ANALYSIS_DEFAULTS.exclusiveLatencyOnly),

  // Query retries (transient backend errors only)
  QUERY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  QUERY_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),

  // Batch driver
  INPUT_FILE: z.string().default("dataset/input.jsonl"),
  OUTPUT_FILE: z.string().default("dataset/output.jsonl"),
  /** 0 keeps every ranked cause */
  OUTPUT_MAX_ROOT_CAUSES: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
};

export const EnvSchema = z.object(envSchema);
export type EnvValues = z.infer<typeof EnvSchema>;

// ============================================================
// Typed Configuration
// ============================================================

export interface StsSettings {
  accessKeyId: string;
  accessKeySecret: string;
  roleArn: string;
  sessionName: string;
  durationSeconds: number;
  region: string;
}

export interface RunnerSettings {
  inputFile: string;
  outputFile: string;
  maxRootCauses: number;
}

export interface AppConfig {
  analysis: AnalysisConfig;
  sts: StsSettings;
  queryRetry: RetryOptions;
  runner: RunnerSettings;
  logLevel: LogLevel;
}

/**
 * Map validated environment values onto typed configuration.
 */
export function buildAppConfig(values: EnvValues): AppConfig {
  const analysis = resolveAnalysisConfig({
    scope: {
      project: values.SLS_PROJECT_NAME,
      logstore: values.SLS_LOGSTORE_NAME,
      region: values.SLS_REGION,
    },
    errorTracesLimit: values.ERROR_TRACES_LIMIT,
    latencyTracesLimit: values.HIGH_RT_TRACES_LIMIT,
    durationThresholdNanos: values.DURATION_THRESHOLD,
    bestEffort: values.ANALYSIS_BEST_EFFORT,
    rootSpansOnly: values.ROOT_SPANS_ONLY,
    exclusiveLatencyOnly: values.EXCLUSIVE_LATENCY_ONLY,
  });

  return {
    analysis,
    sts: {
      accessKeyId: values.ALIBABA_CLOUD_ACCESS_KEY_ID,
      accessKeySecret: values.ALIBABA_CLOUD_ACCESS_KEY_SECRET,
      roleArn: values.ALIBABA_CLOUD_ROLE_ARN,
      sessionName: values.ALIBABA_CLOUD_ROLE_SESSION_NAME,
      durationSeconds: values.STS_DURATION_SECONDS,
      region: values.SLS_REGION,
    },
    queryRetry: {
      maxAttempts: values.QUERY_MAX_ATTEMPTS,
      baseDelayMs: values.QUERY_RETRY_BASE_DELAY_MS,
    },
    runner: {
      inputFile: values.INPUT_FILE,
      outputFile: values.OUTPUT_FILE,
      maxRootCauses: values.OUTPUT_MAX_ROOT_CAUSES,
    },
    logLevel: values.LOG_LEVEL,
  };
}
