/**
 * Analysis Error Classes
 *
 * Error types for root cause analysis with structured error information.
 */

import type { SignalKind, TimeWindow } from "./rca/types";

// ============================================
// Base Analysis Error
// ============================================

export type AnalysisErrorCode =
  | "validation_error"
  | "credential_error"
  | "query_error"
  | "collection_failure";

/**
 * Base error class for all analysis-related errors.
 */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly retryable: boolean;

  constructor(
    message: string,
    options: {
      code: AnalysisErrorCode;
      retryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = "AnalysisError";
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;
  }
}

// ============================================
// Specific Error Types
// ============================================

/**
 * Malformed window, candidate set or configuration. Never retried.
 */
export class ValidationError extends AnalysisError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, { code: "validation_error", retryable: false, cause });
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Upstream credential acquisition failed.
 */
export class CredentialError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "credential_error", retryable: false, cause });
    this.name = "CredentialError";
  }
}

/**
 * Log query failed. `transient` separates backend hiccups (safe to retry)
 * from rejected queries and auth failures.
 */
export class QueryError extends AnalysisError {
  readonly transient: boolean;
  readonly backendCode?: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      transient: boolean;
      backendCode?: string;
      statusCode?: number;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: "query_error",
      retryable: options.transient,
      cause: options.cause,
    });
    this.name = "QueryError";
    this.transient = options.transient;
    this.backendCode = options.backendCode;
    this.statusCode = options.statusCode;
  }
}

/**
 * One collector's failure inside a CollectionFailure.
 */
export interface CollectorFailure {
  collector: SignalKind;
  error: Error;
}

/**
 * One or more signal collectors failed, so the analysis for this case was
 * abandoned instead of reporting "no root cause".
 */
export class CollectionFailure extends AnalysisError {
  readonly failures: CollectorFailure[];
  readonly window: TimeWindow;
  readonly candidates: string[];

  constructor(
    failures: CollectorFailure[],
    window: TimeWindow,
    candidates: string[]
  ) {
    const summary = failures
      .map((f) => `${f.collector}: ${f.error.message}`)
      .join("; ");

    super(`Signal collection failed (${summary})`, {
      code: "collection_failure",
      retryable:
        failures.length > 0 && failures.every((f) => isRetryableError(f.error)),
      cause: failures[0]?.error,
    });
    this.name = "CollectionFailure";
    this.failures = failures;
    this.window = window;
    this.candidates = candidates;
  }

  get collectors(): SignalKind[] {
    return this.failures.map((f) => f.collector);
  }
}

// ============================================
// Error Utilities
// ============================================

/**
 * Check if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AnalysisError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("timed out") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up") ||
      message.includes("503")
    );
  }

  return false;
}

/**
 * Extract error code from error.
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof AnalysisError) {
    return error.code;
  }

  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }

  return "unknown_error";
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
