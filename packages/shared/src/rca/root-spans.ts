/**
 * Root-Cause Span Selection
 *
 * Within one trace an error propagates upward: a failing child makes its
 * callers fail too. The span where the failure originated is the error span
 * none of whose children failed.
 */

import { ERROR_STATUS_CODE_MIN } from "./constants";
import type { LogRecord } from "./types";

function isErrorSpan(record: LogRecord): boolean {
  const status = Number(record.fields.statusCode);
  return Number.isFinite(status) && status >= ERROR_STATUS_CODE_MIN;
}

/**
 * Keep only root-cause error spans, preserving input order.
 * Records missing `traceId` or `spanId` cannot be placed in a trace and are kept.
 */
export function selectRootCauseSpans(records: readonly LogRecord[]): LogRecord[] {
  // traceId -> ids of spans whose child is an error span
  const failingParents = new Map<string, Set<string>>();

  for (const record of records) {
    const { traceId, parentSpanId } = record.fields;
    if (!traceId || !parentSpanId || !isErrorSpan(record)) continue;

    const parents = failingParents.get(traceId) ?? new Set<string>();
    parents.add(parentSpanId);
    failingParents.set(traceId, parents);
  }

  return records.filter((record) => {
    const { traceId, spanId } = record.fields;
    if (!traceId || !spanId) return true;
    if (!isErrorSpan(record)) return false;
    return !failingParents.get(traceId)?.has(spanId);
  });
}
