/**
 * Exclusive Duration
 *
 * A slow span makes every ancestor slow as well. A span's exclusive duration
 * is its own duration minus the durations of its direct children, i.e. the
 * time spent in the span itself. Only children present in the input are
 * subtracted.
 */

import { recordDurationNanos } from "./collectors/latency-collector";
import type { LogRecord } from "./types";

/**
 * Exclusive duration (ns) per record, in input order. Records without a
 * numeric duration get 0. Records missing `traceId` or `spanId` keep their
 * full duration.
 */
export function exclusiveDurations(records: readonly LogRecord[]): number[] {
  // traceId -> spanId -> summed child durations
  const childTime = new Map<string, Map<string, number>>();

  for (const record of records) {
    const { traceId, parentSpanId } = record.fields;
    const duration = recordDurationNanos(record);
    if (!traceId || !parentSpanId || duration === undefined) continue;

    const spans = childTime.get(traceId) ?? new Map<string, number>();
    spans.set(parentSpanId, (spans.get(parentSpanId) ?? 0) + duration);
    childTime.set(traceId, spans);
  }

  return records.map((record) => {
    const duration = recordDurationNanos(record) ?? 0;
    const { traceId, spanId } = record.fields;
    if (!traceId || !spanId) return duration;

    const children = childTime.get(traceId)?.get(spanId) ?? 0;
    return Math.max(0, duration - children);
  });
}

/**
 * Keep spans whose exclusive duration exceeds the threshold, preserving
 * input order.
 */
export function selectBottleneckSpans(
  records: readonly LogRecord[],
  thresholdNanos: number
): LogRecord[] {
  const exclusive = exclusiveDurations(records);
  return records.filter((_, i) => (exclusive[i] ?? 0) > thresholdNanos);
}
