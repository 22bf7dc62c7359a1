/**
 * Time Window
 *
 * Construction and validation of the query window shared by all collectors.
 */

import { ValidationError } from "../errors";
import type { TimeWindow } from "./types";

export type TimeInput = Date | number | string;

function toEpochMs(value: TimeInput, label: string): number {
  const ms =
    value instanceof Date
      ? value.getTime()
      : typeof value === "number"
        ? value
        : Date.parse(value);

  if (!Number.isFinite(ms)) {
    throw new ValidationError(`Invalid ${label} time: ${String(value)}`, [
      `${label}: not a valid timestamp`,
    ]);
  }
  return ms;
}

/**
 * Build an immutable window.
 *
 * @throws ValidationError when a bound is not a timestamp or `start >= end`
 */
export function createTimeWindow(start: TimeInput, end: TimeInput): TimeWindow {
  const window = { start: toEpochMs(start, "start"), end: toEpochMs(end, "end") };
  assertValidWindow(window);
  return Object.freeze(window);
}

/**
 * @throws ValidationError when the window is empty or reversed
 */
export function assertValidWindow(window: TimeWindow): void {
  if (!Number.isFinite(window.start) || !Number.isFinite(window.end)) {
    throw new ValidationError("Time window bounds must be finite timestamps", [
      "window: non-finite bound",
    ]);
  }
  if (window.start >= window.end) {
    throw new ValidationError(
      `Time window start must be before end (${formatWindow(window)})`,
      ["window: start >= end"]
    );
  }
}

/** Unix seconds, the log store's query unit */
export function toUnixSeconds(epochMs: number): number {
  return Math.floor(epochMs / 1000);
}

export function formatWindow(window: TimeWindow): string {
  const iso = (ms: number) =>
    Number.isFinite(ms) ? new Date(ms).toISOString() : String(ms);
  return `${iso(window.start)} ~ ${iso(window.end)}`;
}
