/**
 * Incident time ranges ("2025-08-28 15:08:03 ~ 2025-08-28 15:13:03"), read in
 * local time.
 */

import { isValid, parse } from "date-fns";
import { createTimeWindow, ValidationError, type TimeWindow } from "@faultline/shared";

export const TIME_RANGE_FORMAT = "yyyy-MM-dd HH:mm:ss";
export const TIME_RANGE_SEPARATOR = "~";

function parseBound(text: string, label: string): Date {
  const date = parse(text.trim(), TIME_RANGE_FORMAT, new Date());
  if (!isValid(date)) {
    throw new ValidationError(`Invalid ${label} time "${text.trim()}"`, [
      `time_range.${label}: expected ${TIME_RANGE_FORMAT}`,
    ]);
  }
  return date;
}

/**
 * @throws ValidationError on a malformed range or when start is not before end
 */
export function parseTimeRange(range: string): TimeWindow {
  const parts = range.split(TIME_RANGE_SEPARATOR);
  if (parts.length !== 2) {
    throw new ValidationError(`Invalid time range "${range}"`, [
      `time_range: expected "<start> ${TIME_RANGE_SEPARATOR} <end>"`,
    ]);
  }

  const [startText = "", endText = ""] = parts;
  return createTimeWindow(parseBound(startText, "start"), parseBound(endText, "end"));
}
