/**
 * Picks which signal a case's alarm rules point at. Error keywords take
 * precedence over latency keywords; rules matching neither, or no rules at
 * all, leave both signals in play.
 */

import type { SignalKind } from "@faultline/shared";

const ERROR_KEYWORDS = ["error", "failure", "exception", "status"];
const LATENCY_KEYWORDS = ["rt", "latency", "response", "duration", "time"];

export function analysisFocus(alarmRules: readonly string[] | undefined): SignalKind | undefined {
  if (!alarmRules || alarmRules.length === 0) return undefined;

  const rules = alarmRules.map((rule) => rule.toLowerCase());
  const mentions = (keywords: string[]) =>
    rules.some((rule) => keywords.some((keyword) => rule.includes(keyword)));

  if (mentions(ERROR_KEYWORDS)) return "error";
  if (mentions(LATENCY_KEYWORDS)) return "latency";
  return undefined;
}
