/**
 * Case Runner
 *
 * Analyzes incident cases one after another and collects one output per case.
 * A failing case is logged with its context and reported with no root causes
 * and an error code; it never stops the run. Aborting stops the run at once
 * and the in-flight case gets no output.
 */

import {
  CollectionFailure,
  formatWindow,
  getErrorCode,
  getLogger,
  toError,
  type Logger,
  type RootCauseAnalyzer,
  type TimeWindow,
} from "@faultline/shared";
import { analysisFocus } from "./analysis-focus";
import type { CaseOutput, IncidentCase } from "./schemas";
import { parseTimeRange } from "./time-range";

// ============================================
// Types
// ============================================

export type CaseAnalyzer = Pick<RootCauseAnalyzer, "analyze">;

export interface RunCasesOptions {
  /** Keep at most this many ranked causes per case; 0 keeps all */
  maxRootCauses?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface RunSummary {
  total: number;
  /** Cases with at least one root cause */
  resolved: number;
  /** Cases analyzed with no supported candidate */
  unresolved: number;
  failed: number;
  aborted: boolean;
}

export interface RunResult {
  outputs: CaseOutput[];
  summary: RunSummary;
}

// ============================================
// Runner
// ============================================

export async function runCases(
  analyzer: CaseAnalyzer,
  cases: IncidentCase[],
  options: RunCasesOptions = {}
): Promise<RunResult> {
  const logger = options.logger ?? getLogger();
  const maxRootCauses = options.maxRootCauses ?? 0;

  const outputs: CaseOutput[] = [];
  const summary: RunSummary = {
    total: cases.length,
    resolved: 0,
    unresolved: 0,
    failed: 0,
    aborted: false,
  };

  for (const [index, incident] of cases.entries()) {
    if (options.signal?.aborted) {
      summary.aborted = true;
      logger.warn("[runner] Run aborted", { remaining: cases.length - index });
      break;
    }

    const focus = analysisFocus(incident.alarm_rules);

    logger.info(`[runner] Case ${index + 1}/${cases.length}`, {
      problemId: incident.problem_id,
      timeRange: incident.time_range,
      focus: focus ?? "all",
    });

    let window: TimeWindow | null = null;
    try {
      window = parseTimeRange(incident.time_range);
      const result = await analyzer.analyze(window, incident.candidate_root_causes, {
        signal: options.signal,
        focus,
      });

      const rootCauses =
        maxRootCauses > 0 ? result.rootCauses.slice(0, maxRootCauses) : [...result.rootCauses];

      outputs.push({ problem_id: incident.problem_id, root_causes: rootCauses });
      if (rootCauses.length > 0) {
        summary.resolved++;
      } else {
        summary.unresolved++;
      }

      logger.info("[runner] Case analyzed", {
        problemId: incident.problem_id,
        rootCauses,
        degraded: result.degraded,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        summary.aborted = true;
        logger.warn("[runner] Run aborted", { problemId: incident.problem_id });
        break;
      }

      const err = toError(error);
      const code = getErrorCode(err);
      summary.failed++;
      outputs.push({ problem_id: incident.problem_id, root_causes: [], error: code });

      logger.error("[runner] Case failed", {
        problemId: incident.problem_id,
        code,
        error: err.message,
        window: window ? formatWindow(window) : incident.time_range,
        candidates: incident.candidate_root_causes,
        collectors: err instanceof CollectionFailure ? err.collectors : undefined,
      });
    }
  }

  logger.info("[runner] Run complete", { ...summary });
  return { outputs, summary };
}
