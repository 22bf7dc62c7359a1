/**
 * Root Cause Analyzer
 *
 * Runs both signal collectors over one window, parses every record's evidence,
 * matches it to the caller's candidates and ranks the candidates the evidence
 * supports.
 */

import { abortable } from "../abort";
import {
  CollectionFailure,
  toError,
  type CollectorFailure,
} from "../errors";
import { getLogger, type Logger } from "../logger";
import { ErrorSignalCollector } from "./collectors/error-collector";
import { LatencySignalCollector } from "./collectors/latency-collector";
import { EvidenceParser } from "./evidence-parser";
import { selectBottleneckSpans } from "./exclusive-duration";
import {
  EvidenceTally,
  matchCandidate,
  normalizeCandidates,
  rankCandidates,
} from "./matching";
import { selectRootCauseSpans } from "./root-spans";
import type { AnalysisConfig } from "./schemas";
import { assertValidWindow, formatWindow } from "./time-window";
import type {
  AnalysisResult,
  LogRecord,
  QueryClient,
  SignalKind,
  TimeWindow,
} from "./types";

// ============================================
// Types
// ============================================

export interface RootCauseAnalyzerDeps {
  queryClient: QueryClient;
  config: AnalysisConfig;
  parser?: EvidenceParser;
  logger?: Logger;
  /** Override the collectors built from `queryClient` */
  errorCollector?: ErrorSignalCollector;
  latencyCollector?: LatencySignalCollector;
}

export interface AnalyzeOptions {
  /** Aborts outstanding queries; no result is produced once aborted */
  signal?: AbortSignal;
  /** Collect only this signal; both are collected when omitted */
  focus?: SignalKind;
}

/** Candidate labels in priority order */
export type CandidateInput = readonly string[] | ReadonlySet<string>;

interface CollectedSignals {
  errors: LogRecord[];
  latency: LogRecord[];
  degraded: SignalKind[];
}

// ============================================
// Analyzer
// ============================================

export class RootCauseAnalyzer {
  private readonly config: AnalysisConfig;
  private readonly parser: EvidenceParser;
  private readonly logger: Logger;
  private readonly errorCollector: ErrorSignalCollector;
  private readonly latencyCollector: LatencySignalCollector;

  constructor(deps: RootCauseAnalyzerDeps) {
    this.config = deps.config;
    this.parser = deps.parser ?? new EvidenceParser();
    this.logger = deps.logger ?? getLogger();
    this.errorCollector =
      deps.errorCollector ??
      new ErrorSignalCollector(deps.queryClient, deps.config.scope, this.logger);
    this.latencyCollector =
      deps.latencyCollector ??
      new LatencySignalCollector(
        deps.queryClient,
        deps.config.scope,
        deps.config.latencyTracesLimit,
        this.logger
      );
  }

  /**
   * Decide which candidates the window's evidence supports.
   *
   * @throws ValidationError for a malformed window or candidate set
   * @throws CollectionFailure when a collector fails (both, in best-effort mode)
   * @throws the abort reason when `options.signal` is aborted
   */
  async analyze(
    window: TimeWindow,
    candidates: CandidateInput,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisResult> {
    assertValidWindow(window);
    const labels = normalizeCandidates(candidates);

    if (labels.length === 0) {
      return buildResult(window, [], 0, 0, 0, []);
    }

    options.signal?.throwIfAborted();

    this.logger.info("[analyze] Starting analysis", {
      window: formatWindow(window),
      candidates: labels.length,
      focus: options.focus ?? "all",
    });

    const signals = await this.collect(window, labels, options);

    const errorRecords = this.config.rootSpansOnly
      ? selectRootCauseSpans(signals.errors)
      : signals.errors;
    const latencyRecords = this.config.exclusiveLatencyOnly
      ? selectBottleneckSpans(signals.latency, this.config.durationThresholdNanos)
      : signals.latency;

    const candidateSet = new Set(labels);
    const tally = new EvidenceTally();
    let unmatched = 0;

    const tallyRecords = (records: LogRecord[], signal: SignalKind) => {
      for (const record of records) {
        const evidence = this.parser.parse(record.evidence);
        const match = matchCandidate(
          evidence,
          candidateSet,
          signal,
          this.config.faultKinds
        );
        if (match) {
          tally.add(match, signal);
        } else {
          unmatched++;
        }
      }
    };

    tallyRecords(errorRecords, "error");
    tallyRecords(latencyRecords, "latency");

    const causes = rankCandidates(labels, tally);

    this.logger.info("[analyze] Analysis complete", {
      errorRecords: signals.errors.length,
      latencyViolations: signals.latency.length,
      matched: tally.matchedRecords,
      rootCauses: causes.map((c) => c.candidate),
    });

    return buildResult(
      window,
      causes,
      signals.errors.length,
      signals.latency.length,
      unmatched,
      signals.degraded
    );
  }

  private async collect(
    window: TimeWindow,
    candidates: string[],
    { signal, focus }: AnalyzeOptions
  ): Promise<CollectedSignals> {
    const wanted = (kind: SignalKind) => focus === undefined || focus === kind;

    const [errors, latency] = await abortable(
      Promise.allSettled([
        wanted("error")
          ? this.errorCollector.collectErrors(window, this.config.errorTracesLimit, {
              signal,
            })
          : Promise.resolve<LogRecord[]>([]),
        wanted("latency")
          ? this.latencyCollector.collectLatencyViolations(
              window,
              this.config.durationThresholdNanos,
              { signal }
            )
          : Promise.resolve<LogRecord[]>([]),
      ]),
      signal
    );

    signal?.throwIfAborted();

    const failures: CollectorFailure[] = [];
    if (errors.status === "rejected") {
      failures.push({ collector: "error", error: toError(errors.reason) });
    }
    if (latency.status === "rejected") {
      failures.push({ collector: "latency", error: toError(latency.reason) });
    }

    for (const failure of failures) {
      this.logger.error(`[analyze] ${failure.collector} collector failed`, {
        window: formatWindow(window),
        error: failure.error.message,
      });
    }

    // At least one requested collector must have succeeded
    const requested = focus === undefined ? 2 : 1;
    const tolerated = this.config.bestEffort && failures.length < requested;
    if (failures.length > 0 && !tolerated) {
      throw new CollectionFailure(failures, window, candidates);
    }

    if (failures.length > 0) {
      this.logger.warn("[analyze] Continuing in best-effort mode", {
        skipped: failures[0]?.collector,
      });
    }

    return {
      errors: errors.status === "fulfilled" ? errors.value : [],
      latency: latency.status === "fulfilled" ? latency.value : [],
      degraded: failures.map((f) => f.collector),
    };
  }
}

// ============================================
// Result
// ============================================

function buildResult(
  window: TimeWindow,
  causes: AnalysisResult["causes"],
  errorRecordsExamined: number,
  latencyViolations: number,
  unmatchedRecords: number,
  degraded: SignalKind[]
): AnalysisResult {
  return Object.freeze({
    window,
    rootCauses: Object.freeze(causes.map((c) => c.candidate)),
    causes: Object.freeze(causes.map((c) => Object.freeze({ ...c }))),
    errorRecordsExamined,
    latencyViolations,
    unmatchedRecords,
    degraded: Object.freeze([...degraded]),
  });
}

/**
 * Convenience factory.
 */
export function createRootCauseAnalyzer(deps: RootCauseAnalyzerDeps): RootCauseAnalyzer {
  return new RootCauseAnalyzer(deps);
}
