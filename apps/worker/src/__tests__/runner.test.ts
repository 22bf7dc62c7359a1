import { describe, it, expect, vi } from "vitest";
import {
  CollectionFailure,
  QueryError,
  createLogger,
  type AnalysisResult,
  type AnalyzeOptions,
  type CandidateInput,
  type LogHandler,
  type TimeWindow,
} from "@faultline/shared";
import { runCases, type CaseAnalyzer } from "../cases/runner";
import type { IncidentCase } from "../cases/schemas";

function result(window: TimeWindow, rootCauses: string[]): AnalysisResult {
  return {
    window,
    rootCauses,
    causes: [],
    errorRecordsExamined: 0,
    latencyViolations: 0,
    unmatchedRecords: 0,
    degraded: [],
  };
}

function incident(id: string, candidates: string[], timeRange?: string): IncidentCase {
  return {
    problem_id: id,
    time_range: timeRange ?? "2025-08-28 15:08:03 ~ 2025-08-28 15:13:03",
    candidate_root_causes: candidates,
  };
}

/** Analyzer that confirms candidates listed in `confirmed` */
function fakeAnalyzer(confirmed: Record<string, string[]>) {
  return {
    analyze: vi.fn(async (window: TimeWindow, candidates: CandidateInput, _options?: AnalyzeOptions) =>
      result(
        window,
        Array.from(candidates).flatMap((c) => confirmed[c] ?? [])
      )
    ),
  } satisfies CaseAnalyzer;
}

const silent = createLogger({ enabled: false });

describe("runCases", () => {
  it("should produce one output per case in order", async () => {
    const analyzer = fakeAnalyzer({ payment: ["payment"] });

    const { outputs, summary } = await runCases(
      analyzer,
      [incident("p-001", ["payment", "inventory"]), incident("p-002", ["inventory"])],
      { logger: silent }
    );

    expect(outputs).toEqual([
      { problem_id: "p-001", root_causes: ["payment"] },
      { problem_id: "p-002", root_causes: [] },
    ]);
    expect(summary).toEqual({ total: 2, resolved: 1, unresolved: 1, failed: 0, aborted: false });
  });

  it("should pass the parsed window to the analyzer", async () => {
    const analyzer = fakeAnalyzer({});

    await runCases(analyzer, [incident("p-001", ["payment"])], { logger: silent });

    expect(analyzer.analyze).toHaveBeenCalledWith(
      {
        start: new Date(2025, 7, 28, 15, 8, 3).getTime(),
        end: new Date(2025, 7, 28, 15, 13, 3).getTime(),
      },
      ["payment"],
      { signal: undefined, focus: undefined }
    );
  });

  it("should focus the analysis on the signal named by alarm rules", async () => {
    const analyzer = fakeAnalyzer({});

    await runCases(
      analyzer,
      [
        { ...incident("p-001", ["checkout"]), alarm_rules: ["P99 latency > 2s"] },
        { ...incident("p-002", ["payment"]), alarm_rules: ["HTTP error rate > 5%"] },
        incident("p-003", ["inventory"]),
      ],
      { logger: silent }
    );

    expect(analyzer.analyze.mock.calls.map((call) => call[2]?.focus)).toEqual([
      "latency",
      "error",
      undefined,
    ]);
  });

  it("should keep a negative result apart from a failed case", async () => {
    const analyzer = fakeAnalyzer({});
    analyzer.analyze.mockRejectedValueOnce(
      new CollectionFailure(
        [{ collector: "error", error: new QueryError("busy", { transient: true }) }],
        { start: 0, end: 1000 },
        ["payment"]
      )
    );

    const { outputs } = await runCases(
      analyzer,
      [incident("failed", ["payment"]), incident("negative", ["payment"])],
      { logger: silent }
    );

    expect(outputs).toEqual([
      { problem_id: "failed", root_causes: [], error: "collection_failure" },
      { problem_id: "negative", root_causes: [] },
    ]);
  });

  it("should truncate to the configured number of root causes", async () => {
    const analyzer = fakeAnalyzer({ a: ["a"], b: ["b"], c: ["c"] });

    const { outputs } = await runCases(analyzer, [incident("p-001", ["a", "b", "c"])], {
      maxRootCauses: 2,
      logger: silent,
    });

    expect(outputs[0]?.root_causes).toEqual(["a", "b"]);
  });

  it("should report a failed case with its context and keep going", async () => {
    const handler = vi.fn<LogHandler>();
    const logger = createLogger({ enabled: true, level: "error", handler });
    const analyzer = fakeAnalyzer({ payment: ["payment"] });
    analyzer.analyze.mockImplementationOnce(async (window: TimeWindow, candidates: CandidateInput) => {
      throw new CollectionFailure(
        [{ collector: "latency", error: new QueryError("busy", { transient: true }) }],
        window,
        Array.from(candidates)
      );
    });

    const { outputs, summary } = await runCases(
      analyzer,
      [incident("p-001", ["checkout"]), incident("p-002", ["payment"])],
      { logger }
    );

    expect(outputs).toEqual([
      { problem_id: "p-001", root_causes: [], error: "collection_failure" },
      { problem_id: "p-002", root_causes: ["payment"] },
    ]);
    expect(outputs[1]).not.toHaveProperty("error");
    expect(summary.failed).toBe(1);
    expect(summary.resolved).toBe(1);
    expect(handler).toHaveBeenCalledWith(
      "error",
      "[runner] Case failed",
      expect.objectContaining({
        problemId: "p-001",
        code: "collection_failure",
        candidates: ["checkout"],
        collectors: ["latency"],
      })
    );
  });

  it("should fail a case with a malformed time range without analyzing it", async () => {
    const analyzer = fakeAnalyzer({});

    const { outputs, summary } = await runCases(
      analyzer,
      [incident("p-001", ["payment"], "yesterday")],
      { logger: silent }
    );

    expect(outputs).toEqual([
      { problem_id: "p-001", root_causes: [], error: "validation_error" },
    ]);
    expect(summary.failed).toBe(1);
    expect(analyzer.analyze).not.toHaveBeenCalled();
  });

  it("should stop when aborted mid-run", async () => {
    const controller = new AbortController();
    const analyzer = fakeAnalyzer({});
    analyzer.analyze.mockImplementationOnce(async () => {
      controller.abort(new Error("interrupted"));
      throw new Error("interrupted");
    });

    const { outputs, summary } = await runCases(
      analyzer,
      [incident("p-001", ["a"]), incident("p-002", ["b"])],
      { signal: controller.signal, logger: silent }
    );

    expect(outputs).toEqual([]);
    expect(summary).toMatchObject({ aborted: true, failed: 0 });
    expect(analyzer.analyze).toHaveBeenCalledTimes(1);
  });

  it("should not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const analyzer = fakeAnalyzer({});

    const { outputs, summary } = await runCases(analyzer, [incident("p-001", ["a"])], {
      signal: controller.signal,
      logger: silent,
    });

    expect(outputs).toEqual([]);
    expect(summary.aborted).toBe(true);
    expect(analyzer.analyze).not.toHaveBeenCalled();
  });
});
