import { describe, it, expect } from "vitest";
import { analysisFocus } from "../cases/analysis-focus";

describe("analysisFocus", () => {
  it("should keep both signals without alarm rules", () => {
    expect(analysisFocus(undefined)).toBeUndefined();
    expect(analysisFocus([])).toBeUndefined();
  });

  it("should focus on errors for error-rate rules", () => {
    expect(analysisFocus(["HTTP Error rate > 5%"])).toBe("error");
  });

  it("should focus on latency for response-time rules", () => {
    expect(analysisFocus(["P99 latency > 2s"])).toBe("latency");
    expect(analysisFocus(["avg response time"])).toBe("latency");
  });

  it("should prefer errors when rules name both signals", () => {
    expect(analysisFocus(["p99 latency > 2s", "error count > 10"])).toBe("error");
  });

  it("should keep both signals for unrelated rules", () => {
    expect(analysisFocus(["cpu usage > 90%"])).toBeUndefined();
  });
});
