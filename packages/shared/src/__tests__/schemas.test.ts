import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors";
import { resolveAnalysisConfig } from "../rca/schemas";
import { TEST_SCOPE, captureError } from "./helpers";

describe("resolveAnalysisConfig", () => {
  it("should apply defaults", () => {
    const config = resolveAnalysisConfig({ scope: TEST_SCOPE });

    expect(config).toEqual({
      scope: TEST_SCOPE,
      errorTracesLimit: 2000,
      latencyTracesLimit: 2000,
      durationThresholdNanos: 2_000_000_000,
      bestEffort: false,
      rootSpansOnly: true,
      exclusiveLatencyOnly: true,
      faultKinds: {
        error: ["Failure", "Unreachable", "CacheFailure"],
        latency: ["cpu", "memory", "networkLatency", "latency", "LargeGc", "FloodHomepage"],
      },
    });
  });

  it("should keep explicit values", () => {
    const config = resolveAnalysisConfig({
      scope: TEST_SCOPE,
      durationThresholdNanos: 0,
      bestEffort: true,
      faultKinds: { error: ["Crash"], latency: [] },
    });

    expect(config.durationThresholdNanos).toBe(0);
    expect(config.bestEffort).toBe(true);
    expect(config.faultKinds).toEqual({ error: ["Crash"], latency: [] });
  });

  it("should list every invalid field", async () => {
    const error = await captureError(
      Promise.resolve().then(() =>
        resolveAnalysisConfig({
          scope: { ...TEST_SCOPE, project: "" },
          errorTracesLimit: 0,
        })
      )
    );

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.issues).toEqual([
        "scope.project: String must contain at least 1 character(s)",
        "errorTracesLimit: Number must be greater than 0",
      ]);
    }
  });
});
