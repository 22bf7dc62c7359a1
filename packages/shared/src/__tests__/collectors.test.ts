import { describe, it, expect } from "vitest";
import { QueryError, ValidationError } from "../errors";
import { ErrorSignalCollector } from "../rca/collectors/error-collector";
import {
  LatencySignalCollector,
  recordDurationNanos,
} from "../rca/collectors/latency-collector";
import { FakeQueryClient, TEST_SCOPE, TEST_WINDOW, record } from "./helpers";

describe("ErrorSignalCollector", () => {
  it("should issue one scoped error query with the limit", async () => {
    const errors = [record("payment.Timeout"), record("cart.Add")];
    const client = new FakeQueryClient({ errors });
    const collector = new ErrorSignalCollector(client, TEST_SCOPE);

    const result = await collector.collectErrors(TEST_WINDOW, 50);

    expect(result).toEqual(errors);
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]).toMatchObject({
      expression: "statusCode>1",
      window: TEST_WINDOW,
      scope: TEST_SCOPE,
      options: { limit: 50 },
    });
  });

  it("should reject a non-positive limit without querying", async () => {
    const client = new FakeQueryClient();
    const collector = new ErrorSignalCollector(client, TEST_SCOPE);

    await expect(collector.collectErrors(TEST_WINDOW, 0)).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(client.calls).toHaveLength(0);
  });

  it("should propagate query failures unchanged", async () => {
    const failure = new QueryError("backend unavailable", { transient: true });
    const collector = new ErrorSignalCollector(
      new FakeQueryClient({ errors: failure }),
      TEST_SCOPE
    );

    await expect(collector.collectErrors(TEST_WINDOW, 10)).rejects.toBe(failure);
  });
});

describe("LatencySignalCollector", () => {
  it("should query with the threshold and keep only records above it", async () => {
    const slow = record("checkout.PlaceOrder", { duration: "3000000000" });
    const client = new FakeQueryClient({
      latency: [
        slow,
        record("checkout.PlaceOrder", { duration: "2000000000" }),
        record("checkout.PlaceOrder", { duration: "" }),
        record("checkout.PlaceOrder", { duration: "n/a" }),
        record("checkout.PlaceOrder"),
      ],
    });
    const collector = new LatencySignalCollector(client, TEST_SCOPE, 25);

    const result = await collector.collectLatencyViolations(TEST_WINDOW, 2_000_000_000);

    expect(result).toEqual([slow]);
    expect(client.calls[0]).toMatchObject({
      expression: "duration > 2000000000",
      options: { limit: 25 },
    });
  });

  it("should return an empty list when nothing is slow", async () => {
    const collector = new LatencySignalCollector(new FakeQueryClient(), TEST_SCOPE, 25);
    await expect(collector.collectLatencyViolations(TEST_WINDOW, 1000)).resolves.toEqual([]);
  });

  it("should reject a negative threshold", async () => {
    const collector = new LatencySignalCollector(new FakeQueryClient(), TEST_SCOPE, 25);
    await expect(collector.collectLatencyViolations(TEST_WINDOW, -1)).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

describe("recordDurationNanos", () => {
  it("should parse numeric durations", () => {
    expect(recordDurationNanos(record("", { duration: "1500" }))).toBe(1500);
    expect(recordDurationNanos(record("", { duration: "abc" }))).toBeUndefined();
    expect(recordDurationNanos(record(""))).toBeUndefined();
  });
});
