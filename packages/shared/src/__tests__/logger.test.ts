import { describe, it, expect, vi } from "vitest";
import { createLogger, type LogHandler } from "../logger";

describe("Logger", () => {
  it("should drop messages below the configured level", () => {
    const handler = vi.fn<LogHandler>();
    const logger = createLogger({ enabled: true, level: "warn", handler });

    logger.info("[test] ignored");
    logger.warn("[test] kept", { attempt: 1 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith("warn", "[test] kept", { attempt: 1 });
  });

  it("should stay silent when disabled", () => {
    const handler = vi.fn<LogHandler>();
    createLogger({ enabled: false, handler }).error("[test] hidden");
    expect(handler).not.toHaveBeenCalled();
  });

  it("should share level and handler with children", () => {
    const handler = vi.fn<LogHandler>();
    const child = createLogger({ enabled: true, level: "error", handler }).child("runner");

    child.warn("[test] ignored");
    child.error("[test] kept");

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("should write to the console without a handler", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    createLogger({ enabled: true, prefix: "test" }).warn("careful");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toMatch(/^\d{4}-\d{2}-\d{2}T.* \[test\] careful$/);
    spy.mockRestore();
  });
});
