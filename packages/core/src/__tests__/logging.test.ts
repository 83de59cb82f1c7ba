import { afterEach, describe, expect, it, vi } from "vitest";
import { describeError, log, setLogSink } from "../logging.js";

describe("logging", () => {
  afterEach(() => {
    setLogSink();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("writes one JSON line with a timestamp through console.log by default", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-01T10:00:00.000Z"));
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});

    log({ type: "refresh_without_operation", level: "warn" });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(
      '{"type":"refresh_without_operation","level":"warn","timestamp":"2024-05-01T10:00:00.000Z"}'
    );
  });

  it("setLogSink swaps the sink and returns the previous one", () => {
    const first = vi.fn();
    const second = vi.fn();

    setLogSink(first);
    const prev = setLogSink(second);
    log({ type: "x", level: "info", extra: 1 });

    expect(prev).toBe(first);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith(
      expect.objectContaining({ type: "x", level: "info", extra: 1 })
    );
  });

  it("describeError keeps name and message of an Error", () => {
    const err = new TypeError("bad input");
    expect(describeError(err)).toEqual({ name: "TypeError", message: "bad input", stack: err.stack });
  });

  it("describeError stringifies a non-Error value", () => {
    expect(describeError("x")).toEqual({ name: "string", message: "x" });
    expect(describeError(42)).toEqual({ name: "number", message: "42" });
  });
});
