import { describe, expect, it } from "vitest";
import { OperationError } from "../errors.js";

describe("OperationError", () => {
  it("包住 Error 時沿用 message 與 stack", () => {
    const cause = new TypeError("bad response");
    const error = new OperationError(cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("OperationError");
    expect(error.message).toBe("bad response");
    expect(error.cause).toBe(cause);
    expect(error.trace).toBe(cause.stack);
  });

  it("包住非 Error 值時 message 為字串化結果，沒有 trace", () => {
    const error = new OperationError({ code: 404 });

    expect(error.message).toBe("[object Object]");
    expect(error.cause).toEqual({ code: 404 });
    expect(error.trace).toBeUndefined();
  });

  it("明確傳入的 trace 優先", () => {
    const error = new OperationError(new Error("x"), "custom trace");
    expect(error.trace).toBe("custom trace");
  });

  it("from 對 OperationError 原樣回傳，其他值才包一層", () => {
    const existing = new OperationError("x");

    expect(OperationError.from(existing)).toBe(existing);
    expect(OperationError.from("y").cause).toBe("y");
  });
});
