import { describe, expect, it } from "vitest";
import {
  getErrorMessage,
  InternalError,
  SessionRequiredError,
  ShellgateError,
  wrapError,
} from "../../index.js";

describe("ShellgateError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ShellgateError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.grpcCode).toBe("INTERNAL");
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should support metadata", () => {
    const error = new InternalError("With metadata", { userId: "123" });
    expect(error.metadata).toEqual({ userId: "123" });
  });

  it("should serialize to JSON", () => {
    const error = new InternalError("JSON test", { key: "value" });
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "InternalError",
      name: "InternalError",
      code: "INTERNAL_ERROR",
      message: "JSON test",
      domain: "internal",
      httpStatus: 500,
      grpcCode: "INTERNAL",
      isExpected: false,
      metadata: { key: "value" },
    });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });

  it("should convert to string with metadata", () => {
    const error = new InternalError("String test", { key: "value" });

    expect(error.toString()).toBe('InternalError [INTERNAL_ERROR]: String test {"key":"value"}');
  });

  it("should omit empty metadata from string form", () => {
    expect(new InternalError("Plain", {}).toString()).toBe("InternalError [INTERNAL_ERROR]: Plain");
  });
});

describe("error utilities", () => {
  it("should pass ShellgateErrors through wrapError unchanged", () => {
    const error = new SessionRequiredError();
    expect(wrapError(error)).toBe(error);
  });

  it("should wrap plain errors in InternalError with the original as cause", () => {
    const original = new TypeError("boom");
    const wrapped = wrapError(original);

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.cause).toBe(original);
  });

  it("should wrap strings and unknown values", () => {
    expect(wrapError("text failure").message).toBe("text failure");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });

  it("should extract messages from unknown values", () => {
    expect(getErrorMessage(new Error("a"))).toBe("a");
    expect(getErrorMessage("b")).toBe("b");
    expect(getErrorMessage({ message: "c" })).toBe("An unknown error occurred");
  });
});
