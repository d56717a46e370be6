import { describe, it, expect } from "vitest";
import { ServiceError, errorBody, httpStatusFor, toServiceError } from "./errors";

describe("ServiceError", () => {
  it("derives status and retryability from the kind", () => {
    expect(new ServiceError("ConnectionFailed", "x")).toMatchObject({ status: 502, retryable: true });
    expect(new ServiceError("AuthError", "x")).toMatchObject({ status: 401, retryable: false });
    expect(new ServiceError("Timeout", "x", { retryable: false })).toMatchObject({ status: 504, retryable: false });
    expect(httpStatusFor("UnsupportedFormat")).toBe(415);
    expect(httpStatusFor("ValidationError")).toBe(400);
  });

  it("wraps unknown throwables as Internal", () => {
    const original = new Error("boom");
    const wrapped = toServiceError(original);

    expect(wrapped.kind).toBe("Internal");
    expect(wrapped.cause).toBe(original);
    expect(toServiceError("plain string").message).toBe("plain string");

    const known = new ServiceError("NotFound", "missing");
    expect(toServiceError(known)).toBe(known);
  });

  it("builds the public error body", () => {
    expect(errorBody(new ServiceError("ParseError", "bad json", { stage: "summarization" }))).toEqual({
      kind: "ParseError",
      message: "bad json",
      stage: "summarization",
    });
    expect(errorBody(new ServiceError("Internal", "stack details"))).toEqual({
      kind: "Internal",
      message: "Internal server error",
    });
  });
});
