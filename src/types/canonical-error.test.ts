import { describe, it, expect, expectTypeOf } from "vitest";
import {
  CANONICAL_ERROR_KINDS,
  CanonicalError,
  invalidRequest,
  isCanonicalError,
  toCanonicalError,
} from "./canonical-error.js";
import type { CanonicalErrorKind } from "./canonical-error.js";

describe("CanonicalError type shape", () => {
  it("kind is the closed taxonomy", () => {
    expectTypeOf<CanonicalError["kind"]>().toEqualTypeOf<
      | "AuthError"
      | "RateLimited"
      | "InvalidRequest"
      | "ProviderUnavailable"
      | "UnsupportedCapability"
      | "Timeout"
      | "Unknown"
    >();
  });

  it("statusCode is an optional number", () => {
    expectTypeOf<CanonicalError["statusCode"]>().toEqualTypeOf<number | undefined>();
  });

  it("is an Error", () => {
    expectTypeOf<CanonicalError>().toMatchTypeOf<Error>();
  });
});

describe("CanonicalError", () => {
  it("lists every kind exactly once", () => {
    expect(new Set(CANONICAL_ERROR_KINDS).size).toBe(7);
  });

  it("carries kind, status and provider code", () => {
    const err = new CanonicalError("RateLimited", "slow down", {
      statusCode: 429,
      provider: "OpenAI",
      providerCode: "rate_limit_exceeded",
    });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("CanonicalError");
    expect(err.kind).toBe("RateLimited");
    expect(err.message).toBe("slow down");
    expect(err.statusCode).toBe(429);
    expect(err.providerCode).toBe("rate_limit_exceeded");
    expect(err.payload).toEqual({});
  });

  it("is immutable after construction", () => {
    const err = new CanonicalError("Unknown", "boom", { payload: { a: 1 } });
    expect(Object.isFrozen(err)).toBe(true);
    expect(Object.isFrozen(err.payload)).toBe(true);
    expect(Reflect.set(err, "kind", "Timeout")).toBe(false);
    expect(err.kind).toBe("Unknown");
  });

  it.each<[CanonicalErrorKind, boolean]>([
    ["RateLimited", true],
    ["ProviderUnavailable", true],
    ["Timeout", true],
    ["AuthError", false],
    ["InvalidRequest", false],
    ["UnsupportedCapability", false],
    ["Unknown", false],
  ])("%s retryable = %s", (kind, retryable) => {
    expect(new CanonicalError(kind, "x").retryable).toBe(retryable);
  });
});

describe("toCanonicalError", () => {
  it("returns canonical errors unchanged", () => {
    const err = invalidRequest("bad", { field: "model" });
    expect(toCanonicalError(err)).toBe(err);
  });

  it("wraps other errors as Unknown with the original as cause", () => {
    const cause = new TypeError("nope");
    const wrapped = toCanonicalError(cause);
    expect(isCanonicalError(wrapped)).toBe(true);
    expect(wrapped.kind).toBe("Unknown");
    expect(wrapped.message).toBe("nope");
    expect(wrapped.cause).toBe(cause);
  });

  it("describes non-Error throws", () => {
    expect(toCanonicalError("text", "ProviderUnavailable")).toMatchObject({
      kind: "ProviderUnavailable",
      message: "Unexpected error: text",
    });
  });
});
