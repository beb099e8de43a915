import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { CANONICAL_ERROR_KINDS } from "../types/index.js";
import { HTTP_STATUS_TABLE, classifyKind, classifyProviderError, isTableCode, malformedResponse } from "./error-table.js";
import type { ErrorCodeTable } from "./error-table.js";
import { OPENAI_ERROR_CODES, OPENAI_ERROR_TABLE } from "./openai/openai-transformer.js";
import { ANTHROPIC_ERROR_CODES, ANTHROPIC_ERROR_TABLE } from "./anthropic/anthropic-transformer.js";
import { VERTEX_ERROR_CODES, VERTEX_ERROR_TABLE } from "./vertex/vertex-transformer.js";

interface TableCase {
  name: string;
  codes: readonly string[];
  table: ErrorCodeTable<string>;
}

const TABLES: TableCase[] = [
  { name: "OpenAI", codes: OPENAI_ERROR_CODES, table: OPENAI_ERROR_TABLE },
  { name: "Anthropic", codes: ANTHROPIC_ERROR_CODES, table: ANTHROPIC_ERROR_TABLE },
  { name: "Vertex AI", codes: VERTEX_ERROR_CODES, table: VERTEX_ERROR_TABLE },
];

describe.each(TABLES)("$name error table", ({ codes, table }) => {
  it("lists each code once and maps exactly the listed codes", () => {
    expect(new Set(codes).size).toBe(codes.length);
    expect(Object.keys(table).sort()).toEqual([...codes].sort());
  });

  it("maps every code to a canonical kind", () => {
    for (const code of codes) {
      expect(CANONICAL_ERROR_KINDS).toContain(table[code]);
    }
  });

  it("classifies unlisted codes by HTTP status, then as Unknown", () => {
    fc.assert(
      fc.property(
        fc.string().filter((code) => !isTableCode(table, code)),
        fc.integer({ min: 0, max: 599 }),
        (code, status) => {
          expect(classifyKind(table, code, status)).toBe(HTTP_STATUS_TABLE[status] ?? "Unknown");
        },
      ),
    );
  });
});

describe("classifyKind", () => {
  it("prefers the provider code over the status", () => {
    expect(classifyKind(OPENAI_ERROR_TABLE, "rate_limit_exceeded", 500)).toBe("RateLimited");
  });

  it("falls back to the status without a code", () => {
    expect(classifyKind(OPENAI_ERROR_TABLE, undefined, 401)).toBe("AuthError");
  });

  it("returns Unknown when neither is known", () => {
    expect(classifyKind(OPENAI_ERROR_TABLE, "mystery", 418)).toBe("Unknown");
  });

  it("ignores inherited object keys", () => {
    expect(classifyKind(OPENAI_ERROR_TABLE, "toString", 0)).toBe("Unknown");
  });
});

describe("classifyProviderError", () => {
  it("carries the status, provider and code", () => {
    const err = classifyProviderError("Acme", ANTHROPIC_ERROR_TABLE, { ok: false, status: 429, body: {} }, {
      code: "rate_limit_error",
      message: "slow down",
    });
    expect(err).toMatchObject({
      kind: "RateLimited",
      message: "slow down",
      statusCode: 429,
      provider: "Acme",
      providerCode: "rate_limit_error",
    });
  });

  it("uses a plain-text body as the message", () => {
    const err = classifyProviderError("Acme", ANTHROPIC_ERROR_TABLE, { ok: false, status: 502, body: "Bad gateway" }, {});
    expect(err.message).toBe("Bad gateway");
    expect(err.kind).toBe("ProviderUnavailable");
    expect(err.providerCode).toBeUndefined();
  });

  it("describes the status when the body says nothing", () => {
    const err = classifyProviderError("Acme", ANTHROPIC_ERROR_TABLE, { ok: false, status: 503, body: null }, {});
    expect(err.message).toBe("Acme returned HTTP 503");
  });
});

describe("malformedResponse", () => {
  it("is an Unknown error naming the provider", () => {
    expect(malformedResponse("Acme", "no body", 200)).toMatchObject({
      kind: "Unknown",
      message: "Malformed Acme response: no body",
      provider: "Acme",
      statusCode: 200,
    });
  });
});
