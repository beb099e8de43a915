import { CanonicalError } from "../types/index.js";
import type { CanonicalErrorKind } from "../types/index.js";
import type { ProviderError } from "../transport/index.js";

/**
 * Provider error code → canonical kind. Declare it with
 * `satisfies ErrorCodeTable<Code>` over the provider's code union so that an
 * unmapped code fails to compile.
 */
export type ErrorCodeTable<Code extends string> = Readonly<Record<Code, CanonicalErrorKind>>;

/** Fallback when the provider's code is absent or not in its table. */
export const HTTP_STATUS_TABLE: Readonly<Record<number, CanonicalErrorKind>> = {
  400: "InvalidRequest",
  401: "AuthError",
  403: "AuthError",
  404: "InvalidRequest",
  408: "Timeout",
  409: "InvalidRequest",
  413: "InvalidRequest",
  422: "InvalidRequest",
  429: "RateLimited",
  500: "ProviderUnavailable",
  501: "UnsupportedCapability",
  502: "ProviderUnavailable",
  503: "ProviderUnavailable",
  504: "Timeout",
  529: "ProviderUnavailable",
};

export interface ExtractedError {
  code?: string;
  message?: string;
}

export function isTableCode<Code extends string>(table: ErrorCodeTable<Code>, code: string): code is Code {
  return Object.hasOwn(table, code);
}

/** Table first, then HTTP status, then Unknown. Total over every input. */
export function classifyKind<Code extends string>(
  table: ErrorCodeTable<Code>,
  code: string | undefined,
  status: number,
): CanonicalErrorKind {
  if (code !== undefined && isTableCode(table, code)) return table[code];
  return HTTP_STATUS_TABLE[status] ?? "Unknown";
}

export function classifyProviderError<Code extends string>(
  provider: string,
  table: ErrorCodeTable<Code>,
  error: ProviderError,
  extracted: ExtractedError,
): CanonicalError {
  const kind = classifyKind(table, extracted.code, error.status);
  const message =
    extracted.message ?? (typeof error.body === "string" && error.body !== "" ? error.body : undefined);
  return new CanonicalError(kind, message ?? `${provider} returned HTTP ${error.status}`, {
    statusCode: error.status,
    provider,
    ...(extracted.code !== undefined ? { providerCode: extracted.code } : {}),
  });
}

export function malformedResponse(provider: string, detail: string, status?: number): CanonicalError {
  return new CanonicalError("Unknown", `Malformed ${provider} response: ${detail}`, {
    provider,
    ...(status !== undefined ? { statusCode: status } : {}),
  });
}
