export type CanonicalErrorKind =
  | "AuthError"
  | "RateLimited"
  | "InvalidRequest"
  | "ProviderUnavailable"
  | "UnsupportedCapability"
  | "Timeout"
  | "Unknown";

export const CANONICAL_ERROR_KINDS: readonly CanonicalErrorKind[] = [
  "AuthError",
  "RateLimited",
  "InvalidRequest",
  "ProviderUnavailable",
  "UnsupportedCapability",
  "Timeout",
  "Unknown",
];

export interface CanonicalErrorOptions {
  /** Provider-native HTTP status, passed through untouched. */
  statusCode?: number;
  provider?: string;
  /** Provider-native error code or type string that was classified. */
  providerCode?: string;
  payload?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * The single error type that leaves a Handler or the Dispatcher.
 * Callers branch on `kind`; everything else is diagnostic.
 */
export class CanonicalError extends Error {
  readonly kind: CanonicalErrorKind;
  readonly statusCode?: number;
  readonly provider?: string;
  readonly providerCode?: string;
  readonly payload: Readonly<Record<string, unknown>>;

  constructor(kind: CanonicalErrorKind, message: string, options: CanonicalErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CanonicalError";
    this.kind = kind;
    if (options.statusCode !== undefined) this.statusCode = options.statusCode;
    if (options.provider !== undefined) this.provider = options.provider;
    if (options.providerCode !== undefined) this.providerCode = options.providerCode;
    this.payload = Object.freeze({ ...(options.payload ?? {}) });
    Object.freeze(this);
  }

  get retryable(): boolean {
    return this.kind === "RateLimited" || this.kind === "ProviderUnavailable" || this.kind === "Timeout";
  }
}

export function isCanonicalError(err: unknown): err is CanonicalError {
  return err instanceof CanonicalError;
}

export function invalidRequest(message: string, payload?: Record<string, unknown>): CanonicalError {
  return new CanonicalError("InvalidRequest", message, payload ? { payload } : {});
}

/** Wraps anything thrown from outside the core into the taxonomy, leaving canonical errors as they are. */
export function toCanonicalError(err: unknown, fallback: CanonicalErrorKind = "Unknown"): CanonicalError {
  if (isCanonicalError(err)) return err;
  return new CanonicalError(
    fallback,
    err instanceof Error ? err.message : `Unexpected error: ${String(err)}`,
    { cause: err },
  );
}
