import type { Credentials } from "../credentials/index.js";

export type HttpMethod = "GET" | "POST" | "DELETE";

/** A provider call in wire terms. Built by a transformer, sent by a transport. */
export interface ProviderRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
}

export interface ProviderResponse {
  ok: true;
  status: number;
  body: unknown;
}

/** A non-2xx reply. `body` is the parsed JSON error payload, or the raw text. */
export interface ProviderError {
  ok: false;
  status: number;
  body: unknown;
}

export type ProviderReply = ProviderResponse | ProviderError;

/** One server-sent event: the event name, if any, and its data payload. */
export interface ProviderStreamEvent {
  event?: string;
  data: string;
}

export interface TransportStream extends AsyncIterable<ProviderStreamEvent> {
  readonly closed: boolean;
  /** Releases the underlying connection. Safe to call more than once. */
  close(): Promise<void>;
}

export interface SendOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** False for calls that must reach the provider at most once (job submission). Defaults to true. */
  idempotent?: boolean;
}

/**
 * The narrow contract the core needs from the network. Retries and backoff
 * live behind it.
 */
export interface Transport {
  /** Throws TransportTimeoutError when `timeoutMs` elapses; other throws are connection failures. */
  send(request: ProviderRequest, credentials: Credentials, options: SendOptions): Promise<ProviderReply>;
  /** Opens a stream; `timeoutMs` bounds the wait for the first byte. */
  open(request: ProviderRequest, credentials: Credentials, options: SendOptions): Promise<TransportStream | ProviderError>;
}

export class TransportTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Transport timed out after ${timeoutMs}ms`);
    this.name = "TransportTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class TransportAbortedError extends Error {
  constructor() {
    super("Transport call aborted by caller");
    this.name = "TransportAbortedError";
  }
}
