import type { Credentials } from "../credentials/index.js";
import { parseSse } from "./sse.js";
import { TransportAbortedError, TransportTimeoutError } from "./transport.js";
import type {
  ProviderError,
  ProviderReply,
  ProviderRequest,
  ProviderStreamEvent,
  SendOptions,
  Transport,
  TransportStream,
} from "./transport.js";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
}

export interface FetchTransportConfig {
  retry: RetryConfig;
  /** HTTP statuses worth another attempt. */
  retryableStatuses: readonly number[];
  fetch: typeof fetch;
}

export const DEFAULT_RETRY: RetryConfig = { maxAttempts: 3, initialDelayMs: 500, backoffMultiplier: 2 };

const DEFAULT_RETRYABLE_STATUSES = [429, 500, 502, 503, 504];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    if (err instanceof SyntaxError) return text;
    throw err;
  }
}

interface Attempt {
  response: Response;
  controller: AbortController;
  /** Stops the deadline timer and detaches from the caller's signal. */
  release: () => void;
}

class ResponseEventStream implements TransportStream {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array> | undefined;
  private readonly attempt: Attempt;
  private done = false;
  private started = false;

  constructor(attempt: Attempt) {
    this.attempt = attempt;
    this.reader = attempt.response.body?.getReader();
  }

  get closed(): boolean {
    return this.done;
  }

  async close(): Promise<void> {
    if (this.done) return;
    this.done = true;
    this.attempt.release();
    try {
      await this.reader?.cancel();
    } finally {
      this.attempt.controller.abort();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ProviderStreamEvent> {
    if (this.started) {
      throw new Error("Transport stream can only be iterated once");
    }
    this.started = true;
    try {
      yield* parseSse(this.chunks());
    } finally {
      await this.close();
    }
  }

  private async *chunks(): AsyncGenerator<string> {
    if (!this.reader) return;
    const decoder = new TextDecoder();
    while (!this.done) {
      const { done, value } = await this.reader.read();
      if (done) break;
      yield decoder.decode(value, { stream: true });
    }
    const tail = decoder.decode();
    if (tail) yield tail;
  }
}

/**
 * Default transport on the global `fetch`. Retries retryable statuses and
 * connection failures with exponential backoff, all inside one deadline of
 * `timeoutMs` per call.
 */
export class FetchTransport implements Transport {
  private readonly config: FetchTransportConfig;

  constructor(config: Partial<FetchTransportConfig> = {}) {
    this.config = {
      retry: config.retry ?? DEFAULT_RETRY,
      retryableStatuses: config.retryableStatuses ?? DEFAULT_RETRYABLE_STATUSES,
      fetch: config.fetch ?? ((input, init) => fetch(input, init)),
    };
  }

  async send(request: ProviderRequest, credentials: Credentials, options: SendOptions): Promise<ProviderReply> {
    return this.withRetry(options, async (remainingMs) => {
      const attempt = await this.attempt(request, credentials, remainingMs, options);
      let body: unknown;
      try {
        body = await readBody(attempt.response);
      } catch (err) {
        // An abort while reading the body is either the caller or our deadline
        if (attempt.controller.signal.aborted) {
          throw options.signal?.aborted ? new TransportAbortedError() : new TransportTimeoutError(remainingMs);
        }
        throw err;
      } finally {
        attempt.release();
      }
      return attempt.response.ok
        ? { ok: true, status: attempt.response.status, body }
        : { ok: false, status: attempt.response.status, body };
    });
  }

  async open(
    request: ProviderRequest,
    credentials: Credentials,
    options: SendOptions,
  ): Promise<TransportStream | ProviderError> {
    return this.withRetry(options, async (remainingMs): Promise<TransportStream | ProviderError> => {
      const attempt = await this.attempt(request, credentials, remainingMs, options);
      if (!attempt.response.ok) {
        try {
          return { ok: false, status: attempt.response.status, body: await readBody(attempt.response) };
        } finally {
          attempt.release();
        }
      }
      // The deadline covers time to first byte; the consumer paces the rest.
      attempt.release();
      return new ResponseEventStream(attempt);
    });
  }

  private isRetryable(result: unknown): boolean {
    return (
      typeof result === "object" &&
      result !== null &&
      "ok" in result &&
      result.ok === false &&
      "status" in result &&
      typeof result.status === "number" &&
      this.config.retryableStatuses.includes(result.status)
    );
  }

  private async withRetry<T>(options: SendOptions, fn: (remainingMs: number) => Promise<T>): Promise<T> {
    const { initialDelayMs, backoffMultiplier } = this.config.retry;
    const maxAttempts = options.idempotent === false ? 1 : this.config.retry.maxAttempts;
    const deadline = Date.now() + options.timeoutMs;
    let delayMs = initialDelayMs;

    for (let attempt = 1; ; attempt++) {
      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) throw new TransportTimeoutError(options.timeoutMs);

      let result: T;
      try {
        result = await fn(remainingMs);
      } catch (err) {
        const final =
          err instanceof TransportTimeoutError ||
          err instanceof TransportAbortedError ||
          attempt >= maxAttempts;
        if (final) {
          throw err instanceof TransportTimeoutError ? new TransportTimeoutError(options.timeoutMs) : err;
        }
        await sleep(Math.min(delayMs, Math.max(0, deadline - Date.now())));
        delayMs *= backoffMultiplier;
        continue;
      }

      if (!this.isRetryable(result) || attempt >= maxAttempts) return result;
      await sleep(Math.min(delayMs, Math.max(0, deadline - Date.now())));
      delayMs *= backoffMultiplier;
    }
  }

  private async attempt(
    request: ProviderRequest,
    credentials: Credentials,
    timeoutMs: number,
    options: SendOptions,
  ): Promise<Attempt> {
    if (options.signal?.aborted) throw new TransportAbortedError();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    const release = (): void => {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    };

    try {
      const response = await this.config.fetch(request.url, {
        method: request.method,
        headers: credentials.apply({ "Content-Type": "application/json", ...request.headers }),
        ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
        signal: controller.signal,
      });
      return { response, controller, release };
    } catch (err) {
      release();
      if (timedOut) throw new TransportTimeoutError(timeoutMs);
      if (options.signal?.aborted) throw new TransportAbortedError();
      throw err;
    }
  }
}
