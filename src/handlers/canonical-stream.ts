import { CanonicalError, createCanonicalResponse, isCanonicalError } from "../types/index.js";
import type {
  CanonicalRequest,
  CanonicalResponse,
  CanonicalResponseFragment,
  FinishReason,
  UsageMetrics,
} from "../types/index.js";
import { TransportAbortedError, TransportTimeoutError } from "../transport/index.js";
import type { ProviderStreamEvent, TransportStream } from "../transport/index.js";
import type { ProviderTransformer } from "../providers/index.js";

export function abortedError(provider: string): CanonicalError {
  return new CanonicalError("Unknown", "Request aborted by caller", { provider, payload: { reason: "aborted" } });
}

export interface CanonicalStreamOptions {
  signal?: AbortSignal;
  /** Longest wait for the next transport event. */
  idleTimeoutMs?: number;
  /** Epoch milliseconds by which the whole stream must finish. */
  deadline?: number;
}

/**
 * Lazy, finite, single-pass sequence of canonical fragments over one open
 * transport stream. The transport stream is closed exactly once, whether the
 * consumer finishes, breaks out early, calls `close()`, or an error ends it.
 */
export class CanonicalStream implements AsyncIterable<CanonicalResponseFragment> {
  readonly request: CanonicalRequest;
  private readonly source: TransportStream;
  private readonly transformer: ProviderTransformer;
  private readonly provider: string;
  private readonly signal: AbortSignal | undefined;
  private readonly idleTimeoutMs: number | undefined;
  private readonly deadline: number | undefined;
  private started = false;
  private aborted = false;
  private stalled = false;
  private closeFailure: unknown;

  constructor(
    source: TransportStream,
    transformer: ProviderTransformer,
    request: CanonicalRequest,
    provider: string,
    options: CanonicalStreamOptions = {},
  ) {
    this.source = source;
    this.transformer = transformer;
    this.request = request;
    this.provider = provider;
    this.signal = options.signal;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.deadline = options.deadline;
    this.signal?.addEventListener("abort", this.onAbort, { once: true });
  }

  get closed(): boolean {
    return this.source.closed;
  }

  async close(): Promise<void> {
    this.detach();
    await this.source.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<CanonicalResponseFragment> {
    if (this.started) {
      throw new CanonicalError("InvalidRequest", "A canonical stream can only be iterated once", {
        provider: this.provider,
      });
    }
    this.started = true;

    const events = this.source[Symbol.asyncIterator]();
    let exhausted = false;
    let index = 0;
    try {
      if (this.signal?.aborted) this.aborted = true;
      while (!this.aborted) {
        const next = await this.nextEvent(events);
        if (next.done) {
          exhausted = true;
          break;
        }
        if (this.aborted) break;
        const fragment = this.toFragment(next.value, index);
        if (fragment === null) continue;
        index++;
        yield fragment;
      }
      if (this.aborted) throw abortedError(this.provider);
      if (this.closeFailure !== undefined) throw this.closeFailure;
    } catch (err) {
      throw this.toStreamError(err);
    } finally {
      // A stalled read is still pending; return() would queue behind it.
      if (!exhausted && !this.stalled) await events.return?.();
      await this.close();
    }
  }

  private async nextEvent(events: AsyncIterator<ProviderStreamEvent>): Promise<IteratorResult<ProviderStreamEvent>> {
    const waitMs = this.waitLimit();
    if (waitMs === undefined) return events.next();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        this.stalled = true;
        reject(
          new CanonicalError("Timeout", `${this.transformer.name} stream sent nothing for ${waitMs}ms`, {
            provider: this.provider,
            payload: { timeoutMs: waitMs },
          }),
        );
      }, waitMs);
    });
    try {
      return await Promise.race([events.next(), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private waitLimit(): number | undefined {
    if (this.deadline === undefined) return this.idleTimeoutMs;
    const remaining = Math.max(0, this.deadline - Date.now());
    return this.idleTimeoutMs === undefined ? remaining : Math.min(this.idleTimeoutMs, remaining);
  }

  private readonly onAbort = (): void => {
    this.aborted = true;
    // Unblocks a pending read; the iterator reports the abort.
    this.source.close().then(undefined, (err: unknown) => {
      this.closeFailure = err;
    });
  };

  private detach(): void {
    this.signal?.removeEventListener("abort", this.onAbort);
  }

  private toFragment(event: ProviderStreamEvent, index: number): CanonicalResponseFragment | null {
    const mapped = this.transformer.fromStreamEvent(event, this.request, index);
    if (isCanonicalError(mapped)) throw mapped;
    return mapped;
  }

  private toStreamError(err: unknown): CanonicalError {
    if (isCanonicalError(err)) return err;
    if (err instanceof TransportTimeoutError) {
      return new CanonicalError("Timeout", `${this.transformer.name} stream timed out`, {
        provider: this.provider,
        cause: err,
      });
    }
    if (err instanceof TransportAbortedError) return abortedError(this.provider);
    return new CanonicalError(
      "ProviderUnavailable",
      `${this.transformer.name} stream failed: ${err instanceof Error ? err.message : String(err)}`,
      { provider: this.provider, cause: err },
    );
  }
}

/**
 * Providers split stream usage across events (Anthropic sends input tokens at
 * the start and output tokens at the end) or repeat running totals, so each
 * count keeps its largest reported value.
 */
function mergeUsage(current: UsageMetrics | undefined, next: UsageMetrics): UsageMetrics {
  if (current === undefined) return { ...next };
  const input_tokens = Math.max(current.input_tokens, next.input_tokens);
  const output_tokens = Math.max(current.output_tokens, next.output_tokens);
  return {
    input_tokens,
    output_tokens,
    total_tokens: Math.max(current.total_tokens, next.total_tokens, input_tokens + output_tokens),
  };
}

/** Drains a stream into a single response with one result item. */
export async function collectStream(stream: CanonicalStream): Promise<CanonicalResponse> {
  const fragments: CanonicalResponseFragment[] = [];
  let content = "";
  let finishReason: FinishReason = "stop";
  let finalUsage: UsageMetrics | undefined;

  for await (const fragment of stream) {
    fragments.push(fragment);
    content += fragment.delta;
    if (fragment.finish_reason) finishReason = fragment.finish_reason;
    if (fragment.usage) finalUsage = mergeUsage(finalUsage, fragment.usage);
  }

  return createCanonicalResponse({
    id: stream.request.id,
    kind: stream.request.kind,
    model_used: stream.request.model,
    result: [{ index: 0, role: "assistant", content, finish_reason: finishReason }],
    usage: finalUsage,
    raw: fragments,
  });
}
