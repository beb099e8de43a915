import type { Credentials } from "../credentials/index.js";
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

export interface SentRequest {
  request: ProviderRequest;
  headers: Record<string, string>;
  options: SendOptions;
}

/** `hang` never answers; it rejects only when the call's signal aborts. */
export type ScriptedReply = ProviderReply | { timeout: true } | { fail: Error } | { hang: true };

export type ReplyScript = ScriptedReply | ((request: ProviderRequest) => ScriptedReply);

export type StreamScript = ProviderStreamEvent[] | ProviderError | { fail: Error } | { hang: true };

/** A scripted stream; `closed` flips when the consumer finishes or walks away. */
export class InMemoryStream implements TransportStream {
  private readonly events: readonly ProviderStreamEvent[];
  private done = false;
  private started = false;
  /** Number of events handed to the consumer. */
  delivered = 0;
  closeCount = 0;

  constructor(events: readonly ProviderStreamEvent[]) {
    this.events = events;
  }

  get closed(): boolean {
    return this.done;
  }

  async close(): Promise<void> {
    if (this.done) return;
    this.done = true;
    this.closeCount++;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ProviderStreamEvent> {
    if (this.started) throw new Error("Transport stream can only be iterated once");
    this.started = true;
    try {
      for (const event of this.events) {
        if (this.done) return;
        this.delivered++;
        yield event;
      }
    } finally {
      await this.close();
    }
  }
}

/**
 * In-process transport that answers from a script instead of the network.
 * Replies are consumed in order; the last one repeats.
 */
export class InMemoryTransport implements Transport {
  readonly sent: SentRequest[] = [];
  readonly streams: InMemoryStream[] = [];
  private readonly replies: ReplyScript[];
  private readonly streamScripts: StreamScript[];

  constructor(script: { replies?: ReplyScript[]; streams?: StreamScript[] } = {}) {
    this.replies = [...(script.replies ?? [])];
    this.streamScripts = [...(script.streams ?? [])];
  }

  get lastRequest(): ProviderRequest | undefined {
    return this.sent[this.sent.length - 1]?.request;
  }

  async send(request: ProviderRequest, credentials: Credentials, options: SendOptions): Promise<ProviderReply> {
    this.record(request, credentials, options);
    const script = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (script === undefined) {
      throw new Error(`InMemoryTransport has no reply scripted for ${request.method} ${request.url}`);
    }
    const reply = typeof script === "function" ? script(request) : script;
    if ("timeout" in reply) throw new TransportTimeoutError(options.timeoutMs);
    if ("fail" in reply) throw reply.fail;
    if ("hang" in reply) return this.hang(options);
    return reply;
  }

  async open(
    request: ProviderRequest,
    credentials: Credentials,
    options: SendOptions,
  ): Promise<TransportStream | ProviderError> {
    this.record(request, credentials, options);
    const script = this.streamScripts.shift();
    if (script === undefined) {
      throw new Error(`InMemoryTransport has no stream scripted for ${request.method} ${request.url}`);
    }
    if ("fail" in script) throw script.fail;
    if ("hang" in script) return this.hang(options);
    if (!Array.isArray(script)) return script;
    const stream = new InMemoryStream(script);
    this.streams.push(stream);
    return stream;
  }

  private hang(options: SendOptions): Promise<never> {
    return new Promise((_resolve, reject) => {
      options.signal?.addEventListener("abort", () => reject(new TransportAbortedError()), { once: true });
    });
  }

  private record(request: ProviderRequest, credentials: Credentials, options: SendOptions): void {
    if (options.signal?.aborted) throw new TransportAbortedError();
    this.sent.push({ request, headers: credentials.apply(request.headers), options });
  }
}
