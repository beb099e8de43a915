import { CanonicalError, invalidRequest, isCanonicalError, toCanonicalError } from "../types/index.js";
import type { CanonicalRequest, CanonicalResponse, GenerationParamName } from "../types/index.js";
import type { CapabilityRegistry } from "../registry/index.js";
import type { Credentials } from "../credentials/index.js";
import { TransportAbortedError, TransportTimeoutError } from "../transport/index.js";
import type { ProviderError, SendOptions, Transport, TransportStream } from "../transport/index.js";
import type { FineTuneTransformer, ProviderRequestBuild, ProviderTransformer } from "../providers/index.js";
import { createLogger } from "../observability/log.js";
import type { Logger } from "../observability/log.js";
import { CanonicalStream, abortedError, collectStream } from "./canonical-stream.js";
import { validateFineTuneSpec } from "./fine-tune-validation.js";

export interface CallOptions {
  /** Per-call timeout; capped at the handler's maximum. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Receives the optional params the provider had no equivalent for. */
  onDropped?: (dropped: readonly GenerationParamName[]) => void;
}

export interface ProviderHandlerOptions {
  providerId: string;
  transformer: ProviderTransformer;
  registry: CapabilityRegistry;
  transport: Transport;
  /** Base URL with every placeholder already filled. */
  endpoint: string;
  timeoutMs: number;
  maxTimeoutMs: number;
  logger?: Logger;
}

/**
 * Runs canonical operations against one provider: capability check,
 * outbound mapping, one transport exchange, inbound mapping. Holds no
 * per-request state, so one instance serves concurrent calls.
 */
export class ProviderHandler {
  readonly providerId: string;
  private readonly transformer: ProviderTransformer;
  private readonly registry: CapabilityRegistry;
  private readonly transport: Transport;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly maxTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ProviderHandlerOptions) {
    this.providerId = options.providerId;
    this.transformer = options.transformer;
    this.registry = options.registry;
    this.transport = options.transport;
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs;
    this.maxTimeoutMs = options.maxTimeoutMs;
    this.logger = options.logger ?? createLogger({ service: `handler:${options.providerId}`, level: "warn" });
  }

  async execute(request: CanonicalRequest, credentials: Credentials, options: CallOptions = {}): Promise<CanonicalResponse> {
    if (request.stream) {
      const deadline = Date.now() + this.resolveTimeout(options);
      return collectStream(await this.openStream(request, credentials, options, deadline));
    }

    const descriptor = this.registry.resolve(this.providerId, request.kind);
    if (request.fine_tune) validateFineTuneSpec(request.fine_tune, descriptor);

    const built = this.build(request, options);
    const timeoutMs = this.resolveTimeout(options);
    // Job submission must reach the provider at most once
    const idempotent = request.kind !== "fine_tune";
    const reply = await this.withDeadline(timeoutMs, options.signal, (signal) =>
      this.transport.send(built.request, credentials, this.sendOptions(timeoutMs, signal, idempotent)),
    );
    return this.unwrap(this.transformer.fromProvider(reply, request));
  }

  /**
   * Opens a fragment stream. `timeoutMs` bounds the open and then every wait
   * for the next transport event.
   */
  async stream(request: CanonicalRequest, credentials: Credentials, options: CallOptions = {}): Promise<CanonicalStream> {
    return this.openStream(request, credentials, options);
  }

  private async openStream(
    request: CanonicalRequest,
    credentials: Credentials,
    options: CallOptions,
    deadline?: number,
  ): Promise<CanonicalStream> {
    this.registry.resolveStreaming(this.providerId, request.kind);
    if (!request.stream) {
      throw invalidRequest("stream() needs a request created with stream: true", { field: "stream" });
    }

    const built = this.build(request, options);
    const timeoutMs = this.resolveTimeout(options);
    const opened = await this.withDeadline(
      timeoutMs,
      options.signal,
      (signal) => this.transport.open(built.request, credentials, this.sendOptions(timeoutMs, signal, true)),
      (late) => this.discard(late),
    );
    if ("ok" in opened) throw this.transformer.classifyError(opened);
    return new CanonicalStream(opened, this.transformer, request, this.providerId, {
      signal: options.signal,
      idleTimeoutMs: timeoutMs,
      deadline,
    });
  }

  /** Reads a job's current status. Safe to repeat; never changes the job. */
  async poll(jobId: string, credentials: Credentials, options: CallOptions = {}): Promise<CanonicalResponse> {
    const jobs = this.jobs(jobId);
    const timeoutMs = this.resolveTimeout(options);
    const reply = await this.withDeadline(timeoutMs, options.signal, (signal) =>
      this.transport.send(jobs.toPollRequest(jobId, this.endpoint), credentials, this.sendOptions(timeoutMs, signal, true)),
    );
    return this.unwrap(jobs.fromJobReply(reply, undefined, jobId));
  }

  async cancelJob(jobId: string, credentials: Credentials, options: CallOptions = {}): Promise<CanonicalResponse> {
    const jobs = this.jobs(jobId);
    const timeoutMs = this.resolveTimeout(options);
    const reply = await this.withDeadline(timeoutMs, options.signal, (signal) =>
      this.transport.send(jobs.toCancelRequest(jobId, this.endpoint), credentials, this.sendOptions(timeoutMs, signal, true)),
    );
    this.logger.info("Requested fine-tuning job cancellation", { provider: this.providerId, job_id: jobId });
    return this.unwrap(jobs.fromJobReply(reply, undefined, jobId));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private build(request: CanonicalRequest, options: CallOptions): ProviderRequestBuild {
    let built: ProviderRequestBuild;
    try {
      built = this.transformer.toProvider(request, this.endpoint);
    } catch (err) {
      throw toCanonicalError(err);
    }
    if (built.dropped.length > 0) {
      this.logger.warn("Dropped params with no provider equivalent", {
        provider: this.providerId,
        request_id: request.id,
        kind: request.kind,
        dropped: built.dropped,
      });
      options.onDropped?.(built.dropped);
    }
    this.logger.debug("Sending provider request", {
      provider: this.providerId,
      request_id: request.id,
      method: built.request.method,
      url: built.request.url,
    });
    return built;
  }

  private jobs(jobId: string): FineTuneTransformer {
    this.registry.resolve(this.providerId, "fine_tune");
    const jobs = this.transformer.jobs;
    if (!jobs) {
      throw new CanonicalError("UnsupportedCapability", `${this.transformer.name} does not track fine-tuning jobs`, {
        provider: this.providerId,
      });
    }
    if (jobId.trim() === "") {
      throw invalidRequest("jobId must be a non-empty string", { field: "jobId" });
    }
    return jobs;
  }

  private resolveTimeout(options: CallOptions): number {
    const requested = options.timeoutMs ?? this.timeoutMs;
    if (!Number.isFinite(requested) || requested <= 0) {
      throw invalidRequest("timeoutMs must be a positive number", { field: "timeoutMs", value: requested });
    }
    return Math.min(requested, this.maxTimeoutMs);
  }

  private sendOptions(timeoutMs: number, signal: AbortSignal, idempotent: boolean): SendOptions {
    return { timeoutMs, signal, idempotent };
  }

  private unwrap(result: CanonicalResponse | CanonicalError): CanonicalResponse {
    if (isCanonicalError(result)) throw result;
    return result;
  }

  /**
   * Bounds a transport call by `timeoutMs` and the caller's signal. Whichever
   * fires first aborts the call; `onLate` receives a result that arrives after.
   */
  private withDeadline<T>(
    timeoutMs: number,
    callerSignal: AbortSignal | undefined,
    call: (signal: AbortSignal) => Promise<T>,
    onLate?: (value: T) => void,
  ): Promise<T> {
    const controller = new AbortController();
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    return new Promise<T>((resolve, reject) => {
      const finish = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(timer);
        if (onAbort) callerSignal?.removeEventListener("abort", onAbort);
        return true;
      };

      if (callerSignal?.aborted) {
        finish();
        reject(abortedError(this.providerId));
        return;
      }

      timer = setTimeout(() => {
        if (!finish()) return;
        reject(
          new CanonicalError("Timeout", `${this.transformer.name} did not answer within ${timeoutMs}ms`, {
            provider: this.providerId,
            payload: { timeoutMs },
          }),
        );
        controller.abort();
      }, timeoutMs);

      onAbort = (): void => {
        if (!finish()) return;
        reject(abortedError(this.providerId));
        controller.abort();
      };
      callerSignal?.addEventListener("abort", onAbort, { once: true });

      let pending: Promise<T>;
      try {
        pending = call(controller.signal);
      } catch (err) {
        pending = Promise.reject(err);
      }
      pending.then(
        (value) => {
          if (finish()) resolve(value);
          else onLate?.(value);
        },
        (err: unknown) => {
          if (finish()) reject(this.transportFailure(err, timeoutMs, callerSignal));
        },
      );
    });
  }

  private transportFailure(err: unknown, timeoutMs: number, callerSignal: AbortSignal | undefined): CanonicalError {
    if (isCanonicalError(err)) return err;
    if (err instanceof TransportTimeoutError) {
      return new CanonicalError("Timeout", `${this.transformer.name} did not answer within ${timeoutMs}ms`, {
        provider: this.providerId,
        payload: { timeoutMs },
        cause: err,
      });
    }
    if (err instanceof TransportAbortedError || callerSignal?.aborted) return abortedError(this.providerId);
    return new CanonicalError(
      "ProviderUnavailable",
      `${this.transformer.name} transport failed: ${err instanceof Error ? err.message : String(err)}`,
      { provider: this.providerId, cause: err },
    );
  }

  private discard(late: TransportStream | ProviderError): void {
    if ("ok" in late) return;
    late.close().then(undefined, (err: unknown) => {
      this.logger.warn("Failed to close a stream that opened after its deadline", {
        provider: this.providerId,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }
}
