import { CanonicalError, toCanonicalError } from "../types/index.js";
import type { CanonicalRequest, CanonicalResponse, GenerationParamName } from "../types/index.js";
import type { CapabilityRegistry } from "../registry/index.js";
import type { CredentialSource, Credentials } from "../credentials/index.js";
import type { CallOptions, CanonicalStream, ProviderHandler } from "../handlers/index.js";
import { AuditLogger } from "../observability/audit-logger.js";
import type { AuditParams } from "../observability/audit-logger.js";

export interface DispatcherOptions {
  registry: CapabilityRegistry;
  /** Provider id to handler. Fixed at construction. */
  handlers: Readonly<Record<string, ProviderHandler>>;
  audit?: AuditLogger;
}

/**
 * Single entry point: validates the (provider, kind) pair against the
 * registry and hands the call to that provider's handler. Keeps no state
 * between calls.
 */
export class Dispatcher {
  private readonly registry: CapabilityRegistry;
  private readonly handlers: ReadonlyMap<string, ProviderHandler>;
  private readonly audit: AuditLogger;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.handlers = new Map(Object.entries(options.handlers));
    this.audit = options.audit ?? new AuditLogger();
  }

  get providers(): string[] {
    return [...this.handlers.keys()];
  }

  async dispatch(
    providerId: string,
    request: CanonicalRequest,
    credentials: CredentialSource,
    options: CallOptions = {},
  ): Promise<CanonicalResponse> {
    const dropped: GenerationParamName[] = [];
    const base = this.auditBase("dispatch", providerId, request);
    try {
      const handler = this.select(providerId, request);
      const creds = await this.credentialsFrom(credentials);
      const response = await handler.execute(request, creds, this.tracking(options, dropped));
      this.record({ ...base, dropped, response });
      return response;
    } catch (err) {
      throw this.fail({ ...base, dropped }, err);
    }
  }

  async dispatchStream(
    providerId: string,
    request: CanonicalRequest,
    credentials: CredentialSource,
    options: CallOptions = {},
  ): Promise<CanonicalStream> {
    const dropped: GenerationParamName[] = [];
    const base = this.auditBase("stream", providerId, request);
    try {
      const handler = this.select(providerId, request);
      const creds = await this.credentialsFrom(credentials);
      const stream = await handler.stream(request, creds, this.tracking(options, dropped));
      this.record({ ...base, dropped });
      return stream;
    } catch (err) {
      throw this.fail({ ...base, dropped }, err);
    }
  }

  async poll(
    providerId: string,
    jobId: string,
    credentials: CredentialSource,
    options: CallOptions = {},
  ): Promise<CanonicalResponse> {
    const base: AuditParams = { operation: "poll", provider: providerId, jobId, kind: "fine_tune", startedAt: Date.now() };
    try {
      const handler = this.handlerFor(providerId, "fine_tune");
      const response = await handler.poll(jobId, await this.credentialsFrom(credentials), options);
      this.record({ ...base, response });
      return response;
    } catch (err) {
      throw this.fail(base, err);
    }
  }

  async cancelJob(
    providerId: string,
    jobId: string,
    credentials: CredentialSource,
    options: CallOptions = {},
  ): Promise<CanonicalResponse> {
    const base: AuditParams = { operation: "cancel_job", provider: providerId, jobId, kind: "fine_tune", startedAt: Date.now() };
    try {
      const handler = this.handlerFor(providerId, "fine_tune");
      const response = await handler.cancelJob(jobId, await this.credentialsFrom(credentials), options);
      this.record({ ...base, response });
      return response;
    } catch (err) {
      throw this.fail(base, err);
    }
  }

  private select(providerId: string, request: CanonicalRequest): ProviderHandler {
    if (request.stream) {
      this.registry.resolveStreaming(providerId, request.kind);
    }
    return this.handlerFor(providerId, request.kind);
  }

  private handlerFor(providerId: string, kind: CanonicalRequest["kind"]): ProviderHandler {
    this.registry.resolve(providerId, kind);
    const handler = this.handlers.get(providerId);
    if (!handler) {
      throw new CanonicalError("ProviderUnavailable", `No handler is configured for provider "${providerId}"`, {
        provider: providerId,
      });
    }
    return handler;
  }

  private async credentialsFrom(source: CredentialSource): Promise<Credentials> {
    return typeof source === "function" ? source() : source;
  }

  private tracking(options: CallOptions, dropped: GenerationParamName[]): CallOptions {
    return {
      ...options,
      onDropped: (names) => {
        dropped.push(...names);
        options.onDropped?.(names);
      },
    };
  }

  private auditBase(operation: AuditParams["operation"], providerId: string, request: CanonicalRequest): AuditParams {
    return {
      operation,
      provider: providerId,
      requestId: request.id,
      model: request.model,
      kind: request.kind,
      startedAt: Date.now(),
    };
  }

  private record(params: AuditParams): void {
    this.audit.log(this.audit.buildEntry(params));
  }

  private fail(params: AuditParams, err: unknown): CanonicalError {
    const error = toCanonicalError(err);
    this.record({ ...params, error });
    return error;
  }
}
