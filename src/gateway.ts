import type { CanonicalRequest, CanonicalResponse, OperationKind } from "./types/index.js";
import { CapabilityRegistry, renderEndpoint } from "./registry/index.js";
import { EnvCredentialProvider } from "./credentials/index.js";
import type { CredentialProvider, Credentials } from "./credentials/index.js";
import { FetchTransport } from "./transport/index.js";
import type { Transport } from "./transport/index.js";
import { BUILTIN_PROVIDERS, BUILTIN_PROVIDER_IDS } from "./providers/index.js";
import type { ProviderModule } from "./providers/index.js";
import { ProviderHandler } from "./handlers/index.js";
import type { CallOptions, CanonicalStream } from "./handlers/index.js";
import { Dispatcher } from "./dispatcher/index.js";
import type { GatewayConfig, ProviderSettings } from "./config/index.js";
import { createLogger } from "./observability/log.js";
import type { Logger } from "./observability/log.js";
import type { AuditLogger } from "./observability/audit-logger.js";

/** A provider outside the built-in set, wired in alongside them. */
export interface ExtraProvider extends ProviderModule {
  settings?: ProviderSettings;
}

export interface GatewayDeps {
  /** Defaults to a FetchTransport using the configured retry policy. */
  transport?: Transport;
  /** Defaults to reading each provider's `credential_env` variable. */
  credentials?: CredentialProvider;
  logger?: Logger;
  audit?: AuditLogger;
  extraProviders?: readonly ExtraProvider[];
}

/**
 * Dispatcher plus credential lookup: callers name a provider and a request,
 * the gateway fetches that provider's credentials inside the audited call.
 */
export class Gateway {
  readonly registry: CapabilityRegistry;
  readonly dispatcher: Dispatcher;
  private readonly credentials: CredentialProvider;

  constructor(registry: CapabilityRegistry, dispatcher: Dispatcher, credentials: CredentialProvider) {
    this.registry = registry;
    this.dispatcher = dispatcher;
    this.credentials = credentials;
  }

  async dispatch(providerId: string, request: CanonicalRequest, options?: CallOptions): Promise<CanonicalResponse> {
    return this.dispatcher.dispatch(providerId, request, () => this.credentialsFor(providerId, request.kind), options);
  }

  async dispatchStream(providerId: string, request: CanonicalRequest, options?: CallOptions): Promise<CanonicalStream> {
    return this.dispatcher.dispatchStream(
      providerId,
      request,
      () => this.credentialsFor(providerId, request.kind),
      options,
    );
  }

  async poll(providerId: string, jobId: string, options?: CallOptions): Promise<CanonicalResponse> {
    return this.dispatcher.poll(providerId, jobId, () => this.credentialsFor(providerId, "fine_tune"), options);
  }

  async cancelJob(providerId: string, jobId: string, options?: CallOptions): Promise<CanonicalResponse> {
    return this.dispatcher.cancelJob(providerId, jobId, () => this.credentialsFor(providerId, "fine_tune"), options);
  }

  private async credentialsFor(providerId: string, kind: OperationKind): Promise<Credentials> {
    const descriptor = this.registry.resolve(providerId, kind);
    return this.credentials.get(descriptor.credentialShape, providerId);
  }
}

function credentialVariables(config: GatewayConfig, extras: readonly ExtraProvider[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const id of BUILTIN_PROVIDER_IDS) {
    const variable = config.providers[id]?.credential_env;
    if (variable) variables[id] = variable;
  }
  for (const extra of extras) {
    const variable = extra.settings?.credential_env;
    if (variable) variables[extra.descriptor.id] = variable;
  }
  return variables;
}

/**
 * Composition root. Registers every enabled provider, freezes the registry,
 * and builds one handler per provider. Throws ConfigError when an endpoint
 * template is missing a variable.
 */
export function createGateway(config: GatewayConfig, deps: GatewayDeps = {}): Gateway {
  const logger = deps.logger ?? createLogger({ service: "provider-bridge", level: config.log_level });
  const transport =
    deps.transport ??
    new FetchTransport({
      retry: {
        maxAttempts: config.retry.max_attempts,
        initialDelayMs: config.retry.initial_delay_ms,
        backoffMultiplier: config.retry.backoff_multiplier,
      },
    });
  const extras = deps.extraProviders ?? [];

  const registry = new CapabilityRegistry();
  const handlers: Record<string, ProviderHandler> = {};

  const enable = (module: ProviderModule, settings: ProviderSettings): void => {
    const id = module.descriptor.id;
    registry.register(module.descriptor);
    handlers[id] = new ProviderHandler({
      providerId: id,
      transformer: module.transformer,
      registry,
      transport,
      endpoint: renderEndpoint(settings.endpoint_template ?? module.descriptor.endpointTemplate, settings.endpoint_vars ?? {}),
      timeoutMs: Math.min(settings.timeout_ms ?? config.default_timeout_ms, config.max_timeout_ms),
      maxTimeoutMs: config.max_timeout_ms,
      logger: logger.child(id),
    });
  };

  for (const id of BUILTIN_PROVIDER_IDS) {
    const settings = config.providers[id];
    if (settings?.enabled) enable(BUILTIN_PROVIDERS[id], settings);
  }
  for (const extra of extras) {
    const settings = extra.settings ?? { enabled: true };
    if (settings.enabled) enable(extra, settings);
  }
  registry.freeze();

  logger.info("Gateway ready", { providers: registry.list().map((d) => d.id) });

  const dispatcher = new Dispatcher({ registry, handlers, ...(deps.audit ? { audit: deps.audit } : {}) });
  return new Gateway(registry, dispatcher, deps.credentials ?? new EnvCredentialProvider(credentialVariables(config, extras)));
}
