import type { LogLevel } from "../observability/log.js";
import type { BuiltinProviderId } from "../providers/index.js";

export interface RetrySettings {
  max_attempts: number;
  initial_delay_ms: number;
  backoff_multiplier: number;
}

export interface ProviderSettings {
  enabled: boolean;
  /** Environment variable holding the provider secret. */
  credential_env?: string;
  /** Overrides `default_timeout_ms` for this provider. */
  timeout_ms?: number;
  /** Values for the `{name}` placeholders of the endpoint template. */
  endpoint_vars?: Record<string, string>;
  /** Replaces the provider's endpoint template, e.g. to go through a proxy. */
  endpoint_template?: string;
}

export interface GatewayConfig {
  schema_version: 1;
  default_timeout_ms: number;
  /** Hard ceiling; per-call timeouts above it are clamped. */
  max_timeout_ms: number;
  retry: RetrySettings;
  log_level: LogLevel;
  providers: Partial<Record<BuiltinProviderId, ProviderSettings>>;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_TIMEOUT_MS = 120_000;

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  max_attempts: 3,
  initial_delay_ms: 500,
  backoff_multiplier: 2,
};
