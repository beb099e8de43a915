import { readFileSync } from "fs";
import { LOG_LEVELS } from "../observability/log.js";
import type { LogLevel } from "../observability/log.js";
import { BUILTIN_PROVIDER_IDS, isBuiltinProvider } from "../providers/index.js";
import type { BuiltinProviderId } from "../providers/index.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_MAX_TIMEOUT_MS, DEFAULT_RETRY_SETTINGS, DEFAULT_TIMEOUT_MS } from "./gateway-config.js";
import type { GatewayConfig, ProviderSettings, RetrySettings } from "./gateway-config.js";

export { ConfigError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertString(value: unknown, field: string): asserts value is string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`Config field "${field}" must be a non-empty string`);
  }
}

function assertPositive(value: unknown, field: string): asserts value is number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Config field "${field}" must be a positive number`);
  }
}

function assertBoolean(value: unknown, field: string): asserts value is boolean {
  if (typeof value !== "boolean") {
    throw new ConfigError(`Config field "${field}" must be a boolean`);
  }
}

function assertRecord(value: unknown, field: string): asserts value is Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(`Config field "${field}" must be an object`);
  }
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function optionalPositive(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  assertPositive(value, field);
  return value;
}

function validateRetry(raw: unknown): RetrySettings {
  if (raw === undefined) return { ...DEFAULT_RETRY_SETTINGS };
  assertRecord(raw, "retry");
  const maxAttempts = optionalPositive(raw["max_attempts"], "retry.max_attempts", DEFAULT_RETRY_SETTINGS.max_attempts);
  if (!Number.isInteger(maxAttempts)) {
    throw new ConfigError(`Config field "retry.max_attempts" must be an integer`);
  }
  return {
    max_attempts: maxAttempts,
    initial_delay_ms: optionalPositive(raw["initial_delay_ms"], "retry.initial_delay_ms", DEFAULT_RETRY_SETTINGS.initial_delay_ms),
    backoff_multiplier: optionalPositive(
      raw["backoff_multiplier"],
      "retry.backoff_multiplier",
      DEFAULT_RETRY_SETTINGS.backoff_multiplier,
    ),
  };
}

function validateProvider(id: BuiltinProviderId, raw: unknown): ProviderSettings {
  const prefix = `providers.${id}`;
  assertRecord(raw, prefix);
  const enabled = raw["enabled"];
  assertBoolean(enabled, `${prefix}.enabled`);
  const settings: ProviderSettings = { enabled };

  const credentialEnv = raw["credential_env"];
  if (credentialEnv !== undefined) {
    assertString(credentialEnv, `${prefix}.credential_env`);
    settings.credential_env = credentialEnv;
  }

  const timeout = raw["timeout_ms"];
  if (timeout !== undefined) {
    assertPositive(timeout, `${prefix}.timeout_ms`);
    settings.timeout_ms = timeout;
  }

  const template = raw["endpoint_template"];
  if (template !== undefined) {
    assertString(template, `${prefix}.endpoint_template`);
    settings.endpoint_template = template;
  }

  const vars = raw["endpoint_vars"];
  if (vars !== undefined) {
    assertRecord(vars, `${prefix}.endpoint_vars`);
    const endpointVars: Record<string, string> = {};
    for (const [name, value] of Object.entries(vars)) {
      assertString(value, `${prefix}.endpoint_vars.${name}`);
      endpointVars[name] = value;
    }
    settings.endpoint_vars = endpointVars;
  }

  return settings;
}

/** Validates an already-parsed config object and returns a frozen copy. */
export function parseConfig(raw: unknown): GatewayConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("Config must be a JSON object");
  }

  if (raw["schema_version"] !== 1) {
    throw new ConfigError(`Config field "schema_version" must be 1`);
  }

  const defaultTimeout = optionalPositive(raw["default_timeout_ms"], "default_timeout_ms", DEFAULT_TIMEOUT_MS);
  const maxTimeout = optionalPositive(raw["max_timeout_ms"], "max_timeout_ms", DEFAULT_MAX_TIMEOUT_MS);
  if (defaultTimeout > maxTimeout) {
    throw new ConfigError(`Config field "default_timeout_ms" must not exceed "max_timeout_ms"`);
  }

  const logLevel = raw["log_level"] ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Config field "log_level" must be one of: ${LOG_LEVELS.join(", ")}`);
  }

  const providers = raw["providers"];
  assertRecord(providers, "providers");
  if (Object.keys(providers).length === 0) {
    throw new ConfigError(`Config field "providers" must configure at least one provider`);
  }

  const validated: Partial<Record<BuiltinProviderId, ProviderSettings>> = {};
  for (const [id, settings] of Object.entries(providers)) {
    if (!isBuiltinProvider(id)) {
      throw new ConfigError(`Unknown provider "${id}" in providers. Valid: ${BUILTIN_PROVIDER_IDS.join(", ")}`);
    }
    validated[id] = Object.freeze(validateProvider(id, settings));
  }

  const config: GatewayConfig = {
    schema_version: 1,
    default_timeout_ms: defaultTimeout,
    max_timeout_ms: maxTimeout,
    retry: Object.freeze(validateRetry(raw["retry"])),
    log_level: logLevel,
    providers: Object.freeze(validated),
  };
  return Object.freeze(config);
}

export function loadConfig(filePath: string): GatewayConfig {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, "utf-8");
    raw = JSON.parse(content) as unknown;
  } catch (err) {
    throw new ConfigError(
      `Failed to read config at "${filePath}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseConfig(raw);
}
