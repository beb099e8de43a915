import type { OperationKind } from "../types/index.js";

/** How a provider expects to be authenticated. Transports decide what each shape means on the wire. */
export type CredentialShape = "bearer-token" | "api-key-header" | "oauth-access-token";

export type HyperparameterRange =
  | { type: "integer"; min: number; max: number }
  | { type: "number"; min: number; max: number }
  | { type: "enum"; values: readonly string[] };

export interface ProviderDescriptor {
  readonly id: string;
  readonly operations: ReadonlySet<OperationKind>;
  readonly streaming: boolean;
  readonly credentialShape: CredentialShape;
  /** Base URL with `{name}` placeholders filled from provider config. */
  readonly endpointTemplate: string;
  readonly hyperparameters: Readonly<Record<string, HyperparameterRange>>;
}

export interface ProviderDescriptorInit {
  id: string;
  operations: readonly OperationKind[];
  streaming: boolean;
  credentialShape: CredentialShape;
  endpointTemplate: string;
  hyperparameters?: Record<string, HyperparameterRange>;
}

export function defineProvider(init: ProviderDescriptorInit): ProviderDescriptor {
  return Object.freeze({
    id: init.id,
    operations: new Set(init.operations),
    streaming: init.streaming,
    credentialShape: init.credentialShape,
    endpointTemplate: init.endpointTemplate,
    hyperparameters: Object.freeze({ ...(init.hyperparameters ?? {}) }),
  });
}
