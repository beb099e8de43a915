import { CanonicalError } from "../types/index.js";
import type { OperationKind } from "../types/index.js";
import type { ProviderDescriptor } from "./provider-descriptor.js";

export class DuplicateProviderError extends Error {
  readonly providerId: string;

  constructor(providerId: string) {
    super(`Provider "${providerId}" is already registered`);
    this.name = "DuplicateProviderError";
    this.providerId = providerId;
  }
}

export class RegistryFrozenError extends Error {
  constructor(providerId: string) {
    super(`Cannot register "${providerId}": the capability registry is frozen`);
    this.name = "RegistryFrozenError";
  }
}

/**
 * Static table of which providers support which operations.
 * Populated once at start-up, then frozen; request handling only reads it.
 */
export class CapabilityRegistry {
  private readonly descriptors = new Map<string, ProviderDescriptor>();
  private frozen = false;

  register(descriptor: ProviderDescriptor): void {
    if (this.frozen) {
      throw new RegistryFrozenError(descriptor.id);
    }
    if (this.descriptors.has(descriptor.id)) {
      throw new DuplicateProviderError(descriptor.id);
    }
    this.descriptors.set(descriptor.id, Object.isFrozen(descriptor) ? descriptor : Object.freeze({ ...descriptor }));
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(providerId: string): boolean {
    return this.descriptors.has(providerId);
  }

  list(): ProviderDescriptor[] {
    return [...this.descriptors.values()];
  }

  resolve(providerId: string, kind: OperationKind): ProviderDescriptor {
    const descriptor = this.descriptors.get(providerId);
    if (!descriptor) {
      throw new CanonicalError("ProviderUnavailable", `Provider "${providerId}" is not registered`, {
        provider: providerId,
        payload: { registered: [...this.descriptors.keys()] },
      });
    }
    if (!descriptor.operations.has(kind)) {
      throw new CanonicalError(
        "UnsupportedCapability",
        `Provider "${providerId}" does not support "${kind}"`,
        { provider: providerId, payload: { kind, supported: [...descriptor.operations] } },
      );
    }
    return descriptor;
  }

  /** As `resolve`, and additionally requires the provider to declare streaming. */
  resolveStreaming(providerId: string, kind: OperationKind): ProviderDescriptor {
    const descriptor = this.resolve(providerId, kind);
    if (!descriptor.streaming) {
      throw new CanonicalError(
        "UnsupportedCapability",
        `Provider "${providerId}" does not support streaming`,
        { provider: providerId, payload: { kind } },
      );
    }
    return descriptor;
  }
}
