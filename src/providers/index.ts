import type { ProviderDescriptor } from "../registry/index.js";
import type { ProviderTransformer } from "./i-transformer.js";
import { ANTHROPIC_DESCRIPTOR, AnthropicTransformer } from "./anthropic/anthropic-transformer.js";
import { OPENAI_DESCRIPTOR, OpenAITransformer } from "./openai/openai-transformer.js";
import { VERTEX_DESCRIPTOR, VertexTransformer } from "./vertex/vertex-transformer.js";

export * from "./i-transformer.js";
export * from "./error-table.js";
export * from "./openai/openai-transformer.js";
export * from "./anthropic/anthropic-transformer.js";
export * from "./vertex/vertex-transformer.js";

/** A provider's static capabilities paired with its wire mapping. */
export interface ProviderModule {
  descriptor: ProviderDescriptor;
  transformer: ProviderTransformer;
}

export type BuiltinProviderId = "openai" | "anthropic" | "vertex-ai";

export const BUILTIN_PROVIDERS = {
  openai: { descriptor: OPENAI_DESCRIPTOR, transformer: new OpenAITransformer() },
  anthropic: { descriptor: ANTHROPIC_DESCRIPTOR, transformer: new AnthropicTransformer() },
  "vertex-ai": { descriptor: VERTEX_DESCRIPTOR, transformer: new VertexTransformer() },
} as const satisfies Record<BuiltinProviderId, ProviderModule>;

export const BUILTIN_PROVIDER_IDS: readonly BuiltinProviderId[] = ["openai", "anthropic", "vertex-ai"];

export function isBuiltinProvider(id: string): id is BuiltinProviderId {
  return Object.hasOwn(BUILTIN_PROVIDERS, id);
}
