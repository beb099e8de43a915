import { randomUUID } from "node:crypto";
import { invalidRequest } from "./canonical-error.js";
import type { FineTuneJobSpec } from "./fine-tune.js";

export type OperationKind = "chat" | "completion" | "embedding" | "fine_tune" | "online_predict";

export const OPERATION_KINDS: readonly OperationKind[] = [
  "chat",
  "completion",
  "embedding",
  "fine_tune",
  "online_predict",
];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface TextContent {
  type: "text";
  text: string;
}

/** Structured input, e.g. a prediction instance. */
export interface JsonContent {
  type: "json";
  value: JsonValue;
}

export type ContentItem = TextContent | JsonContent;

export interface Message {
  role: "user" | "assistant" | "tool";
  content: string | ContentItem[];
}

export interface GenerationParams {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  stop?: string[];
  seed?: number;
}

export type GenerationParamName = keyof GenerationParams;

export const GENERATION_PARAM_NAMES: readonly GenerationParamName[] = [
  "temperature",
  "max_tokens",
  "top_p",
  "stop",
  "seed",
];

export interface CanonicalRequest {
  readonly id: string;
  readonly kind: OperationKind;
  readonly model: string;
  readonly system?: string;
  readonly messages: readonly Readonly<Message>[];
  readonly params: Readonly<GenerationParams>;
  readonly stream: boolean;
  /** Present iff kind is "fine_tune". */
  readonly fine_tune?: Readonly<FineTuneJobSpec>;
}

export interface CanonicalRequestInit {
  id?: string;
  kind: OperationKind;
  model: string;
  system?: string;
  messages?: Message[];
  params?: GenerationParams;
  stream?: boolean;
  fine_tune?: FineTuneJobSpec;
}

const STREAMABLE_KINDS: ReadonlySet<OperationKind> = new Set(["chat", "completion"]);

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function assertFinite(value: number | undefined, field: string): void {
  if (value !== undefined && !Number.isFinite(value)) {
    throw invalidRequest(`params.${field} must be a finite number`, { field });
  }
}

function validateParams(params: GenerationParams): void {
  assertFinite(params.temperature, "temperature");
  assertFinite(params.top_p, "top_p");
  assertFinite(params.seed, "seed");
  if (params.max_tokens !== undefined && (!Number.isInteger(params.max_tokens) || params.max_tokens <= 0)) {
    throw invalidRequest("params.max_tokens must be a positive integer", { field: "max_tokens" });
  }
  if (params.stop !== undefined && !params.stop.every((s) => typeof s === "string")) {
    throw invalidRequest("params.stop must be an array of strings", { field: "stop" });
  }
}

function validateMessages(messages: Message[]): void {
  messages.forEach((msg, i) => {
    if (msg.role !== "user" && msg.role !== "assistant" && msg.role !== "tool") {
      throw invalidRequest(`messages[${i}].role is not a valid role`, { index: i });
    }
    if (typeof msg.content !== "string" && !Array.isArray(msg.content)) {
      throw invalidRequest(`messages[${i}].content must be a string or content list`, { index: i });
    }
  });
}

/**
 * Builds a validated, deeply frozen request. Throws CanonicalError(InvalidRequest)
 * when a required field is missing or malformed.
 */
export function createCanonicalRequest(init: CanonicalRequestInit): CanonicalRequest {
  if (!OPERATION_KINDS.includes(init.kind)) {
    throw invalidRequest(`Unknown operation kind "${String(init.kind)}"`, { kind: init.kind });
  }
  if (typeof init.model !== "string" || init.model.trim() === "") {
    throw invalidRequest("model must be a non-empty string", { field: "model" });
  }

  const messages = init.messages ?? [];
  validateMessages(messages);
  const params = init.params ?? {};
  validateParams(params);
  const stream = init.stream ?? false;

  if (init.kind === "fine_tune") {
    if (!init.fine_tune) {
      throw invalidRequest("fine_tune requests require a fine_tune job spec", { field: "fine_tune" });
    }
    if (init.fine_tune.dataset.trim() === "") {
      throw invalidRequest("fine_tune.dataset must be a non-empty string", { field: "fine_tune.dataset" });
    }
    if (init.fine_tune.base_model !== init.model) {
      throw invalidRequest("fine_tune.base_model must match the request model", { field: "fine_tune.base_model" });
    }
  } else {
    if (init.fine_tune) {
      throw invalidRequest(`fine_tune spec is not allowed on a "${init.kind}" request`, { field: "fine_tune" });
    }
    if (messages.length === 0) {
      throw invalidRequest(`"${init.kind}" requests require at least one message`, { field: "messages" });
    }
  }

  if (stream && !STREAMABLE_KINDS.has(init.kind)) {
    throw invalidRequest(`"${init.kind}" requests cannot be streamed`, { field: "stream" });
  }

  const request: CanonicalRequest = {
    id: init.id ?? randomUUID(),
    kind: init.kind,
    model: init.model,
    ...(init.system !== undefined ? { system: init.system } : {}),
    messages: structuredClone(messages),
    params: structuredClone(params),
    stream,
    ...(init.fine_tune ? { fine_tune: structuredClone(init.fine_tune) } : {}),
  };
  return deepFreeze(request);
}

/** Flattens a message's content into plain text; JSON items are serialised. */
export function messageText(message: Readonly<Message>): string {
  if (typeof message.content === "string") return message.content;
  return message.content
    .map((item) => (item.type === "text" ? item.text : JSON.stringify(item.value)))
    .join("\n");
}

/** Names of the params set on a request, in canonical order. */
export function presentParams(params: Readonly<GenerationParams>): GenerationParamName[] {
  return GENERATION_PARAM_NAMES.filter((name) => params[name] !== undefined);
}
