import { CanonicalError, createCanonicalResponse, invalidRequest, messageText, usage } from "../../types/index.js";
import type {
  CanonicalRequest,
  CanonicalResponse,
  CanonicalResponseFragment,
  FinishReason,
  GenerationParamName,
  GenerationParams,
} from "../../types/index.js";
import type { ProviderError, ProviderReply, ProviderRequest, ProviderStreamEvent } from "../../transport/index.js";
import { defineProvider } from "../../registry/index.js";
import { classifyProviderError, malformedResponse } from "../error-table.js";
import type { ErrorCodeTable } from "../error-table.js";
import type { ProviderRequestBuild, ProviderTransformer, RequestEcho } from "../i-transformer.js";
import { asObject, parseJson, readNumber, readObject, readObjects, readString, readStrings } from "../payload.js";
import type { JsonObject } from "../payload.js";

// ---------------------------------------------------------------------------
// Anthropic-specific request shapes (never leak past this file)
// ---------------------------------------------------------------------------

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string;
}

interface AnthropicRequest {
  model: string;
  max_tokens: number;
  system?: string;
  messages: AnthropicMessage[];
  temperature?: number;
  top_p?: number;
  stop_sequences?: string[];
  stream?: boolean;
}

export const ANTHROPIC_VERSION = "2023-06-01";

/** The messages API requires max_tokens; used when the caller sets none. */
export const DEFAULT_MAX_TOKENS = 1024;

export const ANTHROPIC_DESCRIPTOR = defineProvider({
  id: "anthropic",
  operations: ["chat"],
  streaming: true,
  credentialShape: "api-key-header",
  endpointTemplate: "https://api.anthropic.com/v1",
});

// ---------------------------------------------------------------------------
// Error table, keyed by `error.type`
// ---------------------------------------------------------------------------

export const ANTHROPIC_ERROR_CODES = [
  "invalid_request_error",
  "authentication_error",
  "billing_error",
  "permission_error",
  "not_found_error",
  "request_too_large",
  "rate_limit_error",
  "api_error",
  "overloaded_error",
  "timeout_error",
] as const;

export type AnthropicErrorCode = (typeof ANTHROPIC_ERROR_CODES)[number];

export const ANTHROPIC_ERROR_TABLE = {
  invalid_request_error: "InvalidRequest",
  authentication_error: "AuthError",
  billing_error: "AuthError",
  permission_error: "AuthError",
  not_found_error: "InvalidRequest",
  request_too_large: "InvalidRequest",
  rate_limit_error: "RateLimited",
  api_error: "ProviderUnavailable",
  overloaded_error: "ProviderUnavailable",
  timeout_error: "Timeout",
} as const satisfies ErrorCodeTable<AnthropicErrorCode>;

// seed has no messages-API equivalent and is dropped
const UNSUPPORTED_PARAMS: readonly GenerationParamName[] = ["seed"];

function mapStopReason(reason: string | undefined): FinishReason {
  switch (reason) {
    case "end_turn": return "stop";
    case "stop_sequence": return "stop";
    case "max_tokens": return "length";
    case "tool_use": return "tool_use";
    case "refusal": return "content_filter";
    default: return "stop";
  }
}

function readParams(body: JsonObject | undefined): GenerationParams {
  const params: GenerationParams = {};
  const temperature = readNumber(body, "temperature");
  const maxTokens = readNumber(body, "max_tokens");
  const topP = readNumber(body, "top_p");
  const stop = readStrings(body, "stop_sequences");
  if (temperature !== undefined) params.temperature = temperature;
  if (maxTokens !== undefined) params.max_tokens = maxTokens;
  if (topP !== undefined) params.top_p = topP;
  if (stop !== undefined) params.stop = stop;
  return params;
}

// ---------------------------------------------------------------------------
// AnthropicTransformer
// ---------------------------------------------------------------------------

export class AnthropicTransformer implements ProviderTransformer {
  readonly name = "Anthropic";

  toProvider(request: CanonicalRequest, endpoint: string): ProviderRequestBuild {
    if (request.kind !== "chat") {
      throw new CanonicalError("UnsupportedCapability", `Anthropic does not support "${request.kind}"`, {
        provider: this.name,
      });
    }

    const messages: AnthropicMessage[] = request.messages.map((msg) => ({
      role: msg.role === "assistant" ? "assistant" : "user",
      content: messageText(msg),
    }));
    if (messages[0]?.role !== "user") {
      throw invalidRequest("Anthropic conversations must start with a user message", { field: "messages" });
    }

    const { params } = request;
    const body: AnthropicRequest = {
      model: request.model,
      max_tokens: params.max_tokens ?? DEFAULT_MAX_TOKENS,
      messages,
    };
    if (request.system) body.system = request.system;
    if (params.temperature !== undefined) body.temperature = params.temperature;
    if (params.top_p !== undefined) body.top_p = params.top_p;
    if (params.stop !== undefined) body.stop_sequences = [...params.stop];
    if (request.stream) body.stream = true;

    return {
      request: {
        method: "POST",
        url: `${endpoint}/messages`,
        headers: { "anthropic-version": ANTHROPIC_VERSION },
        body,
      },
      dropped: UNSUPPORTED_PARAMS.filter((name) => params[name] !== undefined),
    };
  }

  fromProvider(reply: ProviderReply, request: CanonicalRequest): CanonicalResponse | CanonicalError {
    if (!reply.ok) return this.classifyError(reply);
    const body = asObject(reply.body);
    const blocks = readObjects(body, "content");
    if (!body || readString(body, "type") !== "message") {
      return malformedResponse(this.name, "body is not a message object", reply.status);
    }

    const text = blocks
      .filter((b) => readString(b, "type") === "text")
      .map((b) => readString(b, "text") ?? "")
      .join("");
    const u = readObject(body, "usage");

    return createCanonicalResponse({
      id: request.id,
      kind: request.kind,
      model_used: readString(body, "model") ?? request.model,
      result: [{ index: 0, role: "assistant", content: text, finish_reason: mapStopReason(readString(body, "stop_reason")) }],
      usage: usage(readNumber(u, "input_tokens") ?? 0, readNumber(u, "output_tokens") ?? 0),
      raw: reply.body,
    });
  }

  fromStreamEvent(
    event: ProviderStreamEvent,
    request: CanonicalRequest,
    index: number,
  ): CanonicalResponseFragment | CanonicalError | null {
    const data = asObject(parseJson(event.data));
    if (!data) return malformedResponse(this.name, "stream event is not JSON");
    const type = event.event ?? readString(data, "type");

    switch (type) {
      case "message_start": {
        const u = readObject(readObject(data, "message"), "usage");
        if (!u) return null;
        return {
          id: request.id,
          kind: request.kind,
          index,
          delta: "",
          usage: usage(readNumber(u, "input_tokens") ?? 0, readNumber(u, "output_tokens") ?? 0),
        };
      }
      case "content_block_delta": {
        const delta = readObject(data, "delta");
        if (readString(delta, "type") !== "text_delta") return null;
        return { id: request.id, kind: request.kind, index, delta: readString(delta, "text") ?? "" };
      }
      case "message_delta": {
        const stop = readString(readObject(data, "delta"), "stop_reason");
        const u = readObject(data, "usage");
        return {
          id: request.id,
          kind: request.kind,
          index,
          delta: "",
          ...(stop !== undefined ? { finish_reason: mapStopReason(stop) } : {}),
          ...(u ? { usage: usage(readNumber(u, "input_tokens") ?? 0, readNumber(u, "output_tokens") ?? 0) } : {}),
        };
      }
      case "error":
        return this.classifyError({ ok: false, status: 0, body: data });
      default:
        // content_block_start/stop, message_stop, ping
        return null;
    }
  }

  classifyError(error: ProviderError): CanonicalError {
    const err = readObject(asObject(error.body), "error");
    const code = readString(err, "type");
    const message = readString(err, "message");
    return classifyProviderError(this.name, ANTHROPIC_ERROR_TABLE, error, {
      ...(code !== undefined ? { code } : {}),
      ...(message !== undefined ? { message } : {}),
    });
  }

  recoverRequest(request: ProviderRequest): RequestEcho {
    const body = asObject(request.body);
    if (!body || !new URL(request.url).pathname.endsWith("/messages")) {
      throw invalidRequest(`Not an Anthropic request: ${request.method} ${request.url}`);
    }
    return { kind: "chat", model: readString(body, "model") ?? "", params: readParams(body) };
  }
}
