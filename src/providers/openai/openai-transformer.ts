import {
  CanonicalError,
  createCanonicalResponse,
  invalidRequest,
  messageText,
  presentParams,
  usage,
} from "../../types/index.js";
import type {
  CanonicalRequest,
  CanonicalResponse,
  CanonicalResponseFragment,
  FineTuneJob,
  FineTuneStatus,
  FinishReason,
  GenerationParams,
  OperationKind,
  ResultItem,
} from "../../types/index.js";
import type { ProviderError, ProviderReply, ProviderRequest, ProviderStreamEvent } from "../../transport/index.js";
import { defineProvider } from "../../registry/index.js";
import { classifyProviderError, malformedResponse } from "../error-table.js";
import type { ErrorCodeTable } from "../error-table.js";
import type { FineTuneTransformer, ProviderRequestBuild, ProviderTransformer, RequestEcho } from "../i-transformer.js";
import {
  asObject,
  isNumberArray,
  parseJson,
  readNumber,
  readObject,
  readObjects,
  readString,
  readStrings,
} from "../payload.js";
import type { JsonObject } from "../payload.js";

// ---------------------------------------------------------------------------
// OpenAI-specific request shapes (never leak past this file)
// ---------------------------------------------------------------------------

interface OpenAIChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

interface OpenAISamplingFields {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  stop?: string[];
  seed?: number;
  stream?: boolean;
  stream_options?: { include_usage: boolean };
}

interface OpenAIChatRequest extends OpenAISamplingFields {
  model: string;
  messages: OpenAIChatMessage[];
}

interface OpenAICompletionRequest extends OpenAISamplingFields {
  model: string;
  prompt: string;
}

interface OpenAIEmbeddingRequest {
  model: string;
  input: string[];
}

interface OpenAIFineTuneRequest {
  model: string;
  training_file: string;
  hyperparameters?: {
    n_epochs?: number;
    batch_size?: number;
    learning_rate_multiplier?: number;
  };
  suffix?: string;
}

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

export const OPENAI_DESCRIPTOR = defineProvider({
  id: "openai",
  operations: ["chat", "completion", "embedding", "fine_tune"],
  streaming: true,
  credentialShape: "bearer-token",
  endpointTemplate: "https://api.openai.com/v1",
  hyperparameters: {
    epochs: { type: "integer", min: 1, max: 50 },
    batch_size: { type: "integer", min: 1, max: 256 },
    learning_rate_multiplier: { type: "number", min: 0.01, max: 10 },
  },
});

// ---------------------------------------------------------------------------
// Error table, keyed by `error.code`, falling back to `error.type`
// ---------------------------------------------------------------------------

export const OPENAI_ERROR_CODES = [
  "invalid_api_key",
  "invalid_authentication",
  "authentication_error",
  "permission_error",
  "insufficient_quota",
  "rate_limit_exceeded",
  "invalid_request_error",
  "model_not_found",
  "context_length_exceeded",
  "invalid_value",
  "unsupported_parameter",
  "server_error",
  "service_unavailable",
] as const;

export type OpenAIErrorCode = (typeof OPENAI_ERROR_CODES)[number];

export const OPENAI_ERROR_TABLE = {
  invalid_api_key: "AuthError",
  invalid_authentication: "AuthError",
  authentication_error: "AuthError",
  permission_error: "AuthError",
  insufficient_quota: "RateLimited",
  rate_limit_exceeded: "RateLimited",
  invalid_request_error: "InvalidRequest",
  model_not_found: "InvalidRequest",
  context_length_exceeded: "InvalidRequest",
  invalid_value: "InvalidRequest",
  unsupported_parameter: "InvalidRequest",
  server_error: "ProviderUnavailable",
  service_unavailable: "ProviderUnavailable",
} as const satisfies ErrorCodeTable<OpenAIErrorCode>;

// ---------------------------------------------------------------------------
// Mapping tables
// ---------------------------------------------------------------------------

const PATHS: Readonly<Record<Exclude<OperationKind, "online_predict">, string>> = {
  chat: "/chat/completions",
  completion: "/completions",
  embedding: "/embeddings",
  fine_tune: "/fine_tuning/jobs",
};

const HYPERPARAMETER_WIRE_NAMES = {
  epochs: "n_epochs",
  batch_size: "batch_size",
  learning_rate_multiplier: "learning_rate_multiplier",
} as const;

function isHyperparameter(name: string): name is keyof typeof HYPERPARAMETER_WIRE_NAMES {
  return Object.hasOwn(HYPERPARAMETER_WIRE_NAMES, name);
}

function mapFinishReason(reason: string | undefined): FinishReason {
  switch (reason) {
    case "stop": return "stop";
    case "length": return "length";
    case "tool_calls":
    case "function_call": return "tool_use";
    case "content_filter": return "content_filter";
    default: return "stop";
  }
}

function mapJobStatus(status: string | undefined): FineTuneStatus | undefined {
  switch (status) {
    case "validating_files":
    case "queued": return "queued";
    case "running": return "running";
    case "succeeded": return "succeeded";
    case "failed": return "failed";
    case "cancelled": return "cancelled";
    default: return undefined;
  }
}

function kindFromUrl(url: string): OperationKind | undefined {
  const path = new URL(url).pathname;
  if (path.endsWith(PATHS.chat)) return "chat";
  if (path.endsWith(PATHS.embedding)) return "embedding";
  if (path.endsWith(PATHS.completion)) return "completion";
  if (path.endsWith(PATHS.fine_tune)) return "fine_tune";
  return undefined;
}

function samplingFields(params: Readonly<GenerationParams>, stream: boolean): OpenAISamplingFields {
  const fields: OpenAISamplingFields = {};
  if (params.temperature !== undefined) fields.temperature = params.temperature;
  if (params.max_tokens !== undefined) fields.max_tokens = params.max_tokens;
  if (params.top_p !== undefined) fields.top_p = params.top_p;
  if (params.stop !== undefined) fields.stop = [...params.stop];
  if (params.seed !== undefined) fields.seed = params.seed;
  if (stream) {
    fields.stream = true;
    fields.stream_options = { include_usage: true };
  }
  return fields;
}


function readParams(body: JsonObject | undefined): GenerationParams {
  const params: GenerationParams = {};
  const temperature = readNumber(body, "temperature");
  const maxTokens = readNumber(body, "max_tokens");
  const topP = readNumber(body, "top_p");
  const stop = readStrings(body, "stop");
  const seed = readNumber(body, "seed");
  if (temperature !== undefined) params.temperature = temperature;
  if (maxTokens !== undefined) params.max_tokens = maxTokens;
  if (topP !== undefined) params.top_p = topP;
  if (stop !== undefined) params.stop = stop;
  if (seed !== undefined) params.seed = seed;
  return params;
}

function readUsage(body: JsonObject | undefined): ReturnType<typeof usage> {
  const u = readObject(body, "usage");
  return usage(
    readNumber(u, "prompt_tokens") ?? 0,
    readNumber(u, "completion_tokens") ?? 0,
    readNumber(u, "total_tokens"),
  );
}

// ---------------------------------------------------------------------------
// Fine-tuning jobs
// ---------------------------------------------------------------------------

function parseJob(body: JsonObject | undefined): FineTuneJob | undefined {
  const jobId = readString(body, "id");
  const status = mapJobStatus(readString(body, "status"));
  if (!jobId || !status) return undefined;
  const job: FineTuneJob = { job_id: jobId, status };
  const tuned = readString(body, "fine_tuned_model");
  const failure = readString(readObject(body, "error"), "message");
  if (tuned) job.fine_tuned_model = tuned;
  if (failure) job.failure_reason = failure;
  return job;
}

class OpenAIFineTuneTransformer implements FineTuneTransformer {
  constructor(private readonly owner: OpenAITransformer) {}

  toPollRequest(jobId: string, endpoint: string): ProviderRequest {
    return { method: "GET", url: `${endpoint}${PATHS.fine_tune}/${encodeURIComponent(jobId)}`, headers: {} };
  }

  toCancelRequest(jobId: string, endpoint: string): ProviderRequest {
    return { method: "POST", url: `${endpoint}${PATHS.fine_tune}/${encodeURIComponent(jobId)}/cancel`, headers: {} };
  }

  fromJobReply(reply: ProviderReply, request: CanonicalRequest | undefined, jobId: string): CanonicalResponse | CanonicalError {
    if (!reply.ok) return this.owner.classifyError(reply);
    const body = asObject(reply.body);
    const job = parseJob(body);
    if (!job) return malformedResponse(this.owner.name, "fine-tuning job has no id or known status", reply.status);
    return createCanonicalResponse({
      id: request?.id ?? jobId,
      kind: "fine_tune",
      model_used: job.fine_tuned_model ?? readString(body, "model") ?? request?.model ?? "",
      job,
      raw: reply.body,
    });
  }
}

// ---------------------------------------------------------------------------
// OpenAITransformer
// ---------------------------------------------------------------------------

export class OpenAITransformer implements ProviderTransformer {
  readonly name = "OpenAI";
  readonly jobs: FineTuneTransformer = new OpenAIFineTuneTransformer(this);

  toProvider(request: CanonicalRequest, endpoint: string): ProviderRequestBuild {
    switch (request.kind) {
      case "chat": {
        const messages: OpenAIChatMessage[] = [];
        if (request.system) messages.push({ role: "system", content: request.system });
        for (const msg of request.messages) {
          messages.push({ role: msg.role === "assistant" ? "assistant" : "user", content: messageText(msg) });
        }
        const body: OpenAIChatRequest = { model: request.model, messages, ...samplingFields(request.params, request.stream) };
        return { request: this.post(endpoint, "chat", body), dropped: [] };
      }
      case "completion": {
        const prompt = [request.system, ...request.messages.map(messageText)].filter((s) => s).join("\n\n");
        const body: OpenAICompletionRequest = { model: request.model, prompt, ...samplingFields(request.params, request.stream) };
        return { request: this.post(endpoint, "completion", body), dropped: [] };
      }
      case "embedding": {
        const body: OpenAIEmbeddingRequest = { model: request.model, input: request.messages.map(messageText) };
        // Sampling params have no meaning for embeddings
        return { request: this.post(endpoint, "embedding", body), dropped: presentParams(request.params) };
      }
      case "fine_tune": {
        const spec = request.fine_tune;
        if (!spec) throw invalidRequest("fine_tune requests require a fine_tune job spec");
        const body: OpenAIFineTuneRequest = { model: request.model, training_file: spec.dataset };
        const hyper: NonNullable<OpenAIFineTuneRequest["hyperparameters"]> = {};
        for (const [name, value] of Object.entries(spec.hyperparameters)) {
          if (!isHyperparameter(name) || typeof value !== "number") {
            throw invalidRequest(`OpenAI has no numeric fine-tuning hyperparameter "${name}"`, { name });
          }
          hyper[HYPERPARAMETER_WIRE_NAMES[name]] = value;
        }
        if (Object.keys(hyper).length > 0) body.hyperparameters = hyper;
        if (spec.suffix) body.suffix = spec.suffix;
        return { request: this.post(endpoint, "fine_tune", body), dropped: presentParams(request.params) };
      }
      case "online_predict":
        throw new CanonicalError("UnsupportedCapability", "OpenAI has no online prediction endpoint", {
          provider: this.name,
        });
    }
  }

  fromProvider(reply: ProviderReply, request: CanonicalRequest): CanonicalResponse | CanonicalError {
    if (!reply.ok) return this.classifyError(reply);
    const body = asObject(reply.body);
    if (!body) return malformedResponse(this.name, "body is not a JSON object", reply.status);

    switch (request.kind) {
      case "chat":
      case "completion": {
        const choices = readObjects(body, "choices");
        if (choices.length === 0) return malformedResponse(this.name, "response has no choices", reply.status);
        const result: ResultItem[] = choices.map((choice, i) => ({
          index: readNumber(choice, "index") ?? i,
          role: "assistant",
          content:
            request.kind === "chat"
              ? readString(readObject(choice, "message"), "content") ?? ""
              : readString(choice, "text") ?? "",
          finish_reason: mapFinishReason(readString(choice, "finish_reason")),
        }));
        return createCanonicalResponse({
          id: request.id,
          kind: request.kind,
          model_used: readString(body, "model") ?? request.model,
          result,
          usage: readUsage(body),
          raw: reply.body,
        });
      }
      case "embedding": {
        const data = readObjects(body, "data")
          .map((d, i) => ({ index: readNumber(d, "index") ?? i, vector: d["embedding"] }))
          .sort((a, b) => a.index - b.index);
        const embeddings: number[][] = [];
        for (const d of data) {
          if (!isNumberArray(d.vector)) return malformedResponse(this.name, "embedding is not a number array", reply.status);
          embeddings.push(d.vector);
        }
        return createCanonicalResponse({
          id: request.id,
          kind: "embedding",
          model_used: readString(body, "model") ?? request.model,
          embeddings,
          usage: readUsage(body),
          raw: reply.body,
        });
      }
      case "fine_tune":
        return this.jobs.fromJobReply(reply, request, "");
      case "online_predict":
        return new CanonicalError("UnsupportedCapability", "OpenAI has no online prediction endpoint", {
          provider: this.name,
        });
    }
  }

  fromStreamEvent(
    event: ProviderStreamEvent,
    request: CanonicalRequest,
    index: number,
  ): CanonicalResponseFragment | CanonicalError | null {
    const chunk = asObject(parseJson(event.data));
    if (!chunk) return malformedResponse(this.name, "stream chunk is not JSON");

    if (readObject(chunk, "error")) {
      return this.classifyError({ ok: false, status: 0, body: chunk });
    }

    const choice = readObjects(chunk, "choices")[0];
    const delta =
      request.kind === "chat"
        ? readString(readObject(choice, "delta"), "content") ?? ""
        : readString(choice, "text") ?? "";
    const finish = readString(choice, "finish_reason");
    const hasUsage = readObject(chunk, "usage") !== undefined;

    if (delta === "" && finish === undefined && !hasUsage) return null;

    return {
      id: request.id,
      kind: request.kind,
      index,
      delta,
      ...(finish !== undefined ? { finish_reason: mapFinishReason(finish) } : {}),
      ...(hasUsage ? { usage: readUsage(chunk) } : {}),
    };
  }

  classifyError(error: ProviderError): CanonicalError {
    const err = readObject(asObject(error.body), "error");
    const code = readString(err, "code") ?? readString(err, "type");
    const message = readString(err, "message");
    return classifyProviderError(this.name, OPENAI_ERROR_TABLE, error, {
      ...(code !== undefined ? { code } : {}),
      ...(message !== undefined ? { message } : {}),
    });
  }

  recoverRequest(request: ProviderRequest): RequestEcho {
    const kind = kindFromUrl(request.url);
    const body = asObject(request.body);
    if (!kind || !body) {
      throw invalidRequest(`Not an OpenAI request: ${request.method} ${request.url}`);
    }
    return { kind, model: readString(body, "model") ?? "", params: readParams(body) };
  }

  private post(endpoint: string, kind: keyof typeof PATHS, body: object): ProviderRequest {
    return { method: "POST", url: `${endpoint}${PATHS[kind]}`, headers: {}, body };
  }
}
