import { CanonicalError, createCanonicalResponse, invalidRequest, messageText, presentParams, usage } from "../../types/index.js";
import type {
  CanonicalRequest,
  CanonicalResponse,
  CanonicalResponseFragment,
  FineTuneJob,
  FineTuneStatus,
  FinishReason,
  GenerationParams,
  JsonValue,
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
  readArray,
  readNumber,
  readObject,
  readObjects,
  readString,
  readStrings,
} from "../payload.js";
import type { JsonObject } from "../payload.js";

// ---------------------------------------------------------------------------
// Vertex AI request shapes (never leak past this file)
// ---------------------------------------------------------------------------

interface VertexPart {
  text: string;
}

interface VertexContent {
  role: "user" | "model";
  parts: VertexPart[];
}

interface VertexGenerationConfig {
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
  stopSequences?: string[];
  seed?: number;
}

interface VertexGenerateRequest {
  contents: VertexContent[];
  systemInstruction?: { parts: VertexPart[] };
  generationConfig?: VertexGenerationConfig;
}

interface VertexPredictRequest {
  instances: JsonValue[];
  parameters?: VertexGenerationConfig;
}

interface VertexTuningRequest {
  baseModel: string;
  supervisedTuningSpec: {
    trainingDatasetUri: string;
    hyperParameters?: {
      epochCount?: number;
      learningRateMultiplier?: number;
      adapterSize?: string;
    };
  };
  tunedModelDisplayName?: string;
}

export const VERTEX_DESCRIPTOR = defineProvider({
  id: "vertex-ai",
  operations: ["chat", "embedding", "online_predict", "fine_tune"],
  streaming: true,
  credentialShape: "oauth-access-token",
  endpointTemplate: "https://{region}-aiplatform.googleapis.com/v1/projects/{project}/locations/{region}",
  hyperparameters: {
    epochs: { type: "integer", min: 1, max: 100 },
    learning_rate_multiplier: { type: "number", min: 0.01, max: 10 },
    adapter_size: { type: "enum", values: ["1", "4", "8", "16"] },
  },
});

// ---------------------------------------------------------------------------
// Error table, keyed by the google.rpc status string in `error.status`
// ---------------------------------------------------------------------------

export const VERTEX_ERROR_CODES = [
  "INVALID_ARGUMENT",
  "FAILED_PRECONDITION",
  "OUT_OF_RANGE",
  "NOT_FOUND",
  "ALREADY_EXISTS",
  "UNAUTHENTICATED",
  "PERMISSION_DENIED",
  "RESOURCE_EXHAUSTED",
  "ABORTED",
  "UNAVAILABLE",
  "INTERNAL",
  "DEADLINE_EXCEEDED",
  "UNIMPLEMENTED",
  "CANCELLED",
  "DATA_LOSS",
  "UNKNOWN",
] as const;

export type VertexErrorCode = (typeof VERTEX_ERROR_CODES)[number];

export const VERTEX_ERROR_TABLE = {
  INVALID_ARGUMENT: "InvalidRequest",
  FAILED_PRECONDITION: "InvalidRequest",
  OUT_OF_RANGE: "InvalidRequest",
  NOT_FOUND: "InvalidRequest",
  ALREADY_EXISTS: "InvalidRequest",
  UNAUTHENTICATED: "AuthError",
  PERMISSION_DENIED: "AuthError",
  RESOURCE_EXHAUSTED: "RateLimited",
  ABORTED: "ProviderUnavailable",
  UNAVAILABLE: "ProviderUnavailable",
  INTERNAL: "ProviderUnavailable",
  DEADLINE_EXCEEDED: "Timeout",
  UNIMPLEMENTED: "UnsupportedCapability",
  CANCELLED: "Unknown",
  DATA_LOSS: "Unknown",
  UNKNOWN: "Unknown",
} as const satisfies ErrorCodeTable<VertexErrorCode>;

// ---------------------------------------------------------------------------
// Mapping tables
// ---------------------------------------------------------------------------

const ADAPTER_SIZES: Readonly<Record<string, string>> = {
  "1": "ADAPTER_SIZE_ONE",
  "4": "ADAPTER_SIZE_FOUR",
  "8": "ADAPTER_SIZE_EIGHT",
  "16": "ADAPTER_SIZE_SIXTEEN",
};

function mapFinishReason(reason: string | undefined): FinishReason {
  switch (reason) {
    case "STOP": return "stop";
    case "MAX_TOKENS": return "length";
    case "SAFETY":
    case "RECITATION":
    case "BLOCKLIST":
    case "PROHIBITED_CONTENT":
    case "SPII": return "content_filter";
    case "MALFORMED_FUNCTION_CALL": return "error";
    default: return "stop";
  }
}

function mapJobState(state: string | undefined): FineTuneStatus | undefined {
  switch (state) {
    case "JOB_STATE_QUEUED":
    case "JOB_STATE_PENDING": return "queued";
    case "JOB_STATE_RUNNING":
    case "JOB_STATE_CANCELLING":
    case "JOB_STATE_PAUSED":
    case "JOB_STATE_UPDATING": return "running";
    case "JOB_STATE_SUCCEEDED": return "succeeded";
    case "JOB_STATE_FAILED":
    case "JOB_STATE_EXPIRED": return "failed";
    case "JOB_STATE_CANCELLED": return "cancelled";
    default: return undefined;
  }
}

function generationConfig(params: Readonly<GenerationParams>): VertexGenerationConfig | undefined {
  const config: VertexGenerationConfig = {};
  if (params.temperature !== undefined) config.temperature = params.temperature;
  if (params.max_tokens !== undefined) config.maxOutputTokens = params.max_tokens;
  if (params.top_p !== undefined) config.topP = params.top_p;
  if (params.stop !== undefined) config.stopSequences = [...params.stop];
  if (params.seed !== undefined) config.seed = params.seed;
  return Object.keys(config).length > 0 ? config : undefined;
}

function readGenerationConfig(config: JsonObject | undefined): GenerationParams {
  const params: GenerationParams = {};
  const temperature = readNumber(config, "temperature");
  const maxTokens = readNumber(config, "maxOutputTokens");
  const topP = readNumber(config, "topP");
  const stop = readStrings(config, "stopSequences");
  const seed = readNumber(config, "seed");
  if (temperature !== undefined) params.temperature = temperature;
  if (maxTokens !== undefined) params.max_tokens = maxTokens;
  if (topP !== undefined) params.top_p = topP;
  if (stop !== undefined) params.stop = stop;
  if (seed !== undefined) params.seed = seed;
  return params;
}

function readUsageMetadata(body: JsonObject | undefined): ReturnType<typeof usage> {
  const meta = readObject(body, "usageMetadata");
  return usage(
    readNumber(meta, "promptTokenCount") ?? 0,
    readNumber(meta, "candidatesTokenCount") ?? 0,
    readNumber(meta, "totalTokenCount"),
  );
}

function candidateText(candidate: JsonObject | undefined): string {
  return readObjects(readObject(candidate, "content"), "parts")
    .map((part) => readString(part, "text") ?? "")
    .join("");
}

/** Text items become `{ prompt }` instances; JSON items pass through as-is. */
function predictionInstances(request: CanonicalRequest): JsonValue[] {
  return request.messages.flatMap((msg): JsonValue[] => {
    if (typeof msg.content === "string") return [{ prompt: msg.content }];
    return msg.content.map((item) => (item.type === "json" ? item.value : { prompt: item.text }));
  });
}

/** Reads `.../models/{model}:{method}` or `.../endpoints/{id}:{method}` back out of a URL. */
function parseResourceUrl(url: string): { collection: string; id: string; method: string } | undefined {
  const match = /\/(models|endpoints)\/([^/:]+):([A-Za-z]+)$/.exec(new URL(url).pathname);
  if (!match) return undefined;
  return { collection: match[1] ?? "", id: decodeURIComponent(match[2] ?? ""), method: match[3] ?? "" };
}

function jobUrl(jobId: string, endpoint: string): string {
  // Job ids are full resource names ("projects/.../tuningJobs/123")
  if (jobId.startsWith("projects/")) return `${new URL(endpoint).origin}/v1/${jobId}`;
  return `${endpoint}/tuningJobs/${encodeURIComponent(jobId)}`;
}

// ---------------------------------------------------------------------------
// Tuning jobs
// ---------------------------------------------------------------------------

function parseTuningJob(body: JsonObject | undefined): FineTuneJob | undefined {
  const name = readString(body, "name");
  const status = mapJobState(readString(body, "state"));
  if (!name || !status) return undefined;
  const job: FineTuneJob = { job_id: name, status };
  const tuned = readString(readObject(body, "tunedModel"), "model");
  const failure = readString(readObject(body, "error"), "message");
  if (tuned) job.fine_tuned_model = tuned;
  if (failure) job.failure_reason = failure;
  return job;
}

class VertexTuningTransformer implements FineTuneTransformer {
  constructor(private readonly owner: VertexTransformer) {}

  toPollRequest(jobId: string, endpoint: string): ProviderRequest {
    return { method: "GET", url: jobUrl(jobId, endpoint), headers: {} };
  }

  toCancelRequest(jobId: string, endpoint: string): ProviderRequest {
    return { method: "POST", url: `${jobUrl(jobId, endpoint)}:cancel`, headers: {}, body: {} };
  }

  fromJobReply(reply: ProviderReply, request: CanonicalRequest | undefined, jobId: string): CanonicalResponse | CanonicalError {
    if (!reply.ok) return this.owner.classifyError(reply);
    const body = asObject(reply.body);
    const job = parseTuningJob(body);
    if (!job) return malformedResponse(this.owner.name, "tuning job has no name or known state", reply.status);
    return createCanonicalResponse({
      id: request?.id ?? jobId,
      kind: "fine_tune",
      model_used: job.fine_tuned_model ?? readString(body, "baseModel") ?? request?.model ?? "",
      job,
      raw: reply.body,
    });
  }
}

// ---------------------------------------------------------------------------
// VertexTransformer
// ---------------------------------------------------------------------------

export class VertexTransformer implements ProviderTransformer {
  readonly name = "Vertex AI";
  readonly jobs: FineTuneTransformer = new VertexTuningTransformer(this);

  toProvider(request: CanonicalRequest, endpoint: string): ProviderRequestBuild {
    const model = encodeURIComponent(request.model);
    switch (request.kind) {
      case "chat": {
        const body: VertexGenerateRequest = {
          contents: request.messages.map((msg) => ({
            role: msg.role === "assistant" ? "model" : "user",
            parts: [{ text: messageText(msg) }],
          })),
        };
        if (request.system) body.systemInstruction = { parts: [{ text: request.system }] };
        const config = generationConfig(request.params);
        if (config) body.generationConfig = config;
        const url = request.stream
          ? `${endpoint}/publishers/google/models/${model}:streamGenerateContent?alt=sse`
          : `${endpoint}/publishers/google/models/${model}:generateContent`;
        return { request: { method: "POST", url, headers: {}, body }, dropped: [] };
      }
      case "embedding": {
        const body: VertexPredictRequest = {
          instances: request.messages.map((msg) => ({ content: messageText(msg) })),
        };
        return {
          request: { method: "POST", url: `${endpoint}/publishers/google/models/${model}:predict`, headers: {}, body },
          dropped: presentParams(request.params),
        };
      }
      case "online_predict": {
        const body: VertexPredictRequest = { instances: predictionInstances(request) };
        const config = generationConfig(request.params);
        if (config) body.parameters = config;
        return {
          request: { method: "POST", url: `${endpoint}/endpoints/${model}:predict`, headers: {}, body },
          dropped: [],
        };
      }
      case "fine_tune":
        return { request: this.toTuningRequest(request, endpoint), dropped: presentParams(request.params) };
      case "completion":
        throw new CanonicalError("UnsupportedCapability", "Vertex AI has no text completion endpoint", {
          provider: this.name,
        });
    }
  }

  fromProvider(reply: ProviderReply, request: CanonicalRequest): CanonicalResponse | CanonicalError {
    if (!reply.ok) return this.classifyError(reply);
    const body = asObject(reply.body);
    if (!body) return malformedResponse(this.name, "body is not a JSON object", reply.status);

    switch (request.kind) {
      case "chat": {
        const candidates = readObjects(body, "candidates");
        if (candidates.length === 0) return malformedResponse(this.name, "response has no candidates", reply.status);
        const result: ResultItem[] = candidates.map((candidate, i) => ({
          index: readNumber(candidate, "index") ?? i,
          role: "assistant",
          content: candidateText(candidate),
          finish_reason: mapFinishReason(readString(candidate, "finishReason")),
        }));
        return createCanonicalResponse({
          id: request.id,
          kind: "chat",
          model_used: readString(body, "modelVersion") ?? request.model,
          result,
          usage: readUsageMetadata(body),
          raw: reply.body,
        });
      }
      case "embedding": {
        const embeddings: number[][] = [];
        let tokens = 0;
        for (const prediction of readObjects(body, "predictions")) {
          const embedding = readObject(prediction, "embeddings");
          const values = embedding?.["values"];
          if (!isNumberArray(values)) return malformedResponse(this.name, "embedding has no values", reply.status);
          embeddings.push(values);
          tokens += readNumber(readObject(embedding, "statistics"), "token_count") ?? 0;
        }
        return createCanonicalResponse({
          id: request.id,
          kind: "embedding",
          model_used: request.model,
          embeddings,
          usage: usage(tokens, 0),
          raw: reply.body,
        });
      }
      case "online_predict": {
        const predictions = readArray(body, "predictions");
        if (!predictions) return malformedResponse(this.name, "response has no predictions", reply.status);
        return createCanonicalResponse({
          id: request.id,
          kind: "online_predict",
          model_used: readString(body, "deployedModelId") ?? request.model,
          predictions: predictions.flatMap((p) => (isJsonValue(p) ? [p] : [])),
          raw: reply.body,
        });
      }
      case "fine_tune":
        return this.jobs.fromJobReply(reply, request, "");
      case "completion":
        return new CanonicalError("UnsupportedCapability", "Vertex AI has no text completion endpoint", {
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
      return this.classifyError({ ok: false, status: readNumber(readObject(chunk, "error"), "code") ?? 0, body: chunk });
    }

    const candidate = readObjects(chunk, "candidates")[0];
    const delta = candidateText(candidate);
    const finish = readString(candidate, "finishReason");
    const hasUsage = readObject(chunk, "usageMetadata") !== undefined;
    if (delta === "" && finish === undefined && !hasUsage) return null;

    return {
      id: request.id,
      kind: request.kind,
      index,
      delta,
      ...(finish !== undefined ? { finish_reason: mapFinishReason(finish) } : {}),
      ...(hasUsage ? { usage: readUsageMetadata(chunk) } : {}),
    };
  }

  classifyError(error: ProviderError): CanonicalError {
    // Vertex sometimes wraps the error object in a single-element array
    const root = asObject(Array.isArray(error.body) ? error.body[0] : error.body);
    const err = readObject(root, "error");
    const code = readString(err, "status");
    const message = readString(err, "message");
    return classifyProviderError(this.name, VERTEX_ERROR_TABLE, error, {
      ...(code !== undefined ? { code } : {}),
      ...(message !== undefined ? { message } : {}),
    });
  }

  recoverRequest(request: ProviderRequest): RequestEcho {
    const body = asObject(request.body);
    const path = new URL(request.url).pathname;

    if (path.endsWith("/tuningJobs") && body) {
      return { kind: "fine_tune", model: readString(body, "baseModel") ?? "", params: {} };
    }

    const resource = parseResourceUrl(request.url);
    if (!resource || !body) {
      throw invalidRequest(`Not a Vertex AI request: ${request.method} ${request.url}`);
    }
    let kind: OperationKind;
    if (resource.method === "generateContent" || resource.method === "streamGenerateContent") kind = "chat";
    else if (resource.collection === "endpoints") kind = "online_predict";
    else kind = "embedding";

    const config = kind === "chat" ? readObject(body, "generationConfig") : readObject(body, "parameters");
    return { kind, model: resource.id, params: readGenerationConfig(config) };
  }

  private toTuningRequest(request: CanonicalRequest, endpoint: string): ProviderRequest {
    const spec = request.fine_tune;
    if (!spec) throw invalidRequest("fine_tune requests require a fine_tune job spec");
    if (!spec.dataset.startsWith("gs://")) {
      throw invalidRequest("Vertex AI tuning datasets must be gs:// URIs", { dataset: spec.dataset });
    }

    const hyper: NonNullable<VertexTuningRequest["supervisedTuningSpec"]["hyperParameters"]> = {};
    for (const [name, value] of Object.entries(spec.hyperparameters)) {
      const adapterSize = name === "adapter_size" ? ADAPTER_SIZES[String(value)] : undefined;
      if (name === "epochs" && typeof value === "number") hyper.epochCount = value;
      else if (name === "learning_rate_multiplier" && typeof value === "number") hyper.learningRateMultiplier = value;
      else if (adapterSize !== undefined) hyper.adapterSize = adapterSize;
      else throw invalidRequest(`Vertex AI has no tuning hyperparameter "${name}" = ${String(value)}`, { name });
    }

    const body: VertexTuningRequest = {
      baseModel: request.model,
      supervisedTuningSpec: { trainingDatasetUri: spec.dataset },
    };
    if (Object.keys(hyper).length > 0) body.supervisedTuningSpec.hyperParameters = hyper;
    if (spec.suffix) body.tunedModelDisplayName = `${request.model}-${spec.suffix}`;
    return { method: "POST", url: `${endpoint}/tuningJobs`, headers: {}, body };
  }
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}
