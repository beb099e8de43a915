import type { OperationKind, JsonValue } from "./canonical-request.js";
import type { FineTuneJob } from "./fine-tune.js";

export type FinishReason = "stop" | "length" | "tool_use" | "content_filter" | "error";

export interface ResultItem {
  index: number;
  role: "assistant";
  content: string;
  finish_reason: FinishReason;
}

export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

export interface CanonicalResponse {
  /** Bumped only on breaking changes to this shape. */
  readonly schema_version: 1;
  /** Id of the originating request. */
  readonly id: string;
  readonly kind: OperationKind;
  readonly model_used: string;
  readonly result: readonly ResultItem[];
  readonly embeddings?: readonly (readonly number[])[];
  readonly predictions?: readonly JsonValue[];
  readonly job?: Readonly<FineTuneJob>;
  readonly usage: Readonly<UsageMetrics>;
  /** Provider echo kept for debugging. Never parse this. */
  readonly raw: unknown;
}

export interface CanonicalResponseFragment {
  readonly id: string;
  readonly kind: OperationKind;
  /** Sequence number of the fragment within its stream, from 0. */
  readonly index: number;
  readonly delta: string;
  readonly finish_reason?: FinishReason;
  readonly usage?: Readonly<UsageMetrics>;
}

export const EMPTY_USAGE: Readonly<UsageMetrics> = Object.freeze({
  input_tokens: 0,
  output_tokens: 0,
  total_tokens: 0,
});

export function usage(inputTokens = 0, outputTokens = 0, totalTokens?: number): UsageMetrics {
  return {
    input_tokens: inputTokens,
    output_tokens: outputTokens,
    total_tokens: totalTokens ?? inputTokens + outputTokens,
  };
}

type ResponseInit = Omit<CanonicalResponse, "schema_version" | "usage" | "result"> & {
  result?: ResultItem[];
  usage?: UsageMetrics;
};

/** Freezes the response shell; `raw` is left as the provider returned it. */
export function createCanonicalResponse(init: ResponseInit): CanonicalResponse {
  const result = Object.freeze((init.result ?? []).map((item) => Object.freeze({ ...item })));
  return Object.freeze({
    schema_version: 1,
    ...init,
    result,
    usage: Object.freeze({ ...(init.usage ?? EMPTY_USAGE) }),
    ...(init.job ? { job: Object.freeze({ ...init.job }) } : {}),
  });
}
