import type {
  CanonicalError,
  CanonicalRequest,
  CanonicalResponse,
  CanonicalResponseFragment,
  GenerationParamName,
  GenerationParams,
  OperationKind,
} from "../types/index.js";
import type { ProviderError, ProviderReply, ProviderRequest, ProviderStreamEvent } from "../transport/index.js";

export interface ProviderRequestBuild {
  request: ProviderRequest;
  /** Optional params the provider has no equivalent for, in canonical order. */
  dropped: GenerationParamName[];
}

/** The semantically significant part of a request, read back from wire form. */
export interface RequestEcho {
  kind: OperationKind;
  model: string;
  params: GenerationParams;
}

export interface FineTuneTransformer {
  toPollRequest(jobId: string, endpoint: string): ProviderRequest;
  toCancelRequest(jobId: string, endpoint: string): ProviderRequest;
  fromJobReply(reply: ProviderReply, request: CanonicalRequest | undefined, jobId: string): CanonicalResponse | CanonicalError;
}

/**
 * Pure mapping between the canonical model and one provider's wire format.
 * No I/O and no shared mutable state: every method is a function of its input.
 */
export interface ProviderTransformer {
  /** Human-readable provider name used in error messages. */
  readonly name: string;

  /**
   * Throws CanonicalError(InvalidRequest) when a required field has no
   * provider equivalent; optional unsupported params are dropped and listed.
   */
  toProvider(request: CanonicalRequest, endpoint: string): ProviderRequestBuild;

  fromProvider(reply: ProviderReply, request: CanonicalRequest): CanonicalResponse | CanonicalError;

  /** Returns null for events that carry nothing for the caller (pings, bookkeeping). */
  fromStreamEvent(
    event: ProviderStreamEvent,
    request: CanonicalRequest,
    index: number,
  ): CanonicalResponseFragment | CanonicalError | null;

  classifyError(error: ProviderError): CanonicalError;

  recoverRequest(request: ProviderRequest): RequestEcho;

  /** Present only for providers that run fine-tuning jobs. */
  readonly jobs?: FineTuneTransformer;
}
