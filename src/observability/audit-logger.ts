import type { CanonicalError, CanonicalErrorKind, CanonicalResponse, OperationKind } from "../types/index.js";

export type AuditOperation = "dispatch" | "stream" | "poll" | "cancel_job";

export interface AuditEntry {
  timestamp: string;
  operation: AuditOperation;
  provider: string;
  request_id?: string;
  job_id?: string;
  model?: string;
  kind?: OperationKind;
  outcome: "ok" | "error";
  error_kind?: CanonicalErrorKind;
  /** Optional params the provider had no equivalent for. */
  dropped: string[];
  input_tokens: number;
  output_tokens: number;
  duration_ms: number;
}

export interface AuditLoggerOptions {
  /** Override the write sink. Defaults to process.stdout JSON lines. */
  write?: (entry: AuditEntry) => void;
}

export interface AuditParams {
  operation: AuditOperation;
  provider: string;
  requestId?: string;
  jobId?: string;
  model?: string;
  kind?: OperationKind;
  dropped?: readonly string[];
  response?: CanonicalResponse;
  error?: CanonicalError;
  startedAt: number;
}

/** One JSON line per dispatched call. Never carries message content or credentials. */
export class AuditLogger {
  private readonly write: (entry: AuditEntry) => void;

  constructor(options: AuditLoggerOptions = {}) {
    this.write = options.write ?? ((entry) => process.stdout.write(JSON.stringify(entry) + "\n"));
  }

  log(entry: AuditEntry): void {
    this.write(entry);
  }

  buildEntry(params: AuditParams): AuditEntry {
    return {
      timestamp: new Date().toISOString(),
      operation: params.operation,
      provider: params.provider,
      ...(params.requestId ? { request_id: params.requestId } : {}),
      ...(params.jobId ? { job_id: params.jobId } : {}),
      ...(params.model ? { model: params.model } : {}),
      ...(params.kind ? { kind: params.kind } : {}),
      outcome: params.error ? "error" : "ok",
      ...(params.error ? { error_kind: params.error.kind } : {}),
      dropped: [...(params.dropped ?? [])],
      input_tokens: params.response?.usage.input_tokens ?? 0,
      output_tokens: params.response?.usage.output_tokens ?? 0,
      duration_ms: Date.now() - params.startedAt,
    };
  }
}
