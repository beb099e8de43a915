export type FineTuneStatus = "queued" | "running" | "succeeded" | "failed" | "cancelled";

export const TERMINAL_FINE_TUNE_STATUSES: ReadonlySet<FineTuneStatus> = new Set([
  "succeeded",
  "failed",
  "cancelled",
]);

export type HyperparameterValue = number | string;

export interface FineTuneJobSpec {
  /** Provider-resolvable dataset reference (file id, bucket URI, ...). */
  dataset: string;
  base_model: string;
  hyperparameters: Record<string, HyperparameterValue>;
  /** Appended to the tuned model's display name where the provider supports it. */
  suffix?: string;
}

export interface FineTuneJob {
  job_id: string;
  status: FineTuneStatus;
  fine_tuned_model?: string;
  failure_reason?: string;
}

export function isTerminalStatus(status: FineTuneStatus): boolean {
  return TERMINAL_FINE_TUNE_STATUSES.has(status);
}
