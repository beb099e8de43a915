export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, "silent">;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** A logger for a sub-component sharing this one's level and sink. */
  child(service: string): Logger;
}

export interface LoggerOptions {
  service: string;
  level?: LogLevel;
  /** Override the write sink. Defaults to process.stdout JSON lines. */
  write?: (entry: LogEntry) => void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function stdoutSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + "\n");
}

class JsonLinesLogger implements Logger {
  constructor(
    private readonly service: string,
    private readonly threshold: number,
    private readonly write: (entry: LogEntry) => void,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(service: string): Logger {
    return new JsonLinesLogger(`${this.service}:${service}`, this.threshold, this.write);
  }

  private log(level: LogEntry["level"], message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    this.write({
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...(data ? { data } : {}),
    });
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new JsonLinesLogger(options.service, LEVEL_ORDER[options.level ?? "info"], options.write ?? stdoutSink);
}
