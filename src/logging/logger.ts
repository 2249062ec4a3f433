import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  sink?: LogSink;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function stderrSink(line: string): void {
  process.stderr.write(`${line}\n`);
}

/**
 * Truncates the file once, then appends one line per call.
 */
export function fileSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, "", "utf-8");
  return (line) => {
    appendFileSync(path, `${line}\n`, "utf-8");
  };
}

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "warn";
    this.context = options.context ?? "";
    this.sink = options.sink ?? stderrSink;
  }

  private shouldLog(level: Exclude<LogLevel, "silent">): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  private emit(
    level: Exclude<LogLevel, "silent">,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const context = this.context ? ` (${this.context})` : "";
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    this.sink(`[${level}]${context} ${message}${suffix}`);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit("error", message, data);
  }

  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      sink: this.sink,
    });
  }
}

export function createLogger(options: { level: LogLevel; logFile?: string }): Logger {
  if (options.logFile) {
    return new Logger({ level: "debug", sink: fileSink(options.logFile) });
  }
  return new Logger({ level: options.level });
}

export const silentLogger = new Logger({ level: "silent" });
