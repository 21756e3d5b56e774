// packages/engine/src/logger.ts
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel
  ) {}

  private shouldLog(level: LogLevel): boolean {
    if (this.level === "silent") return false;
    return LOG_LEVELS.indexOf(this.level) <= LOG_LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) console.log(`${this.prefix}${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) console.log(`${this.prefix}${message}`, ...args);
  }

  // diagnostics go to stderr so `bql query --json` output stays parseable
  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) console.warn(`${this.prefix}${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) console.error(`${this.prefix}${message}`, ...args);
  }
}

/** Console-backed logger; silent under NODE_ENV=test unless a level is passed. */
export function createLogger(prefix = "", level?: LogLevel): Logger {
  const resolved = level ?? (process.env["NODE_ENV"] === "test" ? "silent" : "warn");
  return new ConsoleLogger(prefix, resolved);
}
