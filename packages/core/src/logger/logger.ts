export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function shouldLog(current: LogLevel, level: LogLevel): boolean {
  return current !== "silent" && LOG_LEVELS.indexOf(current) <= LOG_LEVELS.indexOf(level);
}

class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (shouldLog(this.level, "debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (shouldLog(this.level, "info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog(this.level, "warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (shouldLog(this.level, "error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }
}

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  message: string;
  args: unknown[];
}

/**
 * Logger that keeps every entry in memory instead of printing it.
 * Lets callers capture or inspect scan diagnostics.
 */
export class CollectingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, ...args: unknown[]): void {
    this.entries.push({ level: "debug", message, args });
  }

  info(message: string, ...args: unknown[]): void {
    this.entries.push({ level: "info", message, args });
  }

  warn(message: string, ...args: unknown[]): void {
    this.entries.push({ level: "warn", message, args });
  }

  error(message: string, ...args: unknown[]): void {
    this.entries.push({ level: "error", message, args });
  }

  messages(level?: LogEntry["level"]): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// Factory for prefixed console loggers
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const envLevel = process.env["LOG_LEVEL"];
  const logLevel = level ??
    (isLogLevel(envLevel) ? envLevel : undefined) ??
    (process.env["NODE_ENV"] === "test" ? "silent" : "info");

  return new ConsoleLogger(prefix, logLevel);
}

export const logger = createLogger("[fsinventory] ");
