export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/**
 * Structured context appended to a log line as `key=value` pairs.
 */
export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Renders fields as `key=value`, quoting values that contain whitespace or quotes.
 * Undefined values are skipped.
 */
export function formatFields(fields?: LogFields): string {
  if (!fields) {
    return "";
  }

  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    const text = String(value);
    parts.push(/[\s"=]/.test(text) ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`);
  }

  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  private format(message: string, fields?: LogFields): string {
    return `${this.prefix}${message}${formatFields(fields)}`;
  }

  debug(message: string, fields?: LogFields): void {
    if (this.shouldLog("debug")) {
      console.log(this.format(message, fields));
    }
  }

  info(message: string, fields?: LogFields): void {
    if (this.shouldLog("info")) {
      console.log(this.format(message, fields));
    }
  }

  warn(message: string, fields?: LogFields): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format(message, fields));
    }
  }

  error(message: string, fields?: LogFields): void {
    if (this.shouldLog("error")) {
      console.error(this.format(message, fields));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Resolution order: explicit level, then LOG_LEVEL, then `silent` under
 * NODE_ENV=test, then `info`.
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }

  const fromEnv = process.env["LOG_LEVEL"];
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }

  return process.env["NODE_ENV"] === "test" ? "silent" : "info";
}

export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, resolveLogLevel(level));
}
