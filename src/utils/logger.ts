/**
 * Levelled logger for the Pocket client
 *
 * Writes to stderr so the stdio transport keeps stdout to itself. Request
 * scoped loggers tag every line with the X-Request-ID sent to Pocket, and
 * credential fields are masked before anything is serialized.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SECRET_KEYS = new Set(["consumer_key", "access_token", "consumerKey", "accessToken"]);

export const REDACTED = "[redacted]";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Copy of `value` with credential fields masked, at any depth
 */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value === null || typeof value !== "object") return value;

  const masked: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    masked[key] = SECRET_KEYS.has(key) ? REDACTED : redactSecrets(field);
  }
  return masked;
}

function describeError(error: unknown): unknown {
  if (!(error instanceof Error)) return error;
  const details: Record<string, unknown> = { name: error.name, message: error.message };
  if ("code" in error && typeof error.code === "string") details.code = error.code;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    details.statusCode = error.statusCode;
  }
  details.stack = error.stack;
  return details;
}

class Logger {
  private level: LogLevel;

  constructor(
    private readonly prefix = "pocket",
    level?: LogLevel,
    private readonly requestId?: string
  ) {
    const envLevel = process.env.LOG_LEVEL;
    this.level = level ?? (isLogLevel(envLevel) ? envLevel : "info");
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const timestamp = new Date().toISOString();
    const tag = this.requestId ? ` [${this.requestId}]` : "";
    const dataStr = data === undefined ? "" : ` ${JSON.stringify(redactSecrets(data))}`;
    console.error(`[${timestamp}] [${this.prefix}]${tag} [${level.toUpperCase()}] ${message}${dataStr}`);
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    this.write("error", message, describeError(error));
  }

  /**
   * Create a child logger with a sub-prefix
   */
  child(subPrefix: string): Logger {
    return new Logger(`${this.prefix}:${subPrefix}`, this.level, this.requestId);
  }

  /**
   * Logger whose lines carry the given request id
   */
  forRequest(requestId: string): Logger {
    return new Logger(this.prefix, this.level, requestId);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export const logger = new Logger();

export { Logger };
