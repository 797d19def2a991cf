export type LogLevel = "error" | "warn" | "info" | "debug";

type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const REDACTED = "[REDACTED]";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

// Read on each call so LOG_LEVEL can change after import.
function threshold(): number {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
}

function asErrorPayload(error: unknown) {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  if (typeof error === "object" && error !== null) {
    return error;
  }
  return { message: String(error) };
}

function normalizeMeta(meta?: LogMeta) {
  if (!meta) return undefined;
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? asErrorPayload(value) : value;
  }
  return Object.keys(out).length ? out : undefined;
}

export function formatLine(level: LogLevel, message: string, meta?: LogMeta, now = new Date()): string {
  const normalized = normalizeMeta(meta);
  return normalized
    ? `${now.toISOString()} [${level.toUpperCase()}] ${message} ${JSON.stringify(normalized)}`
    : `${now.toISOString()} [${level.toUpperCase()}] ${message}`;
}

function baseLog(level: LogLevel, message: string, meta?: LogMeta) {
  if (LEVELS[level] > threshold()) return;
  // stdout belongs to the MCP transport
  console.error(formatLine(level, message, meta));
}

export const logger = {
  debug(message: string, meta?: LogMeta) {
    baseLog("debug", message, meta);
  },
  info(message: string, meta?: LogMeta) {
    baseLog("info", message, meta);
  },
  warn(message: string, meta?: LogMeta) {
    baseLog("warn", message, meta);
  },
  error(message: string, meta?: LogMeta) {
    baseLog("error", message, meta);
  },
};

/**
 * Copies a JSON value with every `password` field replaced, at any depth.
 * Request bodies go through this before they are logged.
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = key === "password" ? REDACTED : redact(inner);
    }
    return out;
  }
  return value;
}
