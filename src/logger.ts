const SENSITIVE_KEYS = ["password", "pass", "secret", "token", "authorization"];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, err?: unknown, meta?: LogMeta): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

function redact(value: unknown): unknown {
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(redact);
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lower = key.toLowerCase();
    out[key] = SENSITIVE_KEYS.some((k) => lower.includes(k)) ? "[REDACTED]" : redact(entry);
  }
  return out;
}

function line(level: string, message: string, fields: LogMeta): string {
  return JSON.stringify({ time: new Date().toISOString(), level, message, ...fields }) + "\n";
}

/**
 * Structured JSON-lines logger. Keys that look like credentials are replaced
 * with "[REDACTED]" at any depth.
 */
export function createLogger(sink: LogSink = process.stderr): Logger {
  const withMeta = (meta?: LogMeta): LogMeta => {
    if (!meta || Object.keys(meta).length === 0) return {};
    return { meta: redact(meta) };
  };

  return {
    info(message, meta) {
      sink.write(line("info", message, withMeta(meta)));
    },
    warn(message, meta) {
      sink.write(line("warn", message, withMeta(meta)));
    },
    error(message, err, meta) {
      const fields: LogMeta = withMeta(meta);
      if (err !== undefined) {
        fields.error = err instanceof Error ? err.message : String(err);
        if (err instanceof Error && err.stack) fields.stack = err.stack;
      }
      sink.write(line("error", message, fields));
    },
  };
}

export const logger: Logger = createLogger();
