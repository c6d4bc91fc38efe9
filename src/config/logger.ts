export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
}

/** Fields every request-scoped log line carries, snake_case like the wire. */
export interface LoggerContext {
  route: string;
  user_id?: number;
  status?: number;
  latency_ms?: number;
  error_code?: string;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "info";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));

  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (meta) {
      entry.meta = redactMeta(meta);
    }
    write(`${safeJson(entry)}\n`);
  }

  return {
    debug(message, meta) {
      log("debug", message, meta);
    },
    info(message, meta) {
      log("info", message, meta);
    },
    warn(message, meta) {
      log("warn", message, meta);
    },
    error(message, meta) {
      log("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  logger[level](message, { ...context, ...fields });
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("password") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}
