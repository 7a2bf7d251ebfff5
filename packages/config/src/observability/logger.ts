import { pino, destination, type DestinationStream, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type ConfigLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
  details?: Record<string, unknown>;
};

export type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  /** Defaults to stderr: stdout belongs to whatever embeds the library. */
  destination?: DestinationStream;
};

/** First non-blank of `GATEWISE_LOG_LEVEL` and `LOG_LEVEL`. */
export function logLevelFromEnv(): string | undefined {
  for (const value of [process.env.GATEWISE_LOG_LEVEL, process.env.LOG_LEVEL]) {
    const level = value?.trim();
    if (level) {
      return level;
    }
  }
  return undefined;
}

export function createLogger(options: CreateLoggerOptions = {}): ConfigLogger {
  const logger = pino(
    {
      level: options.level ?? logLevelFromEnv() ?? "info",
      base: { service: options.serviceName ?? "gatewise" },
      timestamp: stdTimeFunctions.isoTime,
      formatters: {
        level: label => ({ level: label }),
      },
    },
    options.destination ?? destination(2),
  );
  return options.bindings ? logger.child(options.bindings) : logger;
}

export const appLogger: ConfigLogger = createLogger({ bindings: { subsystem: "config" } });

const RESERVED_ERROR_KEYS = new Set(["message", "name", "stack", "code", "cause"]);

function extractCode(error: object): string | number | undefined {
  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    return error.code;
  }
  return undefined;
}

function extractDetails(error: object): Record<string, unknown> | undefined {
  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (RESERVED_ERROR_KEYS.has(key)) {
      continue;
    }
    details[key] = value;
  }
  return Object.keys(details).length > 0 ? details : undefined;
}

function readCause(error: object): unknown {
  return "cause" in error ? error.cause : undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (typeof error === "string") {
    return { message: error };
  }
  if (typeof error !== "object" || error === null) {
    return { message: safeStringify(error) ?? String(error) };
  }

  let message: string;
  if (error instanceof Error) {
    message = error.message;
  } else if ("message" in error && typeof error.message === "string" && error.message.trim().length > 0) {
    message = error.message;
  } else {
    message = safeStringify(error) ?? "Unknown error";
  }

  const normalized: NormalizedError = { message };
  if (error instanceof Error) {
    normalized.name = error.name;
  } else if ("name" in error && typeof error.name === "string") {
    normalized.name = error.name;
  }
  if ("stack" in error && typeof error.stack === "string" && error.stack.length > 0) {
    normalized.stack = error.stack;
  }
  const code = extractCode(error);
  if (code !== undefined) {
    normalized.code = code;
  }
  const cause = readCause(error);
  if (cause !== undefined) {
    normalized.cause = cause instanceof Error ? normalizeError(cause) : cause;
  }
  const details = extractDetails(error);
  if (details) {
    normalized.details = details;
  }
  return normalized;
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
