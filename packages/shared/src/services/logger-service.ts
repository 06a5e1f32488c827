import type { ErrorMetadata, LogFormat, LogMetadata } from "../types.ts";

export interface LoggerOptions {
  /**
   * Determines whether debug logs should be emitted.
   * Defaults to always logging debug messages.
   */
  shouldLogDebug?: () => boolean;
  /**
   * Allows overriding the timestamp generator, primarily for testing.
   */
  now?: () => string;
  /**
   * `json` writes one JSON object per line (CI, log shipping).
   * `text` writes `[SEVERITY] message key=value` lines for terminals.
   */
  format?: LogFormat;
}

export interface StructuredLogger {
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(
    message: string,
    error?: unknown | null,
    metadata?: ErrorMetadata,
  ): void;
  critical(
    message: string,
    error?: unknown | null,
    metadata?: ErrorMetadata,
  ): void;
  debug(message: string, metadata?: LogMetadata): void;
}

const defaultNow = () => new Date().toISOString();

/**
 * The subset of a logger that the event store services call into.
 * Every method is optional so callers can silence a level by omitting it.
 */
export interface ServiceLogger {
  info?(message: string, metadata?: LogMetadata): void;
  warn?(message: string, metadata?: LogMetadata): void;
  error?(
    message: string,
    error?: unknown | null,
    metadata?: LogMetadata,
  ): void;
  debug?(message: string, metadata?: LogMetadata): void;
}

type LoggerLike = Pick<
  StructuredLogger,
  "info" | "warn" | "error" | "debug"
>;

type Severity = "INFO" | "WARNING" | "ERROR" | "CRITICAL" | "DEBUG";

const consoleServiceLogger: Required<ServiceLogger> = {
  info(message, metadata) {
    console.log(message, ...(metadata ? [metadata] : []));
  },
  warn(message, metadata) {
    console.warn(message, ...(metadata ? [metadata] : []));
  },
  error(message, error, metadata) {
    console.error(message, error ?? null, metadata);
  },
  debug(message, metadata) {
    console.debug(message, ...(metadata ? [metadata] : []));
  },
};

export function resolveServiceLogger(
  logger?: ServiceLogger,
  fallback: Required<ServiceLogger> = consoleServiceLogger,
): Required<ServiceLogger> {
  if (!logger) {
    return fallback;
  }

  return {
    info: logger.info ?? fallback.info,
    warn: logger.warn ?? fallback.warn,
    error: logger.error ?? fallback.error,
    debug: logger.debug ?? fallback.debug,
  };
}

export function createServiceLoggerFromStructuredLogger(
  baseLogger: LoggerLike,
): Required<ServiceLogger> {
  return {
    info(message, metadata) {
      baseLogger.info(message, metadata);
    },
    warn(message, metadata) {
      baseLogger.warn(message, metadata);
    },
    error(message, error, metadata) {
      baseLogger.error(message, error ?? null, metadata);
    },
    debug(message, metadata) {
      baseLogger.debug(message, metadata);
    },
  };
}

function normalizeError(error: unknown): Record<string, unknown> | undefined {
  if (!error) return undefined;

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name,
    };
  }

  return { details: error };
}

function formatTextValue(value: unknown): string {
  if (typeof value === "string" && /^\S+$/.test(value)) {
    return value;
  }
  return JSON.stringify(value);
}

function formatText(payload: Record<string, unknown>): string {
  const { severity, message, timestamp: _timestamp, error, ...rest } = payload;
  const parts = [`[${String(severity)}] ${String(message)}`];

  for (const [key, value] of Object.entries(rest)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatTextValue(value)}`);
  }

  let stack: string | undefined;
  if (error && typeof error === "object" && "message" in error) {
    parts.push(`error=${formatTextValue(error.message)}`);
    if ("stack" in error && typeof error.stack === "string") {
      stack = error.stack;
    }
  } else if (error !== undefined) {
    parts.push(`error=${formatTextValue(error)}`);
  }

  const line = parts.join(" ");
  return stack ? `${line}\n${stack}` : line;
}

function write(
  consoleFn: (message?: unknown, ...optionalParams: unknown[]) => void,
  severity: Severity,
  message: string,
  metadata: LogMetadata = {},
  now: () => string,
  format: LogFormat,
  error?: unknown | null,
): void {
  const payload: Record<string, unknown> = {
    severity,
    message,
    timestamp: now(),
    ...metadata,
  };

  const normalized = normalizeError(error ?? undefined);
  if (normalized) {
    payload.error = normalized;
  }

  try {
    consoleFn(format === "text" ? formatText(payload) : JSON.stringify(payload));
  } catch (serializationError) {
    // Fallback to a safe console output if serialization fails.
    consoleFn(
      JSON.stringify({
        severity: "ERROR",
        message: "Failed to serialize log payload",
        originalMessage: message,
        timestamp: now(),
        serializationError: serializationError instanceof Error
          ? {
            message: serializationError.message,
            stack: serializationError.stack,
            name: serializationError.name,
          }
          : serializationError,
      }),
    );
  }
}

export function createStructuredLogger(
  options: LoggerOptions = {},
): StructuredLogger {
  const {
    shouldLogDebug = () => true,
    now = defaultNow,
    format = "json",
  } = options;

  return {
    info(message, metadata) {
      write(console.log, "INFO", message, metadata, now, format);
    },
    warn(message, metadata) {
      write(console.warn, "WARNING", message, metadata, now, format);
    },
    error(message, error, metadata) {
      write(console.error, "ERROR", message, metadata, now, format, error);
    },
    critical(message, error, metadata) {
      write(console.error, "CRITICAL", message, metadata, now, format, error);
    },
    debug(message, metadata) {
      if (!shouldLogDebug()) return;
      write(console.debug, "DEBUG", message, metadata, now, format);
    },
  };
}
