// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in endpoints and transports.
 *
 * Allows applications to integrate their own logging solutions (Winston, Pino,
 * structured logging services) instead of console.log.
 *
 * @example
 * ```typescript
 * import { createLogger, createTypedSubscriber } from "@ferry/core";
 *
 * const subscriber = createTypedSubscriber(transport, "telemetry", format, {
 *   logger: createLogger({ minLevel: "warn" }),
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "publisher", "delivery")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  /**
   * Log an info-level message
   */
  info(context: string, message: string, data?: unknown): void;

  /**
   * Log a warning-level message
   */
  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

/**
 * Logger adapter that writes through console methods
 */
export class DefaultLoggerAdapter implements LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void {
    console.debug(`[${context}] ${message}`, data);
  }

  info(context: string, message: string, data?: unknown): void {
    console.info(`[${context}] ${message}`, data);
  }

  warn(context: string, message: string, data?: unknown): void {
    console.warn(`[${context}] ${message}`, data);
  }

  error(context: string, message: string, data?: unknown): void {
    console.error(`[${context}] ${message}`, data);
  }
}

/**
 * Logger that drops everything. Endpoints use it unless a logger is passed in.
 */
export const noopLogger: LoggerAdapter = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /**
   * Custom log function. When omitted, console methods are used.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "debug")
   */
  minLevel?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger adapter with custom configuration
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "debug"];
  const fallback = new DefaultLoggerAdapter();

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
    } else {
      fallback[level](context, message, data);
    }
  };

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}

/**
 * Log context constants used by Ferry endpoints and transports
 *
 * Applications can use these to filter or categorize logs
 */
export const LOG_CONTEXT = {
  PUBLISHER: "publisher",
  SUBSCRIBER: "subscriber",
  WRITER: "writer",
  DELIVERY: "delivery",
  TRANSPORT: "transport",
} as const;
