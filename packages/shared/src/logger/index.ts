/**
 * perpnote Logger
 * Structured logging with Pino
 */

import pino, { type Logger, type LoggerOptions } from "pino";

// ============================================
// LOGGER CONFIGURATION
// ============================================

const isDevelopment = process.env.NODE_ENV === "development";
const logLevel = process.env.LOG_LEVEL || "info";
const logFormat = process.env.LOG_FORMAT || "json";

const baseOptions: LoggerOptions = {
  level: logLevel,
  base: {
    service: "perpnote",
    env: process.env.NODE_ENV || "production",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      service: bindings.service,
      env: bindings.env,
    }),
  },
  redact: {
    paths: ["*.privateKey", "*.password", "*.secret", "*.apiKey", "*.token"],
    censor: "[REDACTED]",
  },
};

// Pretty printing for development
const devOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      messageFormat: "{msg}",
    },
  },
};

// ============================================
// LOGGER INSTANCE
// ============================================

export const logger: Logger =
  isDevelopment && logFormat === "pretty"
    ? pino(devOptions)
    : pino(baseOptions);

// ============================================
// CHILD LOGGERS FOR SERVICES
// ============================================

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

// Pre-configured service loggers
export const ledgerLogger = createServiceLogger("ledger");
export const engineLogger = createServiceLogger("engine");
export const vaultLogger = createServiceLogger("vault");

// ============================================
// STRUCTURED LOG HELPERS
// ============================================

interface OperationLogContext {
  operation: string;
  caller: string;
  token?: string;
  amounts: Record<string, bigint>;
}

/**
 * Logs an accounting operation. Bigints are written as decimal strings.
 */
export function logOperation(
  target: Logger,
  context: OperationLogContext,
  message?: string
): void {
  const amounts: Record<string, string> = {};
  for (const [key, value] of Object.entries(context.amounts)) {
    amounts[key] = value.toString();
  }
  target.info(
    {
      event: context.operation,
      caller: context.caller,
      token: context.token,
      amounts,
    },
    message || context.operation
  );
}

// ============================================
// ERROR LOGGING
// ============================================

/**
 * Logs an error with stack trace and context
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
  message?: string,
  target: Logger = logger
): void {
  target.error(
    {
      err: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    message || error.message
  );
}

// ============================================
// PERFORMANCE LOGGING
// ============================================

/**
 * Creates a timer for measuring operation duration
 */
export function createTimer(operationName: string, target: Logger = logger): () => number {
  const start = performance.now();

  return () => {
    const duration = performance.now() - start;
    target.debug(
      {
        operation: operationName,
        durationMs: duration.toFixed(2),
      },
      `${operationName} completed in ${duration.toFixed(2)}ms`
    );
    return duration;
  };
}

/**
 * Wraps a synchronous function with timing
 */
export function withTiming<T>(
  operationName: string,
  fn: () => T,
  target: Logger = logger
): T {
  const done = createTimer(operationName, target);
  try {
    return fn();
  } finally {
    done();
  }
}
