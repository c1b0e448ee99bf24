/**
 * Logger Factory
 *
 * Core logging infrastructure built on Pino. Creates the root logger once at
 * startup and hands out component-scoped child loggers.
 *
 * - Output goes to stderr unless a custom stream is supplied
 * - Secret fields are redacted (see redactors.ts)
 * - JSON format for production, pretty-print for development
 *
 * @module logging/logger-factory
 */

import { pino } from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

/**
 * Singleton root logger instance
 */
let rootLogger: pino.Logger | null = null;

/**
 * Base Pino options shared by every output format
 */
function baseOptions(level: LoggerConfig["level"]): pino.LoggerOptions {
  return {
    level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const pinoOptions = baseOptions(config.level);

  // Custom stream (tests capture log lines this way)
  if (config.stream) {
    return pino(pinoOptions, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          singleLine: false,
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once at application startup before any logging occurs.
 *
 * @param config - Logger configuration
 * @throws Error if logger is already initialized
 *
 * @example
 * ```typescript
 * const level = process.env["LOG_LEVEL"];
 * initializeLogger({
 *   level: isLogLevel(level) ? level : "info",
 *   format: process.env["LOG_FORMAT"] === "json" ? "json" : "pretty",
 * });
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty missing or transport failure: plain JSON to stderr, still redacted
    rootLogger = pino(baseOptions(config.level), pino.destination(2));

    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger instance
 *
 * @throws Error if logger not initialized
 * @internal - Most code should use getComponentLogger() instead
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Get a component-scoped logger
 *
 * Child logger that stamps every entry with the component name
 * and, when given, a request ID.
 *
 * @param component - Component name (colon notation for hierarchy, e.g. "auth:oidc-client")
 * @param requestId - Optional request/correlation ID
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("http:oidc-routes");
 * logger.info({ next: "/dashboard" }, "Starting login");
 * // {"level":"info","component":"http:oidc-routes","next":"/dashboard","msg":"Starting login",...}
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const root = getRootLogger();

  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return root.child(context);
}

/**
 * Reset logger (tests only)
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
