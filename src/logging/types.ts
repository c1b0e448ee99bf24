/**
 * Logging Types and Interfaces
 *
 * @module logging/types
 */

/**
 * Log levels supported by the logger, highest severity first
 *
 * `silent` suppresses all output and is what the test suite uses.
 */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "info"
   */
  level: LogLevel;

  /**
   * Output format
   * - json: Structured JSON for production/log aggregation
   * - pretty: Human-readable colorized output for development
   * @default "pretty"
   */
  format: "json" | "pretty";

  /**
   * Custom output stream; replaces stderr when set
   * @internal - Only used in tests for log capture
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context stamped on every entry of a component logger
 */
export interface ComponentContext {
  /**
   * Component name, colon-separated for hierarchy:
   * - "auth:oidc-client" - openid-client adapter
   * - "http:oidc-routes" - login/callback/logout routes
   * - "http:bearer-guard" - API token guard
   */
  component: string;

  /** Optional request/correlation ID */
  requestId?: string;
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;

  /** Log level name */
  level: string;

  /** Component name that generated the log */
  component: string;

  /** Log message */
  msg: string;

  /** Optional request/correlation ID */
  requestId?: string;

  [key: string]: unknown;
}

/**
 * Metric emitted as a structured log event
 *
 * @example { metric: "oidc.discovery_ms", value: 142 }
 */
export interface MetricLogEntry extends LogEntry {
  metric: string;
  value: number;
}

/**
 * Accepted values for the LOG_LEVEL environment variable
 */
export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

/**
 * Narrow an arbitrary string (typically from the environment) to a LogLevel
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some((level) => level === value);
}
