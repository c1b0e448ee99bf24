/**
 * Logging Module - Public API
 *
 * Structured logging built on Pino with secret redaction and
 * component-scoped child loggers.
 *
 * ```typescript
 * import { initializeLogger, getComponentLogger } from "./logging/index.js";
 *
 * initializeLogger({ level: "info", format: "json" });
 *
 * const logger = getComponentLogger("http:oidc-routes");
 * logger.info("Login started");
 * logger.error({ err }, "Code exchange failed");
 * ```
 *
 * Environment variables read by the entry point:
 * - `LOG_LEVEL`: silent|fatal|error|warn|info|debug|trace (default: info)
 * - `LOG_FORMAT`: json|pretty (default: pretty)
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

export {
  REDACT_PATHS,
  REDACT_OPTIONS,
  SECRET_PATTERNS,
  looksLikeSecret,
} from "./redactors.js";
