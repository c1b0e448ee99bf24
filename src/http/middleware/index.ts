/**
 * HTTP Middleware Exports
 *
 * Re-exports all middleware for the HTTP transport layer.
 */

export { requestLogging } from "./request-logging.js";
export {
  errorHandler,
  notFoundHandler,
  HttpError,
  internalError,
  escapeHtml,
  renderErrorPage,
} from "./error-handler.js";
