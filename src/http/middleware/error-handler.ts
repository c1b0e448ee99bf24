/**
 * Error Handler Middleware
 *
 * Catches errors from route handlers and returns appropriate HTTP responses.
 * Browsers get a small HTML page, API clients get JSON. Error details are
 * logged but not leaked for unexpected failures.
 */

import { STATUS_CODES } from "node:http";
import type { Request, Response, NextFunction } from "express";
import { getComponentLogger } from "../../logging/index.js";
import { AuthError, BearerTokenError } from "../../auth/errors.js";
import {
  OidcAuthorizationError,
  OidcCodeExchangeError,
  OidcConfigurationError,
  OidcDiscoveryError,
  OidcIntrospectionError,
  OidcIntrospectionUnsupportedError,
  OidcNotLoggedInError,
  OidcStateValidationError,
  OidcUserInfoError,
} from "../../auth/oidc/oidc-errors.js";
import { extractRequestId } from "../request-utils.js";

/**
 * Lazy-initialized logger to avoid initialization at module load time
 */
let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:error");
  }
  return logger;
}

/**
 * HTTP error with status code
 */
export class HttpError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/**
 * Create a 500 Internal Server Error
 *
 * The message is sent to the client; use only for failures the user should see.
 */
export function internalError(message: string, code?: string): HttpError {
  return new HttpError(500, message, code);
}

/**
 * Error response structure
 */
interface ErrorResponse {
  error: {
    message: string;
    code?: string;
    statusCode: number;
  };
}

/**
 * Status and client-facing message for a handled error
 */
interface ErrorClassification {
  statusCode: number;
  code?: string;
  /** Message sent to the client; null hides the error's own message */
  exposedMessage: string | null;
}

/**
 * Check if error is a JSON parsing error from express.json() middleware
 */
function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && "body" in err;
}

function authErrorStatus(err: AuthError): number {
  if (err instanceof BearerTokenError) {
    return err.statusCode;
  }
  if (
    err instanceof OidcAuthorizationError ||
    err instanceof OidcStateValidationError ||
    err instanceof OidcCodeExchangeError ||
    err instanceof OidcNotLoggedInError
  ) {
    return 401;
  }
  if (
    err instanceof OidcDiscoveryError ||
    err instanceof OidcUserInfoError ||
    err instanceof OidcIntrospectionError
  ) {
    return 502;
  }
  // OidcConfigurationError, OidcIntrospectionUnsupportedError and anything unmapped
  return 500;
}

function classifyError(err: Error): ErrorClassification {
  if (err instanceof HttpError) {
    return { statusCode: err.statusCode, code: err.code, exposedMessage: err.message };
  }

  if (err instanceof AuthError) {
    const statusCode = authErrorStatus(err);
    const fatal =
      err instanceof OidcConfigurationError || err instanceof OidcIntrospectionUnsupportedError;
    return {
      statusCode,
      code: err.code,
      exposedMessage: fatal || statusCode === 500 ? null : err.message,
    };
  }

  if (isJsonParseError(err)) {
    return { statusCode: 400, code: "INVALID_JSON", exposedMessage: "Invalid JSON in request body" };
  }

  return { statusCode: 500, code: "INTERNAL_ERROR", exposedMessage: null };
}

/**
 * Escape text for inclusion in an HTML page
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Minimal error page for browser requests
 */
export function renderErrorPage(statusCode: number, message: string): string {
  const title = escapeHtml(`${statusCode} ${STATUS_CODES[statusCode] ?? "Error"}`);
  return [
    "<!doctype html>",
    `<html><head><title>${title}</title></head>`,
    `<body><h1>${title}</h1><p>${escapeHtml(message)}</p></body></html>`,
  ].join("\n");
}

/**
 * Send an error as HTML or JSON depending on the Accept header
 */
function sendError(req: Request, res: Response, body: ErrorResponse): void {
  res.status(body.error.statusCode);

  if (req.accepts(["json", "html"]) === "html") {
    res.type("html").send(renderErrorPage(body.error.statusCode, body.error.message));
    return;
  }

  res.json(body);
}

/**
 * Express error handling middleware
 *
 * Must have 4 parameters to be recognized as error middleware by Express.
 * Logs error details for debugging while returning sanitized response to client.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = extractRequestId(req);
  const { statusCode, code, exposedMessage } = classifyError(err);

  const logData = {
    requestId,
    error: err,
    method: req.method,
    path: req.path,
    statusCode,
  };

  if (statusCode >= 500) {
    getLogger().error(logData, `Request failed: ${err.message}`);
  } else {
    getLogger().warn(logData, `Request rejected: ${err.message}`);
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  sendError(req, res, {
    error: {
      message: exposedMessage ?? "Internal server error",
      code,
      statusCode,
    },
  });
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(req, res, {
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: "NOT_FOUND",
      statusCode: 404,
    },
  });
}
