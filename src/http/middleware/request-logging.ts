/**
 * Request Logging Middleware
 *
 * Logs HTTP requests with timing information for observability.
 */

import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { getComponentLogger } from "../../logging/index.js";
import { extractRequestId, extractSourceIp } from "../request-utils.js";

/**
 * Lazy-initialized logger to avoid initialization at module load time
 */
let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:request");
  }
  return logger;
}

/**
 * Request logging middleware
 *
 * Logs incoming requests and their completion with timing metrics.
 * Excludes query strings and bodies: callbacks carry authorization codes.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const requestId = extractRequestId(req) ?? generateRequestId();

  // Attach request ID for correlation
  req.headers["x-request-id"] = requestId;
  res.setHeader("X-Request-Id", requestId);

  getLogger().debug(
    {
      requestId,
      method: req.method,
      path: req.path,
      sourceIp: extractSourceIp(req),
      userAgent: req.get("User-Agent"),
    },
    "Incoming request"
  );

  // Log response when finished
  res.on("finish", () => {
    const duration = Date.now() - startTime;

    const logData = {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration,
    };

    if (res.statusCode >= 500) {
      getLogger().error(logData, "Request completed with server error");
    } else if (res.statusCode >= 400) {
      getLogger().warn(logData, "Request completed with client error");
    } else {
      getLogger().info(logData, "Request completed");
    }
  });

  next();
}

/**
 * Generate a unique request ID for correlation
 */
function generateRequestId(): string {
  return `req_${randomUUID()}`;
}
