/**
 * Bearer Token Guard
 *
 * Express middleware protecting API routes with bearer tokens validated by
 * remote token introspection and a required-scope check.
 *
 * @module auth/oidc/bearer-guard
 */

import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { BearerTokenError } from "../errors.js";
import type { AcceptTokenOptions, AuthMiddleware } from "../middleware-types.js";
import type { IntrospectionResult, OidcClient } from "./oidc-types.js";
import { extractRequestId } from "../../http/request-utils.js";

/**
 * Lazy-initialized logger to avoid module load-time initialization
 */
let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:bearer-guard");
  }
  return logger;
}

/**
 * Split an Authorization header into scheme and credentials
 *
 * @returns The token, or the rejection to send
 */
export function extractBearerToken(authHeader: string | undefined): string | BearerTokenError {
  if (authHeader === undefined || authHeader.trim() === "") {
    return BearerTokenError.missingAuthorization();
  }

  const [scheme = "", ...credentials] = authHeader.trim().split(/\s+/);
  if (scheme.toLowerCase() !== "bearer" || credentials.length === 0) {
    return BearerTokenError.unsupportedTokenType(scheme);
  }
  if (credentials.length > 1) {
    return BearerTokenError.invalidToken();
  }
  return credentials.join("");
}

/**
 * Whether `granted` (space-delimited) contains every required scope
 */
export function hasRequiredScopes(granted: string | undefined, required: readonly string[]): boolean {
  if (required.length === 0) {
    return true;
  }
  const grantedScopes = new Set((granted ?? "").split(/\s+/).filter((scope) => scope !== ""));
  return required.every((scope) => grantedScopes.has(scope));
}

/**
 * Send a bearer rejection and log it
 */
function reject(req: Request, res: Response, error: BearerTokenError): void {
  getLogger().info(
    {
      requestId: extractRequestId(req),
      method: req.method,
      path: req.path,
      reason: error.error,
    },
    `Bearer token rejected: ${error.error}`
  );

  res
    .status(error.statusCode)
    .set("WWW-Authenticate", error.toChallenge())
    .json(error.toResponseBody());
}

/**
 * Create the bearer token guard
 *
 * Rejections are written directly as `{ error, error_description }` JSON with a
 * WWW-Authenticate challenge. Provider and configuration failures (including a
 * provider without an introspection endpoint) are passed to the error handler.
 *
 * @param oidcClient - Client adapter used for introspection
 * @param options - Required scopes
 *
 * @example
 * ```typescript
 * router.get("/api/documents", acceptToken(oidcClient, { scopes: ["documents:read"] }), handler);
 * ```
 */
export function acceptToken(
  oidcClient: OidcClient,
  options: AcceptTokenOptions = {}
): AuthMiddleware {
  const requiredScopes = options.scopes ?? [];

  return async function guardBearerToken(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const extracted = extractBearerToken(req.headers.authorization);
      if (extracted instanceof BearerTokenError) {
        reject(req, res, extracted);
        return;
      }

      const tokenInfo: IntrospectionResult = await oidcClient.introspectToken(extracted);

      if (!tokenInfo.active) {
        reject(req, res, BearerTokenError.invalidToken());
        return;
      }

      if (!hasRequiredScopes(tokenInfo.scope, requiredScopes)) {
        reject(req, res, BearerTokenError.insufficientScope());
        return;
      }

      req.oidcTokenInfo = tokenInfo;

      getLogger().debug(
        { requestId: extractRequestId(req), method: req.method, path: req.path },
        "Bearer token accepted"
      );
      next();
    } catch (error) {
      next(error);
    }
  };
}
