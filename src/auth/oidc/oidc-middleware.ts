/**
 * OIDC Session Middleware
 *
 * Per-request token expiry enforcement and the login-required guard for
 * browser routes.
 *
 * @module auth/oidc/middleware
 */

import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { internalError } from "../../http/middleware/error-handler.js";
import { extractRequestId, requestUrl } from "../../http/request-utils.js";
import type { ExpiryRedirect, OidcConfig, OidcRoutePaths } from "./oidc-types.js";
import { SessionAuthState } from "./oidc-session.js";

/**
 * Lazy-initialized logger
 */
let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:oidc-session");
  }
  return logger;
}

/**
 * OIDC middleware dependencies
 */
export interface OidcMiddlewareDeps {
  config: Readonly<OidcConfig>;
  paths: OidcRoutePaths;
}

/**
 * Decide whether the request must be sent to logout because its token expired
 *
 * The logout route itself is never redirected.
 *
 * @returns The redirect to perform, or null to continue
 * @throws TypeError if the stored token record is malformed
 */
export function checkSessionExpiry(
  req: Request,
  deps: OidcMiddlewareDeps
): ExpiryRedirect | null {
  if (req.path === deps.paths.logout) {
    return null;
  }

  const state = new SessionAuthState(req.session, deps.config.clockSkewSeconds);
  if (!state.isExpired()) {
    return null;
  }

  return { location: `${deps.paths.logout}?reason=expired`, reason: "expired" };
}

/**
 * Create the per-request expiry check
 *
 * Expired sessions are redirected to logout (the session is left for logout
 * to clear). A malformed token record is purged along with the profile and
 * the request fails with 500.
 *
 * @param deps - Middleware dependencies
 * @returns Express middleware function
 */
export function createExpiryCheckMiddleware(deps: OidcMiddlewareDeps) {
  return function checkExpiry(req: Request, res: Response, next: NextFunction): void {
    let redirect: ExpiryRedirect | null;

    try {
      redirect = checkSessionExpiry(req, deps);
    } catch (error) {
      if (!(error instanceof TypeError)) {
        next(error);
        return;
      }

      new SessionAuthState(req.session, deps.config.clockSkewSeconds).clear();
      getLogger().error(
        { err: error, requestId: extractRequestId(req), path: req.path },
        "Corrupted session token, authentication cleared"
      );
      next(internalError(`${error.name}: ${error.message}`, "SESSION_CORRUPTED"));
      return;
    }

    if (redirect !== null) {
      getLogger().info(
        { requestId: extractRequestId(req), path: req.path },
        "Session token expired, redirecting to logout"
      );
      res.redirect(redirect.location);
      return;
    }

    next();
  };
}

/**
 * Create the login-required guard
 *
 * Anonymous requests are redirected to the login route with the absolute
 * URL of the current request as `next`.
 *
 * @param deps - Middleware dependencies
 * @returns Express middleware function
 *
 * @example
 * ```typescript
 * app.get("/profile", createRequireLoginMiddleware(deps), (req, res) => { ... });
 * ```
 */
export function createRequireLoginMiddleware(deps: OidcMiddlewareDeps) {
  return function requireLogin(req: Request, res: Response, next: NextFunction): void {
    const state = new SessionAuthState(req.session, deps.config.clockSkewSeconds);
    if (state.isLoggedIn()) {
      next();
      return;
    }

    getLogger().debug(
      { requestId: extractRequestId(req), path: req.path },
      "Login required, redirecting"
    );
    res.redirect(`${deps.paths.login}?next=${encodeURIComponent(requestUrl(req))}`);
  };
}
