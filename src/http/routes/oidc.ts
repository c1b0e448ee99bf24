/**
 * OIDC Route Handlers
 *
 * Express router for the browser login flow: login redirect, authorization
 * callback and logout, plus the legacy callback alias.
 *
 * @module http/routes/oidc
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import type { OidcClient, OidcConfig, OidcRoutePaths } from "../../auth/oidc/oidc-types.js";
import { LOGOUT_MESSAGES } from "../../auth/oidc/oidc-types.js";
import { SessionAuthState } from "../../auth/oidc/oidc-session.js";
import {
  OidcAuthorizationError,
  OidcStateValidationError,
} from "../../auth/oidc/oidc-errors.js";
import { extractRequestId, requestOrigin, rootUrl, safeRedirectTarget } from "../request-utils.js";

/**
 * Lazy-initialized logger
 */
let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("http:oidc-routes");
  }
  return logger;
}

/**
 * Dependencies for OIDC routes
 */
export interface OidcRouterDeps {
  config: Readonly<OidcConfig>;

  /** OAuth client adapter */
  oidcClient: OidcClient;

  /** Absolute paths of the routes, including the mount prefix */
  paths: OidcRoutePaths;
}

/**
 * Single string value of a query parameter
 */
function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Query string of the request, including the leading "?" (empty when absent)
 */
function rawQuery(req: Request): string {
  const index = req.originalUrl.indexOf("?");
  return index === -1 ? "" : req.originalUrl.slice(index);
}

function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Create OIDC router
 *
 * Endpoints (relative to the mount prefix):
 * - GET /login - Start the authorization code flow
 * - GET /authorize - Handle the IdP callback and establish the session
 * - GET /logout - Clear the session authentication
 *
 * @param deps - Router dependencies
 * @returns Express router
 */
export function createOidcRouter(deps: OidcRouterDeps): Router {
  const { config, oidcClient, paths } = deps;
  const router = Router();

  /**
   * GET /login
   *
   * Query parameters:
   * - next: Optional same-host URL to return to after authentication
   */
  router.get("/login", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const requestedNext = queryString(req.query["next"]);
      const nextTarget = safeRedirectTarget(req, requestedNext);
      if (requestedNext !== undefined && nextTarget === undefined) {
        getLogger().warn(
          { requestId: extractRequestId(req), next: requestedNext },
          "Ignoring unsafe next parameter"
        );
      }

      const redirectUri = config.redirectUri ?? `${requestOrigin(req)}${paths.authorize}`;
      const authRequest = await oidcClient.createAuthorizationRequest(redirectUri);

      const state = new SessionAuthState(req.session, config.clockSkewSeconds);
      state.addPendingLogin(authRequest.state, {
        ...authRequest.checks,
        createdAt: nowInSeconds(),
        ...(nextTarget !== undefined && { next: nextTarget }),
      });

      getLogger().info(
        { requestId: extractRequestId(req), hasNext: nextTarget !== undefined },
        "Starting OIDC authorization flow"
      );

      res.redirect(authRequest.url);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /authorize
   *
   * Handle the IdP callback. The state is checked against the pending
   * attempts before the code is exchanged.
   */
  router.get("/authorize", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const requestId = extractRequestId(req);
      const error = queryString(req.query["error"]);

      // Check for error from IdP
      if (error !== undefined) {
        const description = queryString(req.query["error_description"]);
        getLogger().warn(
          { requestId, error, error_description: description },
          "OIDC authorization error from IdP"
        );
        throw new OidcAuthorizationError(error, description);
      }

      const state = new SessionAuthState(req.session, config.clockSkewSeconds);
      const returnedState = queryString(req.query["state"]);
      const pending = returnedState === undefined ? null : state.takePendingLogin(returnedState);

      if (returnedState === undefined || pending === null) {
        getLogger().warn(
          { requestId, hasState: returnedState !== undefined },
          "OIDC state does not match a pending login"
        );
        throw new OidcStateValidationError();
      }

      if (queryString(req.query["code"]) === undefined) {
        throw new OidcAuthorizationError("invalid_request", 'Missing "code" in response.');
      }

      const callbackUrl = new URL(pending.redirectUri);
      callbackUrl.search = rawQuery(req);

      const { token, subject } = await oidcClient.exchangeCode(
        callbackUrl,
        returnedState,
        pending
      );

      const profile = config.userInfoEnabled
        ? await oidcClient.fetchUserInfo(token.access_token, subject)
        : undefined;

      state.establish(token, profile);

      getLogger().info(
        { requestId, sub: subject, hasNext: pending.next !== undefined },
        "OIDC authentication successful"
      );

      res.redirect(pending.next ?? rootUrl(req));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /logout
   *
   * Query parameters:
   * - next: Optional same-host URL to go to afterwards
   * - reason: "expired" when sent here by the expiry check
   */
  router.get("/logout", (req: Request, res: Response, next: NextFunction) => {
    try {
      const state = new SessionAuthState(req.session, config.clockSkewSeconds);
      const expired = req.query["reason"] === "expired";

      state.clear();
      state.flash(expired ? LOGOUT_MESSAGES.expired : LOGOUT_MESSAGES.loggedOut);

      getLogger().info({ requestId: extractRequestId(req), expired }, "OIDC session ended");

      res.redirect(safeRedirectTarget(req, queryString(req.query["next"])) ?? rootUrl(req));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/**
 * Create the legacy callback handler
 *
 * Forwards to the canonical callback with the query string unchanged.
 *
 * @param paths - Route paths, including the mount prefix
 */
export function createLegacyCallbackHandler(paths: OidcRoutePaths) {
  return function legacyCallback(req: Request, res: Response): void {
    getLogger().warn(
      { requestId: extractRequestId(req), path: req.path, callback: paths.authorize },
      `The ${req.path} callback route is deprecated, register ${paths.authorize} with the provider`
    );
    res.redirect(`${paths.authorize}${rawQuery(req)}`);
  };
}
