/**
 * Example Application Routes
 *
 * Small application showing every guard: a public page, login-required
 * pages and bearer-protected API endpoints.
 *
 * @module http/routes/example
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { OpenIdConnect } from "../../auth/oidc/openid-connect.js";

/**
 * Create the example application router
 *
 * Endpoints:
 * - GET / - Public; login state and pending flash messages
 * - GET /profile - Login required; user-info claims
 * - GET /at, GET /rt - Login required; stored access and refresh token
 * - GET /api/need-token - Bearer token required
 * - GET /api/need-profile - Bearer token with the "profile" scope required
 *
 * @param oidc - Installed OpenID Connect facade
 * @param options.browserRoutes - Mount the session-backed routes (default: true)
 */
export function createExampleRouter(
  oidc: OpenIdConnect,
  options: { browserRoutes?: boolean } = {}
): Router {
  const router = Router();

  if (options.browserRoutes ?? true) {
    router.get("/", (req: Request, res: Response) => {
      res.json({
        loggedIn: oidc.isLoggedIn(req),
        flashes: oidc.consumeFlashes(req),
        logoutUrl: oidc.logoutUrl(),
      });
    });

    router.get("/profile", oidc.requireLogin, (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(oidc.getProfile(req));
      } catch (error) {
        next(error);
      }
    });

    router.get("/at", oidc.requireLogin, (req: Request, res: Response) => {
      res.type("text").send(oidc.getAccessToken(req) ?? "");
    });

    router.get("/rt", oidc.requireLogin, (req: Request, res: Response) => {
      res.type("text").send(oidc.getRefreshToken(req) ?? "");
    });
  }

  router.get("/api/need-token", oidc.acceptToken(), (_req: Request, res: Response) => {
    res.type("text").send("OK");
  });

  router.get(
    "/api/need-profile",
    oidc.acceptToken({ scopes: ["profile"] }),
    (_req: Request, res: Response) => {
      res.type("text").send("OK");
    }
  );

  return router;
}
