/**
 * OpenID Connect Facade
 *
 * Binds the frozen configuration and the OAuth client adapter, installs the
 * browser flow on an Express application and exposes the guards and session
 * getters.
 *
 * @module auth/oidc/openid-connect
 */

import type { Express, Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import { createLegacyCallbackHandler, createOidcRouter } from "../../http/routes/oidc.js";
import type { AcceptTokenOptions, AuthMiddleware } from "../middleware-types.js";
import type {
  ExpiryRedirect,
  OidcClient,
  OidcConfig,
  OidcRoutePaths,
  UserProfile,
} from "./oidc-types.js";
import { OpenIdClientAdapter } from "./oidc-client.js";
import { SessionAuthState } from "./oidc-session.js";
import { acceptToken } from "./bearer-guard.js";
import {
  checkSessionExpiry,
  createExpiryCheckMiddleware,
  createRequireLoginMiddleware,
} from "./oidc-middleware.js";
import { OidcConfigurationError, OidcNotLoggedInError } from "./oidc-errors.js";

/**
 * Options for creating the facade
 */
export interface OpenIdConnectOptions {
  config: Readonly<OidcConfig>;

  /** Client adapter (default: openid-client backed adapter over `config`) */
  oidcClient?: OidcClient;

  /** Mount prefix for login, authorize and logout (default: none) */
  prefix?: string;
}

/**
 * Build route paths under a mount prefix
 *
 * @example buildRoutePaths("/auth/") // { login: "/auth/login", ... }
 */
export function buildRoutePaths(prefix: string = ""): OidcRoutePaths {
  const base = prefix.replace(/\/+$/, "");
  return {
    login: `${base}/login`,
    authorize: `${base}/authorize`,
    logout: `${base}/logout`,
  };
}

/**
 * OpenID Connect relying party for an Express application
 *
 * @example
 * ```typescript
 * const oidc = new OpenIdConnect({ config: loadOidcConfig() });
 *
 * const app = express();
 * app.use(session({ secret: sessionSecret, resave: false, saveUninitialized: false }));
 * oidc.install(app);
 *
 * app.get("/profile", oidc.requireLogin, (req, res) => res.json(oidc.getProfile(req)));
 * app.get("/api/items", oidc.acceptToken({ scopes: ["items"] }), listItems);
 * ```
 */
export class OpenIdConnect {
  readonly config: Readonly<OidcConfig>;
  readonly paths: OidcRoutePaths;

  /**
   * Redirects anonymous browser requests to the login route
   */
  readonly requireLogin: (req: Request, res: Response, next: NextFunction) => void;

  private readonly oidcClient: OidcClient;
  private readonly prefix: string;
  private _logger: Logger | null = null;

  constructor(options: OpenIdConnectOptions) {
    this.config = options.config;
    this.oidcClient = options.oidcClient ?? new OpenIdClientAdapter(options.config);
    this.prefix = (options.prefix ?? "").replace(/\/+$/, "");
    this.paths = buildRoutePaths(this.prefix);
    this.requireLogin = createRequireLoginMiddleware({ config: this.config, paths: this.paths });
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:openid-connect");
    }
    return this._logger;
  }

  /**
   * Install the expiry check and the browser routes
   *
   * Call after the session middleware and before any application route.
   * In resource-server-only mode nothing is installed.
   */
  install(app: Express): void {
    if (this.config.resourceServerOnly) {
      this.logger.info("Resource server only mode, browser login routes not installed");
      return;
    }

    app.use(createExpiryCheckMiddleware({ config: this.config, paths: this.paths }));
    app.use(
      this.prefix === "" ? "/" : this.prefix,
      createOidcRouter({ config: this.config, oidcClient: this.oidcClient, paths: this.paths })
    );
    app.get(this.config.callbackRoute, createLegacyCallbackHandler(this.paths));

    this.logger.info({ paths: this.paths }, "OIDC routes installed");
  }

  /**
   * Create a bearer token guard
   */
  acceptToken(options: AcceptTokenOptions = {}): AuthMiddleware {
    return acceptToken(this.oidcClient, options);
  }

  /**
   * Expiry decision for the request's session
   *
   * @throws TypeError if the stored token record is malformed
   */
  checkExpiry(req: Request): ExpiryRedirect | null {
    return checkSessionExpiry(req, { config: this.config, paths: this.paths });
  }

  isLoggedIn(req: Request): boolean {
    return this.session(req).isLoggedIn();
  }

  getAccessToken(req: Request): string | null {
    return this.session(req).getAccessToken();
  }

  getRefreshToken(req: Request): string | null {
    return this.session(req).getRefreshToken();
  }

  /**
   * User-info claims of the logged-in user
   *
   * @throws OidcConfigurationError if user info is disabled
   * @throws OidcNotLoggedInError if the session is anonymous
   */
  getProfile(req: Request): UserProfile {
    this.assertUserInfoEnabled();

    const state = this.session(req);
    if (!state.isLoggedIn()) {
      throw new OidcNotLoggedInError();
    }
    return state.getProfile() ?? {};
  }

  /**
   * Fetch user-info claims for an arbitrary access token
   *
   * @throws OidcConfigurationError if user info is disabled
   */
  async fetchUserInfo(accessToken: string): Promise<UserProfile> {
    this.assertUserInfoEnabled();
    return this.oidcClient.fetchUserInfo(accessToken);
  }

  /**
   * Logout route URL, optionally returning to `returnTo` afterwards
   */
  logoutUrl(returnTo?: string): string {
    if (returnTo === undefined) {
      return this.paths.logout;
    }
    return `${this.paths.logout}?next=${encodeURIComponent(returnTo)}`;
  }

  /**
   * Return and clear the session's pending flash messages
   */
  consumeFlashes(req: Request): string[] {
    return this.session(req).consumeFlashes();
  }

  private session(req: Request): SessionAuthState {
    return new SessionAuthState(req.session, this.config.clockSkewSeconds);
  }

  private assertUserInfoEnabled(): void {
    if (!this.config.userInfoEnabled) {
      throw new OidcConfigurationError(["User info is disabled (OIDC_USER_INFO_ENABLED=false)"]);
    }
  }
}
