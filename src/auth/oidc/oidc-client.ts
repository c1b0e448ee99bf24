/**
 * OAuth Client Adapter
 *
 * Wraps openid-client for the authorization code flow (with PKCE and nonce),
 * user info and RFC 7662 token introspection. Provider metadata is
 * discovered lazily on first use.
 *
 * @module auth/oidc/client
 */

import * as client from "openid-client";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import type {
  AuthorizationChecks,
  AuthorizationRequest,
  AuthorizationResult,
  ClientAuthMethod,
  IntrospectionResult,
  OidcClient,
  OidcConfig,
  SessionAuthToken,
  UserProfile,
} from "./oidc-types.js";
import {
  OidcCodeExchangeError,
  OidcDiscoveryError,
  OidcIntrospectionError,
  OidcIntrospectionUnsupportedError,
  OidcUserInfoError,
} from "./oidc-errors.js";

/**
 * Lifetime assumed when neither the token response nor the ID token carries one
 */
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

/**
 * Render an upstream failure as `error: error_description` when the provider
 * sent an OAuth error body, or the plain message otherwise
 */
export function describeUpstreamError(error: unknown): string {
  if (typeof error === "object" && error !== null && "error" in error) {
    const code = error.error;
    const description = "error_description" in error ? error.error_description : undefined;
    if (typeof code === "string") {
      return typeof description === "string" && description !== ""
        ? `${code}: ${description}`
        : code;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function createClientAuth(method: ClientAuthMethod, clientSecret: string): client.ClientAuth {
  switch (method) {
    case "client_secret_basic":
      return client.ClientSecretBasic(clientSecret);
    case "client_secret_jwt":
      return client.ClientSecretJwt(clientSecret);
    case "none":
      return client.None();
    case "client_secret_post":
      return client.ClientSecretPost(clientSecret);
  }
}

/**
 * openid-client backed OAuth client adapter
 *
 * @example
 * ```typescript
 * const oidcClient = new OpenIdClientAdapter(loadOidcConfig());
 *
 * const request = await oidcClient.createAuthorizationRequest("https://app.example.com/authorize");
 * // store request.state and request.checks in the session, redirect to request.url
 *
 * const { token, subject } = await oidcClient.exchangeCode(callbackUrl, state, checks);
 * ```
 */
export class OpenIdClientAdapter implements OidcClient {
  /**
   * Lazy-initialized logger
   */
  private _logger: Logger | null = null;

  /**
   * In-flight or completed discovery
   *
   * Shared by concurrent callers. Reset when discovery fails so the next
   * call retries.
   */
  private configuration: Promise<client.Configuration> | null = null;

  constructor(private readonly config: Readonly<OidcConfig>) {}

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:oidc-client");
    }
    return this._logger;
  }

  /**
   * Discovered client configuration
   */
  private getConfiguration(): Promise<client.Configuration> {
    if (!this.configuration) {
      this.configuration = this.discover().catch((error: unknown) => {
        this.configuration = null;
        throw error;
      });
    }
    return this.configuration;
  }

  private async discover(): Promise<client.Configuration> {
    const startTime = performance.now();
    const metadataUrl = new URL(this.config.serverMetadataUrl);

    try {
      this.logger.info({ serverMetadataUrl: metadataUrl.href }, "Discovering OIDC provider");

      const configuration = await client.discovery(
        metadataUrl,
        this.config.clientId,
        undefined,
        createClientAuth(this.config.introspectionAuthMethod, this.config.clientSecret),
        {
          timeout: this.config.httpTimeoutSeconds,
          ...(metadataUrl.protocol === "http:" && { execute: [client.allowInsecureRequests] }),
        }
      );
      configuration.timeout = this.config.httpTimeoutSeconds;

      const durationMs = Math.round(performance.now() - startTime);
      this.logger.info(
        { metric: "oidc.discovery_ms", value: durationMs },
        "OIDC provider discovered successfully"
      );

      return configuration;
    } catch (error) {
      const durationMs = Math.round(performance.now() - startTime);
      this.logger.error(
        { err: error, metric: "oidc.discovery_ms", value: durationMs },
        "OIDC discovery failed"
      );

      throw new OidcDiscoveryError(metadataUrl.href, error instanceof Error ? error : undefined);
    }
  }

  async createAuthorizationRequest(redirectUri: string): Promise<AuthorizationRequest> {
    const configuration = await this.getConfiguration();

    const codeVerifier = client.randomPKCECodeVerifier();
    const codeChallenge = await client.calculatePKCECodeChallenge(codeVerifier);
    const state = client.randomState();
    const nonce = client.randomNonce();

    const url = client.buildAuthorizationUrl(configuration, {
      redirect_uri: redirectUri,
      scope: this.config.scopes,
      state,
      nonce,
      code_challenge: codeChallenge,
      code_challenge_method: "S256",
    });

    this.logger.debug(
      { state: state.substring(0, 8) + "...", redirectUri },
      "Generated authorization URL"
    );

    return { url: url.href, state, checks: { codeVerifier, nonce, redirectUri } };
  }

  async exchangeCode(
    callbackUrl: URL,
    expectedState: string,
    checks: AuthorizationChecks
  ): Promise<AuthorizationResult> {
    const configuration = await this.getConfiguration();
    const startTime = performance.now();

    try {
      const tokens = await client.authorizationCodeGrant(configuration, callbackUrl, {
        pkceCodeVerifier: checks.codeVerifier,
        expectedState,
        expectedNonce: checks.nonce,
        idTokenExpected: true,
      });

      const claims = tokens.claims();
      const now = Math.floor(Date.now() / 1000);

      let expiresAt = now + DEFAULT_TOKEN_LIFETIME_SECONDS;
      if (tokens.expires_in !== undefined) {
        expiresAt = Math.floor(now + tokens.expires_in);
      } else if (claims !== undefined) {
        expiresAt = Math.floor(claims.exp);
      }

      const token: SessionAuthToken = {
        access_token: tokens.access_token,
        token_type: tokens.token_type,
        expires_at: expiresAt,
        ...(tokens.refresh_token !== undefined && { refresh_token: tokens.refresh_token }),
        ...(tokens.id_token !== undefined && { id_token: tokens.id_token }),
        ...(tokens.scope !== undefined && { scope: tokens.scope }),
      };

      const durationMs = Math.round(performance.now() - startTime);
      this.logger.info(
        { sub: claims?.sub, metric: "oidc.code_exchange_ms", value: durationMs },
        "OIDC code exchange successful"
      );

      return { token, ...(claims !== undefined && { subject: claims.sub }) };
    } catch (error) {
      const durationMs = Math.round(performance.now() - startTime);
      this.logger.error(
        { err: error, metric: "oidc.code_exchange_ms", value: durationMs },
        "OIDC code exchange failed"
      );

      throw new OidcCodeExchangeError(
        describeUpstreamError(error),
        error instanceof Error ? error : undefined
      );
    }
  }

  async fetchUserInfo(accessToken: string, subject?: string): Promise<UserProfile> {
    const configuration = await this.getConfiguration();

    try {
      const userInfo = await client.fetchUserInfo(
        configuration,
        accessToken,
        subject ?? client.skipSubjectCheck
      );
      return { ...userInfo };
    } catch (error) {
      this.logger.error({ err: error }, "OIDC user info request failed");
      throw new OidcUserInfoError(
        describeUpstreamError(error),
        error instanceof Error ? error : undefined
      );
    }
  }

  async introspectToken(token: string): Promise<IntrospectionResult> {
    const configuration = await this.getConfiguration();

    if (configuration.serverMetadata().introspection_endpoint === undefined) {
      throw new OidcIntrospectionUnsupportedError(this.config.issuer);
    }

    const startTime = performance.now();

    try {
      const response = await client.tokenIntrospection(configuration, token);

      const durationMs = Math.round(performance.now() - startTime);
      this.logger.debug(
        { active: response.active, metric: "oidc.introspection_ms", value: durationMs },
        "Token introspected"
      );

      return { ...response, active: response.active === true };
    } catch (error) {
      const durationMs = Math.round(performance.now() - startTime);
      this.logger.error(
        { err: error, metric: "oidc.introspection_ms", value: durationMs },
        "Token introspection failed"
      );

      throw new OidcIntrospectionError(
        describeUpstreamError(error),
        error instanceof Error ? error : undefined
      );
    }
  }
}
