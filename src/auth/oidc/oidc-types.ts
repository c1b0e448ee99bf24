/**
 * OIDC Module Type Definitions
 *
 * Types for provider configuration, the session-bound authentication
 * record, and the OAuth client adapter interface.
 *
 * @module auth/oidc/types
 */

/**
 * How the client authenticates to the provider's token and introspection endpoints
 */
export type ClientAuthMethod =
  | "client_secret_post"
  | "client_secret_basic"
  | "client_secret_jwt"
  | "none";

/**
 * One provider entry of the client secrets document
 */
export interface ClientSecrets {
  client_id: string;
  client_secret: string;
  issuer: string;
}

/**
 * Client secrets document: a single entry keyed by provider name
 *
 * @example { "web": { "client_id": "...", "client_secret": "...", "issuer": "https://idp/" } }
 */
export type ClientSecretsDocument = Record<string, ClientSecrets>;

/**
 * OIDC provider configuration
 *
 * Loaded once at startup and frozen.
 */
export interface OidcConfig {
  /** OIDC issuer URL (e.g., https://idp.example.com/realms/main) */
  issuer: string;

  /** Provider metadata document URL */
  serverMetadataUrl: string;

  /** OAuth2 client ID */
  clientId: string;

  /** OAuth2 client secret */
  clientSecret: string;

  /** Space-separated scopes requested at login; always contains "openid" */
  scopes: string;

  /** Tokens count as expired this many seconds before `expires_at` (default: 60) */
  clockSkewSeconds: number;

  /** Fetch user-info claims after the code exchange (default: true) */
  userInfoEnabled: boolean;

  /** Only protect APIs: no browser routes, no expiry check (default: false) */
  resourceServerOnly: boolean;

  /** Client authentication method for provider calls (default: client_secret_post) */
  introspectionAuthMethod: ClientAuthMethod;

  /** Legacy callback path that forwards to the canonical callback (default: /oidc_callback) */
  callbackRoute: string;

  /**
   * Fixed callback URL registered with the provider.
   * When unset, it is derived from the incoming request's host.
   */
  redirectUri?: string;

  /** Timeout for every request made to the provider, in seconds (default: 30) */
  httpTimeoutSeconds: number;
}

/**
 * Token record kept in the browser session
 */
export interface SessionAuthToken {
  access_token: string;
  token_type?: string;
  refresh_token?: string;
  id_token?: string;
  scope?: string;

  /** Unix seconds */
  expires_at: number;
}

/**
 * User-info claims kept in the browser session
 */
export type UserProfile = Record<string, unknown>;

/**
 * Per-attempt secrets bound to a login redirect
 */
export interface AuthorizationChecks {
  /** PKCE code verifier (kept server-side, sent at code exchange) */
  codeVerifier: string;

  /** Expected ID token nonce */
  nonce: string;

  /** Redirect URI sent to the authorization endpoint; must match at exchange */
  redirectUri: string;
}

/**
 * Login attempt waiting for its callback, keyed by correlation value in the session
 */
export interface PendingLogin extends AuthorizationChecks {
  /** Post-login destination, already checked against open redirects */
  next?: string;

  /** Unix seconds when the attempt started */
  createdAt: number;
}

/**
 * Authorization redirect built by the client adapter
 */
export interface AuthorizationRequest {
  /** Full authorization endpoint URL to redirect the browser to */
  url: string;

  /** Correlation value sent as `state` */
  state: string;

  checks: AuthorizationChecks;
}

/**
 * Outcome of a successful code exchange
 */
export interface AuthorizationResult {
  token: SessionAuthToken;

  /** `sub` claim of the ID token, when one was returned */
  subject?: string;
}

/**
 * RFC 7662 introspection response
 */
export interface IntrospectionResult {
  active: boolean;

  /** Space-separated scopes granted to the token */
  scope?: string;

  [claim: string]: unknown;
}

/**
 * OAuth client adapter
 *
 * Everything that talks to the identity provider goes through this
 * interface. The production implementation wraps openid-client.
 */
export interface OidcClient {
  /**
   * Build the authorization endpoint redirect for a new login attempt
   *
   * @param redirectUri - Absolute callback URL
   */
  createAuthorizationRequest(redirectUri: string): Promise<AuthorizationRequest>;

  /**
   * Exchange the authorization code carried by `callbackUrl`
   *
   * @param callbackUrl - Callback URL including `code` and `state`
   * @param expectedState - Correlation value of the pending attempt
   * @param checks - Secrets stored with the pending attempt
   */
  exchangeCode(
    callbackUrl: URL,
    expectedState: string,
    checks: AuthorizationChecks
  ): Promise<AuthorizationResult>;

  /**
   * Fetch user-info claims
   *
   * @param accessToken - Access token to present
   * @param subject - Expected `sub`; omitted when no ID token is available
   */
  fetchUserInfo(accessToken: string, subject?: string): Promise<UserProfile>;

  /**
   * Introspect a bearer token
   *
   * @throws OidcIntrospectionUnsupportedError if the provider has no introspection endpoint
   */
  introspectToken(token: string): Promise<IntrospectionResult>;
}

/**
 * Route paths of the browser flow, including any mount prefix
 */
export interface OidcRoutePaths {
  login: string;
  authorize: string;
  logout: string;
}

/**
 * Redirect signalled by the per-request expiry check
 */
export interface ExpiryRedirect {
  location: string;
  reason: "expired";
}

/**
 * Flash message shown after logout
 */
export const LOGOUT_MESSAGES = {
  expired: "Your session expired, please reconnect.",
  loggedOut: "You were successfully logged out.",
} as const;
