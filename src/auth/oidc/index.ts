/**
 * OIDC Authentication Module - Public API
 *
 * OpenID Connect relying party for Express: browser login with the
 * authorization code flow and bearer token introspection for APIs.
 *
 * @module auth/oidc
 *
 * @example
 * ```typescript
 * import { loadOidcConfig, OpenIdConnect } from "./auth/oidc/index.js";
 *
 * // Load OIDC configuration from environment
 * const oidc = new OpenIdConnect({ config: loadOidcConfig() });
 *
 * // Install after express-session, before application routes
 * oidc.install(app);
 *
 * app.get("/profile", oidc.requireLogin, handler);
 * app.get("/api/data", oidc.acceptToken({ scopes: ["data"] }), apiHandler);
 * ```
 */

// Types
export type {
  AuthorizationChecks,
  AuthorizationRequest,
  AuthorizationResult,
  ClientAuthMethod,
  ClientSecrets,
  ClientSecretsDocument,
  ExpiryRedirect,
  IntrospectionResult,
  OidcClient,
  OidcConfig,
  OidcRoutePaths,
  PendingLogin,
  SessionAuthToken,
  UserProfile,
} from "./oidc-types.js";
export { LOGOUT_MESSAGES } from "./oidc-types.js";

// Errors
export {
  OidcError,
  OidcConfigurationError,
  OidcIntrospectionUnsupportedError,
  OidcDiscoveryError,
  OidcAuthorizationError,
  OidcStateValidationError,
  OidcCodeExchangeError,
  OidcUserInfoError,
  OidcIntrospectionError,
  OidcNotLoggedInError,
} from "./oidc-errors.js";

// Configuration
export {
  loadOidcConfig,
  loadClientSecrets,
  validateOidcSettings,
  REMOVED_SETTINGS,
  DEPRECATED_SETTINGS,
  type OidcSettings,
  type SettingsValidation,
} from "./oidc-config.js";

// Validation
export {
  ClientSecretsSchema,
  ClientSecretsDocumentSchema,
  OidcSettingsSchema,
  SessionAuthTokenSchema,
  UserProfileSchema,
} from "./oidc-validation.js";

// Client adapter
export { OpenIdClientAdapter, describeUpstreamError } from "./oidc-client.js";

// Session state
export { SessionAuthState, PENDING_LOGIN_TTL_SECONDS, type OidcSessionData } from "./oidc-session.js";

// Middleware
export {
  checkSessionExpiry,
  createExpiryCheckMiddleware,
  createRequireLoginMiddleware,
  type OidcMiddlewareDeps,
} from "./oidc-middleware.js";
export { acceptToken, extractBearerToken, hasRequiredScopes } from "./bearer-guard.js";

// Facade
export {
  OpenIdConnect,
  buildRoutePaths,
  type OpenIdConnectOptions,
} from "./openid-connect.js";
