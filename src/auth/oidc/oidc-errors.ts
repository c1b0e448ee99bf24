/**
 * OIDC Module Error Classes
 *
 * Domain-specific error types for OIDC authentication operations.
 * All errors extend AuthError and include a retryable flag.
 *
 * @module auth/oidc/errors
 */

import { AuthError } from "../errors.js";

/**
 * Base class for OIDC-specific errors
 */
export abstract class OidcError extends AuthError {
  constructor(message: string, code: string, retryable: boolean = false) {
    super(message, code, retryable);
  }
}

/**
 * OIDC configuration is invalid or lacks a capability the caller needs
 *
 * Fatal: raised at startup, or on first use of the missing capability.
 */
export class OidcConfigurationError extends OidcError {
  constructor(public readonly problems: string[]) {
    super(`Invalid OIDC configuration: ${problems.join("; ")}`, "OIDC_CONFIGURATION_ERROR", false);
  }
}

/**
 * Provider metadata has no introspection endpoint
 *
 * Fatal for every bearer-protected route: the deployment cannot validate
 * tokens at all, so this is never turned into a per-request 401.
 */
export class OidcIntrospectionUnsupportedError extends OidcError {
  constructor(public readonly issuer: string) {
    super(
      `Can't validate the token because the server ${issuer} does not support introspection`,
      "OIDC_INTROSPECTION_UNSUPPORTED",
      false
    );
  }
}

/**
 * OIDC provider discovery failed
 *
 * Retryable - IdP could be temporarily unavailable.
 */
export class OidcDiscoveryError extends OidcError {
  /** Underlying error that caused the discovery failure */
  public override readonly cause?: Error;

  constructor(
    public readonly metadataUrl: string,
    cause?: Error
  ) {
    super(`Failed to discover OIDC provider at ${metadataUrl}`, "OIDC_DISCOVERY_FAILED", true);
    this.cause = cause;
  }
}

/**
 * The IdP redirected back with an `error` parameter
 *
 * Not retryable - the user denied access or the request was rejected.
 */
export class OidcAuthorizationError extends OidcError {
  constructor(
    public readonly error: string,
    public readonly errorDescription?: string
  ) {
    super(
      errorDescription ? `${error}: ${errorDescription}` : error,
      "OIDC_AUTHORIZATION_ERROR",
      false
    );
  }
}

/**
 * OIDC state parameter validation failed
 *
 * Not retryable - indicates a forged or replayed callback, or a session
 * that no longer holds the login attempt. The user must start over.
 */
export class OidcStateValidationError extends OidcError {
  constructor() {
    super(
      "mismatching_state: CSRF Warning! State not equal in request and response.",
      "OIDC_STATE_INVALID",
      false
    );
  }
}

/**
 * OIDC code exchange failed
 *
 * Not retryable - user must restart the authorization flow.
 */
export class OidcCodeExchangeError extends OidcError {
  /** Underlying error that caused the code exchange failure */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, "OIDC_CODE_EXCHANGE_FAILED", false);
    this.cause = cause;
  }
}

/**
 * OIDC user info fetch failed
 *
 * Retryable - IdP could be temporarily unavailable.
 */
export class OidcUserInfoError extends OidcError {
  /** Underlying error that caused the userinfo failure */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(`Failed to fetch OIDC user info: ${message}`, "OIDC_USERINFO_FAILED", true);
    this.cause = cause;
  }
}

/**
 * Token introspection request failed (transport or provider error)
 *
 * Retryable - distinct from an inactive token, which is a normal 401.
 */
export class OidcIntrospectionError extends OidcError {
  /** Underlying error that caused the introspection failure */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(`Token introspection failed: ${message}`, "OIDC_INTROSPECTION_FAILED", true);
    this.cause = cause;
  }
}

/**
 * Operation needs an authenticated browser session
 */
export class OidcNotLoggedInError extends OidcError {
  constructor() {
    super("User was not authenticated", "OIDC_NOT_LOGGED_IN", false);
  }
}
