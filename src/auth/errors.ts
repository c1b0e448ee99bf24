/**
 * Authentication Module Error Classes
 *
 * Base error type for the auth module plus the RFC 6750 bearer token errors.
 * All errors include a retryable flag to guide error handling logic.
 *
 * @module auth/errors
 */

/**
 * Base class for all authentication-related errors
 *
 * Provides consistent structure with error code and retryable flag
 * for downstream error handling.
 */
export abstract class AuthError extends Error {
  /** Whether the operation can be retried */
  public readonly retryable: boolean;

  /** Error code for programmatic handling */
  public readonly code: string;

  constructor(message: string, code: string, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * RFC 6750 error codes returned by the bearer token guard
 *
 * `missing_authorization` and `unsupported_token_type` are not in the RFC
 * registry but are what API clients of this guard have always received.
 */
export type BearerErrorCode =
  | "missing_authorization"
  | "unsupported_token_type"
  | "invalid_token"
  | "insufficient_scope";

/**
 * Bearer token rejected by the guard
 *
 * Expected control flow for API requests: the guard turns it into a
 * `{ error, error_description }` JSON response and never rethrows it.
 */
export class BearerTokenError extends AuthError {
  constructor(
    public readonly error: BearerErrorCode,
    public readonly description: string,
    public readonly statusCode: 401 | 403
  ) {
    super(description, error, false);
  }

  static missingAuthorization(): BearerTokenError {
    return new BearerTokenError(
      "missing_authorization",
      'Missing "Authorization" in headers.',
      401
    );
  }

  static unsupportedTokenType(tokenType: string): BearerTokenError {
    return new BearerTokenError(
      "unsupported_token_type",
      `Unsupported token_type: '${tokenType}'`,
      401
    );
  }

  static invalidToken(): BearerTokenError {
    return new BearerTokenError(
      "invalid_token",
      "The access token provided is expired, revoked, malformed, or invalid for other reasons.",
      401
    );
  }

  static insufficientScope(): BearerTokenError {
    return new BearerTokenError(
      "insufficient_scope",
      "The request requires higher privileges than provided by the access token.",
      403
    );
  }

  /**
   * JSON body sent to the client
   */
  toResponseBody(): { error: BearerErrorCode; error_description: string } {
    return { error: this.error, error_description: this.description };
  }

  /**
   * Value for the WWW-Authenticate response header
   */
  toChallenge(): string {
    if (this.error === "missing_authorization") {
      return "Bearer";
    }
    return `Bearer error="${this.error}", error_description="${this.description}"`;
  }
}
