/**
 * Authentication Module - Public API
 *
 * @module auth
 */

export { AuthError, BearerTokenError, type BearerErrorCode } from "./errors.js";
export type { AcceptTokenOptions, AuthMiddleware } from "./middleware-types.js";
export * from "./oidc/index.js";
