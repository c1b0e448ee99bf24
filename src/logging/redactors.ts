/**
 * Secret Redaction Configuration
 *
 * Paths that Pino replaces with [REDACTED] before a log line is written,
 * plus heuristics used by tests to catch leaks.
 *
 * @module logging/redactors
 */

/**
 * Paths to redact from log objects
 *
 * Pino redaction path syntax:
 * - Dot notation for nested objects: "env.OIDC_CLIENT_SECRET"
 * - Wildcard for any key at one level: "*.access_token"
 */
export const REDACT_PATHS = [
  // Environment / settings records
  "env.OIDC_CLIENT_SECRET",
  "env.SESSION_SECRET",
  "settings.OIDC_CLIENT_SECRET",
  "settings.OIDC_CLIENT_SECRETS",

  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "headers.cookie",
  "req.headers.authorization",
  "req.headers.cookie",

  // OAuth / OIDC material
  "*.client_secret",
  "*.clientSecret",
  "*.access_token",
  "*.accessToken",
  "*.refresh_token",
  "*.refreshToken",
  "*.id_token",
  "*.idToken",
  "*.codeVerifier",
  "*.code_verifier",
  "*.nonce",
  "*.token",
  "*.oidcAuthToken",
  "*.password",
  "*.secret",

  // Query parameters that carry one-time credentials
  "query.code",
];

/**
 * Pino redaction options
 *
 * See: https://getpino.io/#/docs/redaction
 */
export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  // Keep the key so log structure stays stable
  remove: false,
} as const;

/**
 * Heuristic patterns for secret-looking strings
 *
 * Used by tests to validate redaction, not at runtime.
 */
export const SECRET_PATTERNS = {
  /**
   * JWT (base64url.base64url.base64url)
   * @example "eyJhbGciOiJSUzI1NiJ9.eyJzdWIiOi..."
   */
  jwt: /^eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/,

  /**
   * Generic opaque token: long base64url-ish string
   */
  opaqueToken: /^[A-Za-z0-9_-]{32,}$/,
} as const;

/**
 * Check if a string value looks like a secret
 *
 * @example
 * ```typescript
 * looksLikeSecret("eyJhbGciOi...") // true
 * looksLikeSecret("hello world") // false
 * ```
 */
export function looksLikeSecret(value: string): boolean {
  return Object.values(SECRET_PATTERNS).some((pattern) => pattern.test(value));
}
