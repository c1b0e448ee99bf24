/**
 * HTTP Type Definitions
 *
 * Type definitions for the HTTP layer hosting the OIDC relying party.
 */

/**
 * HTTP server configuration
 */
export interface HttpConfig {
  /** Port to listen on (default: 3000) */
  port: number;

  /** Interface to bind (default: 127.0.0.1) */
  host: string;

  /** Secret signing the session cookie; required unless resource-server-only */
  sessionSecret?: string;

  /** Send the session cookie over HTTPS only (default: true in production) */
  sessionCookieSecure: boolean;
}

/**
 * HTTP server instance with additional metadata
 */
export interface HttpServerInstance {
  /** Close the HTTP server gracefully */
  close: () => Promise<void>;

  /** The port the server is listening on */
  port: number;

  /** The host the server is bound to */
  host: string;
}
