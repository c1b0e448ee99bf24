/**
 * HTTP Routes Exports
 *
 * Re-exports all route handlers for the HTTP layer.
 */

export { createOidcRouter, createLegacyCallbackHandler, type OidcRouterDeps } from "./oidc.js";
export { createExampleRouter } from "./example.js";
