/**
 * HTTP Module
 *
 * Express application hosting the OIDC browser flow, the bearer-protected
 * API and the example pages.
 */

// Server setup
export {
  createHttpApp,
  startHttpServer,
  loadHttpConfig,
  type HttpAppDependencies,
} from "./server.js";

// Types
export type {
  HttpConfig,
  HttpServerInstance,
} from "./types.js";

// Routes
export {
  createOidcRouter,
  createLegacyCallbackHandler,
  createExampleRouter,
  type OidcRouterDeps,
} from "./routes/index.js";

// Request helpers
export {
  extractSourceIp,
  extractRequestId,
  requestOrigin,
  requestUrl,
  rootUrl,
  safeRedirectTarget,
} from "./request-utils.js";

// Middleware
export {
  requestLogging,
  errorHandler,
  notFoundHandler,
  HttpError,
  internalError,
} from "./middleware/index.js";
