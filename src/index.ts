/**
 * OIDC Relying Party for Express - Library Entry Point
 *
 * @example
 * ```typescript
 * import express from "express";
 * import session from "express-session";
 * import { initializeLogger, loadOidcConfig, OpenIdConnect } from "express-oidc-rp";
 *
 * initializeLogger({ level: "info", format: "json" });
 *
 * const oidc = new OpenIdConnect({ config: loadOidcConfig() });
 * const app = express();
 * app.use(session({ secret: process.env["SESSION_SECRET"] ?? "", resave: false, saveUninitialized: false }));
 * oidc.install(app);
 * ```
 */

export * from "./auth/index.js";
export * from "./http/index.js";
export * from "./logging/index.js";
