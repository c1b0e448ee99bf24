#!/usr/bin/env node
/**
 * OIDC Relying Party - Main Entry Point
 *
 * Loads configuration from the environment (and .env), then serves the
 * example application with browser login and bearer-protected API routes.
 */

import "dotenv/config";
import { initializeLogger, getComponentLogger, isLogLevel } from "./logging/index.js";
import { loadOidcConfig, OpenIdConnect } from "./auth/oidc/index.js";
import { createHttpApp, startHttpServer, loadHttpConfig } from "./http/index.js";

// Initialize logger at application startup
const logLevel = process.env["LOG_LEVEL"];
initializeLogger({
  level: isLogLevel(logLevel) ? logLevel : "info",
  format: process.env["LOG_FORMAT"] === "json" ? "json" : "pretty",
});

const logger = getComponentLogger("main");

/**
 * Main entry point
 *
 * Initialization order:
 * 1. OIDC configuration (settings validation, client secrets)
 * 2. HTTP configuration
 * 3. Express app (session, OIDC routes, example routes)
 * 4. HTTP server, with graceful shutdown on SIGINT/SIGTERM
 */
async function main(): Promise<void> {
  logger.info("Initializing OIDC relying party");

  try {
    const oidcConfig = loadOidcConfig();
    const httpConfig = loadHttpConfig();

    const oidc = new OpenIdConnect({
      config: oidcConfig,
      prefix: process.env["OIDC_ROUTE_PREFIX"] ?? "",
    });

    const app = createHttpApp({ oidc, config: httpConfig });
    const server = await startHttpServer(app, httpConfig);

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, "Shutting down");
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, "Error during shutdown");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    logger.info(
      { host: httpConfig.host, port: httpConfig.port, login: oidc.paths.login },
      "OIDC relying party is running"
    );
  } catch (error) {
    logger.fatal({ error }, "Failed to start OIDC relying party");
    process.exit(1);
  }
}

// Start the server
main().catch((error: unknown) => {
  console.error("Unhandled error in main():", error);
  process.exit(1);
});
