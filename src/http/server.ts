/**
 * HTTP Server Setup
 *
 * Creates and configures the Express application hosting the OIDC relying
 * party. Provides factory functions for creating the server and managing
 * lifecycle.
 */

import express from "express";
import session from "express-session";
import type { ErrorRequestHandler, Express } from "express";
import type { Server as HttpServer } from "node:http";
import { requestLogging, errorHandler, notFoundHandler } from "./middleware/index.js";
import { createExampleRouter } from "./routes/index.js";
import type { HttpConfig, HttpServerInstance } from "./types.js";
import { getComponentLogger } from "../logging/index.js";
import type { OpenIdConnect } from "../auth/oidc/openid-connect.js";

/**
 * Lazy-initialized logger to avoid initialization at module load time
 */
let logger: ReturnType<typeof getComponentLogger> | null = null;

function getLogger(): ReturnType<typeof getComponentLogger> {
  if (!logger) {
    logger = getComponentLogger("http:server");
  }
  return logger;
}

/**
 * Name of the session cookie
 */
export const SESSION_COOKIE_NAME = "oidc_rp.sid";

/**
 * Dependencies required to create the HTTP app
 */
export interface HttpAppDependencies {
  /** OpenID Connect facade (not yet installed) */
  oidc: OpenIdConnect;

  /** HTTP configuration (session secret and cookie flags) */
  config: Pick<HttpConfig, "sessionSecret" | "sessionCookieSecure">;

  /** Session store (default: express-session's in-memory store) */
  sessionStore?: session.Store;

  /**
   * Hook to add routes after the session and OIDC middleware but before the
   * application routes
   */
  configure?: (app: Express) => void;
}

/**
 * Create and configure the Express application
 *
 * Middleware order: request logging, session, OIDC expiry check and
 * browser routes, application routes, 404, error handler.
 *
 * @param deps - App dependencies
 * @returns Configured Express application
 * @throws Error if browser login is enabled without a session secret
 */
export function createHttpApp(deps: HttpAppDependencies): Express {
  const { oidc, config } = deps;
  const browserRoutes = !oidc.config.resourceServerOnly;
  const app = express();

  // Request logging (must be early in middleware chain)
  app.use(requestLogging);

  if (config.sessionSecret !== undefined) {
    app.use(
      session({
        name: SESSION_COOKIE_NAME,
        secret: config.sessionSecret,
        resave: false,
        saveUninitialized: false,
        ...(deps.sessionStore !== undefined && { store: deps.sessionStore }),
        cookie: {
          httpOnly: true,
          sameSite: "lax",
          secure: config.sessionCookieSecure,
        },
      })
    );
  } else if (browserRoutes) {
    throw new Error("SESSION_SECRET is required unless OIDC_RESOURCE_SERVER_ONLY is enabled");
  }

  // Expiry check and login/authorize/logout (before application routes)
  oidc.install(app);

  deps.configure?.(app);

  app.use(createExampleRouter(oidc, { browserRoutes }));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Error handler (must be last)
  const handleErrors: ErrorRequestHandler = (err, req, res, next) => {
    errorHandler(err instanceof Error ? err : new Error(String(err)), req, res, next);
  };
  app.use(handleErrors);

  return app;
}

/**
 * Start the HTTP server
 *
 * @param app - Express application
 * @param config - HTTP configuration
 * @returns Server instance with control methods
 */
export async function startHttpServer(
  app: Express,
  config: Pick<HttpConfig, "port" | "host">
): Promise<HttpServerInstance> {
  return new Promise((resolve, reject) => {
    let httpServer: HttpServer;

    try {
      httpServer = app.listen(config.port, config.host, () => {
        getLogger().info({ host: config.host, port: config.port }, "HTTP server listening");

        resolve({
          port: config.port,
          host: config.host,
          close: async (): Promise<void> => {
            getLogger().info("Closing HTTP server");

            return new Promise((resolveClose, rejectClose) => {
              httpServer.close((err) => {
                if (err) {
                  getLogger().error({ error: err }, "Error closing HTTP server");
                  rejectClose(err);
                } else {
                  getLogger().info("HTTP server closed");
                  resolveClose();
                }
              });
            });
          },
        });
      });

      httpServer.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "EADDRINUSE") {
          getLogger().error({ port: config.port, host: config.host }, "Port already in use");
          reject(new Error(`Port ${config.port} is already in use`));
        } else if (error.code === "EACCES") {
          getLogger().error({ port: config.port }, "Permission denied to bind to port");
          reject(new Error(`Permission denied to bind to port ${config.port}`));
        } else {
          getLogger().error({ error }, "HTTP server error");
          reject(error);
        }
      });
    } catch (error) {
      getLogger().error({ error }, "Failed to create HTTP server");
      reject(error);
    }
  });
}

/**
 * Parse an optional boolean environment value
 *
 * @returns The parsed value, or undefined when unset or unrecognized
 */
function parseEnvBoolean(value: string | undefined, envKey: string): boolean | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }

  getLogger().warn({ envKey, value }, `Invalid ${envKey} value (expected true or false), ignoring`);
  return undefined;
}

/**
 * Load HTTP configuration from environment
 *
 * Environment variables:
 * - HTTP_PORT: Port to listen on (default: 3000)
 * - HTTP_HOST: Interface to bind (default: 127.0.0.1)
 * - SESSION_SECRET: Session cookie signing secret
 * - SESSION_COOKIE_SECURE: HTTPS-only session cookie (default: true when NODE_ENV=production)
 *
 * @param env - Environment (default: process.env)
 * @returns HTTP configuration
 * @throws Error if configuration is invalid
 */
export function loadHttpConfig(env: NodeJS.ProcessEnv = process.env): HttpConfig {
  const portStr = env["HTTP_PORT"] || "3000";
  const port = parseInt(portStr, 10);

  // Validate port is a valid number in valid range
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid HTTP_PORT: "${portStr}". Must be a number between 1 and 65535.`);
  }

  const host = env["HTTP_HOST"] || "127.0.0.1";

  // Warn if exposing to network
  if (host === "0.0.0.0") {
    getLogger().warn(
      { host },
      "HTTP server binding to all interfaces (0.0.0.0). " +
        "Serve it behind TLS so session cookies and tokens are not sent in clear text."
    );
  }

  const sessionSecret = env["SESSION_SECRET"] || undefined;
  const sessionCookieSecure =
    parseEnvBoolean(env["SESSION_COOKIE_SECURE"], "SESSION_COOKIE_SECURE") ??
    env["NODE_ENV"] === "production";

  return {
    port,
    host,
    sessionCookieSecure,
    ...(sessionSecret !== undefined && { sessionSecret }),
  };
}
