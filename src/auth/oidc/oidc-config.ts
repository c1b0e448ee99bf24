/**
 * OIDC Configuration Module
 *
 * Loads and validates OIDC configuration from a flat settings record
 * (environment variables by default) and the client secrets document.
 *
 * @module auth/oidc/config
 */

import { readFileSync } from "node:fs";
import type { Logger } from "pino";
import type { ClientSecrets, OidcConfig } from "./oidc-types.js";
import {
  ClientSecretsDocumentSchema,
  OidcSettingsSchema,
  formatIssues,
} from "./oidc-validation.js";
import { OidcConfigurationError } from "./oidc-errors.js";
import { getComponentLogger } from "../../logging/index.js";

/**
 * Lazy-initialized logger
 */
let logger: Logger | null = null;

function getLogger(): Logger {
  if (!logger) {
    logger = getComponentLogger("auth:oidc-config");
  }
  return logger;
}

/**
 * Flat settings record; `process.env` satisfies it
 */
export type OidcSettings = Readonly<Record<string, unknown>>;

/**
 * Settings that used to change behavior and no longer do.
 * Their presence is fatal: the deployment expects a check that is not made.
 */
export const REMOVED_SETTINGS = [
  "OIDC_GOOGLE_APPS_DOMAIN",
  "OIDC_REQUIRE_VERIFIED_EMAIL",
  "OIDC_RESOURCE_CHECK_AUD",
  "OIDC_VALID_ISSUERS",
] as const;

/**
 * Settings that are still accepted but ignored
 */
export const DEPRECATED_SETTINGS = [
  "OIDC_ID_TOKEN_COOKIE_NAME",
  "OIDC_ID_TOKEN_COOKIE_PATH",
  "OIDC_ID_TOKEN_COOKIE_TTL",
  "OIDC_COOKIE_SECURE",
  "OIDC_OPENID_REALM",
  "OVERWRITE_REDIRECT_URI",
  "OIDC_USERINFO_URL",
] as const;

/**
 * Outcome of the settings validation pass
 */
export interface SettingsValidation {
  /** Fatal problems; any entry prevents startup */
  errors: string[];

  /** Warnings about settings that should be updated */
  advisories: string[];
}

interface SettingsEvaluation extends SettingsValidation {
  config: OidcConfig | null;
}

/**
 * Whether a setting is present (empty environment strings count as unset)
 */
function isSet(settings: OidcSettings, key: string): boolean {
  const value = settings[key];
  return value !== undefined && value !== null && value !== "";
}

/**
 * Copy the settings this module reads, dropping unset values so schema
 * defaults apply
 */
function pickSettings(settings: OidcSettings): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const key of Object.keys(OidcSettingsSchema.shape)) {
    if (isSet(settings, key)) {
      picked[key] = settings[key];
    }
  }
  return picked;
}

/**
 * Load the client secrets document and return its first provider entry
 *
 * @param source - Path to a JSON file, or the parsed document
 * @throws OidcConfigurationError if the file is unreadable or the document is invalid
 */
export function loadClientSecrets(source: string | Record<string, unknown>): ClientSecrets {
  let document: unknown = source;

  if (typeof source === "string") {
    try {
      document = JSON.parse(readFileSync(source, "utf8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OidcConfigurationError([`Cannot read client secrets from ${source}: ${reason}`]);
    }
  }

  const result = ClientSecretsDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new OidcConfigurationError([`Invalid client secrets: ${formatIssues(result.error)}`]);
  }

  const [entry] = Object.values(result.data);
  if (!entry) {
    throw new OidcConfigurationError(["Invalid client secrets: no provider entry"]);
  }

  return {
    client_id: entry.client_id,
    client_secret: entry.client_secret,
    issuer: entry.issuer,
  };
}

/**
 * Run every check over the settings and build the configuration when none fails
 */
function evaluateSettings(settings: OidcSettings): SettingsEvaluation {
  const errors: string[] = [];
  const advisories: string[] = [];

  for (const key of REMOVED_SETTINGS) {
    if (isSet(settings, key)) {
      errors.push(`The "${key}" configuration value is no longer enforced`);
    }
  }

  for (const key of DEPRECATED_SETTINGS) {
    if (isSet(settings, key)) {
      advisories.push(`The "${key}" configuration value is deprecated and ignored`);
    }
  }

  if (isSet(settings, "OIDC_CALLBACK_ROUTE")) {
    advisories.push(
      'The "OIDC_CALLBACK_ROUTE" configuration value is deprecated; the callback is served at /authorize'
    );
  }

  if (Array.isArray(settings["OIDC_SCOPES"])) {
    advisories.push('The "OIDC_SCOPES" configuration value should be a space-separated string');
  }

  const parsed = OidcSettingsSchema.safeParse(pickSettings(settings));
  if (!parsed.success) {
    errors.push(formatIssues(parsed.error));
    return { errors, advisories, config: null };
  }

  const values = parsed.data;

  if (!values.OIDC_SCOPES.split(/\s+/).includes("openid")) {
    errors.push('The value "openid" must be in OIDC_SCOPES');
  }

  let secrets: ClientSecrets | null = null;
  try {
    secrets = loadClientSecrets(values.OIDC_CLIENT_SECRETS);
  } catch (error) {
    if (!(error instanceof OidcConfigurationError)) {
      throw error;
    }
    errors.push(...error.problems);
  }

  if (secrets === null || errors.length > 0) {
    return { errors, advisories, config: null };
  }

  const issuer = secrets.issuer.replace(/\/+$/, "");

  const config: OidcConfig = {
    issuer: secrets.issuer,
    serverMetadataUrl:
      values.OIDC_SERVER_METADATA_URL ?? `${issuer}/.well-known/openid-configuration`,
    clientId: values.OIDC_CLIENT_ID ?? secrets.client_id,
    clientSecret: values.OIDC_CLIENT_SECRET ?? secrets.client_secret,
    scopes: values.OIDC_SCOPES,
    clockSkewSeconds: values.OIDC_CLOCK_SKEW,
    userInfoEnabled: values.OIDC_USER_INFO_ENABLED,
    resourceServerOnly: values.OIDC_RESOURCE_SERVER_ONLY,
    introspectionAuthMethod: values.OIDC_INTROSPECTION_AUTH_METHOD,
    callbackRoute: values.OIDC_CALLBACK_ROUTE,
    httpTimeoutSeconds: values.OIDC_HTTP_TIMEOUT,
    ...(values.OIDC_REDIRECT_URI !== undefined && { redirectUri: values.OIDC_REDIRECT_URI }),
  };

  return { errors, advisories, config };
}

/**
 * Validate a settings record without building the configuration
 *
 * @param settings - Settings record (default: process.env)
 */
export function validateOidcSettings(settings: OidcSettings = process.env): SettingsValidation {
  const { errors, advisories } = evaluateSettings(settings);
  return { errors, advisories };
}

/**
 * Load OIDC configuration
 *
 * Settings:
 * - OIDC_CLIENT_SECRETS: Path to the client secrets JSON, or the document itself (required)
 * - OIDC_CLIENT_ID / OIDC_CLIENT_SECRET: Override the client identity from the secrets
 * - OIDC_SCOPES: Requested scopes (default: "openid profile email")
 * - OIDC_USER_INFO_ENABLED: Fetch user info after login (default: true)
 * - OIDC_INTROSPECTION_AUTH_METHOD: Client authentication method (default: client_secret_post)
 * - OIDC_CLOCK_SKEW: Expiry tolerance in seconds (default: 60)
 * - OIDC_RESOURCE_SERVER_ONLY: API-only mode (default: false)
 * - OIDC_CALLBACK_ROUTE: Legacy callback path (default: /oidc_callback)
 * - OIDC_SERVER_METADATA_URL: Discovery document (default: derived from the issuer)
 * - OIDC_REDIRECT_URI: Fixed callback URL (default: derived per request)
 * - OIDC_HTTP_TIMEOUT: Provider request timeout in seconds (default: 30)
 *
 * @param settings - Settings record (default: process.env)
 * @returns Frozen OIDC configuration
 * @throws OidcConfigurationError listing every fatal problem
 */
export function loadOidcConfig(settings: OidcSettings = process.env): Readonly<OidcConfig> {
  const { errors, advisories, config } = evaluateSettings(settings);

  for (const advisory of advisories) {
    getLogger().warn({ advisory }, advisory);
  }

  if (config === null || errors.length > 0) {
    getLogger().error({ errors }, "OIDC configuration validation failed");
    throw new OidcConfigurationError(errors);
  }

  // Never log secrets
  getLogger().info(
    {
      issuer: config.issuer,
      serverMetadataUrl: config.serverMetadataUrl,
      scopes: config.scopes,
      userInfoEnabled: config.userInfoEnabled,
      resourceServerOnly: config.resourceServerOnly,
      redirectUri: config.redirectUri ?? "per-request",
    },
    "OIDC configuration loaded"
  );

  return Object.freeze(config);
}
