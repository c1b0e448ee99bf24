/**
 * OIDC Module Validation Schemas
 *
 * Zod schemas for the settings record, the client secrets document and
 * the token record read back from the session.
 *
 * @module auth/oidc/validation
 */

import { z } from "zod";

/**
 * Boolean setting: accepts real booleans and the usual environment spellings
 */
const BooleanSettingSchema = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "1", "0"]))
    .transform((value) => value === "true" || value === "1"),
]);

/**
 * Integer setting: accepts numbers and numeric strings
 */
const IntegerSettingSchema = z.coerce.number().int("must be a whole number");

/**
 * OIDC issuer URL validation
 */
export const OidcIssuerSchema = z
  .string()
  .url("OIDC issuer must be a valid URL")
  .refine(
    (url) => url.startsWith("https://") || /^http:\/\/(localhost|127\.0\.0\.1)(:|\/|$)/.test(url),
    "OIDC issuer must use HTTPS (except localhost for development)"
  );

/**
 * One provider entry of the client secrets document
 */
export const ClientSecretsSchema = z
  .object({
    client_id: z.string().min(1, "client_id is required"),
    client_secret: z.string().min(1, "client_secret is required"),
    issuer: OidcIssuerSchema,
  })
  .passthrough();

/**
 * Client secrets document: provider name to entry; the first entry is used
 */
export const ClientSecretsDocumentSchema = z
  .record(z.string(), ClientSecretsSchema)
  .refine((doc) => Object.keys(doc).length > 0, "client secrets document has no provider entry");

/**
 * Client authentication methods supported by openid-client
 */
export const ClientAuthMethodSchema = z.enum([
  "client_secret_post",
  "client_secret_basic",
  "client_secret_jwt",
  "none",
]);

/**
 * Settings record validation schema
 *
 * Keys follow the environment variable names so the same schema reads
 * `process.env` and programmatic settings objects.
 */
export const OidcSettingsSchema = z.object({
  OIDC_CLIENT_SECRETS: z.union([
    z.string().min(1, "OIDC_CLIENT_SECRETS path must not be empty"),
    z.record(z.string(), z.unknown()),
  ]),

  OIDC_CLIENT_ID: z.string().min(1).optional(),

  OIDC_CLIENT_SECRET: z.string().min(1).optional(),

  OIDC_SCOPES: z
    .union([z.string(), z.array(z.string())])
    .default("openid profile email")
    .transform((value) => (Array.isArray(value) ? value.join(" ") : value.trim())),

  OIDC_USER_INFO_ENABLED: BooleanSettingSchema.default(true),

  OIDC_INTROSPECTION_AUTH_METHOD: ClientAuthMethodSchema.default("client_secret_post"),

  OIDC_CLOCK_SKEW: IntegerSettingSchema.pipe(
    z.number().nonnegative("OIDC_CLOCK_SKEW must be non-negative")
  ).default(60),

  OIDC_RESOURCE_SERVER_ONLY: BooleanSettingSchema.default(false),

  OIDC_CALLBACK_ROUTE: z
    .string()
    .startsWith("/", "OIDC_CALLBACK_ROUTE must be an absolute path")
    .default("/oidc_callback"),

  OIDC_SERVER_METADATA_URL: z.string().url("OIDC_SERVER_METADATA_URL must be a valid URL").optional(),

  OIDC_REDIRECT_URI: z.string().url("OIDC_REDIRECT_URI must be a valid URL").optional(),

  OIDC_HTTP_TIMEOUT: IntegerSettingSchema.pipe(
    z.number().positive("OIDC_HTTP_TIMEOUT must be positive")
  ).default(30),
});

/**
 * Token record stored in the session
 *
 * Unknown keys are kept so provider-specific token fields survive a round trip.
 */
export const SessionAuthTokenSchema = z
  .object({
    access_token: z.string(),
    token_type: z.string().optional(),
    refresh_token: z.string().optional(),
    id_token: z.string().optional(),
    scope: z.string().optional(),
    expires_at: z.number().int(),
  })
  .passthrough();

/**
 * User-info claims stored in the session
 */
export const UserProfileSchema = z.record(z.string(), z.unknown());

/**
 * Render zod issues as a single line
 *
 * @example "expires_at: Required; access_token: Expected string, received number"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
