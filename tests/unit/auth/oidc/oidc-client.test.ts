/**
 * OAuth Client Adapter Unit Tests
 *
 * openid-client is replaced by the vi.fn stand-in from the OIDC helpers.
 *
 * @module tests/unit/auth/oidc/oidc-client
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";

vi.mock("openid-client", async () => (await import("../../../helpers/oidc-mock.js")).openIdClientMock);

import {
  OpenIdClientAdapter,
  describeUpstreamError,
} from "../../../../src/auth/oidc/oidc-client.js";
import {
  OidcCodeExchangeError,
  OidcDiscoveryError,
  OidcIntrospectionError,
  OidcIntrospectionUnsupportedError,
  OidcUserInfoError,
} from "../../../../src/auth/oidc/oidc-errors.js";
import { SessionAuthTokenSchema } from "../../../../src/auth/oidc/oidc-validation.js";
import { initializeLogger, resetLogger } from "../../../../src/logging/index.js";
import {
  TEST_AUTHORIZATION_ENDPOINT,
  TEST_METADATA_URL,
  createMockConfiguration,
  createProviderMetadata,
  createTestOidcConfig,
  createTokenResponse,
  openIdClientMock,
  resetOpenIdClientMock,
} from "../../../helpers/oidc-mock.js";

const NOW = 1_700_000_000;

const CHECKS = {
  codeVerifier: "test-code-verifier",
  nonce: "test-nonce",
  redirectUri: "http://localhost/authorize",
};

describe("OpenIdClientAdapter", () => {
  beforeAll(() => {
    initializeLogger({ level: "silent", format: "json" });
  });

  afterAll(() => {
    resetLogger();
  });

  beforeEach(() => {
    resetOpenIdClientMock();
  });

  describe("discovery", () => {
    it("should discover once with the configured client authentication", async () => {
      const configuration = createMockConfiguration();
      openIdClientMock.discovery.mockResolvedValue(configuration);
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await adapter.createAuthorizationRequest("http://localhost/authorize");
      await adapter.introspectToken("token");

      expect(openIdClientMock.discovery).toHaveBeenCalledTimes(1);
      expect(openIdClientMock.discovery).toHaveBeenCalledWith(
        new URL(TEST_METADATA_URL),
        "test-client",
        undefined,
        { method: "client_secret_post", secret: "test-secret" },
        { timeout: 30 }
      );
      expect(configuration.timeout).toBe(30);
    });

    it("should share one discovery between concurrent callers", async () => {
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await Promise.all([adapter.introspectToken("a"), adapter.introspectToken("b")]);

      expect(openIdClientMock.discovery).toHaveBeenCalledTimes(1);
    });

    it("should use the configured introspection auth method", async () => {
      const adapter = new OpenIdClientAdapter(
        createTestOidcConfig({ introspectionAuthMethod: "client_secret_basic" })
      );

      await adapter.introspectToken("token");

      expect(openIdClientMock.ClientSecretBasic).toHaveBeenCalledWith("test-secret");
      expect(openIdClientMock.ClientSecretPost).not.toHaveBeenCalled();
    });

    it("should allow plain http for a local provider", async () => {
      const adapter = new OpenIdClientAdapter(
        createTestOidcConfig({
          serverMetadataUrl: "http://localhost:8080/.well-known/openid-configuration",
        })
      );

      await adapter.introspectToken("token");

      expect(openIdClientMock.discovery.mock.calls[0]?.[4]).toEqual({
        timeout: 30,
        execute: [openIdClientMock.allowInsecureRequests],
      });
    });

    it("should wrap failures in OidcDiscoveryError and retry on the next call", async () => {
      openIdClientMock.discovery.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await expect(adapter.introspectToken("token")).rejects.toThrow(OidcDiscoveryError);
      await expect(adapter.introspectToken("token")).resolves.toEqual({
        active: true,
        scope: "openid",
      });
      expect(openIdClientMock.discovery).toHaveBeenCalledTimes(2);
    });
  });

  describe("createAuthorizationRequest", () => {
    it("should build a PKCE and nonce protected authorization URL", async () => {
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const request = await adapter.createAuthorizationRequest("http://localhost/authorize");

      const url = new URL(request.url);
      expect(`${url.origin}${url.pathname}`).toBe(TEST_AUTHORIZATION_ENDPOINT);
      expect(url.searchParams.get("redirect_uri")).toBe("http://localhost/authorize");
      expect(url.searchParams.get("scope")).toBe("openid profile email");
      expect(url.searchParams.get("state")).toBe("state-1");
      expect(url.searchParams.get("nonce")).toBe("test-nonce");
      expect(url.searchParams.get("code_challenge")).toBe("test-code-challenge");
      expect(url.searchParams.get("code_challenge_method")).toBe("S256");
      expect(openIdClientMock.calculatePKCECodeChallenge).toHaveBeenCalledWith(
        "test-code-verifier"
      );
    });

    it("should return the values to keep for the callback", async () => {
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const request = await adapter.createAuthorizationRequest("http://localhost/authorize");

      expect(request.state).toBe("state-1");
      expect(request.checks).toEqual(CHECKS);
    });

    it("should use a fresh state per request", async () => {
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const first = await adapter.createAuthorizationRequest("http://localhost/authorize");
      const second = await adapter.createAuthorizationRequest("http://localhost/authorize");

      expect(first.state).toBe("state-1");
      expect(second.state).toBe("state-2");
    });
  });

  describe("exchangeCode", () => {
    const callbackUrl = new URL("http://localhost/authorize?state=state-1&code=test-code");

    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW * 1000);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should validate state, nonce and PKCE in the grant", async () => {
      const configuration = createMockConfiguration();
      openIdClientMock.discovery.mockResolvedValue(configuration);
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      expect(openIdClientMock.authorizationCodeGrant).toHaveBeenCalledWith(
        configuration,
        callbackUrl,
        {
          pkceCodeVerifier: "test-code-verifier",
          expectedState: "state-1",
          expectedNonce: "test-nonce",
          idTokenExpected: true,
        }
      );
    });

    it("should build the session token record", async () => {
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const result = await adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      expect(result).toEqual({
        token: {
          access_token: "test-access-token",
          token_type: "bearer",
          refresh_token: "test-refresh-token",
          id_token: "test-id-token",
          scope: "openid profile email",
          expires_at: NOW + 3600,
        },
        subject: "user-123",
      });
    });

    it("should fall back to the ID token expiry", async () => {
      openIdClientMock.authorizationCodeGrant.mockResolvedValue(
        createTokenResponse({ expires_in: undefined })
      );
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const { token } = await adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      expect(token.expires_at).toBe(1_700_000_600);
    });

    it("should truncate a fractional lifetime to whole seconds", async () => {
      openIdClientMock.authorizationCodeGrant.mockResolvedValue(
        createTokenResponse({ expires_in: 3599.5 })
      );
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const { token } = await adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      expect(token.expires_at).toBe(NOW + 3599);
      expect(SessionAuthTokenSchema.safeParse(token).success).toBe(true);
    });

    it("should truncate a fractional ID token expiry", async () => {
      openIdClientMock.authorizationCodeGrant.mockResolvedValue(
        createTokenResponse({ expires_in: undefined }, { exp: 1_700_000_600.75 })
      );
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const { token } = await adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      expect(token.expires_at).toBe(1_700_000_600);
    });

    it("should assume one hour without any expiry information", async () => {
      openIdClientMock.authorizationCodeGrant.mockResolvedValue(
        createTokenResponse({ expires_in: undefined }, null)
      );
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const result = await adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      expect(result.token.expires_at).toBe(NOW + 3600);
      expect(result).not.toHaveProperty("subject");
    });

    it("should leave out absent optional fields", async () => {
      openIdClientMock.authorizationCodeGrant.mockResolvedValue(
        createTokenResponse({ refresh_token: undefined, scope: undefined })
      );
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const { token } = await adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      expect(token).not.toHaveProperty("refresh_token");
      expect(token).not.toHaveProperty("scope");
    });

    it("should report the provider error in OidcCodeExchangeError", async () => {
      openIdClientMock.authorizationCodeGrant.mockRejectedValue(
        Object.assign(new Error("server responded with an error"), {
          error: "invalid_grant",
          error_description: "Code not valid",
        })
      );
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const failure = adapter.exchangeCode(callbackUrl, "state-1", CHECKS);

      await expect(failure).rejects.toThrow(OidcCodeExchangeError);
      await expect(failure).rejects.toThrow("invalid_grant: Code not valid");
    });
  });

  describe("fetchUserInfo", () => {
    it("should check the subject when one is known", async () => {
      const configuration = createMockConfiguration();
      openIdClientMock.discovery.mockResolvedValue(configuration);
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const profile = await adapter.fetchUserInfo("test-access-token", "user-123");

      expect(profile).toEqual({ sub: "user-123", nickname: "dummy" });
      expect(openIdClientMock.fetchUserInfo).toHaveBeenCalledWith(
        configuration,
        "test-access-token",
        "user-123"
      );
    });

    it("should skip the subject check without a subject", async () => {
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await adapter.fetchUserInfo("test-access-token");

      expect(openIdClientMock.fetchUserInfo.mock.calls[0]?.[2]).toBe(
        openIdClientMock.skipSubjectCheck
      );
    });

    it("should wrap failures in OidcUserInfoError", async () => {
      openIdClientMock.fetchUserInfo.mockRejectedValue(new Error("unexpected HTTP status 500"));
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const failure = adapter.fetchUserInfo("test-access-token");

      await expect(failure).rejects.toThrow(OidcUserInfoError);
      await expect(failure).rejects.toThrow(
        "Failed to fetch OIDC user info: unexpected HTTP status 500"
      );
    });
  });

  describe("introspectToken", () => {
    it("should return the introspection response", async () => {
      openIdClientMock.tokenIntrospection.mockResolvedValue({
        active: true,
        scope: "openid profile",
        sub: "user-123",
      });
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await expect(adapter.introspectToken("token")).resolves.toEqual({
        active: true,
        scope: "openid profile",
        sub: "user-123",
      });
      expect(openIdClientMock.tokenIntrospection.mock.calls[0]?.[1]).toBe("token");
    });

    it("should treat anything but active=true as inactive", async () => {
      openIdClientMock.tokenIntrospection.mockResolvedValue({ active: "true" });
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await expect(adapter.introspectToken("token")).resolves.toEqual({ active: false });
    });

    it("should refuse when the provider has no introspection endpoint", async () => {
      openIdClientMock.discovery.mockResolvedValue(
        createMockConfiguration(createProviderMetadata({ introspection_endpoint: undefined }))
      );
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      await expect(adapter.introspectToken("token")).rejects.toThrow(
        OidcIntrospectionUnsupportedError
      );
      expect(openIdClientMock.tokenIntrospection).not.toHaveBeenCalled();
    });

    it("should wrap transport failures in OidcIntrospectionError", async () => {
      openIdClientMock.tokenIntrospection.mockRejectedValue(new Error("request timed out"));
      const adapter = new OpenIdClientAdapter(createTestOidcConfig());

      const failure = adapter.introspectToken("token");

      await expect(failure).rejects.toThrow(OidcIntrospectionError);
      await expect(failure).rejects.toThrow("Token introspection failed: request timed out");
    });
  });
});

describe("describeUpstreamError", () => {
  it("should prefer the OAuth error body", () => {
    expect(describeUpstreamError({ error: "invalid_client", error_description: "Bad secret" })).toBe(
      "invalid_client: Bad secret"
    );
  });

  it("should use the error code alone without a description", () => {
    expect(describeUpstreamError({ error: "invalid_client", error_description: "" })).toBe(
      "invalid_client"
    );
  });

  it("should fall back to the error message", () => {
    expect(describeUpstreamError(new Error("boom"))).toBe("boom");
  });

  it("should stringify anything else", () => {
    expect(describeUpstreamError("boom")).toBe("boom");
  });
});
