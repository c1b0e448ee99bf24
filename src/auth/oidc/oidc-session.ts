/**
 * Session Authentication State
 *
 * Typed view over the OIDC fields of an express-session session: the token
 * record, user-info profile, pending login attempts and flash messages.
 * Stored values are validated on every read.
 *
 * @module auth/oidc/session
 */

import type { Session, SessionData } from "express-session";
import type { PendingLogin, SessionAuthToken, UserProfile } from "./oidc-types.js";
import { SessionAuthTokenSchema, UserProfileSchema, formatIssues } from "./oidc-validation.js";

declare module "express-session" {
  interface SessionData {
    /** Token record; validated on read */
    oidcAuthToken: unknown;

    /** User-info claims; validated on read */
    oidcAuthProfile: unknown;

    /** Login attempts waiting for their callback, keyed by state */
    oidcPendingLogins: Record<string, PendingLogin>;

    /** One-time messages for the next page */
    oidcFlashes: string[];
  }
}

/**
 * Login attempts older than this are dropped when a new one starts
 */
export const PENDING_LOGIN_TTL_SECONDS = 600;

/**
 * Session object as exposed on `req.session`
 */
export type OidcSessionData = Session & Partial<SessionData>;

function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Authentication state of one browser session
 *
 * @example
 * ```typescript
 * const state = new SessionAuthState(req.session, config.clockSkewSeconds);
 * if (state.isLoggedIn() && state.isExpired()) {
 *   res.redirect(`${paths.logout}?reason=expired`);
 * }
 * ```
 */
export class SessionAuthState {
  constructor(
    private readonly session: OidcSessionData,
    private readonly clockSkewSeconds: number
  ) {}

  /**
   * True iff a token record is stored, whatever its shape
   */
  isLoggedIn(): boolean {
    const token = this.session.oidcAuthToken;
    return token !== undefined && token !== null;
  }

  /**
   * Stored token record
   *
   * @returns null when not logged in
   * @throws TypeError if the stored record is malformed
   */
  getToken(): SessionAuthToken | null {
    const stored = this.session.oidcAuthToken;
    if (stored === undefined || stored === null) {
      return null;
    }

    const result = SessionAuthTokenSchema.safeParse(stored);
    if (!result.success) {
      throw new TypeError(`Session token is malformed: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  /**
   * Whether the stored token is expired, counting `clockSkewSeconds` early
   *
   * @param now - Unix seconds (default: current time)
   * @throws TypeError if the stored record is malformed
   */
  isExpired(now: number = nowInSeconds()): boolean {
    const token = this.getToken();
    if (token === null) {
      return false;
    }
    return now + this.clockSkewSeconds >= token.expires_at;
  }

  getAccessToken(): string | null {
    return this.getToken()?.access_token ?? null;
  }

  getRefreshToken(): string | null {
    return this.getToken()?.refresh_token ?? null;
  }

  /**
   * Stored user-info claims
   *
   * @returns null when no profile is stored
   * @throws TypeError if the stored profile is not an object
   */
  getProfile(): UserProfile | null {
    const stored = this.session.oidcAuthProfile;
    if (stored === undefined || stored === null) {
      return null;
    }

    const result = UserProfileSchema.safeParse(stored);
    if (!result.success) {
      throw new TypeError(`Session profile is malformed: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  /**
   * Record a completed login
   */
  establish(token: SessionAuthToken, profile?: UserProfile): void {
    this.session.oidcAuthToken = token;
    if (profile === undefined) {
      delete this.session.oidcAuthProfile;
    } else {
      this.session.oidcAuthProfile = profile;
    }
  }

  /**
   * Drop token and profile; safe to call when not logged in
   */
  clear(): void {
    delete this.session.oidcAuthToken;
    delete this.session.oidcAuthProfile;
  }

  addPendingLogin(state: string, attempt: PendingLogin): void {
    const cutoff = nowInSeconds() - PENDING_LOGIN_TTL_SECONDS;
    const pending: Record<string, PendingLogin> = {};

    for (const [key, value] of Object.entries(this.session.oidcPendingLogins ?? {})) {
      if (value.createdAt >= cutoff) {
        pending[key] = value;
      }
    }
    pending[state] = attempt;

    this.session.oidcPendingLogins = pending;
  }

  /**
   * Remove and return the pending attempt for `state`
   *
   * @returns null when no attempt is pending under that value
   */
  takePendingLogin(state: string): PendingLogin | null {
    const pending = this.session.oidcPendingLogins;
    if (pending === undefined || !Object.hasOwn(pending, state)) {
      return null;
    }

    const attempt = pending[state];
    delete pending[state];
    return attempt ?? null;
  }

  flash(message: string): void {
    this.session.oidcFlashes = [...(this.session.oidcFlashes ?? []), message];
  }

  /**
   * Return queued messages and empty the queue
   */
  consumeFlashes(): string[] {
    const flashes = this.session.oidcFlashes ?? [];
    delete this.session.oidcFlashes;
    return flashes;
  }
}
