/**
 * HTTP Request Utility Functions
 *
 * Shared utilities for extracting information from Express requests.
 *
 * @module http/request-utils
 */

import type { Request } from "express";

/**
 * Extract source IP from request, supporting reverse proxy environments
 *
 * Handles X-Forwarded-For header parsing for requests behind proxies
 * (Docker, nginx, load balancers, etc.).
 *
 * @param req - Express request
 * @returns Client IP address or undefined if not available
 */
export function extractSourceIp(req: Request): string | undefined {
  // Trust X-Forwarded-For for reverse proxy environments (Docker, nginx)
  const forwarded = req.headers["x-forwarded-for"];
  if (forwarded) {
    // X-Forwarded-For can be comma-separated list; take first (client) IP
    const firstIp = Array.isArray(forwarded) ? forwarded[0] : forwarded.split(",")[0]?.trim();
    return firstIp;
  }
  // Fall back to direct IP
  return req.ip;
}

/**
 * Request ID supplied by a proxy or the client, if any
 */
export function extractRequestId(req: Request): string | undefined {
  const header = req.headers["x-request-id"];
  return Array.isArray(header) ? header[0] : header;
}

/**
 * Scheme and host the request was addressed to
 *
 * @example "https://app.example.com"
 */
export function requestOrigin(req: Request): string {
  return `${req.protocol}://${req.get("host") ?? req.hostname}`;
}

/**
 * Absolute URL of the current request, query string included
 */
export function requestUrl(req: Request): string {
  return `${requestOrigin(req)}${req.originalUrl}`;
}

/**
 * Absolute URL of the application root
 */
export function rootUrl(req: Request): string {
  return `${requestOrigin(req)}/`;
}

/**
 * Validate a post-login or post-logout destination
 *
 * Accepts a relative path with a single leading slash, or an absolute
 * http(s) URL on the request's own host.
 *
 * @param req - Express request
 * @param candidate - Raw `next` value (usually from the query string)
 * @returns The destination, or undefined when it must not be followed
 *
 * @example
 * ```typescript
 * safeRedirectTarget(req, "/profile");           // "/profile"
 * safeRedirectTarget(req, "//evil.example");     // undefined
 * safeRedirectTarget(req, "https://evil.example/"); // undefined
 * ```
 */
export function safeRedirectTarget(req: Request, candidate: unknown): string | undefined {
  if (typeof candidate !== "string" || candidate === "") {
    return undefined;
  }

  if (candidate.startsWith("/")) {
    return /^\/[/\\]/.test(candidate) ? undefined : candidate;
  }

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return undefined;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return undefined;
  }
  return url.host === new URL(requestOrigin(req)).host ? candidate : undefined;
}
