/**
 * Authentication Middleware Type Definitions
 *
 * Extends Express Request with the introspection result of an accepted
 * bearer token.
 *
 * @module auth/middleware-types
 */

import type { Request, Response, NextFunction } from "express";
import type { IntrospectionResult } from "./oidc/oidc-types.js";

/**
 * Extend Express Request with the introspected token
 * Using module augmentation (ES2015 module syntax) instead of namespace
 */
declare module "express-serve-static-core" {
  interface Request {
    /** Introspection result (only present after acceptToken succeeds) */
    oidcTokenInfo?: IntrospectionResult;
  }
}

/**
 * Authentication middleware function type
 */
export type AuthMiddleware = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Options for the bearer token guard
 */
export interface AcceptTokenOptions {
  /** Scopes the token must all carry (default: none) */
  scopes?: readonly string[];
}
