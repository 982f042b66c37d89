/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * Either way the result is a caller address. On success, sets
 * `c.set("auth", authContext)`; on failure, returns 401.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { canonicalAddress, ZERO_ADDRESS } from "@quorum-vault/types";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, ApiKeyRecord, JwtClaims } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      auth = { type: "api-key", caller: record.address };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"), 401);
        }
        auth = { type: "jwt", caller: claims.sub };
      }
    }

    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Unsecured Mode
// =============================================================================

export const CALLER_HEADER = "X-Caller-Address";

/**
 * Unsecured mode (tests, development): the caller names itself in
 * X-Caller-Address. Without the header the caller is the zero address,
 * which owns nothing.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const raw = c.req.header(CALLER_HEADER);
    let caller = ZERO_ADDRESS;
    if (raw !== undefined) {
      const address = canonicalAddress(raw);
      if (address === undefined) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", `Invalid ${CALLER_HEADER} header`),
          400,
        );
      }
      caller = address;
    }

    c.set("auth", { type: "header", caller });
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return undefined;
    }
    return value as Record<string, unknown>;
  } catch {
    return undefined;
  }
}

function sign(input: string, secret: string): string {
  return createHmac("sha256", secret).update(input).digest("base64url");
}

/**
 * Verify a JWT token using HMAC-SHA256.
 *
 * Only supports HS256 (alg: "HS256"). The `sub` claim must be an address;
 * it is returned in canonical form.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const parts = token.split(".");
  if (parts.length !== 3) {
    return undefined;
  }
  const [headerB64, payloadB64, signatureB64] = parts;
  if (headerB64 === undefined || payloadB64 === undefined || signatureB64 === undefined) {
    return undefined;
  }

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  const header = decodeSegment(headerB64);
  if (header === undefined || header["alg"] !== "HS256") {
    return undefined;
  }

  const payload = decodeSegment(payloadB64);
  if (payload === undefined) {
    return undefined;
  }
  const { sub, iss, exp, iat } = payload;
  if (typeof sub !== "string" || typeof exp !== "number" || typeof iat !== "number") {
    return undefined;
  }

  if (exp < Math.floor(Date.now() / 1000)) {
    return undefined;
  }
  if (expectedIssuer !== undefined && iss !== expectedIssuer) {
    return undefined;
  }

  const caller = canonicalAddress(sub);
  if (caller === undefined) {
    return undefined;
  }

  return { sub: caller, iss: typeof iss === "string" ? iss : "", exp, iat };
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const payload = Buffer.from(
    JSON.stringify({ ...claims, iat: claims.iat ?? Math.floor(Date.now() / 1000) }),
  ).toString("base64url");

  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}
