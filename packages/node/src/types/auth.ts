/**
 * Authentication types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header, mapped to a caller address
 * 2. JWT bearer token via Authorization header, whose `sub` is the caller
 *
 * There are no roles: the wallet decides what a caller may do from the
 * owner set.
 */

import type { Address } from "@quorum-vault/types";

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 *
 * "header" is the unsecured mode, where the caller names itself.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header";
  readonly caller: Address;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  /** Caller address */
  readonly sub: Address;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
