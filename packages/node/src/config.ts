/**
 * @quorum-vault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { canonicalAddress } from "@quorum-vault/types";
import type { Address } from "@quorum-vault/types";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("quorum-vault"),

  // Wallet
  WALLET_ADDRESS: z.string().min(1),
  WALLET_OWNERS: z.string().min(1),
  WALLET_THRESHOLD: z.coerce.number().int().min(1),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into key → caller records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, rawAddress] = parts;
    if (parts.length !== 2 || key === undefined || rawAddress === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    const address = canonicalAddress(rawAddress);
    if (address === undefined) {
      throw new Error(`Invalid address "${rawAddress}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, address });
  }

  return keys;
}

/**
 * Parse a comma-separated owner list (WALLET_OWNERS).
 *
 * Entries are trimmed; empty entries and malformed addresses are errors.
 * Duplicates and the zero address are left to the wallet to reject.
 */
export function parseOwnerList(raw: string): readonly Address[] {
  return raw.split(",").map((entry, index) => {
    const address = canonicalAddress(entry.trim());
    if (address === undefined) {
      throw new Error(`Invalid WALLET_OWNERS entry at index ${index}: "${entry.trim()}"`);
    }
    return address;
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
