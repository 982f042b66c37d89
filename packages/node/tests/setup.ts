/**
 * Test helpers for @quorum-vault/node.
 *
 * Provides a test app factory that creates a Hono app with all middleware
 * and routes, but no HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export function addr(byte: string): string {
  return `0x${byte.repeat(20)}`;
}

export const OWNER_A = addr("a1");
export const OWNER_B = addr("b2");
export const OWNER_C = addr("c3");
export const OUTSIDER = addr("0e");
export const WALLET = addr("77");
export const DEST = addr("d0");

export const FIXED_TIME = new Date("2024-06-01T12:00:00.000Z");

/**
 * Create a test app around a 2-of-3 wallet (owners A, B, C) in
 * unsecured mode, with a fixed clock and no logging.
 */
export function createTestApp(overrides: Partial<CreateAppOptions> = {}): AppInstance {
  return createApp({
    wallet: { address: WALLET, owners: [OWNER_A, OWNER_B, OWNER_C], threshold: 2 },
    clock: () => FIXED_TIME,
    ...overrides,
  });
}

/** Unsecured-mode caller header. */
export function as(caller: string): Record<string, string> {
  return { "X-Caller-Address": caller };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

export interface TransactionBody {
  data: {
    id: number;
    destination: string;
    value: string;
    payload: string;
    executionDate: number;
    status: string;
    approvals: number;
  };
}
