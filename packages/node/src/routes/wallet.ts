/**
 * Wallet overview.
 *
 * GET /api/v1/wallet — address, owners, threshold, counts and balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").summary() });
  });

  return routes;
}
