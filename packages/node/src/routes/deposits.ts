/**
 * Deposits.
 *
 * POST /api/v1/deposits — credit the wallet; the caller is the sender
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createDepositRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const { caller } = c.get("auth");
    const body = c.get("validatedBody");

    service.deposit(caller, body.value);
    return c.json(
      { data: { from: caller, value: body.value, balance: service.summary().balance } },
      201,
    );
  });

  return routes;
}
