/**
 * Governance routes.
 *
 * Privileged actions are proposed as transactions from the wallet to
 * itself and run through the quorum like any other transaction.
 *
 * POST /api/v1/governance/owner-updates — propose replacing owners and threshold
 * POST /api/v1/governance/declines      — propose declining a pending transaction
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ProposeDeclineSchema, ProposeOwnerUpdateSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createGovernanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/owner-updates", validateBody(ProposeOwnerUpdateSchema), (c) => {
    const body = c.get("validatedBody");
    const tx = c
      .get("service")
      .proposeSelfCall(
        c.get("auth").caller,
        { kind: "update_owners", owners: body.owners, threshold: body.threshold },
        body.approve,
      );
    return c.json({ data: tx }, 201);
  });

  routes.post("/declines", validateBody(ProposeDeclineSchema), (c) => {
    const body = c.get("validatedBody");
    const tx = c
      .get("service")
      .proposeSelfCall(
        c.get("auth").caller,
        { kind: "decline", transactionId: body.transactionId },
        body.approve,
      );
    return c.json({ data: tx }, 201);
  });

  return routes;
}
