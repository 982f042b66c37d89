/**
 * Transaction lifecycle routes.
 *
 * POST /api/v1/transactions                           — Propose (optionally approve)
 * GET  /api/v1/transactions                           — List a range (?start&limit)
 * GET  /api/v1/transactions/:id                       — Get one
 * GET  /api/v1/transactions/:id/approvals             — Approval count and approvers
 * POST /api/v1/transactions/:id/approve               — Approve
 * POST /api/v1/transactions/:id/revoke                — Revoke approval
 * POST /api/v1/transactions/:id/execute               — Execute
 * POST /api/v1/transactions/:id/approve-and-execute   — Approve, then execute
 *
 * The acting owner is the authenticated caller.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { TransactionId } from "@quorum-vault/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListTransactionsQuerySchema,
  ProposeTransactionSchema,
  TransactionIdParamSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";
import type { TransactionView, WalletService } from "../services/wallet-service.js";

type Action = (service: WalletService, caller: string, id: TransactionId) => TransactionView;

const ACTIONS: ReadonlyMap<string, Action> = new Map<string, Action>([
  ["approve", (service, caller, id) => service.approve(caller, id)],
  ["revoke", (service, caller, id) => service.revoke(caller, id)],
  ["execute", (service, caller, id) => service.execute(caller, id)],
  ["approve-and-execute", (service, caller, id) => service.approveAndExecute(caller, id)],
]);

function parseId(c: Context<AppEnv>): TransactionId | Response {
  const parsed = TransactionIdParamSchema.safeParse(c.req.param("id"));
  if (!parsed.success) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Invalid transaction id", {
        issues: formatZodErrors(parsed.error),
      }),
      400,
    );
  }
  return parsed.data;
}

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/transactions — Propose
  routes.post("/", validateBody(ProposeTransactionSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const tx = service.propose(c.get("auth").caller, body);
    return c.json({ data: tx }, 201);
  });

  // GET /api/v1/transactions — Range listing
  routes.get("/", (c) => {
    const service = c.get("service");
    const query = ListTransactionsQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }

    const { start, limit } = query.data;
    return c.json({
      data: service.listTransactions(start, limit),
      pagination: { start, limit, total: service.summary().transactionCount },
    });
  });

  // GET /api/v1/transactions/:id
  routes.get("/:id", (c) => {
    const id = parseId(c);
    if (id instanceof Response) {
      return id;
    }
    return c.json({ data: c.get("service").getTransaction(id) });
  });

  // GET /api/v1/transactions/:id/approvals
  routes.get("/:id/approvals", (c) => {
    const id = parseId(c);
    if (id instanceof Response) {
      return id;
    }
    return c.json({ data: c.get("service").approvals(id) });
  });

  // POST /api/v1/transactions/:id/:action
  routes.post("/:id/:action", (c) => {
    const action = ACTIONS.get(c.req.param("action"));
    if (action === undefined) {
      return c.notFound();
    }
    const id = parseId(c);
    if (id instanceof Response) {
      return id;
    }

    const tx = action(c.get("service"), c.get("auth").caller, id);
    return c.json({ data: tx });
  });

  return routes;
}
