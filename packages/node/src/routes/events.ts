/**
 * Notification log routes.
 *
 * GET /api/v1/events            — Read the log from a global position
 * GET /api/v1/events/integrity  — Verify the hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { fromPosition, limit } = queryResult.data;
    const events = service.readEvents({ fromPosition, maxCount: limit });
    const last = events.at(-1);

    return c.json({
      data: events,
      pagination: {
        fromPosition,
        limit,
        nextPosition: last !== undefined ? last.globalPosition + 1 : fromPosition,
      },
    });
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyEvents() });
  });

  return routes;
}
