/**
 * Event query routes.
 *
 * GET  /api/v1/events        Committed ledger events in global order
 * GET  /api/v1/events/types  Registered event types
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events?afterPosition=&limit=
  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const events = c.get("service").readEvents(query.afterPosition ?? 0, query.limit);
    const last = events[events.length - 1];

    return c.json({
      data: events,
      pagination: {
        nextPosition: last?.globalPosition ?? query.afterPosition ?? 0,
        hasMore: events.length === query.limit,
      },
    });
  });

  // GET /api/v1/events/types
  routes.get("/types", (c) => {
    return c.json({ data: c.get("service").eventTypes() });
  });

  return routes;
}
