/**
 * Per-principal views.
 *
 * GET  /api/v1/principals/:principal/inventory  Owned asset ids
 * GET  /api/v1/principals/:principal/offers     Sent, received and pending offer ids
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createPrincipalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:principal/inventory", (c) => {
    const principal = c.req.param("principal");
    const assetIds = c.get("service").exchange.inventoryOf(principal);

    return c.json({ data: { principal, assetIds, count: assetIds.length } });
  });

  routes.get("/:principal/offers", (c) => {
    const principal = c.req.param("principal");
    const exchange = c.get("service").exchange;

    return c.json({
      data: {
        principal,
        sent: exchange.sentBy(principal),
        received: exchange.receivedBy(principal),
        pending: exchange.pendingFor(principal),
      },
    });
  });

  return routes;
}
