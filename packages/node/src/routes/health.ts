/**
 * Health check route.
 *
 * GET  /health  Ledger counters plus index and hash-chain checks.
 * Answers 503 when either check fails.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

export function createHealthRoutes(service: LedgerService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const health = service.health();
    return c.json(
      { ...health, timestamp: new Date().toISOString() },
      health.status === "ok" ? 200 : 503,
    );
  });

  return routes;
}
