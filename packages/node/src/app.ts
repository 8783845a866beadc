/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. main.ts serves it;
 * tests call it directly without starting the HTTP server.
 */

import { Hono } from "hono";
import type { ExchangeOptions } from "@swapledger/exchange";
import type { AppEnv } from "./types/api-contract.js";
import { LedgerService } from "./services/ledger-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, principalHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAssetRoutes } from "./routes/assets.js";
import { createOfferRoutes } from "./routes/offers.js";
import { createPrincipalRoutes } from "./routes/principals.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, API keys are required. */
  readonly auth?: AuthConfig | undefined;
  /** Clock and id sources for the hosted exchange */
  readonly ledger?: ExchangeOptions | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = new LedgerService(options.ledger);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Open mode (tests, dev): X-Principal header names the caller
    app.use("/api/*", principalHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/assets", createAssetRoutes());
  app.route("/api/v1/offers", createOfferRoutes());
  app.route("/api/v1/principals", createPrincipalRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
