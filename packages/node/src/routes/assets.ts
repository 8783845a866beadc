/**
 * Asset routes.
 *
 * POST /api/v1/assets              Issue an asset (caller = emitter)
 * GET  /api/v1/assets/:id          Get a single asset
 * GET  /api/v1/assets/:id/history  Committed events for the asset
 * POST /api/v1/assets/:id/retract  Retract an asset (emitter only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IssueAssetSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseIdParam } from "./params.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/assets (Issue)
  routes.post("/", validateBody(IssueAssetSchema), (c) => {
    const caller = requireCaller(c.get("caller"));
    const body = c.get("validatedBody");

    const asset = c.get("service").exchange.issue(caller, body.owner, body.data);
    return c.json({ data: asset }, 201);
  });

  // GET /api/v1/assets/:id (Get one)
  routes.get("/:id", (c) => {
    const assetId = parseIdParam(c.req.param("id"), "asset");
    const asset = c.get("service").exchange.getAsset(assetId);

    if (asset === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Asset ${assetId} not found`),
        404,
      );
    }

    return c.json({ data: asset });
  });

  // GET /api/v1/assets/:id/history (kept after retraction)
  routes.get("/:id/history", (c) => {
    const assetId = parseIdParam(c.req.param("id"), "asset");
    const history = c.get("service").exchange.historyOf(assetId);

    if (history.length === 0) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Asset ${assetId} was never issued`),
        404,
      );
    }

    return c.json({ data: history });
  });

  // POST /api/v1/assets/:id/retract
  routes.post("/:id/retract", (c) => {
    const caller = requireCaller(c.get("caller"));
    const assetId = parseIdParam(c.req.param("id"), "asset");

    c.get("service").exchange.retract(caller, assetId);
    return c.json({ data: { assetId, retracted: true } });
  });

  return routes;
}
