/**
 * Trade offer routes.
 *
 * POST /api/v1/offers              Send an offer (recipient null = public)
 * GET  /api/v1/offers/public       Ids of public offers
 * GET  /api/v1/offers/:id          Get a single offer
 * POST /api/v1/offers/:id/cancel   Withdraw (sender only)
 * POST /api/v1/offers/:id/decline  Refuse (recipient only)
 * POST /api/v1/offers/:id/accept   Accept and settle (recipient only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateOfferSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseIdParam } from "./params.js";

export function createOfferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/offers (Create)
  routes.post("/", validateBody(CreateOfferSchema), (c) => {
    const caller = requireCaller(c.get("caller"));
    const body = c.get("validatedBody");

    const offer = c
      .get("service")
      .exchange.createOffer(caller, body.recipient, body.myAssets, body.theirAssets);
    return c.json({ data: offer }, 201);
  });

  // GET /api/v1/offers/public
  routes.get("/public", (c) => {
    return c.json({ data: c.get("service").exchange.publicOffers() });
  });

  // GET /api/v1/offers/:id (Get one)
  routes.get("/:id", (c) => {
    const offerId = parseIdParam(c.req.param("id"), "offer");
    const offer = c.get("service").exchange.getOffer(offerId);

    if (offer === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Offer ${offerId} not found`),
        404,
      );
    }

    return c.json({ data: offer });
  });

  // POST /api/v1/offers/:id/cancel
  routes.post("/:id/cancel", (c) => {
    const caller = requireCaller(c.get("caller"));
    const offerId = parseIdParam(c.req.param("id"), "offer");

    return c.json({ data: c.get("service").exchange.cancelOffer(caller, offerId) });
  });

  // POST /api/v1/offers/:id/decline
  routes.post("/:id/decline", (c) => {
    const caller = requireCaller(c.get("caller"));
    const offerId = parseIdParam(c.req.param("id"), "offer");

    return c.json({ data: c.get("service").exchange.declineOffer(caller, offerId) });
  });

  // POST /api/v1/offers/:id/accept
  routes.post("/:id/accept", (c) => {
    const caller = requireCaller(c.get("caller"));
    const offerId = parseIdParam(c.req.param("id"), "offer");

    return c.json({ data: c.get("service").exchange.acceptOffer(caller, offerId) });
  });

  return routes;
}
