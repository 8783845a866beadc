/**
 * Tests for trade offer routes.
 *
 * Covers: create, public listing, get, cancel, decline, accept,
 * and the status mapping of lifecycle errors.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { as, createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

function post(path: string, caller: string, body?: unknown): Promise<Response> {
  return Promise.resolve(instance.app.request(jsonRequest(path, "POST", body, as(caller))));
}

async function seedSwap(): Promise<void> {
  await post("/api/v1/assets", "alice", { owner: "alice", data: "0x01" });
  await post("/api/v1/assets", "bob", { owner: "bob", data: "0x02" });
  await post("/api/v1/offers", "alice", { recipient: "bob", myAssets: [1], theirAssets: [2] });
}

// =============================================================================
// POST /api/v1/offers (Create)
// =============================================================================

describe("POST /api/v1/offers", () => {
  it("creates a pending offer and returns 201", async () => {
    const res = await post("/api/v1/offers", "alice", {
      recipient: "bob",
      myAssets: [1],
      theirAssets: [2],
    });

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: { id: number; sender: string; state: string } };
    expect(body.data.id).toBe(1);
    expect(body.data.sender).toBe("alice");
    expect(body.data.state).toBe("pending");
  });

  it("accepts a null recipient as a public offer", async () => {
    await post("/api/v1/offers", "alice", { recipient: null, myAssets: [], theirAssets: [] });

    const res = await instance.app.request("/api/v1/offers/public");

    expect(await res.json()).toEqual({ data: [1] });
  });

  it("returns 400 when the recipient is missing", async () => {
    const res = await post("/api/v1/offers", "alice", { myAssets: [], theirAssets: [] });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 400 for non-integer asset ids", async () => {
    const res = await post("/api/v1/offers", "alice", {
      recipient: "bob",
      myAssets: [1.5],
      theirAssets: [],
    });

    expect(res.status).toBe(400);
  });
});

// =============================================================================
// GET /api/v1/offers/:id
// =============================================================================

describe("GET /api/v1/offers/:id", () => {
  it("returns 404 for an absent offer", async () => {
    const res = await instance.app.request("/api/v1/offers/3");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_FOUND");
  });
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("POST /api/v1/offers/:id/accept", () => {
  it("swaps the assets and returns the accepted offer", async () => {
    await seedSwap();

    const res = await post("/api/v1/offers/1/accept", "bob");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { state: string; settledBy: string } };
    expect(body.data.state).toBe("accepted");
    expect(body.data.settledBy).toBe("bob");
    expect(instance.service.exchange.inventoryOf("bob")).toEqual([1]);
    expect(instance.service.exchange.inventoryOf("alice")).toEqual([2]);
  });

  it("returns 409 with the mismatches when an asset has gone", async () => {
    await seedSwap();
    await post("/api/v1/assets/1/retract", "alice");

    const res = await post("/api/v1/offers/1/accept", "bob");

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("OWNERSHIP_MISMATCH");
    expect(body.error.details).toEqual({
      mismatches: [{ assetId: 1, side: "sender", expectedOwner: "alice", actualOwner: null }],
    });
    expect(instance.service.exchange.getOffer(1)?.state).toBe("pending");
    expect(instance.service.exchange.getAsset(2)?.owner).toBe("bob");
  });

  it("returns 403 for a caller who is not the recipient", async () => {
    await seedSwap();

    const res = await post("/api/v1/offers/1/accept", "carol");

    expect(res.status).toBe(403);
  });

  it("returns 409 after the sender cancels", async () => {
    await seedSwap();
    const cancel = await post("/api/v1/offers/1/cancel", "alice");
    expect(cancel.status).toBe(200);

    const res = await post("/api/v1/offers/1/accept", "bob");

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_STATE");
  });

  it("returns 401 without a caller", async () => {
    await seedSwap();

    const res = await instance.app.request(jsonRequest("/api/v1/offers/1/accept", "POST"));

    expect(res.status).toBe(401);
  });
});

describe("POST /api/v1/offers/:id/decline", () => {
  it("marks the offer declined", async () => {
    await seedSwap();

    const res = await post("/api/v1/offers/1/decline", "bob");

    const body = (await res.json()) as { data: { state: string } };
    expect(body.data.state).toBe("declined");
    expect(instance.service.exchange.getAsset(1)?.owner).toBe("alice");
  });
});
