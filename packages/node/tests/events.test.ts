/**
 * Tests for event query routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { as, createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

interface EventsBody {
  data: { streamId: string; globalPosition: number; event: { type: string } }[];
  pagination: { nextPosition: number; hasMore: boolean };
}

async function seed(): Promise<void> {
  for (const data of ["0x01", "0x02", "0x03"]) {
    await instance.app.request(
      jsonRequest("/api/v1/assets", "POST", { owner: "bob", data }, as("alice")),
    );
  }
}

describe("GET /api/v1/events", () => {
  it("returns an empty list before any change", async () => {
    const res = await instance.app.request("/api/v1/events");

    expect(await res.json()).toEqual({
      data: [],
      pagination: { nextPosition: 0, hasMore: false },
    });
  });

  it("returns committed events in global order", async () => {
    await seed();

    const res = await instance.app.request("/api/v1/events");
    const body = (await res.json()) as EventsBody;

    expect(body.data.map((e) => e.streamId)).toEqual(["asset-1", "asset-2", "asset-3"]);
    expect(body.data[0]?.event.type).toBe("registry.asset.issued");
  });

  it("pages with afterPosition and limit", async () => {
    await seed();

    const res = await instance.app.request("/api/v1/events?afterPosition=1&limit=1");
    const body = (await res.json()) as EventsBody;

    expect(body.data.map((e) => e.globalPosition)).toEqual([2]);
    expect(body.pagination).toEqual({ nextPosition: 2, hasMore: true });
  });

  it("returns 400 for a negative afterPosition", async () => {
    const res = await instance.app.request("/api/v1/events?afterPosition=-1");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/events/types", () => {
  it("lists the registered ledger events", async () => {
    const res = await instance.app.request("/api/v1/events/types");
    const body = (await res.json()) as { data: { type: string; source: string }[] };

    expect(body.data.map((t) => t.type)).toEqual([
      "exchange.offer.created",
      "exchange.offer.state_changed",
      "registry.asset.issued",
      "registry.asset.moved",
      "registry.asset.retracted",
    ]);
    expect(body.data[0]?.source).toBe("exchange");
  });
});
