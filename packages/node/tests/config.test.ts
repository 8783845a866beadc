/**
 * Tests for config.ts: parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated entries", () => {
    expect(parseApiKeys("k1:alice, k2:bob ")).toEqual([
      { key: "k1", principal: "alice" },
      { key: "k2", principal: "bob" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or principal", () => {
    expect(() => parseApiKeys(":alice")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow("Principal cannot be empty");
  });

  it("throws on a duplicate key", () => {
    expect(() => parseApiKeys("k1:alice,k1:bob")).toThrow("Duplicate API key");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_KEYS: "",
    });
  });

  it("coerces PORT from a string", () => {
    expect(loadConfig({ PORT: "8080" }).PORT).toBe(8080);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow();
  });
});
