/**
 * @swapledger/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth: "key:principal,key:principal". Empty = open mode
  API_KEYS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into key records.
 *
 * Format: "key1:principal1,key2:principal2"
 *
 * @throws Error on a malformed entry, an empty key or principal, or a
 * key listed twice
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, principal] = parts;
    if (parts.length !== 2 || key === undefined || principal === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:principal`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (principal === "") {
      throw new Error("Principal cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error("Duplicate API key in API_KEYS");
    }

    seen.add(key);
    keys.push({ key, principal });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
