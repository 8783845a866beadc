/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (RegistryError, ExchangeError, ApiError)
 * to HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ExchangeError } from "@swapledger/exchange";
import { createErrorEnvelope } from "../types/error.js";
import { ApiError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Caller identity
  AUTHENTICATION_REQUIRED: 401,
  UNAUTHORIZED: 403,

  // Request shape
  VALIDATION_ERROR: 400,
  INVALID_INPUT: 400,
  NOT_FOUND: 404,

  // Offer lifecycle
  INVALID_STATE: 409,
  OWNERSHIP_MISMATCH: 409,

  // Event store
  CONCURRENCY_CONFLICT: 409,

  // Internal faults, answered as a generic 500
  UNKNOWN_ASSET: 500,
  INVALID_SNAPSHOT: 500,
  NO_ACTIVE_UNIT: 500,
  EMPTY_APPEND: 500,
  INVALID_STREAM_ID: 500,
};

function getErrorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function getDetails(error: Error): Record<string, unknown> | undefined {
  if (error instanceof ExchangeError && error.mismatches.length > 0) {
    return { mismatches: error.mismatches };
  }
  if (error instanceof ApiError) {
    return error.details;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = getErrorCode(err);
  const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, getDetails(err)), status);
}
