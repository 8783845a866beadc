/**
 * Caller resolution middleware.
 *
 * Two modes:
 * 1. Secured: X-Api-Key header → principal from the configured key map.
 *    Missing or unknown keys are rejected with 401.
 * 2. Open: X-Principal header names the caller. Anonymous requests pass
 *    through; handlers that mutate call `callerOf` to demand a caller.
 *
 * On success, sets `c.set("caller", principal)`.
 */

import type { MiddlewareHandler } from "hono";
import type { Principal } from "@swapledger/types";
import type { AppEnv } from "../types/api-contract.js";
import { API_KEY_HEADER, PRINCIPAL_HEADER } from "../types/auth.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Secured mode. Every request must carry a known X-Api-Key.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("AUTHENTICATION_REQUIRED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("AUTHENTICATION_REQUIRED", "Invalid API key"),
        401,
      );
    }

    c.set("caller", record.principal);
    return next();
  };
}

/**
 * Open mode. Trusts X-Principal; an empty header counts as absent.
 */
export function principalHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const principal = c.req.header(PRINCIPAL_HEADER);
    c.set("caller", principal !== undefined && principal !== "" ? principal : undefined);
    return next();
  };
}

// =============================================================================
// Caller Guard
// =============================================================================

/**
 * The resolved caller of a state-changing request.
 *
 * @throws ApiError AUTHENTICATION_REQUIRED when the request is anonymous
 */
export function requireCaller(caller: Principal | undefined): Principal {
  if (caller === undefined) {
    throw new ApiError(
      "AUTHENTICATION_REQUIRED",
      `Identify the caller with the ${PRINCIPAL_HEADER} or ${API_KEY_HEADER} header`,
    );
  }
  return caller;
}
