/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Principal } from "@swapledger/types";
import type { LedgerService } from "../services/ledger-service.js";

/**
 * Hono environment type for the SwapLedger node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The node's single ledger (set by app) */
    service: LedgerService;

    /**
     * Principal making the request (set by auth middleware).
     * Undefined for anonymous reads in open mode.
     */
    caller: Principal | undefined;
  };
}
