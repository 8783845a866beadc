/**
 * Caller identity types.
 *
 * The node resolves every request to a principal, or to no one:
 * 1. Secured mode: X-Api-Key header looked up in the configured keys
 * 2. Open mode: X-Principal header taken as given
 */

import type { Principal } from "@swapledger/types";

export const API_KEY_HEADER = "X-Api-Key";
export const PRINCIPAL_HEADER = "X-Principal";

export type AuthMode = "api-key" | "open";

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly principal: Principal;
}
