/**
 * @swapledger/registry: Asset registry with emitter-gated retraction.
 *
 * - Any principal may issue; the issuer is recorded as the emitter
 * - Only the emitter may retract, and retraction deletes the record
 * - Ownership moves only through the internal transfer primitive
 * - Asset ids strictly increase and are never reused
 * - The per-principal inventory index moves in lockstep with the table
 */

export { AssetRegistry } from "./registry.js";
export { InventoryIndex } from "./inventory.js";

export type {
  RegistryErrorCode,
  AssetRegistryOptions,
  RegistrySnapshot,
} from "./types.js";
export { RegistryError } from "./types.js";
