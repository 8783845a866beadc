/**
 * @swapledger/registry: Internal types for the asset registry.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Asset } from "@swapledger/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for registry operations. */
export type RegistryErrorCode =
  | "UNAUTHORIZED"
  | "UNKNOWN_ASSET"
  | "INVALID_INPUT"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the asset registry.
 * Always thrown, and always before any mutation.
 */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface AssetRegistryOptions {
  /** Source of `issuedAt` timestamps. Default: the journal's clock */
  readonly clock?: (() => string) | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the registry.
 *
 * `lastAssetId` is kept separately from `assets` so that ids of
 * retracted assets are never allocated again after a restore.
 */
export interface RegistrySnapshot {
  readonly version: 1;
  readonly lastAssetId: number;
  readonly assets: readonly Asset[];
  readonly createdAt: string;
}
