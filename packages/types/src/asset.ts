/**
 * Asset Types
 *
 * An asset is an opaque record issued by an emitter and held by an owner.
 * The emitter attests the asset; the owner holds it. They need not be
 * the same principal.
 *
 * Rules:
 * - Asset ids are strictly increasing and never reused
 * - emitter and data are immutable after issuance
 * - A retracted asset has no record at all (absent, not zeroed)
 */

/**
 * Opaque identifier of a ledger participant.
 * The ledger never authenticates principals; it only compares them.
 */
export type Principal = string;

/** Positive integer, allocated from 1 upwards. */
export type AssetId = number;

/**
 * Opaque asset data as lowercase hex with a `0x` prefix.
 * `"0x"` is the empty byte sequence.
 */
export type HexData = string;

/**
 * An issued asset as recorded in the registry.
 */
export interface Asset {
  readonly id: AssetId;
  readonly owner: Principal;
  readonly emitter: Principal;
  readonly data: HexData;

  /** ISO 8601 timestamp of issuance */
  readonly issuedAt: string;
}
