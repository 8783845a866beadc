/**
 * @swapledger/event-store: Event Catalog.
 *
 * Registry of every domain event type the ledger emits, with:
 * - Typed event definitions (type string → payload validator)
 * - Schema versions (each event type tracks its schema version)
 * - Discovery (listing all known event types, by source)
 */

import type { EventMetadata } from "@swapledger/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "registry.asset.issued") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventMetadata["source"];

  /** Returns true if the payload matches this schema version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of all domain event types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "registry.asset.retracted",
 *   version: 1,
 *   description: "An emitter retracted one of its assets",
 *   source: "registry",
 *   validate: (p) => typeof p === "object" && p !== null && "assetId" in p,
 * });
 *
 * catalog.validate("registry.asset.retracted", { assetId: 3 }); // true
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same type and version is a no-op.
   *
   * @throws CatalogError if the type is registered with a different version
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined) {
      if (existing.version === schema.version) {
        return;
      }
      throw new CatalogError(
        `Event type "${schema.type}" is already registered at version ${existing.version}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventMetadata["source"]): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
