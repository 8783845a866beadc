/**
 * LedgerService: Composition root for the node.
 *
 * Route handlers reach the ledger only through this service. One node
 * hosts exactly one Exchange and the catalog describing its events.
 */

import { Exchange } from "@swapledger/exchange";
import type { ExchangeOptions } from "@swapledger/exchange";
import { createLedgerCatalog } from "@swapledger/event-store";
import type { EventCatalog, StoredEvent } from "@swapledger/event-store";

// =============================================================================
// Types
// =============================================================================

export interface EventTypeInfo {
  readonly type: string;
  readonly version: number;
  readonly source: string;
  readonly description: string;
}

export interface LedgerHealth {
  readonly status: "ok" | "degraded";
  readonly assets: number;
  readonly offers: number;
  readonly eventPosition: number;
  readonly indicesConsistent: boolean;
  readonly eventLogValid: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  readonly exchange: Exchange;
  readonly catalog: EventCatalog;

  constructor(options?: ExchangeOptions) {
    this.exchange = Exchange.create(options);
    this.catalog = createLedgerCatalog();
  }

  // ─── Events ────────────────────────────────────────────────────────

  /** Committed events after `afterPosition`, oldest first. */
  readEvents(afterPosition: number, limit: number): readonly StoredEvent[] {
    return this.exchange.eventStore.readAll({
      fromPosition: afterPosition + 1,
      maxCount: limit,
    });
  }

  eventTypes(): readonly EventTypeInfo[] {
    const types: EventTypeInfo[] = [];
    for (const type of this.catalog.listTypes()) {
      const schema = this.catalog.getSchema(type);
      if (schema !== undefined) {
        types.push({
          type: schema.type,
          version: schema.version,
          source: schema.source,
          description: schema.description,
        });
      }
    }
    return types;
  }

  /** Whether a committed event's payload matches its registered schema. */
  conforms(event: StoredEvent): boolean {
    return this.catalog.validate(event.event.type, event.event.payload);
  }

  // ─── Health ────────────────────────────────────────────────────────

  health(): LedgerHealth {
    const indicesConsistent = this.exchange.auditIndices().consistent;
    const eventLogValid = this.exchange.verifyEventLog().valid;

    return {
      status: indicesConsistent && eventLogValid ? "ok" : "degraded",
      assets: this.exchange.assetCount,
      offers: this.exchange.offerCount,
      eventPosition: this.exchange.eventStore.globalPosition(),
      indicesConsistent,
      eventLogValid,
    };
  }
}
