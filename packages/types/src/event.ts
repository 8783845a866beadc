/**
 * Event Types
 *
 * Every committed state change in the ledger is published as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Events are appended only after the change they describe is committed
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Principal whose call caused this event */
  readonly actor: string;

  /** ID shared by every event produced by the same operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "registry" | "exchange";
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "registry.asset.issued") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
