/**
 * @swapledger/event-store: Core types.
 *
 * The ledger's notifications are kept as an append-only log split into
 * streams, one per asset and one per offer. Every stored event carries
 * its stream version, its global position and a link in a SHA-256 hash
 * chain over the whole log.
 */

import type { DomainEvent } from "@swapledger/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A DomainEvent once it has been committed to the log.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  /** e.g. "asset-7" or "offer-3" */
  readonly streamId: string;

  /** 1-based, contiguous within the stream */
  readonly version: number;

  /** 1-based, contiguous across the whole log */
  readonly globalPosition: number;

  /** Commit time, distinct from the domain timestamp in `event.metadata` */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;

  /** Hash of the event at `globalPosition - 1`, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * The hashed fields of a StoredEvent.
 */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Writing
// =============================================================================

/**
 * Stream version a write expects to find.
 *
 * - A number: the stream is at exactly this version
 * - "no_stream": the stream has no events yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

/**
 * Events for one stream inside a multi-stream commit.
 */
export interface StreamAppend {
  readonly streamId: string;
  readonly events: readonly DomainEvent[];
  readonly expectedVersion?: ExpectedVersion | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

// =============================================================================
// Reading
// =============================================================================

export interface ReadAllOptions {
  /** First global position to return (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;

  /** Default: unlimited */
  readonly maxCount?: number | undefined;
}

/**
 * Called synchronously for every committed event, in log order.
 */
export type EventHandler = (event: StoredEvent) => void;

/**
 * Receives an error thrown by an EventHandler. Delivery to the remaining
 * handlers and events continues.
 */
export type SubscriberErrorHandler = (error: unknown, event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Store Interfaces
// =============================================================================

/**
 * Read side of the log.
 */
export interface EventLog {
  /** Events of one stream in version order. Empty if the stream doesn't exist. */
  read(streamId: string): readonly StoredEvent[];

  /** Events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribeAll(handler: EventHandler): Subscription;

  /** Version of the last event in the stream, or 0 */
  streamVersion(streamId: string): number;

  /** Position of the last event in the log, or 0 */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

/**
 * Append-only event store.
 *
 * `commit` is all-or-nothing: every expected version in the batch is
 * checked before any event is stored, and subscribers are notified only
 * after the whole batch is stored.
 */
export interface EventStore extends EventLog {
  /** @throws EventStoreError on an invalid batch or a version conflict */
  commit(batch: readonly StreamAppend[]): readonly AppendResult[];

  /** Single-stream `commit`. */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    expectedVersion?: ExpectedVersion,
  ): AppendResult;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash verified */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "NO_ACTIVE_UNIT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}

/**
 * Throw CONCURRENCY_CONFLICT unless `currentVersion` satisfies `expected`.
 */
export function checkExpectedVersion(
  streamId: string,
  currentVersion: number,
  expected: ExpectedVersion | undefined,
): void {
  if (expected === undefined || expected === "any") {
    return;
  }
  if (expected === "no_stream") {
    if (currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    return;
  }
  if (currentVersion !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
      streamId,
    );
  }
}
