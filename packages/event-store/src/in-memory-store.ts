/**
 * @swapledger/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous dispatch, after the whole batch is stored
 */

import type { DomainEvent } from "@swapledger/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  StoredEvent,
  StreamAppend,
  SubscriberErrorHandler,
  Subscription,
} from "./types.js";
import { checkExpectedVersion, EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: wall clock */
  readonly clock?: (() => string) | undefined;

  /**
   * Receives errors thrown by subscribers. Default: re-raised as a
   * process warning.
   */
  readonly onSubscriberError?: SubscriberErrorHandler | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _clock: () => string;
  private readonly _onSubscriberError: SubscriberErrorHandler;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? (() => new Date().toISOString());
    this._onSubscriberError = options?.onSubscriberError ?? warnSubscriberError;
  }

  // ─── Write ──────────────────────────────────────────────────────────

  commit(batch: readonly StreamAppend[]): readonly AppendResult[] {
    this._checkBatch(batch);

    const appendedAt = this._clock();
    const stored: StoredEvent[] = [];
    const results = batch.map((entry): AppendResult => {
      const stream = this._streams.get(entry.streamId) ?? [];
      this._streams.set(entry.streamId, stream);
      const fromVersion = stream.length + 1;

      for (const event of entry.events) {
        const record = this._link(event, entry.streamId, stream.length + 1, appendedAt);
        stream.push(record);
        this._globalLog.push(record);
        stored.push(record);
      }

      return {
        streamId: entry.streamId,
        fromVersion,
        toVersion: stream.length,
        count: entry.events.length,
      };
    });

    this._dispatch(stored);
    return results;
  }

  append(
    streamId: string,
    events: readonly DomainEvent[],
    expectedVersion?: ExpectedVersion,
  ): AppendResult {
    const [result] = this.commit([{ streamId, events, expectedVersion }]);
    if (result === undefined) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    return result;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly StoredEvent[] {
    return [...(this._streams.get(streamId) ?? [])];
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const start = Math.max((options?.fromPosition ?? 1) - 1, 0);
    const maxCount = options?.maxCount;
    const end = maxCount !== undefined && maxCount >= 0 ? start + maxCount : undefined;
    return this._globalLog.slice(start, end);
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Validate a whole batch against the current versions, counting the
   * batch's own earlier entries for the same stream.
   */
  private _checkBatch(batch: readonly StreamAppend[]): void {
    if (batch.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot commit an empty batch");
    }

    const pending = new Map<string, number>();
    for (const entry of batch) {
      if (entry.streamId.length === 0) {
        throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
      }
      if (entry.events.length === 0) {
        throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", entry.streamId);
      }

      const version = pending.get(entry.streamId) ?? this.streamVersion(entry.streamId);
      checkExpectedVersion(entry.streamId, version, entry.expectedVersion);
      pending.set(entry.streamId, version + entry.events.length);
    }
  }

  private _link(
    event: DomainEvent,
    streamId: string,
    version: number,
    appendedAt: string,
  ): StoredEvent {
    const base = {
      event,
      streamId,
      version,
      globalPosition: this._globalLog.length + 1,
      appendedAt,
    };
    const previousHash = this._lastHash;
    const record: StoredEvent = {
      ...base,
      hash: computeEventHash(base, previousHash),
      previousHash,
    };
    this._lastHash = record.hash;
    return record;
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    const handlers = [...this._subscribers];
    for (const event of events) {
      for (const handler of handlers) {
        try {
          handler(event);
        } catch (error) {
          this._onSubscriberError(error, event);
        }
      }
    }
  }
}

function warnSubscriberError(error: unknown, event: StoredEvent): void {
  const cause = error instanceof Error ? error.message : String(error);
  process.emitWarning(
    `Subscriber failed on "${event.event.type}" at position ${event.globalPosition}: ${cause}`,
    "SubscriberError",
  );
}
