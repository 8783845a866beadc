/**
 * @swapledger/event-store: Unit-of-work journal.
 *
 * Stages domain events while an operation runs and commits them to the
 * event store as one batch only after the operation returns. A thrown
 * operation discards everything it staged, so subscribers never see
 * events for a change that did not happen, and never see a change
 * half-applied.
 *
 * Expected versions are checked when an event is staged, so a conflict
 * surfaces before the operation goes on to change state. The journal
 * must be the store's only writer for that check to hold at commit.
 *
 * Units nest: an operation started inside another joins the outer unit,
 * sharing its actor and correlation ID. Only the outermost unit commits.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventMetadata, Principal } from "@swapledger/types";
import type { EventStore, ExpectedVersion, StreamAppend } from "./types.js";
import { checkExpectedVersion, EventStoreError } from "./types.js";

export interface EventJournalOptions {
  /** Source of event timestamps. Default: wall clock */
  readonly clock?: (() => string) | undefined;

  /** Source of event and correlation IDs. Default: randomUUID */
  readonly newId?: (() => string) | undefined;
}

interface Unit {
  readonly actor: Principal;
  readonly correlationId: string;
  readonly staged: StreamAppend[];
  /** Stream versions as they will be once the staged events commit */
  readonly versions: Map<string, number>;
}

export class EventJournal {
  private readonly _store: EventStore;
  private readonly _clock: () => string;
  private readonly _newId: () => string;
  private _unit: Unit | undefined;

  constructor(store: EventStore, options?: EventJournalOptions) {
    this._store = store;
    this._clock = options?.clock ?? (() => new Date().toISOString());
    this._newId = options?.newId ?? randomUUID;
  }

  get store(): EventStore {
    return this._store;
  }

  /** Current time from the journal's clock. */
  now(): string {
    return this._clock();
  }

  /** Whether an operation is currently running. */
  get inUnit(): boolean {
    return this._unit !== undefined;
  }

  /**
   * Run `operation` as one unit of work on behalf of `actor`.
   *
   * Staged events are committed in staging order, as one batch, when
   * the outermost unit returns, and dropped if it throws.
   */
  transact<T>(actor: Principal, operation: () => T): T {
    if (this._unit !== undefined) {
      return operation();
    }

    const unit: Unit = {
      actor,
      correlationId: this._newId(),
      staged: [],
      versions: new Map(),
    };
    this._unit = unit;
    let result: T;
    try {
      result = operation();
    } finally {
      this._unit = undefined;
    }

    if (unit.staged.length > 0) {
      this._store.commit(unit.staged);
    }
    return result;
  }

  /**
   * Stage an event in the current unit.
   *
   * @throws EventStoreError if no unit is running, or on a version conflict
   */
  record(
    source: EventMetadata["source"],
    streamId: string,
    type: string,
    payload: Readonly<Record<string, unknown>>,
    expectedVersion: ExpectedVersion = "any",
  ): void {
    const unit = this._unit;
    if (unit === undefined) {
      throw new EventStoreError(
        "NO_ACTIVE_UNIT",
        `Cannot record "${type}" outside a unit of work`,
        streamId,
      );
    }

    const version = unit.versions.get(streamId) ?? this._store.streamVersion(streamId);
    checkExpectedVersion(streamId, version, expectedVersion);
    unit.versions.set(streamId, version + 1);

    const event: DomainEvent = {
      type,
      metadata: {
        eventId: this._newId(),
        timestamp: this._clock(),
        actor: unit.actor,
        correlationId: unit.correlationId,
        source,
      },
      payload,
    };
    unit.staged.push({ streamId, events: [event], expectedVersion });
  }
}
