/**
 * @multicustody/event-store: Shared stream index.
 *
 * Both store implementations keep the same in-memory index:
 * - per-stream arrays for stream reads
 * - one global array for readAll and global subscriptions
 *
 * Subclasses decide where a batch goes before it is indexed by overriding
 * `persist`. A batch that fails to persist is never indexed or dispatched.
 */

import type { DomainEvent } from "@multicustody/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

export abstract class IndexedEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private _lastGlobalPosition = 0;

  /** Durably record a batch. Throwing aborts the append. */
  protected abstract persist(batch: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);

    const appendedAt = new Date().toISOString();
    const batch: StoredEvent[] = events.map((event, i) => ({
      event,
      streamId,
      version: currentVersion + 1 + i,
      globalPosition: this._lastGlobalPosition + 1 + i,
      appendedAt,
    }));

    this.persist(batch);
    for (const stored of batch) {
      this.index(stored);
    }
    this._dispatch(streamId, batch);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + events.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion;
    if (fromVersion !== undefined && fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    return window(stream, (e) => e.version, fromVersion, options?.direction, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    return window(
      this._globalLog,
      (e) => e.globalPosition,
      options?.fromPosition,
      options?.direction,
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._lastGlobalPosition;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Add an already-persisted event to the index (also used on load). */
  protected index(stored: StoredEvent): void {
    let stream = this._streams.get(stored.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(stored.streamId, stream);
    }
    stream.push(stored);
    this._globalLog.push(stored);

    if (stored.globalPosition > this._lastGlobalPosition) {
      this._lastGlobalPosition = stored.globalPosition;
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }

    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
          streamId,
        );
      }
      return;
    }

    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expected)}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, batch: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    for (const event of batch) {
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) handler(event);
      }
      for (const handler of this._globalSubscribers) handler(event);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function validateStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

/**
 * Slice an ordered log. Forward reads start at `from` (default: first) and
 * go up; backward reads start at `from` (default: last) and go down.
 */
function window(
  log: readonly StoredEvent[],
  positionOf: (e: StoredEvent) => number,
  from: number | undefined,
  direction: ReadOptions["direction"],
  maxCount: number | undefined,
): StoredEvent[] {
  const result = direction === "backward"
    ? log.filter((e) => from === undefined || positionOf(e) <= from).reverse()
    : log.filter((e) => positionOf(e) >= (from ?? 1));

  return maxCount !== undefined && maxCount >= 0 ? result.slice(0, maxCount) : result;
}
