/**
 * @multicustody/event-store: Core types.
 *
 * Append-only streams of custody notifications. One stream per wallet or
 * coordinator; events are never updated or deleted.
 *
 * Invariants:
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - Subscribers see events in append order
 */

import type { DomainEvent, ErrorKind } from "@multicustody/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A domain event plus its position in the store.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within the stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When the store persisted the event */
  readonly appendedAt: string;
}

// =============================================================================
// Append / Read
// =============================================================================

/**
 * Optimistic concurrency guard for appends.
 *
 * - number: the stream must be at exactly this version
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive start version. Default: 1 (forward) */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Inclusive start position. Default: 1 (forward) */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append events to a stream, in order, as one batch.
   *
   * @throws EventStoreError on a concurrency conflict or empty batch
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty when the stream does not exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event, or 0 for a missing stream. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 for an empty store. */
  globalPosition(): number;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "WRITE_FAILED";

const KIND_BY_CODE: Record<EventStoreErrorCode, ErrorKind> = {
  CONCURRENCY_CONFLICT: "invalid_state",
  INVALID_STREAM_ID: "validation",
  EMPTY_APPEND: "validation",
  INVALID_VERSION: "validation",
  WRITE_FAILED: "resource",
};

export class EventStoreError extends Error {
  public readonly kind: ErrorKind;

  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
    this.kind = KIND_BY_CODE[code];
  }
}
