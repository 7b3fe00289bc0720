/**
 * Event Types
 *
 * Notifications emitted by the approval wallet, in the shape the
 * event store persists.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are only published for committed state changes
 */

/**
 * Which component emitted an event.
 */
export type EventSource = "approval";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Custodian (or process) that caused this event */
  readonly actor: string;

  /** Groups events that belong to the same proposal */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A persisted domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g. "approval.submission") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload, typed by consumers */
  readonly payload: Readonly<Record<string, unknown>>;
}
