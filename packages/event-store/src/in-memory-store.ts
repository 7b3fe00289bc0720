/**
 * @multicustody/event-store: In-memory EventStore implementation.
 *
 * Suitable for tests, demos and short-lived processes. All state is lost on
 * process exit.
 */

import { IndexedEventStore } from "./base-store.js";
import type { StoredEvent } from "./types.js";

export class InMemoryEventStore extends IndexedEventStore {
  protected persist(_batch: readonly StoredEvent[]): void {
    // Nothing to write: the index is the store.
  }
}
