/**
 * In-memory PendingStore for tests and throwaway coordinators.
 */

import type { PendingTransaction } from "@multicustody/types";
import type { PendingStore } from "../types.js";

export class InMemoryPendingStore implements PendingStore {
  private readonly records = new Map<string, PendingTransaction>();

  constructor(initial: readonly PendingTransaction[] = []) {
    for (const record of initial) {
      this.records.set(record.id, record);
    }
  }

  async get(id: string): Promise<PendingTransaction | undefined> {
    return this.records.get(id);
  }

  async put(record: PendingTransaction): Promise<void> {
    this.records.set(record.id, record);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async list(): Promise<readonly PendingTransaction[]> {
    return [...this.records.values()];
  }
}
