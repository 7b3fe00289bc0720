/**
 * @multicustody/event-store: File-based JSONL EventStore implementation.
 *
 * One JSON object per line, shaped like StoredEvent:
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"..."}
 *
 * Crash safety:
 * - Each append is written as a single batch and fsynced before it is indexed
 * - Torn or malformed lines are skipped on load
 * - The file is never truncated or rewritten
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent, isRecord } from "@multicustody/types";
import { IndexedEventStore } from "./base-store.js";
import type { StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";

export interface JsonlEventStoreOptions {
  /** Path to the JSONL file; parent directories are created */
  readonly filePath: string;
}

export class JsonlEventStore extends IndexedEventStore {
  private readonly _filePath: string;

  constructor(options: JsonlEventStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._load();
  }

  get filePath(): string {
    return this._filePath;
  }

  protected persist(batch: readonly StoredEvent[]): void {
    const data = batch.map((stored) => JSON.stringify(stored)).join("\n") + "\n";

    try {
      const fd = openSync(this._filePath, "a");
      try {
        appendFileSync(fd, data, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
    } catch (err) {
      throw new EventStoreError(
        "WRITE_FAILED",
        `Failed to append to ${this._filePath}: ${err instanceof Error ? err.message : String(err)}`,
        batch[0]?.streamId,
      );
    }
  }

  private _load(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    for (const line of content.split("\n")) {
      const stored = parseLine(line);
      if (stored !== undefined) {
        this.index(stored);
      }
    }
  }
}

function parseLine(line: string): StoredEvent | undefined {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    // Torn write from an unclean shutdown
    return undefined;
  }

  if (
    !isRecord(parsed) ||
    typeof parsed.streamId !== "string" ||
    typeof parsed.version !== "number" ||
    typeof parsed.globalPosition !== "number" ||
    typeof parsed.appendedAt !== "string" ||
    !isDomainEvent(parsed.event)
  ) {
    return undefined;
  }

  return {
    event: parsed.event,
    streamId: parsed.streamId,
    version: parsed.version,
    globalPosition: parsed.globalPosition,
    appendedAt: parsed.appendedAt,
  };
}
