/**
 * File-backed PendingStore.
 *
 * The whole set lives in one JSON document:
 * { "format": "multicustody/store/v1", "records": [ ...PendingTransaction ] }
 *
 * Durability:
 * - Every mutation rewrites the document to a temp file, fsyncs it and
 *   renames it over the original, so a crash leaves either the old or the
 *   new document on disk
 * - The in-memory copy changes only after the rename succeeded
 * - The document is validated on open; a corrupt file is an error, never
 *   silently replaced
 */

import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { PendingTransaction } from "@multicustody/types";
import { pendingTransactionSchema } from "../schema.js";
import type { PendingStore } from "../types.js";

export const STORE_FORMAT = "multicustody/store/v1";

const storeDocumentSchema = z.object({
  format: z.literal(STORE_FORMAT),
  records: z.array(pendingTransactionSchema),
});

export class PendingStoreError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "PendingStoreError";
  }
}

export class FilePendingStore implements PendingStore {
  private records: Map<string, PendingTransaction>;

  private constructor(
    readonly filePath: string,
    records: Map<string, PendingTransaction>,
  ) {
    this.records = records;
  }

  /**
   * Open (or create on first write) the store at `filePath`.
   *
   * @throws PendingStoreError if the file exists but is not a valid store
   */
  static async open(filePath: string): Promise<FilePendingStore> {
    await mkdir(dirname(filePath), { recursive: true });

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        return new FilePendingStore(filePath, new Map());
      }
      throw new PendingStoreError(filePath, `Cannot read pending store`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      throw new PendingStoreError(filePath, "Pending store is not valid JSON", { cause: err });
    }

    const parsed = storeDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new PendingStoreError(
        filePath,
        `Pending store failed validation: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      );
    }

    const records = new Map<string, PendingTransaction>();
    for (const record of parsed.data.records) {
      records.set(record.id, record);
    }
    return new FilePendingStore(filePath, records);
  }

  async get(id: string): Promise<PendingTransaction | undefined> {
    return this.records.get(id);
  }

  async put(record: PendingTransaction): Promise<void> {
    const next = new Map(this.records);
    next.set(record.id, record);
    await this.commit(next);
  }

  async delete(id: string): Promise<boolean> {
    if (!this.records.has(id)) {
      return false;
    }
    const next = new Map(this.records);
    next.delete(id);
    await this.commit(next);
    return true;
  }

  async list(): Promise<readonly PendingTransaction[]> {
    return [...this.records.values()];
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async commit(next: Map<string, PendingTransaction>): Promise<void> {
    const document = JSON.stringify(
      { format: STORE_FORMAT, records: [...next.values()] },
      null,
      2,
    );
    const tempPath = `${this.filePath}.${String(process.pid)}.tmp`;

    try {
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(document, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw new PendingStoreError(this.filePath, "Failed to write pending store", { cause: err });
    }

    this.records = next;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
