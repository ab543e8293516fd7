import { setTimeout as sleep } from "node:timers/promises";
import { MergeConflictError, PersistenceError, errorMessage } from "../errors.js";
import { Logger, silentLogger } from "../logging.js";
import type { NoteStore } from "../notes/store.js";
import type { Note } from "../notes/types.js";
import type { MergedNote } from "./merge.js";

export interface PersistenceOptions {
  retries: number;
  backoffMs: number;
}

export class Persistence {
  constructor(
    private readonly store: NoteStore,
    private readonly options: PersistenceOptions = { retries: 3, backoffMs: 100 },
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Writes a merged note if the file still holds the bytes the dispatch
   * started from, and returns the snapshot of what was written. A changed
   * file raises MergeConflictError and is left untouched. Write failures are
   * retried with exponential backoff before surfacing as PersistenceError.
   */
  async commit(merged: MergedNote, signal?: AbortSignal): Promise<Note> {
    const text = this.store.serialize(merged.frontmatter, merged.body, merged.processedMarkers);
    const { retries, backoffMs } = this.options;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();

      const current = await this.store.hashOf(merged.path);
      if (current !== merged.baseHash) {
        throw new MergeConflictError(merged.path, merged.baseHash, current);
      }

      try {
        await this.store.writeAtomic(merged.path, text);
        return this.store.toNote(merged.path, text);
      } catch (error) {
        if (attempt >= retries) {
          throw new PersistenceError(merged.path, errorMessage(error), attempt);
        }
        const delay = backoffMs * 2 ** (attempt - 1);
        this.logger.warn(`Write to ${merged.path} failed (attempt ${attempt}/${retries}), retrying in ${delay}ms`);
        await sleep(delay, undefined, signal ? { signal } : undefined);
      }
    }
  }
}
