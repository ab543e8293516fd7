import type { NoteStore } from "../notes/store.js";
import type { Note } from "../notes/types.js";
import type { CoalescedChange } from "../sync/watcher.js";
import { freezeNote, type NoteEvent } from "./events.js";

/**
 * Turns coalesced file changes into typed note events against the last known
 * snapshot of each path. Identical content produces no event, which is what
 * keeps the pipeline's own writes from re-triggering it.
 */
export class EventNormalizer {
  private readonly snapshots = new Map<string, Note>();

  constructor(private readonly store: NoteStore) {}

  prime(notes: Iterable<Note>): void {
    for (const note of notes) {
      this.remember(note);
    }
  }

  remember(note: Note): void {
    this.snapshots.set(note.path, freezeNote(note));
  }

  snapshotOf(path: string): Note | undefined {
    return this.snapshots.get(path);
  }

  async normalize(change: CoalescedChange): Promise<NoteEvent | null> {
    const prior = this.snapshots.get(change.path) ?? null;
    const current = await this.store.read(change.path);

    if (!current) {
      if (!prior) {
        return null;
      }
      this.snapshots.delete(change.path);
      return { kind: "deleted", path: change.path, cause: "filesystem", before: prior, after: null };
    }

    const after = freezeNote(current);

    if (!prior) {
      this.snapshots.set(change.path, after);
      return { kind: "created", path: change.path, cause: "filesystem", before: null, after };
    }

    if (prior.hash === after.hash) {
      return null;
    }

    this.snapshots.set(change.path, after);
    return { kind: "updated", path: change.path, cause: "filesystem", before: prior, after };
  }

  /** A sync re-runs a note regardless of whether its hash moved. */
  async normalizeSync(path: string): Promise<NoteEvent | null> {
    const current = await this.store.read(path);
    if (!current) {
      return null;
    }

    const before = this.snapshots.get(path) ?? null;
    const after = freezeNote(current);
    this.snapshots.set(path, after);
    return { kind: "synced", path, cause: "sync", before, after };
  }
}
