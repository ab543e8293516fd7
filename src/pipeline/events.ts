import type { Note } from "../notes/types.js";

export type NoteEventKind = "created" | "updated" | "synced" | "deleted";

/** What produced the event: a file-system change or an explicit sync request. */
export type NoteEventCause = "filesystem" | "sync";

export type NoteEvent =
  | { readonly kind: "created"; readonly path: string; readonly cause: NoteEventCause; readonly before: null; readonly after: Note }
  | { readonly kind: "updated"; readonly path: string; readonly cause: NoteEventCause; readonly before: Note; readonly after: Note }
  | { readonly kind: "synced"; readonly path: string; readonly cause: "sync"; readonly before: Note | null; readonly after: Note }
  | { readonly kind: "deleted"; readonly path: string; readonly cause: NoteEventCause; readonly before: Note; readonly after: null };

/** The snapshot observers work against: the post-event note, or the last known one for deletions. */
export function subjectOf(event: NoteEvent): Note {
  return event.kind === "deleted" ? event.before : event.after;
}

export function freezeNote(note: Note): Note {
  for (const value of Object.values(note.frontmatter)) {
    if (Array.isArray(value)) {
      Object.freeze(value);
    }
  }
  Object.freeze(note.frontmatter);
  Object.freeze(note.processedMarkers);
  return Object.freeze(note);
}

const PLUGIN_KEYS: Record<NoteEventKind, string> = {
  created: "Created",
  updated: "Updated",
  synced: "Synced",
  deleted: "Deleted",
};

export interface PluginEventBody {
  title: string;
  content: string;
  file_path: string;
  frontmatter: Record<string, unknown>;
  processed_markers: string[];
}

/**
 * JSON document handed to script and interpreter observers: exactly one
 * top-level key naming the event kind.
 */
export function toPluginPayload(event: NoteEvent): Record<string, PluginEventBody> {
  const note = subjectOf(event);
  return {
    [PLUGIN_KEYS[event.kind]]: {
      title: note.title,
      content: note.body,
      file_path: note.path,
      frontmatter: { ...note.frontmatter },
      processed_markers: [...note.processedMarkers],
    },
  };
}

export function toPluginJson(event: NoteEvent): string {
  return JSON.stringify(toPluginPayload(event));
}
