import { describe, expect, it } from "vitest";
import type { Frontmatter, Note } from "../notes/types.js";
import type { NoteEvent, NoteEventKind } from "../pipeline/events.js";
import { defineObserver } from "../runtimes/types.js";
import { createTimestampHandler } from "./timestamp.js";

const NOW = "2026-01-02T03:04:05.000Z";
const handler = createTimestampHandler(() => new Date(NOW));
const context = {
  descriptor: defineObserver({ name: "timestamp", runtime: "native", capabilities: ["metadata"] }),
  signal: new AbortController().signal,
};

function eventOf(kind: Exclude<NoteEventKind, "deleted">, frontmatter: Frontmatter): NoteEvent {
  const note: Note = { path: "/notes/a.md", title: "a", frontmatter, body: "", hash: "h", processedMarkers: [] };
  switch (kind) {
    case "created":
      return { kind, path: note.path, cause: "filesystem", before: null, after: note };
    case "updated":
      return { kind, path: note.path, cause: "filesystem", before: note, after: note };
    case "synced":
      return { kind, path: note.path, cause: "sync", before: note, after: note };
  }
}

describe("timestamp handler", () => {
  it("stamps both fields on a new note", async () => {
    expect(await handler(eventOf("created", {}), context)).toEqual({
      status: "modified",
      metadata: { created_at: NOW, updated_at: NOW },
    });
  });

  it("only refreshes updated_at on an edit", async () => {
    expect(await handler(eventOf("updated", { created_at: "2025-01-01T00:00:00.000Z" }), context)).toEqual({
      status: "modified",
      metadata: { updated_at: NOW },
    });
  });

  it("leaves a stamped note alone on sync", async () => {
    expect(await handler(eventOf("synced", { created_at: "2025-01-01T00:00:00.000Z" }), context)).toEqual({
      status: "unchanged",
    });
    expect(await handler(eventOf("synced", {}), context)).toEqual({
      status: "modified",
      metadata: { created_at: NOW },
    });
  });
});
