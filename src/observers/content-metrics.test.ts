import { describe, expect, it } from "vitest";
import type { Frontmatter, Note } from "../notes/types.js";
import type { NoteEvent } from "../pipeline/events.js";
import { contentMetricsHandler, measure } from "./content-metrics.js";

function synced(body: string, frontmatter: Frontmatter = {}): NoteEvent {
  const note: Note = { path: "/notes/m.md", title: "m", frontmatter, body, hash: "h", processedMarkers: [] };
  return { kind: "synced", path: note.path, cause: "sync", before: note, after: note };
}

describe("measure", () => {
  it("counts words, lines, headers and links", () => {
    expect(measure("# Title\n\nRead [the docs](https://example.test) today.\n## Next\n")).toEqual({
      word_count: 8,
      line_count: 4,
      header_count: 2,
      link_count: 1,
    });
  });

  it("counts an empty body as zero everywhere", () => {
    expect(measure("")).toEqual({ word_count: 0, line_count: 0, header_count: 0, link_count: 0 });
  });
});

describe("contentMetricsHandler", () => {
  it("writes the counts that differ from the frontmatter", () => {
    expect(contentMetricsHandler(synced("two words\n", { word_count: 2, line_count: 3 }))).toEqual({
      status: "modified",
      metadata: { line_count: 1, header_count: 0, link_count: 0 },
    });
  });

  it("writes nothing once the counts are current", () => {
    const current = { word_count: 2, line_count: 1, header_count: 0, link_count: 0 };

    expect(contentMetricsHandler(synced("two words\n", current))).toEqual({ status: "unchanged" });
  });
});
