import { readList } from "../notes/frontmatter.js";
import type { NoteEvent } from "../pipeline/events.js";
import { UNCHANGED, type ObserverResult } from "../runtimes/types.js";

const FENCED_BLOCK = /^(`{3,}|~{3,})[^\n]*\n[\s\S]*?^\1[ \t]*$/gm;
const INLINE_CODE = /`[^`\n]*`/g;
const ANCHOR_LINK = /\[[^\]]*\]\(#[^)]*\)/g;
const INLINE_TAG = /(?<![\p{L}\p{N}_&/#])#([\p{L}_][\p{L}\p{N}_-]*)/gu;

// Words that show up as anchors in generated tables of contents
const IGNORED_TAGS = new Set(["contents", "references", "table-of-contents"]);

/** `#tags` in prose; code blocks, inline code and anchor links are ignored. */
export function extractInlineTags(body: string): string[] {
  const prose = body.replace(FENCED_BLOCK, "").replace(INLINE_CODE, "").replace(ANCHOR_LINK, "");
  const tags = new Set<string>();
  for (const match of prose.matchAll(INLINE_TAG)) {
    const tag = match[1];
    if (!IGNORED_TAGS.has(tag.toLowerCase())) {
      tags.add(tag);
    }
  }
  return [...tags].sort();
}

/** Adds inline tags to the `tags` list; tags already listed are left as they are. */
export function inlineTagsHandler(event: NoteEvent): ObserverResult {
  if (event.kind === "deleted") {
    return UNCHANGED;
  }

  const note = event.after;
  const existing = readList(note.frontmatter, "tags");
  const known = new Set(existing);
  const found = extractInlineTags(note.body).filter((tag) => !known.has(tag));

  if (found.length === 0) {
    return UNCHANGED;
  }

  const tags = [...new Set([...existing, ...found])].sort();
  return { status: "modified", metadata: { tags } };
}
