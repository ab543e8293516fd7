import type { NoteEvent } from "../pipeline/events.js";
import { UNCHANGED, type MetadataPatch, type ObserverResult } from "../runtimes/types.js";

export interface ContentMetrics {
  word_count: number;
  line_count: number;
  header_count: number;
  link_count: number;
}

const HEADER = /^#{1,6}\s+\S/gm;
const LINK = /\[[^\]]+\]\([^)]+\)/g;

export function measure(body: string): ContentMetrics {
  const text = body.endsWith("\n") ? body.slice(0, -1) : body;
  return {
    word_count: body.split(/\s+/).filter(Boolean).length,
    line_count: text === "" ? 0 : text.split("\n").length,
    header_count: body.match(HEADER)?.length ?? 0,
    link_count: body.match(LINK)?.length ?? 0,
  };
}

/**
 * Word, line, header and link counts of the body as the event delivered it.
 * Another observer's rewrite of the same event is counted on the next one.
 */
export function contentMetricsHandler(event: NoteEvent): ObserverResult {
  if (event.kind === "deleted") {
    return UNCHANGED;
  }

  const { body, frontmatter } = event.after;
  const patch: Record<string, number> = {};
  for (const [key, value] of Object.entries(measure(body))) {
    if (frontmatter[key] !== value) {
      patch[key] = value;
    }
  }

  if (Object.keys(patch).length === 0) {
    return UNCHANGED;
  }
  const metadata: MetadataPatch = patch;
  return { status: "modified", metadata };
}
