import type { NoteEvent } from "../pipeline/events.js";
import { UNCHANGED, type ObserverResult } from "../runtimes/types.js";

export const CONTENTS_HEADING = "## Contents";

const HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const FENCE = /^\s*(`{3,}|~{3,})/;
const CONTENTS_ENTRY = /^\s*\* \[.*\]\(#.*\)\s*$/;
const CONTENTS_TITLES = new Set(["contents", "table of contents"]);

export interface Heading {
  level: number;
  text: string;
  anchor: string;
}

export function anchorFor(text: string): string {
  return text
    .toLowerCase()
    .replace(/ /g, "-")
    .replace(/[^\p{L}\p{N}-]/gu, "");
}

function isContentsHeading(line: string): boolean {
  const match = HEADING.exec(line);
  return match !== null && match[1] === "##" && CONTENTS_TITLES.has(match[2].toLowerCase());
}

/** ATX headings outside fenced code, minus the first H1 and any contents heading. */
export function collectHeadings(lines: readonly string[]): Heading[] {
  const headings: Heading[] = [];
  let fence: string | null = null;
  let titleSeen = false;

  for (const line of lines) {
    const fenceMatch = FENCE.exec(line);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (fence === null) {
        fence = marker;
      } else if (marker[0] === fence[0] && marker.length >= fence.length) {
        fence = null;
      }
      continue;
    }
    if (fence !== null || isContentsHeading(line)) {
      continue;
    }

    const match = HEADING.exec(line);
    if (!match) {
      continue;
    }
    const level = match[1].length;
    if (level === 1 && !titleSeen) {
      titleSeen = true;
      continue;
    }
    headings.push({ level, text: match[2], anchor: anchorFor(match[2]) });
  }

  return headings;
}

export function formatContents(headings: readonly Heading[]): string[] {
  return [
    CONTENTS_HEADING,
    "",
    ...headings.map(({ level, text, anchor }) => `${"  ".repeat(level - 1)}* [${text}](#${anchor})`),
  ];
}

/**
 * Rebuilds the body with a contents section right under the first H1. A
 * previous section there (its heading, entries and blank lines) is replaced.
 * Returns null when the note has no H1 or nothing to list and no old section.
 */
export function insertContents(body: string): string | null {
  const lines = body.split("\n");
  const title = lines.findIndex((line) => /^# \S/.test(line));
  if (title < 0) {
    return null;
  }

  let rest = title + 1;
  while (rest < lines.length && lines[rest].trim() === "") {
    rest++;
  }
  const hadContents = rest < lines.length && isContentsHeading(lines[rest]);
  if (hadContents) {
    rest++;
    while (rest < lines.length && (lines[rest].trim() === "" || CONTENTS_ENTRY.test(lines[rest]))) {
      rest++;
    }
  }

  const headings = collectHeadings(lines);
  if (headings.length === 0 && !hadContents) {
    return null;
  }

  const contents = headings.length > 0 ? [...formatContents(headings), ""] : [];
  return [...lines.slice(0, title + 1), "", ...contents, ...lines.slice(rest)].join("\n");
}

/** Keeps a linked list of the note's headings under its title. */
export function tocHandler(event: NoteEvent): ObserverResult {
  if (event.kind === "deleted") {
    return UNCHANGED;
  }

  const { body } = event.after;
  const next = insertContents(body);
  if (next === null || next === body) {
    return UNCHANGED;
  }
  return { status: "modified", body: next };
}
