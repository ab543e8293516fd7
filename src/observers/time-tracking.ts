import type { NoteEvent } from "../pipeline/events.js";
import { UNCHANGED, type MetadataPatch, type ObserverResult } from "../runtimes/types.js";

export const ENTRIES_HEADING = "## Time Entries";

const TIME = /^(\d{1,2}):(\d{2})$/;
const MINUTES_PER_DAY = 24 * 60;

export interface TimeEntry {
  date: string;
  type: string;
  workMinutes: number;
  breakMinutes: number;
}

export interface TimeSummary {
  time_entries: number;
  hours_worked: number;
  vacation_days: number;
  sick_days: number;
}

function toMinutes(value: string): number | null {
  const match = TIME.exec(value.trim());
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  return hours < 24 && minutes < 60 ? hours * 60 + minutes : null;
}

/**
 * Total minutes in a cell like `09:00-12:00,13:00-17:30`. A block that ends
 * before it starts runs past midnight; malformed blocks count as zero.
 */
export function blockMinutes(cell: string): number {
  let total = 0;
  for (const part of cell.split(",")) {
    const [start, end, ...extra] = part.split("-");
    if (end === undefined || extra.length > 0) {
      continue;
    }
    const from = toMinutes(start);
    const to = toMinutes(end);
    if (from === null || to === null) {
      continue;
    }
    total += to >= from ? to - from : to + MINUTES_PER_DAY - from;
  }
  return total;
}

/**
 * Rows of the table under `## Time Entries`:
 * `| Date | Type | Work Times | Break Times | Notes |`. The header and
 * separator rows are skipped; the table ends at the first non-table line.
 */
export function parseTimeEntries(body: string): TimeEntry[] | null {
  const lines = body.split("\n");
  const heading = lines.findIndex((line) => line.trim() === ENTRIES_HEADING);
  if (heading < 0) {
    return null;
  }

  const entries: TimeEntry[] = [];
  let headerSeen = false;
  for (const line of lines.slice(heading + 1)) {
    const trimmed = line.trim();
    if (trimmed === "" && !headerSeen) {
      continue;
    }
    if (!trimmed.startsWith("|")) {
      break;
    }
    if (!headerSeen) {
      headerSeen = true;
      continue;
    }
    const cells = trimmed.split("|").map((cell) => cell.trim());
    if (/^:?-+:?$/.test(cells[1] ?? "") || cells.length < 5 || cells[1] === "") {
      continue;
    }
    entries.push({
      date: cells[1],
      type: cells[2].toLowerCase(),
      workMinutes: blockMinutes(cells[3]),
      breakMinutes: blockMinutes(cells[4]),
    });
  }
  return entries;
}

export function summarize(entries: readonly TimeEntry[]): TimeSummary {
  let minutes = 0;
  let vacation = 0;
  let sick = 0;
  for (const entry of entries) {
    if (entry.type === "vacation") {
      vacation++;
    } else if (entry.type === "sick") {
      sick++;
    } else {
      minutes += Math.max(0, entry.workMinutes - entry.breakMinutes);
    }
  }
  return {
    time_entries: entries.length,
    hours_worked: Math.round((minutes / 60) * 100) / 100,
    vacation_days: vacation,
    sick_days: sick,
  };
}

/** Sums the time-entry table of a note into frontmatter; other notes are left alone. */
export function timeTrackingHandler(event: NoteEvent): ObserverResult {
  if (event.kind === "deleted") {
    return UNCHANGED;
  }

  const { body, frontmatter } = event.after;
  const entries = parseTimeEntries(body);
  if (entries === null) {
    return UNCHANGED;
  }

  const summary = summarize(entries);
  const patch: Record<string, number> = {};
  for (const [key, value] of Object.entries(summary)) {
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
