import matter from "gray-matter";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { Frontmatter, FrontmatterValue, ParsedNoteFile } from "./types.js";

export const MARKERS_KEY = "processed_markers";

// Keys whose comma-separated string form is read as a list
export const LIST_KEYS = new Set(["tags", "skip_observers", MARKERS_KEY]);

const MATTER_OPTIONS = {
  engines: {
    yaml: {
      parse: (input: string): object => {
        const parsed: unknown = parseYaml(input);
        return isRecord(parsed) ? parsed : {};
      },
      stringify: (data: object): string => stringifyYaml(data, { lineWidth: 0 }),
    },
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function toFrontmatterValue(key: string, value: unknown): FrontmatterValue {
  if (Array.isArray(value)) {
    return value
      .filter((item) => item !== null && item !== undefined)
      .map((item) => (typeof item === "string" ? item : String(item)));
  }
  if (typeof value === "string") {
    return LIST_KEYS.has(key) ? splitList(value) : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  return JSON.stringify(value);
}

/** Reads a list-valued field regardless of whether it was stored as a list or a comma string. */
export function readList(frontmatter: Frontmatter, key: string): string[] {
  const value = frontmatter[key];
  if (value === undefined) {
    return [];
  }
  if (typeof value === "string") {
    return splitList(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return [String(value)];
  }
  return [...value];
}

export function parseNoteFile(raw: string): ParsedNoteFile {
  let data: Record<string, unknown>;
  let body: string;

  try {
    const parsed = matter(raw, MATTER_OPTIONS);
    data = parsed.data;
    body = parsed.content;
  } catch (error) {
    return {
      frontmatter: {},
      body: raw,
      processedMarkers: [],
      parseError: error instanceof Error ? error.message : String(error),
    };
  }

  const frontmatter: Record<string, FrontmatterValue> = {};
  let processedMarkers: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    const normalized = toFrontmatterValue(key, value);
    if (key === MARKERS_KEY) {
      processedMarkers = typeof normalized === "object" ? [...normalized] : [];
      continue;
    }
    frontmatter[key] = normalized;
  }

  return {
    frontmatter,
    body,
    processedMarkers: [...new Set(processedMarkers)].sort(),
  };
}

export function serializeNoteFile(
  frontmatter: Frontmatter,
  body: string,
  processedMarkers: readonly string[] = [],
): string {
  const data: Record<string, FrontmatterValue> = { ...frontmatter };
  delete data[MARKERS_KEY];
  if (processedMarkers.length > 0) {
    data[MARKERS_KEY] = [...processedMarkers];
  }

  // Passing an object keeps gray-matter from re-parsing a body that starts with "---"
  return matter.stringify({ content: body }, data, MATTER_OPTIONS);
}

export function frontmatterEquals(a: Frontmatter, b: Frontmatter): boolean {
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) {
    return false;
  }
  return aKeys.every((key, index) => key === bKeys[index] && valueEquals(a[key], b[key]));
}

export function valueEquals(
  a: FrontmatterValue | null | undefined,
  b: FrontmatterValue | null | undefined,
): boolean {
  if (typeof a === "object" && a !== null && typeof b === "object" && b !== null) {
    return a.length === b.length && a.every((item, index) => item === b[index]);
  }
  return a === b;
}
