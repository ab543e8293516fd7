export type FrontmatterValue = string | number | boolean | readonly string[];

/** Ordered key/value map; insertion order is the order written to disk. */
export type Frontmatter = Readonly<Record<string, FrontmatterValue>>;

export interface Note {
  readonly path: string; // Absolute file path, the note's identity
  readonly title: string; // Derived from the file name
  readonly frontmatter: Frontmatter;
  readonly body: string;
  readonly hash: string; // sha256 of the file bytes last read or written
  readonly processedMarkers: readonly string[]; // "<observer>:<token>", sorted
}

export interface ParsedNoteFile {
  frontmatter: Record<string, FrontmatterValue>;
  body: string;
  processedMarkers: string[];
  /** Set when a frontmatter block was present but could not be parsed. */
  parseError?: string;
}
