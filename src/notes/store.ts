import { createHash, randomBytes } from "node:crypto";
import type { Dirent } from "node:fs";
import { readFile, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, relative, sep } from "node:path";
import { Logger, silentLogger } from "../logging.js";
import { parseNoteFile, serializeNoteFile } from "./frontmatter.js";
import type { Frontmatter, Note } from "./types.js";

export function hashContent(raw: string): string {
  return createHash("sha256").update(raw, "utf-8").digest("hex");
}

function isMissing(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === "ENOENT";
}

/**
 * File-backed note access. A note is identified by its absolute path; reads
 * return the parsed frontmatter, body and the hash of the exact bytes read.
 */
export class NoteStore {
  readonly root: string;
  private readonly extension: string;
  private readonly logger: Logger;

  constructor(root: string, extension: string = "md", logger: Logger = silentLogger) {
    this.root = root;
    this.extension = `.${extension}`;
    this.logger = logger;
  }

  isNotePath(filePath: string): boolean {
    if (extname(filePath) !== this.extension) {
      return false;
    }
    const rel = relative(this.root, filePath);
    if (rel.startsWith("..")) {
      return false;
    }
    // Skip dotfiles and anything under a dot-directory (.index, .scripts, temp files)
    return !rel.split(sep).some((segment) => segment.startsWith("."));
  }

  titleFor(filePath: string): string {
    return basename(filePath, this.extension).replace(/%20/g, " ");
  }

  toNote(filePath: string, raw: string): Note {
    const parsed = parseNoteFile(raw);
    if (parsed.parseError) {
      this.logger.warn(`Ignoring unreadable frontmatter in ${filePath}: ${parsed.parseError}`);
    }
    return {
      path: filePath,
      title: this.titleFor(filePath),
      frontmatter: parsed.frontmatter,
      body: parsed.body,
      hash: hashContent(raw),
      processedMarkers: parsed.processedMarkers,
    };
  }

  async read(filePath: string): Promise<Note | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
    return this.toNote(filePath, raw);
  }

  async hashOf(filePath: string): Promise<string | null> {
    try {
      return hashContent(await readFile(filePath, "utf-8"));
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async list(): Promise<string[]> {
    const notes: string[] = [];
    await this.collect(this.root, notes);
    return notes.sort();
  }

  private async collect(dir: string, into: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.collect(fullPath, into);
      } else if (entry.isFile() && this.isNotePath(fullPath)) {
        into.push(fullPath);
      }
    }
  }

  serialize(frontmatter: Frontmatter, body: string, processedMarkers: readonly string[]): string {
    return serializeNoteFile(frontmatter, body, processedMarkers);
  }

  /**
   * Writes through a temp file in the same directory and renames it into
   * place, so a watcher never sees a half-written note.
   */
  async writeAtomic(filePath: string, contents: string): Promise<void> {
    const tempPath = join(
      dirname(filePath),
      `.${basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`,
    );

    try {
      await writeFile(tempPath, contents, "utf-8");
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch(() => undefined);
      throw error;
    }
  }
}
