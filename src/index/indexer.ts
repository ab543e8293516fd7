import initSqlJs, { Database, type SqlValue } from "sql.js";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { readList } from "../notes/frontmatter.js";
import type { Note } from "../notes/types.js";
import type { NotePipeline, ProcessedReport } from "../pipeline/pipeline.js";

export interface IndexedNote {
  path: string;
  title: string;
  hash: string;
  tags: string[];
  indexedAt: string;
}

export interface TagCount {
  tag: string;
  count: number;
}

let SQL: Awaited<ReturnType<typeof initSqlJs>> | null = null;

async function getSqlJs() {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

function text(value: SqlValue | undefined): string {
  return typeof value === "string" ? value : value === null || value === undefined ? "" : String(value);
}

function integer(value: SqlValue | undefined): number {
  return typeof value === "number" ? value : Number(text(value)) || 0;
}

/**
 * sql.js database of committed notes and their tags, kept in step with the
 * pipeline. The database lives in memory and is exported to disk after each
 * write; pass a null path to keep it in memory only.
 */
export class NoteIndex {
  private db: Database;
  private dbPath: string | null;

  private constructor(db: Database, dbPath: string | null) {
    this.db = db;
    this.dbPath = dbPath;
  }

  static async create(dbPath: string | null): Promise<NoteIndex> {
    const SQL = await getSqlJs();
    let db: Database;

    if (dbPath && existsSync(dbPath)) {
      db = new SQL.Database(readFileSync(dbPath));
    } else {
      if (dbPath) {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      db = new SQL.Database();
    }

    const index = new NoteIndex(db, dbPath);
    index.initializeSchema();
    return index;
  }

  private initializeSchema(): void {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS notes (
        path TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        hash TEXT NOT NULL,
        frontmatter TEXT NOT NULL,
        body TEXT NOT NULL,
        indexed_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS note_tags (
        path TEXT NOT NULL,
        tag TEXT NOT NULL,
        PRIMARY KEY (path, tag)
      );

      CREATE INDEX IF NOT EXISTS idx_note_tags_tag ON note_tags(tag);
    `);
    this.save();
  }

  private save(): void {
    if (!this.dbPath) {
      return;
    }
    writeFileSync(this.dbPath, Buffer.from(this.db.export()));
  }

  indexNote(note: Note): void {
    this.db.run("DELETE FROM note_tags WHERE path = ?", [note.path]);
    this.db.run("DELETE FROM notes WHERE path = ?", [note.path]);

    this.db.run(
      `INSERT INTO notes (path, title, hash, frontmatter, body, indexed_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [note.path, note.title, note.hash, JSON.stringify(note.frontmatter), note.body, new Date().toISOString()],
    );

    for (const tag of new Set(readList(note.frontmatter, "tags"))) {
      this.db.run("INSERT OR IGNORE INTO note_tags (path, tag) VALUES (?, ?)", [note.path, tag]);
    }

    this.save();
  }

  removeNote(path: string): void {
    this.db.run("DELETE FROM note_tags WHERE path = ?", [path]);
    this.db.run("DELETE FROM notes WHERE path = ?", [path]);
    this.save();
  }

  getNote(path: string): IndexedNote | null {
    const results = this.db.exec("SELECT path, title, hash, indexed_at FROM notes WHERE path = ?", [path]);
    const row = results[0]?.values[0];
    if (!row) {
      return null;
    }
    return {
      path: text(row[0]),
      title: text(row[1]),
      hash: text(row[2]),
      tags: this.tagsOf(path),
      indexedAt: text(row[3]),
    };
  }

  private tagsOf(path: string): string[] {
    const results = this.db.exec("SELECT tag FROM note_tags WHERE path = ? ORDER BY tag", [path]);
    if (results.length === 0) return [];
    return results[0].values.map((row) => text(row[0]));
  }

  listTags(): TagCount[] {
    const results = this.db.exec(
      `SELECT tag, COUNT(*) as count
       FROM note_tags
       GROUP BY tag
       ORDER BY count DESC, tag ASC`,
    );
    if (results.length === 0) return [];
    return results[0].values.map((row) => ({ tag: text(row[0]), count: integer(row[1]) }));
  }

  notesWithTag(tag: string): string[] {
    const results = this.db.exec("SELECT path FROM note_tags WHERE tag = ? ORDER BY path", [tag]);
    if (results.length === 0) return [];
    return results[0].values.map((row) => text(row[0]));
  }

  count(): number {
    const results = this.db.exec("SELECT COUNT(*) FROM notes");
    return integer(results[0]?.values[0]?.[0]);
  }

  /** Follows the pipeline: committed and unchanged notes are (re)indexed, deletions removed. */
  attach(pipeline: NotePipeline): () => void {
    const onProcessed = (report: ProcessedReport) => {
      if (report.event.kind === "deleted") {
        this.removeNote(report.event.path);
      } else {
        this.indexNote(report.committed ?? report.event.after);
      }
    };
    pipeline.on("processed", onProcessed);
    return () => {
      pipeline.off("processed", onProcessed);
    };
  }

  close(): void {
    this.save();
    this.db.close();
  }
}
