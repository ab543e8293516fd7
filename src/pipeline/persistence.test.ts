import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { MergeConflictError, PersistenceError } from "../errors.js";
import { NoteStore, hashContent } from "../notes/store.js";
import { MergeEngine } from "./merge.js";
import { Persistence } from "./persistence.js";

class FlakyStore extends NoteStore {
  constructor(
    root: string,
    private failures: number,
  ) {
    super(root);
  }

  async writeAtomic(filePath: string, contents: string): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error("disk full");
    }
    await super.writeAtomic(filePath, contents);
  }
}

async function setup(prefix: string, failures: number = 0) {
  const root = path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  await mkdir(root, { recursive: true });
  const filePath = path.join(root, "note.md");
  await writeFile(filePath, "---\ntitle: Draft\n---\nOriginal\n");

  const store = new FlakyStore(root, failures);
  const note = await store.read(filePath);
  if (!note) {
    throw new Error("note was not written");
  }
  const merged = new MergeEngine().fold(note, [
    { observer: "reviewer", result: { status: "modified", metadata: { reviewed: true } } },
  ]);
  return { filePath, store, merged };
}

describe("Persistence", () => {
  it("writes the merged note and returns what is now on disk", async () => {
    const { filePath, store, merged } = await setup("noteflow-persist");

    const committed = await new Persistence(store).commit(merged);

    const raw = await readFile(filePath, "utf-8");
    expect(raw).toBe("---\ntitle: Draft\nreviewed: true\n---\nOriginal\n");
    expect(committed.hash).toBe(hashContent(raw));
    expect(committed.frontmatter).toEqual({ title: "Draft", reviewed: true });
  });

  it("refuses to overwrite an external edit", async () => {
    const { filePath, store, merged } = await setup("noteflow-persist-conflict");
    await writeFile(filePath, "Edited elsewhere\n");

    await expect(new Persistence(store).commit(merged)).rejects.toBeInstanceOf(MergeConflictError);
    expect(await readFile(filePath, "utf-8")).toBe("Edited elsewhere\n");
  });

  it("retries failed writes with backoff", async () => {
    const { filePath, store, merged } = await setup("noteflow-persist-retry", 2);

    await new Persistence(store, { retries: 3, backoffMs: 1 }).commit(merged);

    expect(await readFile(filePath, "utf-8")).toBe("---\ntitle: Draft\nreviewed: true\n---\nOriginal\n");
  });

  it("gives up after the last attempt", async () => {
    const { filePath, store, merged } = await setup("noteflow-persist-give-up", 5);

    await expect(new Persistence(store, { retries: 3, backoffMs: 1 }).commit(merged)).rejects.toThrow(
      new PersistenceError(filePath, "disk full", 3),
    );
    expect(await readFile(filePath, "utf-8")).toBe("---\ntitle: Draft\n---\nOriginal\n");
  });
});
