import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { NoteStore, hashContent } from "./store.js";

async function createTempDir(prefix: string): Promise<string> {
  const dir = path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

describe("NoteStore", () => {
  it("lists notes recursively, skipping dot entries and other extensions", async () => {
    const root = await createTempDir("noteflow-store-list");
    await mkdir(path.join(root, "sub"));
    await mkdir(path.join(root, ".index"));
    await writeFile(path.join(root, "b.md"), "b");
    await writeFile(path.join(root, "sub", "a.md"), "a");
    await writeFile(path.join(root, ".hidden.md"), "hidden");
    await writeFile(path.join(root, ".index", "x.md"), "x");
    await writeFile(path.join(root, "c.txt"), "c");

    const store = new NoteStore(root);

    expect(await store.list()).toEqual([path.join(root, "b.md"), path.join(root, "sub", "a.md")]);
  });

  it("returns an empty list for a missing root", async () => {
    const store = new NoteStore(path.join(os.tmpdir(), `noteflow-missing-${Date.now()}`));
    expect(await store.list()).toEqual([]);
  });

  it("reads a note with its title and the hash of the exact bytes", async () => {
    const root = await createTempDir("noteflow-store-read");
    const filePath = path.join(root, "My%20Note.md");
    const raw = "---\ntitle: Hello\n---\nBody\n";
    await writeFile(filePath, raw);

    const note = await new NoteStore(root).read(filePath);

    expect(note).toEqual({
      path: filePath,
      title: "My Note",
      frontmatter: { title: "Hello" },
      body: "Body\n",
      hash: hashContent(raw),
      processedMarkers: [],
    });
  });

  it("returns null for a missing file", async () => {
    const root = await createTempDir("noteflow-store-missing");
    const store = new NoteStore(root);

    expect(await store.read(path.join(root, "gone.md"))).toBeNull();
    expect(await store.hashOf(path.join(root, "gone.md"))).toBeNull();
  });

  it("writes atomically and leaves no temp file behind", async () => {
    const root = await createTempDir("noteflow-store-write");
    const filePath = path.join(root, "note.md");
    const store = new NoteStore(root);

    await store.writeAtomic(filePath, "first\n");
    await store.writeAtomic(filePath, "second\n");

    expect(await readFile(filePath, "utf-8")).toBe("second\n");
    expect(await store.hashOf(filePath)).toBe(hashContent("second\n"));
    expect(await store.list()).toEqual([filePath]);
  });

  it("only accepts note files inside the root", () => {
    const store = new NoteStore("/notes", "md");

    expect(store.isNotePath("/notes/a.md")).toBe(true);
    expect(store.isNotePath("/notes/sub/a.md")).toBe(true);
    expect(store.isNotePath("/notes/a.txt")).toBe(false);
    expect(store.isNotePath("/notes/.scripts/a.md")).toBe(false);
    expect(store.isNotePath("/elsewhere/a.md")).toBe(false);
  });
});
