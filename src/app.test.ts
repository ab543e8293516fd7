import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createApp } from "./app.js";
import { parseConfig } from "./config/index.js";
import { WatchError } from "./errors.js";

async function tempDir(prefix: string): Promise<string> {
  const dir = path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

describe("createApp", () => {
  it("runs built-in and script observers over every note", async () => {
    const notes = await tempDir("noteflow-app-notes");
    const scripts = await tempDir("noteflow-app-scripts");
    await mkdir(path.join(scripts, "restricted"));
    await writeFile(
      path.join(scripts, "restricted", "wordcount.js"),
      "function onEvent(event) { var note = event.Synced; return { metadata: { words: note.content.trim().split(/\\s+/).length } }; }\n",
    );
    await writeFile(path.join(notes, "a.md"), "three little words\n");

    const config = parseConfig({
      notesDirectory: notes,
      scriptsDirectory: scripts,
      enabledObservers: ["inline_tags"],
    });
    const app = await createApp(config);

    expect(app.registry.list().map(({ descriptor }) => descriptor.name)).toEqual(["inline_tags", "wordcount"]);
    expect(await app.pipeline.syncAll()).toEqual({ total: 1, changed: 1, unchanged: 0, conflicts: 0, failed: 0 });
    expect(await readFile(path.join(notes, "a.md"), "utf-8")).toBe("---\nwords: 3\n---\nthree little words\n");

    await app.close(0);
  });

  it("gives up watching a missing directory after the configured retries", async () => {
    const base = await tempDir("noteflow-app-missing");
    const config = parseConfig({
      notesDirectory: path.join(base, "does-not-exist"),
      scriptsDirectory: path.join(base, "scripts"),
      watcher: { startRetries: 1 },
    });
    const app = await createApp(config, { watch: true, retryDelayMs: 1 });

    await expect(app.start()).rejects.toBeInstanceOf(WatchError);
    await app.close(0);
  });
});
