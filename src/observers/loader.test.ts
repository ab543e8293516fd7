import { mkdir, unlink, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { parseConfig } from "../config/index.js";
import type { NoteEvent } from "../pipeline/events.js";
import { ObserverRegistry } from "../pipeline/registry.js";
import { InterpreterHost, InterpreterRuntime } from "../runtimes/interpreter.js";
import { ScriptSandbox } from "../runtimes/sandbox.js";
import { INTERPRETER_DIR, RESTRICTED_DIR, ScriptLoader } from "./loader.js";

async function setup(config = parseConfig({})) {
  const directory = path.join(os.tmpdir(), `noteflow-scripts-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  await mkdir(path.join(directory, RESTRICTED_DIR), { recursive: true });
  await mkdir(path.join(directory, INTERPRETER_DIR), { recursive: true });

  await writeFile(
    path.join(directory, RESTRICTED_DIR, "tagger.js"),
    "function onEvent(event) { return { metadata: { seen: event.Created.title } }; }\n",
  );
  await writeFile(path.join(directory, RESTRICTED_DIR, "broken.js"), "function (\n");
  await writeFile(path.join(directory, RESTRICTED_DIR, "notes.txt"), "not a script\n");
  await writeFile(path.join(directory, INTERPRETER_DIR, "echo.mjs"), "export function processEvent() { return null; }\n");

  const registry = new ObserverRegistry();
  const loader = new ScriptLoader({
    directory,
    registry,
    sandbox: new ScriptSandbox(1),
    interpreter: new InterpreterHost(),
    config,
  });
  return { directory, registry, loader };
}

describe("ScriptLoader", () => {
  it("registers every valid script under its file name", async () => {
    const { registry, loader } = await setup();

    const descriptors = await loader.loadAll();

    expect(descriptors.map((descriptor) => [descriptor.name, descriptor.runtime])).toEqual([
      ["tagger", "restricted-script"],
      ["echo", "interpreter"],
    ]);
    expect(loader.loadedNames).toEqual(["echo", "tagger"]);
    expect(registry.has("broken")).toBe(false);
  });

  it("runs a loaded restricted script", async () => {
    const { registry, loader } = await setup();
    await loader.loadAll();

    const entry = registry.get("tagger");
    if (!entry) {
      throw new Error("tagger was not registered");
    }
    const note = { path: "/notes/a.md", title: "a", frontmatter: {}, body: "", hash: "h", processedMarkers: [] };
    const event: NoteEvent = { kind: "created", path: note.path, cause: "filesystem", before: null, after: note };

    expect(await entry.runtime.invoke(entry.descriptor, event, new AbortController().signal)).toEqual({
      status: "modified",
      metadata: { seen: "a" },
    });
  });

  it("re-registers a reloaded interpreter module under a new version", async () => {
    const { directory, registry, loader } = await setup();
    await loader.loadAll();
    const slot = registry.get("echo")?.slot;

    await loader.load(path.join(directory, INTERPRETER_DIR, "echo.mjs"));

    const entry = registry.get("echo");
    expect(entry?.slot).toBe(slot);
    expect(entry?.runtime).toBeInstanceOf(InterpreterRuntime);
    if (entry?.runtime instanceof InterpreterRuntime) {
      expect(entry.runtime.version).toBe(2);
    }
  });

  it("unregisters a removed script", async () => {
    const { directory, registry, loader } = await setup();
    await loader.loadAll();
    const filePath = path.join(directory, RESTRICTED_DIR, "tagger.js");

    await unlink(filePath);
    expect(loader.unload(filePath)).toBe(true);
    expect(registry.has("tagger")).toBe(false);
    expect(loader.unload(filePath)).toBe(false);
  });

  it("skips scripts disabled in config", async () => {
    const { registry, loader } = await setup(parseConfig({ observers: { echo: { enabled: false } } }));
    await loader.loadAll();

    expect(registry.has("echo")).toBe(false);
    expect(registry.has("tagger")).toBe(true);
  });

  it("tolerates a missing scripts directory", async () => {
    const loader = new ScriptLoader({
      directory: path.join(os.tmpdir(), `noteflow-no-scripts-${Date.now()}`),
      registry: new ObserverRegistry(),
      sandbox: new ScriptSandbox(1),
      interpreter: new InterpreterHost(),
      config: parseConfig({}),
    });

    expect(await loader.loadAll()).toEqual([]);
  });
});
