import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { ObserverTimeoutError } from "../errors.js";
import type { Note } from "../notes/types.js";
import type { NoteEvent } from "../pipeline/events.js";
import { ScriptSandbox, type BlockRun, type SandboxRunOptions } from "../runtimes/sandbox.js";
import { defineObserver } from "../runtimes/types.js";
import { CodeFenceObserver, codeHash, findFences, formatAnnotation } from "./code-fence.js";

const descriptor = defineObserver({
  name: "code_fence",
  runtime: "restricted-script",
  capabilities: ["body"],
  priority: 10,
});
const signal = new AbortController().signal;

function observer() {
  return new CodeFenceObserver(new ScriptSandbox(), { languages: ["js"], blockTimeoutMs: 100 });
}

function noteWith(body: string, processedMarkers: string[] = []): Note {
  return { path: "/notes/calc.md", title: "calc", frontmatter: {}, body, hash: "h", processedMarkers };
}

function created(note: Note): NoteEvent {
  return { kind: "created", path: note.path, cause: "filesystem", before: null, after: note };
}

function updated(note: Note): NoteEvent {
  return { kind: "updated", path: note.path, cause: "filesystem", before: note, after: note };
}

class RecordingSandbox extends ScriptSandbox {
  readonly runs: string[] = [];

  override runBlock(code: string, options: SandboxRunOptions): Promise<BlockRun> {
    this.runs.push(code);
    return super.runBlock(code, options);
  }
}

describe("findFences", () => {
  it("finds executable fences and their existing annotation", () => {
    const lines = ["intro", "```js", "print(1)", "```", "", "> Output:", "> 1", "", "```python", "x", "```"];

    expect(findFences(lines, ["js"])).toEqual([
      { language: "js", code: "print(1)", start: 1, end: 4, annotationEnd: 7, hasOutput: true },
    ]);
  });

  it("never looks inside a fence of another language", () => {
    const lines = ["````md", "```js", "print(1)", "```", "````"];
    expect(findFences(lines, ["js"])).toEqual([]);
  });

  it("stops at an unterminated fence", () => {
    expect(findFences(["```js", "print(1)"], ["js"])).toEqual([]);
  });
});

describe("formatAnnotation", () => {
  it("quotes each output line and marks empty ones", () => {
    expect(formatAnnotation(["a", "", "b"])).toEqual(["", "> Output:", "> a", ">", "> b"]);
    expect(formatAnnotation([])).toEqual(["", "> Output:", ">"]);
  });
});

describe("CodeFenceObserver", () => {
  it("appends the output of a block", async () => {
    const result = await observer().invoke(descriptor, created(noteWith("```js\nprint(1+1)\n```\n")), signal);

    expect(result).toEqual({
      status: "modified",
      body: "```js\nprint(1+1)\n```\n\n> Output:\n> 2\n",
      markers: [codeHash("print(1+1)")],
    });
  });

  it("is a no-op when run over its own output", async () => {
    const body = "```js\nprint(1+1)\n```\n\n> Output:\n> 2\n";
    const note = noteWith(body, [`code_fence:${codeHash("print(1+1)")}`]);

    expect(await observer().invoke(descriptor, created(note), signal)).toEqual({ status: "unchanged" });
  });

  it("renders a thrown error as the block's output", async () => {
    const result = await observer().invoke(descriptor, created(noteWith('```js\nthrow new Error("bad")\n```')), signal);

    expect(result).toEqual({
      status: "modified",
      body: '```js\nthrow new Error("bad")\n```\n\n> Output:\n> Error: bad',
      markers: [codeHash('throw new Error("bad")')],
    });
  });

  it("reports a block that runs too long", async () => {
    const result = await observer().invoke(descriptor, created(noteWith("```js\nwhile (true) {}\n```\n")), signal);

    expect(result.status).toBe("modified");
    if (result.status === "modified") {
      expect(result.body).toBe(
        "```js\nwhile (true) {}\n```\n\n> Output:\n> Error: Script execution timed out after 100ms\n",
      );
    }
  });

  it("stops running blocks once the observer's own timeout has passed", async () => {
    const sandbox = new RecordingSandbox();
    const fences = new CodeFenceObserver(sandbox, { languages: ["js"], blockTimeoutMs: 200 });
    const short = defineObserver({ name: "code_fence", runtime: "restricted-script", capabilities: ["body"], timeoutMs: 300 });
    const body = ["```js", "for (;;) {} // one", "```", "", "```js", "for (;;) {} // two", "```", "", "```js", 'print("three")', "```", ""].join("\n");

    await expect(fences.invoke(short, created(noteWith(body)), signal)).rejects.toThrow(
      new ObserverTimeoutError("code_fence", 300),
    );
    await sleep(200);

    expect(sandbox.runs).toEqual(["for (;;) {} // one", "for (;;) {} // two"]);
  });

  it("keeps a blockquote separated from the output by a blank line", async () => {
    const body = "```js\nprint(1+1)\n```\n\n> Output:\n> 99\n\n> my quote\n";

    const result = await observer().invoke(descriptor, created(noteWith(body)), signal);

    expect(result).toEqual({
      status: "modified",
      body: "```js\nprint(1+1)\n```\n\n> Output:\n> 2\n\n> my quote\n",
      markers: [codeHash("print(1+1)")],
    });
  });

  it("on update re-runs only blocks whose code it has not seen", async () => {
    const hash = codeHash("print(1+1)");
    const stale = "```js\nprint(1+1)\n```\n\n> Output:\n> 99\n";

    expect(await observer().invoke(descriptor, updated(noteWith(stale, [`code_fence:${hash}`])), signal)).toEqual({
      status: "unchanged",
    });

    const rerun = await observer().invoke(descriptor, updated(noteWith(stale, ["code_fence:000000000000"])), signal);
    expect(rerun).toEqual({
      status: "modified",
      body: "```js\nprint(1+1)\n```\n\n> Output:\n> 2\n",
      markers: [hash],
    });
  });

  it("collapses the blank lines left around replaced output", async () => {
    const body = "```js\nprint(1)\n```\n\n> Output:\n> old\n\n\n\nafter\n";

    const result = await observer().invoke(descriptor, created(noteWith(body)), signal);

    expect(result).toEqual({
      status: "modified",
      body: "```js\nprint(1)\n```\n\n> Output:\n> 1\n\nafter\n",
      markers: [codeHash("print(1)")],
    });
  });

  it("leaves other languages and deletions alone", async () => {
    const note = noteWith("```python\nprint(1)\n```\n");

    expect(await observer().invoke(descriptor, created(note), signal)).toEqual({ status: "unchanged" });
    expect(
      await observer().invoke(
        descriptor,
        { kind: "deleted", path: note.path, cause: "filesystem", before: note, after: null },
        signal,
      ),
    ).toEqual({ status: "unchanged" });
  });

  it("drops markers of blocks that were removed", async () => {
    const note = noteWith("No code left\n", ["code_fence:abcdef123456"]);

    expect(await observer().invoke(descriptor, updated(note), signal)).toEqual({ status: "modified", markers: [] });
  });
});
