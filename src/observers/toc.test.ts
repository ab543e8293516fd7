import { describe, expect, it } from "vitest";
import type { Note } from "../notes/types.js";
import type { NoteEvent } from "../pipeline/events.js";
import { anchorFor, collectHeadings, insertContents, tocHandler } from "./toc.js";

function created(body: string): NoteEvent {
  const note: Note = { path: "/notes/guide.md", title: "guide", frontmatter: {}, body, hash: "h", processedMarkers: [] };
  return { kind: "created", path: note.path, cause: "filesystem", before: null, after: note };
}

const withContents = [
  "# Guide",
  "",
  "## Contents",
  "",
  "* [Setup](#setup)",
  "    * [First run](#first-run)",
  "",
  "Intro text",
  "## Setup",
  "### First run",
  "",
].join("\n");

describe("anchorFor", () => {
  it("lowercases, hyphenates spaces and drops punctuation", () => {
    expect(anchorFor("First run")).toBe("first-run");
    expect(anchorFor("Café Notes!")).toBe("café-notes");
  });
});

describe("collectHeadings", () => {
  it("skips the title, the contents heading and headings inside code", () => {
    const lines = ["# Guide", "## Contents", "## Setup", "```sh", "# not a heading", "```", "# Appendix"];

    expect(collectHeadings(lines)).toEqual([
      { level: 2, text: "Setup", anchor: "setup" },
      { level: 1, text: "Appendix", anchor: "appendix" },
    ]);
  });
});

describe("insertContents", () => {
  it("lists the headings right under the title", () => {
    expect(insertContents("# Guide\nIntro text\n## Setup\n### First run\n")).toBe(withContents);
  });

  it("is stable when run over its own output", () => {
    expect(insertContents(withContents)).toBe(withContents);
  });

  it("refreshes an outdated contents section", () => {
    const outdated = "# Guide\n\n## Contents\n\n* [Old](#old)\n\nIntro text\n## Setup\n### First run\n";

    expect(insertContents(outdated)).toBe(withContents);
  });

  it("removes the section once there is nothing left to list", () => {
    expect(insertContents("# Guide\n\n## Contents\n\n* [Old](#old)\n\nJust text\n")).toBe("# Guide\n\nJust text\n");
  });

  it("leaves notes without a title or without headings alone", () => {
    expect(insertContents("## Setup\ntext\n")).toBeNull();
    expect(insertContents("# Guide\nonly text\n")).toBeNull();
  });
});

describe("tocHandler", () => {
  it("replaces the body when the contents change", () => {
    expect(tocHandler(created("# Guide\nIntro text\n## Setup\n### First run\n"))).toEqual({
      status: "modified",
      body: withContents,
    });
    expect(tocHandler(created(withContents))).toEqual({ status: "unchanged" });
  });
});
