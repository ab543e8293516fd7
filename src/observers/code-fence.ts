import { createHash } from "node:crypto";
import { basename } from "node:path";
import { ObserverTimeoutError } from "../errors.js";
import type { Logger } from "../logging.js";
import { subjectOf, type NoteEvent } from "../pipeline/events.js";
import type { ScriptSandbox } from "../runtimes/sandbox.js";
import { raceTimeout } from "../runtimes/timeout.js";
import { UNCHANGED, type ObserverDescriptor, type ObserverResult, type ObserverRuntime } from "../runtimes/types.js";

export const OUTPUT_HEADER = "> Output:";

export interface FenceBlock {
  language: string;
  code: string;
  /** Line index of the opening fence. */
  start: number;
  /** Line index just past the closing fence. */
  end: number;
  /** Line index just past the existing annotation, or `end` when there is none. */
  annotationEnd: number;
  hasOutput: boolean;
}

const OPENING_FENCE = /^(`{3,}|~{3,})\s*([^\s`]*)/;

function isClosingFence(line: string, fence: string): boolean {
  const trimmed = line.trim();
  return trimmed.length >= fence.length && trimmed === fence[0].repeat(trimmed.length);
}

/**
 * Length of the `> Output:` annotation starting right after a closing fence
 * at `end`. The annotation runs through every following `>` line, so a
 * blockquote of the note's own must be separated from it by a blank line.
 */
function annotationLength(lines: readonly string[], end: number): number {
  if (lines[end] !== "" || lines[end + 1] !== OUTPUT_HEADER) {
    return 0;
  }
  let cursor = end + 2;
  while (cursor < lines.length && lines[cursor].startsWith(">")) {
    cursor++;
  }
  return cursor - end;
}

/**
 * Scans fence delimiters left to right with a line cursor. Fences in other
 * languages are skipped whole, so a fence nested in one is never executed.
 * An unterminated fence ends the scan.
 */
export function findFences(lines: readonly string[], languages: readonly string[]): FenceBlock[] {
  const executable = new Set(languages.map((language) => language.toLowerCase()));
  const blocks: FenceBlock[] = [];
  let cursor = 0;

  while (cursor < lines.length) {
    const match = OPENING_FENCE.exec(lines[cursor]);
    if (!match) {
      cursor++;
      continue;
    }

    const fence = match[1];
    let close = cursor + 1;
    while (close < lines.length && !isClosingFence(lines[close], fence)) {
      close++;
    }
    if (close >= lines.length) {
      break;
    }

    const language = match[2].toLowerCase();
    const end = close + 1;
    if (!executable.has(language)) {
      cursor = end;
      continue;
    }

    const annotation = annotationLength(lines, end);
    blocks.push({
      language,
      code: lines.slice(cursor + 1, close).join("\n"),
      start: cursor,
      end,
      annotationEnd: end + annotation,
      hasOutput: annotation > 0,
    });
    cursor = end + annotation;
  }

  return blocks;
}

export function formatAnnotation(output: readonly string[]): string[] {
  const lines = output.length > 0 ? output : [""];
  return ["", OUTPUT_HEADER, ...lines.map((line) => (line === "" ? ">" : `> ${line}`))];
}

export function codeHash(code: string): string {
  return createHash("sha256").update(code, "utf-8").digest("hex").slice(0, 12);
}

export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, "\n\n");
}

export type BlockExecutor = (block: FenceBlock, index: number) => Promise<string[]>;

export interface FenceRewrite {
  body: string;
  blocks: FenceBlock[];
  executed: number;
}

/**
 * Rebuilds the body in one forward pass. Text before each block is copied,
 * the block is re-emitted with a fresh (or kept) annotation, and the cursor
 * moves past the old annotation, so inserted output is never scanned.
 */
export async function rewriteFences(
  body: string,
  languages: readonly string[],
  shouldExecute: (block: FenceBlock) => boolean,
  execute: BlockExecutor,
): Promise<FenceRewrite> {
  const lines = body.split("\n");
  const blocks = findFences(lines, languages);
  const out: string[] = [];
  let cursor = 0;
  let executed = 0;

  for (const [index, block] of blocks.entries()) {
    out.push(...lines.slice(cursor, block.end));
    if (shouldExecute(block)) {
      out.push(...formatAnnotation(await execute(block, index)));
      executed++;
    } else {
      out.push(...lines.slice(block.end, block.annotationEnd));
    }
    cursor = block.annotationEnd;
  }
  out.push(...lines.slice(cursor));

  const rewritten = blocks.length > 0 ? collapseBlankLines(out.join("\n")) : body;
  return { body: rewritten, blocks, executed };
}

export interface CodeFenceOptions {
  languages: readonly string[];
  blockTimeoutMs: number;
}

/**
 * Executes fenced code blocks with the restricted sandbox and keeps a
 * `> Output:` annotation under each one. Markers hold the hash of every
 * block's code; on `updated` a block that already has output is re-run only
 * when its hash is not among them. `created` and `synced` re-run everything.
 */
export class CodeFenceObserver implements ObserverRuntime {
  readonly kind = "restricted-script";

  constructor(
    private readonly sandbox: ScriptSandbox,
    private readonly options: CodeFenceOptions,
    private readonly logger?: Logger,
  ) {}

  async invoke(descriptor: ObserverDescriptor, event: NoteEvent, signal: AbortSignal): Promise<ObserverResult> {
    signal.throwIfAborted();

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal.reason);
    signal.addEventListener("abort", forwardAbort, { once: true });
    const deadline = Date.now() + descriptor.timeoutMs;

    try {
      return await raceTimeout(this.process(descriptor, event, controller.signal, deadline), descriptor.timeoutMs, () => {
        const error = new ObserverTimeoutError(descriptor.name, descriptor.timeoutMs);
        controller.abort(error);
        return error;
      });
    } finally {
      signal.removeEventListener("abort", forwardAbort);
    }
  }

  /**
   * Blocks run back to back without yielding to timers, so the deadline is
   * also checked before each block and caps each block's own timeout.
   */
  private async process(
    descriptor: ObserverDescriptor,
    event: NoteEvent,
    signal: AbortSignal,
    deadline: number,
  ): Promise<ObserverResult> {
    if (event.kind === "deleted") {
      return UNCHANGED;
    }

    const note = subjectOf(event);
    const namespace = `${descriptor.name}:`;
    const known = new Set(
      note.processedMarkers.filter((marker) => marker.startsWith(namespace)).map((marker) => marker.slice(namespace.length)),
    );
    const outOfTime = () => new ObserverTimeoutError(descriptor.name, descriptor.timeoutMs);

    const file = basename(note.path);
    const rewrite = await rewriteFences(
      note.body,
      this.options.languages,
      (block) => event.kind !== "updated" || !block.hasOutput || !known.has(codeHash(block.code)),
      async (block, index) => {
        signal.throwIfAborted();
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          throw outOfTime();
        }
        const run = await this.sandbox.runBlock(block.code, {
          filename: `${file}#${block.language}-${index + 1}`,
          timeoutMs: Math.min(this.options.blockTimeoutMs, remaining),
        });
        if (run.timedOut && remaining < this.options.blockTimeoutMs) {
          throw outOfTime();
        }
        if (run.error !== undefined) {
          this.logger?.debug(`Block ${index + 1} in ${file} failed: ${run.error}`);
          return [`Error: ${run.error}`];
        }
        return run.output.join("\n").split("\n");
      },
    );

    const markers = [...new Set(rewrite.blocks.map((block) => codeHash(block.code)))].sort();
    const markersChanged = markers.length !== known.size || markers.some((marker) => !known.has(marker));

    if (rewrite.body === note.body && !markersChanged) {
      return UNCHANGED;
    }

    if (rewrite.executed > 0) {
      this.logger?.debug(`Executed ${rewrite.executed} code block(s) in ${file}`);
    }

    return {
      status: "modified",
      ...(rewrite.body !== note.body ? { body: rewrite.body } : {}),
      markers,
    };
  }
}
