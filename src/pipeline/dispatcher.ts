import { errorMessage } from "../errors.js";
import { Logger, silentLogger } from "../logging.js";
import { readList } from "../notes/frontmatter.js";
import type { Frontmatter } from "../notes/types.js";
import { failed, type Capability, type ObserverDescriptor, type ObserverResult } from "../runtimes/types.js";
import { subjectOf, type NoteEvent } from "./events.js";
import { MergeEngine, type MergedNote, type ObserverOutcome } from "./merge.js";
import type { ObserverRegistry } from "./registry.js";

export const SKIP_KEY = "skip_observers";

export interface DispatchResult {
  readonly event: NoteEvent;
  /** Null for deletions and interrupted dispatches. */
  readonly merged: MergedNote | null;
  readonly outcomes: readonly ObserverOutcome[];
  readonly skipped: readonly string[];
  /** The signal aborted mid-dispatch; nothing from it may be written. */
  readonly interrupted: boolean;
}

/** Observers a note opts out of through `skip_observers` (a list, or `all`). */
export function skippedBy(frontmatter: Frontmatter): (name: string) => boolean {
  const names = new Set(readList(frontmatter, SKIP_KEY));
  if (names.has("all")) {
    return () => true;
  }
  return (name) => names.has(name);
}

/** Drops the parts of a result the descriptor is not allowed to produce. */
export function enforceCapabilities(
  descriptor: ObserverDescriptor,
  result: ObserverResult,
): { result: ObserverResult; denied: Capability[] } {
  if (result.status !== "modified") {
    return { result, denied: [] };
  }

  const denied: Capability[] = [];
  let { metadata, body } = result;
  if (metadata !== undefined && !descriptor.capabilities.has("metadata")) {
    denied.push("metadata");
    metadata = undefined;
  }
  if (body !== undefined && !descriptor.capabilities.has("body")) {
    denied.push("body");
    body = undefined;
  }
  if (denied.length === 0) {
    return { result, denied };
  }

  return {
    result: {
      status: "modified",
      ...(metadata !== undefined ? { metadata } : {}),
      ...(body !== undefined ? { body } : {}),
      ...(result.markers !== undefined ? { markers: result.markers } : {}),
    },
    denied,
  };
}

/**
 * Runs every interested observer against one event, in priority order, and
 * folds what they return. A failing observer is recorded and the rest still
 * run.
 */
export class Dispatcher {
  constructor(
    private readonly registry: ObserverRegistry,
    private readonly merge: MergeEngine = new MergeEngine(),
    private readonly logger: Logger = silentLogger,
  ) {}

  async dispatch(event: NoteEvent, signal: AbortSignal = new AbortController().signal): Promise<DispatchResult> {
    const note = subjectOf(event);
    const isSkipped = skippedBy(note.frontmatter);
    const outcomes: ObserverOutcome[] = [];
    const skipped: string[] = [];
    let interrupted = false;

    for (const { descriptor, runtime } of this.registry.listFor(event.kind)) {
      if (signal.aborted) {
        interrupted = true;
        break;
      }
      if (isSkipped(descriptor.name)) {
        skipped.push(descriptor.name);
        continue;
      }

      const started = Date.now();
      let result: ObserverResult;
      try {
        result = await runtime.invoke(descriptor, event, signal);
      } catch (error) {
        if (signal.aborted) {
          interrupted = true;
          break;
        }
        result = failed(errorMessage(error));
      }

      if (result.status === "failed") {
        this.logger.warn(`Observer ${descriptor.name} failed on ${event.path}: ${result.reason}`);
      }

      const enforced = enforceCapabilities(descriptor, result);
      outcomes.push({
        observer: descriptor.name,
        result: enforced.result,
        denied: enforced.denied,
        durationMs: Date.now() - started,
      });
    }

    if (skipped.length > 0) {
      this.logger.debug(`Skipped ${skipped.join(", ")} for ${event.path}`);
    }

    if (interrupted) {
      this.logger.info(`Dispatch for ${event.path} interrupted`);
      return { event, merged: null, outcomes, skipped, interrupted };
    }

    const merged = event.kind === "deleted" ? null : this.merge.fold(note, outcomes);
    for (const report of merged?.reports ?? []) {
      if (report.kind === "shadowed") {
        const what = report.key !== undefined ? `'${report.key}'` : "body";
        this.logger.info(`${report.observer}'s ${what} change on ${event.path} shadowed by ${report.by}`);
      } else {
        this.logger.warn(`${report.observer} on ${event.path}: ${report.detail}`);
      }
    }

    return { event, merged, outcomes, skipped, interrupted };
  }
}
