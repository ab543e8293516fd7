import { applyPatch, createPatch } from "diff";
import { MARKERS_KEY, frontmatterEquals, valueEquals } from "../notes/frontmatter.js";
import type { Frontmatter, FrontmatterValue, Note } from "../notes/types.js";
import type { Capability, ObserverResult } from "../runtimes/types.js";

export interface ObserverOutcome {
  readonly observer: string;
  readonly result: ObserverResult;
  /** Parts of the result dropped because the observer lacks the capability. */
  readonly denied?: readonly Capability[];
  readonly durationMs?: number;
}

export type MergeReport =
  | { readonly kind: "shadowed"; readonly observer: string; readonly by: string; readonly key?: string }
  | { readonly kind: "denied"; readonly observer: string; readonly detail: string };

export interface MergedNote {
  readonly path: string;
  /** Hash of the snapshot the dispatch started from. */
  readonly baseHash: string;
  readonly frontmatter: Frontmatter;
  readonly body: string;
  readonly processedMarkers: readonly string[];
  readonly changed: boolean;
  readonly reports: readonly MergeReport[];
}

function markersEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((marker, index) => marker === b[index]);
}

/**
 * Folds observer results into one candidate note, highest priority first.
 *
 * Every observer saw the same pre-dispatch snapshot. A metadata key belongs
 * to the first observer that sets it; a different value from a later one is
 * dropped and reported as shadowed. The first body replacement is taken
 * whole; later ones are re-expressed as a line patch against the snapshot
 * and applied on top, which composes edits to different regions and shadows
 * edits to the same one.
 */
export class MergeEngine {
  constructor(private readonly patchContext: number = 1) {}

  fold(note: Note, outcomes: readonly ObserverOutcome[]): MergedNote {
    const frontmatter: Record<string, FrontmatterValue> = { ...note.frontmatter };
    const keyOwners = new Map<string, string>();
    const markers = new Set(note.processedMarkers);
    const reports: MergeReport[] = [];
    let body = note.body;
    let bodyOwner: string | null = null;

    for (const outcome of outcomes) {
      const { observer, result } = outcome;
      for (const capability of outcome.denied ?? []) {
        reports.push({ kind: "denied", observer, detail: `lacks the '${capability}' capability` });
      }
      if (result.status !== "modified") {
        continue;
      }

      for (const [key, value] of Object.entries(result.metadata ?? {})) {
        if (key === MARKERS_KEY) {
          reports.push({ kind: "denied", observer, detail: `'${MARKERS_KEY}' is reserved` });
          continue;
        }

        const owner = keyOwners.get(key);
        if (owner !== undefined) {
          if (!valueEquals(frontmatter[key] ?? null, value)) {
            reports.push({ kind: "shadowed", observer, by: owner, key });
          }
          continue;
        }

        keyOwners.set(key, observer);
        if (value === null) {
          delete frontmatter[key];
        } else {
          frontmatter[key] = value;
        }
      }

      if (result.body !== undefined && result.body !== note.body && result.body !== body) {
        if (bodyOwner === null) {
          body = result.body;
          bodyOwner = observer;
        } else {
          const patch = createPatch(note.path, note.body, result.body, "", "", { context: this.patchContext });
          const patched = applyPatch(body, patch);
          if (patched === false) {
            reports.push({ kind: "shadowed", observer, by: bodyOwner });
          } else {
            body = patched;
          }
        }
      }

      if (result.markers !== undefined) {
        const namespace = `${observer}:`;
        for (const marker of [...markers]) {
          if (marker.startsWith(namespace)) {
            markers.delete(marker);
          }
        }
        for (const token of result.markers) {
          markers.add(`${namespace}${token}`);
        }
      }
    }

    const processedMarkers = [...markers].sort();
    const changed =
      body !== note.body ||
      !frontmatterEquals(note.frontmatter, frontmatter) ||
      !markersEqual(note.processedMarkers, processedMarkers);

    return {
      path: note.path,
      baseHash: note.hash,
      frontmatter,
      body,
      processedMarkers,
      changed,
      reports,
    };
  }
}
