import type { NativeHandler } from "../runtimes/native.js";
import { UNCHANGED, type MetadataPatch, type ObserverResult } from "../runtimes/types.js";

export const CREATED_AT = "created_at";
export const UPDATED_AT = "updated_at";

export type Clock = () => Date;

/**
 * Stamps `created_at` once and refreshes `updated_at` on every create or
 * edit. A sync only fills in a missing `created_at`, so re-running a sync
 * over converged notes writes nothing.
 */
export function createTimestampHandler(clock: Clock = () => new Date()): NativeHandler {
  return (event): ObserverResult => {
    if (event.kind === "deleted") {
      return UNCHANGED;
    }

    const { frontmatter } = event.after;
    const now = clock().toISOString();
    const patch: Record<string, string> = {};

    if (frontmatter[CREATED_AT] === undefined) {
      patch[CREATED_AT] = now;
    }
    if (event.kind !== "synced") {
      patch[UPDATED_AT] = now;
    }

    if (Object.keys(patch).length === 0) {
      return UNCHANGED;
    }
    const metadata: MetadataPatch = patch;
    return { status: "modified", metadata };
  };
}
