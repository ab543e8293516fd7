import type { FrontmatterValue } from "../notes/types.js";
import type { NoteEvent, NoteEventKind } from "../pipeline/events.js";

export type RuntimeKind = "restricted-script" | "interpreter" | "native";

/** `metadata`: may patch frontmatter. `body`: may replace the note body. */
export type Capability = "metadata" | "body";

export interface ObserverDescriptor {
  readonly name: string;
  readonly runtime: RuntimeKind;
  readonly capabilities: ReadonlySet<Capability>;
  readonly events: ReadonlySet<NoteEventKind>;
  readonly timeoutMs: number;
  /** Higher runs first and wins metadata conflicts; ties keep registration order. */
  readonly priority: number;
}

/** `null` deletes the key; absent keys are left alone. */
export type MetadataPatch = Readonly<Record<string, FrontmatterValue | null>>;

export type ObserverResult =
  | { readonly status: "unchanged" }
  | {
      readonly status: "modified";
      readonly metadata?: MetadataPatch;
      readonly body?: string;
      /** Replaces every marker in this observer's namespace. */
      readonly markers?: readonly string[];
    }
  | { readonly status: "failed"; readonly reason: string };

export const UNCHANGED: ObserverResult = Object.freeze({ status: "unchanged" });

export function failed(reason: string): ObserverResult {
  return { status: "failed", reason };
}

/**
 * One execution backend bound to one observer. Bindings receive a frozen
 * snapshot (or its JSON form) and return results by value. Each binding
 * enforces `descriptor.timeoutMs` itself and rejects with
 * ObserverTimeoutError, discarding whatever instance was running the call.
 */
export interface ObserverRuntime {
  readonly kind: RuntimeKind;
  invoke(descriptor: ObserverDescriptor, event: NoteEvent, signal: AbortSignal): Promise<ObserverResult>;
}

export interface DescriptorInput {
  name: string;
  runtime: RuntimeKind;
  capabilities?: Iterable<Capability>;
  events?: Iterable<NoteEventKind>;
  timeoutMs?: number;
  priority?: number;
}

export const DEFAULT_OBSERVER_TIMEOUT_MS = 5000;

export function defineObserver(input: DescriptorInput): ObserverDescriptor {
  return Object.freeze({
    name: input.name,
    runtime: input.runtime,
    capabilities: new Set<Capability>(input.capabilities ?? ["metadata", "body"]),
    events: new Set<NoteEventKind>(input.events ?? ["created", "updated", "synced"]),
    timeoutMs: input.timeoutMs ?? DEFAULT_OBSERVER_TIMEOUT_MS,
    priority: input.priority ?? 0,
  });
}
