import type { ObserverDescriptor, ObserverRuntime } from "../runtimes/types.js";
import type { NoteEventKind } from "./events.js";

export interface RegisteredObserver {
  readonly descriptor: ObserverDescriptor;
  readonly runtime: ObserverRuntime;
  /** Registration order; kept when a name is registered again. */
  readonly slot: number;
}

function byPriority(a: RegisteredObserver, b: RegisteredObserver): number {
  return b.descriptor.priority - a.descriptor.priority || a.slot - b.slot;
}

export class ObserverRegistry {
  private readonly entries = new Map<string, RegisteredObserver>();
  private nextSlot = 0;

  /**
   * Adds an observer, or swaps the descriptor and binding of one already
   * registered under the same name. Dispatches already in progress keep the
   * binding they started with.
   */
  register(descriptor: ObserverDescriptor, runtime: ObserverRuntime): void {
    const existing = this.entries.get(descriptor.name);
    const slot = existing ? existing.slot : this.nextSlot++;
    this.entries.set(descriptor.name, { descriptor, runtime, slot });
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  get(name: string): RegisteredObserver | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  list(): RegisteredObserver[] {
    return [...this.entries.values()].sort(byPriority);
  }

  listFor(kind: NoteEventKind): RegisteredObserver[] {
    return this.list().filter((entry) => entry.descriptor.events.has(kind));
  }
}
