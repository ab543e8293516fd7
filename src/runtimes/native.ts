import { ObserverTimeoutError } from "../errors.js";
import type { NoteEvent } from "../pipeline/events.js";
import { raceTimeout } from "./timeout.js";
import type { ObserverDescriptor, ObserverResult, ObserverRuntime } from "./types.js";

export interface NativeContext {
  descriptor: ObserverDescriptor;
  /** Aborted on timeout or shutdown; long-running handlers should check it. */
  signal: AbortSignal;
}

export type NativeHandler = (event: NoteEvent, context: NativeContext) => ObserverResult | Promise<ObserverResult>;

/** In-process observer; runs concurrently with everything else. */
export class NativeRuntime implements ObserverRuntime {
  readonly kind = "native";

  constructor(private readonly handler: NativeHandler) {}

  async invoke(descriptor: ObserverDescriptor, event: NoteEvent, signal: AbortSignal): Promise<ObserverResult> {
    signal.throwIfAborted();

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal.reason);
    signal.addEventListener("abort", forwardAbort, { once: true });

    try {
      const work = Promise.resolve().then(() => this.handler(event, { descriptor, signal: controller.signal }));
      return await raceTimeout(work, descriptor.timeoutMs, () => {
        const error = new ObserverTimeoutError(descriptor.name, descriptor.timeoutMs);
        controller.abort(error);
        return error;
      });
    } finally {
      signal.removeEventListener("abort", forwardAbort);
    }
  }
}
