import { ObserverExecutionError, ObserverTimeoutError } from "../errors.js";
import type { Logger } from "../logging.js";
import { toPluginJson, type NoteEvent } from "../pipeline/events.js";
import { parsePluginResult } from "./contract.js";
import {
  SandboxScriptError,
  SandboxTimeoutError,
  type ObserverScriptRun,
  type ScriptSandbox,
} from "./sandbox.js";
import type { ObserverDescriptor, ObserverResult, ObserverRuntime } from "./types.js";

/**
 * Binding for a user script that defines `onEvent(event)`. Each call gets a
 * fresh sandbox context, so the binding itself holds nothing but the source.
 */
export class RestrictedScriptRuntime implements ObserverRuntime {
  readonly kind = "restricted-script";

  constructor(
    private readonly source: string,
    private readonly sandbox: ScriptSandbox,
    private readonly filename: string,
    private readonly logger?: Logger,
  ) {}

  async invoke(descriptor: ObserverDescriptor, event: NoteEvent, signal: AbortSignal): Promise<ObserverResult> {
    signal.throwIfAborted();

    let run: ObserverScriptRun;
    try {
      run = await this.sandbox.runObserver(this.source, toPluginJson(event), {
        filename: this.filename,
        timeoutMs: descriptor.timeoutMs,
      });
    } catch (error) {
      if (error instanceof SandboxTimeoutError) {
        throw new ObserverTimeoutError(descriptor.name, descriptor.timeoutMs);
      }
      if (error instanceof SandboxScriptError) {
        this.flushOutput(descriptor.name, error.output);
        throw new ObserverExecutionError(descriptor.name, error.message);
      }
      throw error;
    }

    this.flushOutput(descriptor.name, run.output);
    return parsePluginResult(descriptor.name, run.result);
  }

  private flushOutput(observer: string, lines: string[]): void {
    for (const line of lines) {
      this.logger?.debug(`[${observer}] ${line}`);
    }
  }
}
