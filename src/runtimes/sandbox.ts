import { types } from "node:util";
import vm from "node:vm";
import { ConcurrencyLimiter } from "../pipeline/queue.js";

// Runs inside every fresh context before user code. print() buffers output
// in a closure that scripts cannot reach; __readOutput is non-configurable so
// a script can neither replace nor shadow it. Nothing from the host realm is
// reachable from scripts.
const BOOTSTRAP = `
"use strict";
delete globalThis.WebAssembly;
delete globalThis.SharedArrayBuffer;
delete globalThis.Atomics;
(function () {
  var stringify = JSON.stringify;
  var output = [];
  function print() {
    var line = "";
    for (var i = 0; i < arguments.length; i++) {
      var value = arguments[i];
      var part;
      if (typeof value === "string") {
        part = value;
      } else if (value !== null && typeof value === "object") {
        try {
          part = stringify(value);
        } catch (error) {
          part = String(value);
        }
      } else {
        part = String(value);
      }
      line += (i > 0 ? "\\t" : "") + part;
    }
    output[output.length] = line;
  }
  globalThis.print = print;
  Object.defineProperty(globalThis, "__readOutput", {
    value: function () {
      return stringify(output);
    },
    writable: false,
    configurable: false,
  });
  globalThis.console = { log: print };
})();
`;

const OBSERVER_ENTRY = `
(function () {
  if (typeof onEvent !== "function") {
    throw new Error("script does not define onEvent(event)");
  }
  var result = onEvent(JSON.parse(__INPUT__));
  return result === undefined || result === null ? null : JSON.stringify(result);
})()
`;

function observerEntry(eventJson: string): string {
  return OBSERVER_ENTRY.replace("__INPUT__", () => JSON.stringify(eventJson));
}

export interface SandboxRunOptions {
  filename: string;
  timeoutMs: number;
}

export interface BlockRun {
  output: string[];
  error?: string;
  timedOut: boolean;
}

export interface ObserverScriptRun {
  output: string[];
  result: string | null;
}

export class SandboxTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Script execution timed out after ${timeoutMs}ms`);
    this.name = "SandboxTimeoutError";
  }
}

export class SandboxScriptError extends Error {
  constructor(
    message: string,
    readonly output: string[],
  ) {
    super(message);
    this.name = "SandboxScriptError";
  }
}

interface Thrown {
  timedOut: boolean;
  message: string;
}

/**
 * Reads a value thrown from a context without calling back into script code:
 * proxies are not inspected, and only plain data properties are read.
 * Errors from another realm also fail `instanceof Error`.
 */
function inspectThrown(error: unknown): Thrown {
  if (typeof error !== "object" || error === null) {
    return { timedOut: false, message: typeof error === "function" ? "Script threw a function" : String(error) };
  }
  if (types.isProxy(error)) {
    return { timedOut: false, message: "Script threw a value that is not an Error" };
  }
  const code = Object.getOwnPropertyDescriptor(error, "code");
  const message = Object.getOwnPropertyDescriptor(error, "message");
  return {
    timedOut: code !== undefined && "value" in code && code.value === "ERR_SCRIPT_EXECUTION_TIMEOUT",
    message:
      message !== undefined && "value" in message && typeof message.value === "string"
        ? message.value
        : "Script threw a value that is not an Error",
  };
}

function parseLines(json: unknown): string[] {
  if (typeof json !== "string") {
    return [];
  }
  try {
    const lines: unknown = JSON.parse(json);
    return Array.isArray(lines) ? lines.map((line) => String(line)) : [];
  } catch {
    return [];
  }
}

/**
 * Reduced-capability script execution: a fresh vm context per run with only
 * the language built-ins, no string code generation and no WebAssembly.
 * Microtasks drain inside each evaluation, so promise callbacks count against
 * the same timeout. Runs are bounded by a small pool.
 */
export class ScriptSandbox {
  private readonly limiter: ConcurrencyLimiter;

  constructor(poolSize: number = 4) {
    this.limiter = new ConcurrencyLimiter(poolSize);
  }

  private createContext(): vm.Context {
    const context = vm.createContext(Object.create(null), {
      name: "noteflow-restricted",
      codeGeneration: { strings: false, wasm: false },
      microtaskMode: "afterEvaluate",
    });
    vm.runInContext(BOOTSTRAP, context);
    return context;
  }

  /** Throws the timeout error when a script has left something runaway behind. */
  private readOutput(context: vm.Context, timeoutMs: number): string[] {
    return parseLines(vm.runInContext("__readOutput()", context, { timeout: timeoutMs }));
  }

  private readOutputAfterFailure(context: vm.Context, timeoutMs: number): string[] {
    try {
      return this.readOutput(context, timeoutMs);
    } catch {
      return [];
    }
  }

  /** Parses a script without running it; throws the SyntaxError if it does not parse. */
  compile(source: string, filename: string): void {
    new vm.Script(source, { filename });
  }

  /** Runs a snippet and reports what it printed; script errors are returned, not thrown. */
  runBlock(code: string, options: SandboxRunOptions): Promise<BlockRun> {
    return this.limiter.run(() => {
      const context = this.createContext();
      try {
        vm.runInContext(code, context, { filename: options.filename, timeout: options.timeoutMs });
        return { output: this.readOutput(context, options.timeoutMs), timedOut: false };
      } catch (error) {
        const thrown = inspectThrown(error);
        return {
          output: this.readOutputAfterFailure(context, options.timeoutMs),
          error: thrown.timedOut ? new SandboxTimeoutError(options.timeoutMs).message : thrown.message,
          timedOut: thrown.timedOut,
        };
      }
    });
  }

  /**
   * Evaluates an observer script, then calls its `onEvent(event)` with the
   * parsed event JSON. Resolves with the JSON text of the return value.
   */
  runObserver(source: string, eventJson: string, options: SandboxRunOptions): Promise<ObserverScriptRun> {
    return this.limiter.run(() => {
      const context = this.createContext();
      const runOptions = { filename: options.filename, timeout: options.timeoutMs };
      try {
        vm.runInContext(source, context, runOptions);
        const result: unknown = vm.runInContext(observerEntry(eventJson), context, runOptions);
        return {
          output: this.readOutput(context, options.timeoutMs),
          result: typeof result === "string" ? result : null,
        };
      } catch (error) {
        const thrown = inspectThrown(error);
        if (thrown.timedOut) {
          throw new SandboxTimeoutError(options.timeoutMs);
        }
        throw new SandboxScriptError(thrown.message, this.readOutputAfterFailure(context, options.timeoutMs));
      }
    });
  }
}
