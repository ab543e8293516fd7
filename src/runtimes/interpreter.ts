import { Worker } from "node:worker_threads";
import { z } from "zod";
import { ObserverExecutionError, ObserverTimeoutError } from "../errors.js";
import { Logger, silentLogger } from "../logging.js";
import { toPluginJson, type NoteEvent } from "../pipeline/events.js";
import { ConcurrencyLimiter } from "../pipeline/queue.js";
import { parsePluginResult } from "./contract.js";
import { raceTimeout } from "./timeout.js";
import type { ObserverDescriptor, ObserverResult, ObserverRuntime } from "./types.js";

// Worker body. Modules are imported by file URL with a version query so a
// reloaded script is a new module instance.
const WORKER_SOURCE = `
const { parentPort } = require("node:worker_threads");
const { pathToFileURL } = require("node:url");

const modules = new Map();

async function load(modulePath, version) {
  const key = modulePath + "@" + version;
  let mod = modules.get(key);
  if (!mod) {
    const url = pathToFileURL(modulePath);
    url.searchParams.set("v", String(version));
    mod = await import(url.href);
    modules.set(key, mod);
  }
  return mod;
}

function entryOf(mod) {
  if (typeof mod.processEvent === "function") return mod.processEvent;
  if (mod.default && typeof mod.default.processEvent === "function") return mod.default.processEvent;
  return null;
}

parentPort.on("message", async (request) => {
  try {
    const entry = entryOf(await load(request.modulePath, request.version));
    if (!entry) {
      throw new Error("module does not export processEvent(eventJson)");
    }
    const value = await entry(request.eventJson);
    const result = value === undefined || value === null
      ? null
      : typeof value === "string" ? value : JSON.stringify(value);
    parentPort.postMessage({ id: request.id, ok: true, result });
  } catch (error) {
    const message = error && typeof error.message === "string" ? error.message : String(error);
    parentPort.postMessage({ id: request.id, ok: false, message });
  }
});
`;

const WorkerResponseSchema = z.discriminatedUnion("ok", [
  z.object({ id: z.number(), ok: z.literal(true), result: z.string().nullable() }),
  z.object({ id: z.number(), ok: z.literal(false), message: z.string() }),
]);

export interface InterpreterCall {
  modulePath: string;
  version: number;
  eventJson: string;
}

interface InFlight {
  id: number;
  observer: string;
  resolve: (result: string | null) => void;
  reject: (error: Error) => void;
}

/**
 * The one interpreter instance shared by every interpreter-backed observer.
 * It is not reentrant, so all calls go through a single-slot queue; a call
 * that overruns its timeout takes the worker down with it and the next call
 * starts a fresh one.
 */
export class InterpreterHost {
  private worker: Worker | null = null;
  private inflight: InFlight | null = null;
  private readonly queue = new ConcurrencyLimiter(1);
  private nextId = 1;
  private starts = 0;
  private closed = false;

  constructor(private readonly logger: Logger = silentLogger) {}

  /** Number of workers started so far. */
  get workerStarts(): number {
    return this.starts;
  }

  /**
   * Runs one call once every earlier call has finished. The timeout covers
   * execution only, not time spent waiting in the queue.
   */
  call(observer: string, request: InterpreterCall, timeoutMs: number, signal: AbortSignal): Promise<string | null> {
    return this.queue.run(async () => {
      signal.throwIfAborted();
      if (this.closed) {
        throw new ObserverExecutionError(observer, "interpreter host is shut down");
      }

      const worker = this.ensureWorker();
      const id = this.nextId++;
      const response = new Promise<string | null>((resolve, reject) => {
        this.inflight = { id, observer, resolve, reject };
      });
      worker.postMessage({ id, ...request });

      try {
        return await raceTimeout(response, timeoutMs, () => new ObserverTimeoutError(observer, timeoutMs));
      } catch (error) {
        if (error instanceof ObserverTimeoutError) {
          this.logger.warn(`Recycling interpreter worker after ${observer} timed out`);
          await this.recycle();
        }
        throw error;
      } finally {
        this.inflight = null;
      }
    });
  }

  /** Terminates the current worker; the next call starts a new one. */
  async recycle(): Promise<void> {
    const worker = this.worker;
    this.worker = null;

    const inflight = this.inflight;
    if (inflight) {
      inflight.reject(new ObserverExecutionError(inflight.observer, "interpreter worker was terminated"));
    }

    if (worker) {
      await worker.terminate();
    }
  }

  async dispose(): Promise<void> {
    this.closed = true;
    await this.recycle();
  }

  private ensureWorker(): Worker {
    if (this.worker) {
      return this.worker;
    }

    const worker = new Worker(WORKER_SOURCE, { eval: true });
    worker.unref();
    worker.on("message", (message: unknown) => this.onMessage(message));
    worker.on("error", (error) => this.onExit(worker, `interpreter worker crashed: ${error.message}`));
    worker.on("exit", (code) => this.onExit(worker, `interpreter worker exited with code ${code}`));

    this.worker = worker;
    this.starts++;
    this.logger.debug(`Started interpreter worker #${this.starts}`);
    return worker;
  }

  private onMessage(message: unknown): void {
    const parsed = WorkerResponseSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn("Ignoring malformed message from interpreter worker");
      return;
    }

    const response = parsed.data;
    const inflight = this.inflight;
    if (!inflight || inflight.id !== response.id) {
      return;
    }

    if (response.ok) {
      inflight.resolve(response.result);
    } else {
      inflight.reject(new ObserverExecutionError(inflight.observer, response.message));
    }
  }

  private onExit(worker: Worker, reason: string): void {
    // Exits of a worker we already replaced were caused by recycle()
    if (this.worker !== worker) {
      return;
    }
    this.worker = null;

    const inflight = this.inflight;
    if (inflight) {
      inflight.reject(new ObserverExecutionError(inflight.observer, reason));
    }
  }
}

/** Binds one interpreter module (exporting `processEvent`) to the shared host. */
export class InterpreterRuntime implements ObserverRuntime {
  readonly kind = "interpreter";

  constructor(
    private readonly host: InterpreterHost,
    readonly modulePath: string,
    readonly version: number = 0,
  ) {}

  async invoke(descriptor: ObserverDescriptor, event: NoteEvent, signal: AbortSignal): Promise<ObserverResult> {
    const raw = await this.host.call(
      descriptor.name,
      { modulePath: this.modulePath, version: this.version, eventJson: toPluginJson(event) },
      descriptor.timeoutMs,
      signal,
    );
    return parsePluginResult(descriptor.name, raw);
  }
}
