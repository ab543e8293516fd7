import { EventEmitter } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import { MergeConflictError, errorMessage, type WatchError } from "../errors.js";
import { Logger, silentLogger } from "../logging.js";
import type { NoteStore } from "../notes/store.js";
import type { Note } from "../notes/types.js";
import type { InterpreterHost } from "../runtimes/interpreter.js";
import type { ChangeWatcher, CoalescedChange } from "../sync/watcher.js";
import type { Dispatcher } from "./dispatcher.js";
import type { NoteEvent } from "./events.js";
import type { MergedNote, ObserverOutcome } from "./merge.js";
import type { EventNormalizer } from "./normalizer.js";
import type { Persistence } from "./persistence.js";
import { ConcurrencyLimiter, PathQueue } from "./queue.js";

type Job = { kind: "change"; change: CoalescedChange } | { kind: "sync" };

export type ProcessOutcome = "changed" | "unchanged" | "skipped" | "conflict" | "failed" | "interrupted";

export interface ProcessedReport {
  event: NoteEvent;
  merged: MergedNote | null;
  /** The snapshot written to disk, when anything was. */
  committed: Note | null;
  outcomes: readonly ObserverOutcome[];
}

export interface ObserverFailure {
  path: string;
  observer: string;
  reason: string;
}

export interface PipelineEvents {
  processed: [report: ProcessedReport];
  conflict: [error: MergeConflictError];
  failed: [path: string, error: Error];
  observerFailed: [failure: ObserverFailure];
  watchError: [error: WatchError];
}

export interface SyncSummary {
  total: number;
  changed: number;
  unchanged: number;
  conflicts: number;
  failed: number;
}

export interface NotePipelineOptions {
  store: NoteStore;
  normalizer: EventNormalizer;
  dispatcher: Dispatcher;
  persistence: Persistence;
  watcher?: ChangeWatcher;
  interpreter?: InterpreterHost;
  concurrency?: number;
  logger?: Logger;
}

/** A sync re-reads the file, so it absorbs any change queued behind it. */
function coalesceJobs(pending: Job, incoming: Job): Job {
  if (pending.kind === "sync" || incoming.kind === "sync") {
    return { kind: "sync" };
  }
  return {
    kind: "change",
    change: { ...incoming.change, count: pending.change.count + incoming.change.count },
  };
}

/**
 * Watcher to normalizer to dispatcher to merge to persistence, one job per
 * note path at a time and a bounded number of paths at once.
 */
export class NotePipeline extends EventEmitter<PipelineEvents> {
  private readonly store: NoteStore;
  private readonly normalizer: EventNormalizer;
  private readonly dispatcher: Dispatcher;
  private readonly persistence: Persistence;
  private readonly watcher?: ChangeWatcher;
  private readonly interpreter?: InterpreterHost;
  private readonly logger: Logger;
  private readonly queue: PathQueue<Job, ProcessOutcome>;
  private readonly abort = new AbortController();
  private stopping = false;

  constructor(options: NotePipelineOptions) {
    super();
    this.store = options.store;
    this.normalizer = options.normalizer;
    this.dispatcher = options.dispatcher;
    this.persistence = options.persistence;
    this.watcher = options.watcher;
    this.interpreter = options.interpreter;
    this.logger = options.logger ?? silentLogger;
    this.queue = new PathQueue<Job, ProcessOutcome>(
      (path, job) => this.process(path, job),
      coalesceJobs,
      new ConcurrencyLimiter(options.concurrency ?? 4),
    );

    this.watcher?.on("change", (change) => {
      this.handleChange(change).catch((error: unknown) => {
        this.logger.error(`Unhandled failure for ${change.path}: ${errorMessage(error)}`);
      });
    });
    this.watcher?.on("error", (error) => {
      this.logger.error(error.message);
      this.emit("watchError", error);
    });
  }

  /**
   * Records what is on disk now, then starts watching for changes. Rejects
   * with WatchError when the directory cannot be watched; calling it again
   * is safe.
   */
  async start(): Promise<void> {
    await this.prime();
    if (!this.watcher) {
      return;
    }
    await this.watcher.start();
    this.logger.info(`Watching ${this.store.root}`);
  }

  async prime(): Promise<number> {
    const notes: Note[] = [];
    for (const path of await this.store.list()) {
      const note = await this.store.read(path);
      if (note) {
        notes.push(note);
      }
    }
    this.normalizer.prime(notes);
    this.logger.debug(`Primed ${notes.length} note snapshot(s)`);
    return notes.length;
  }

  handleChange(change: CoalescedChange): Promise<ProcessOutcome> {
    if (this.stopping) {
      return Promise.resolve("skipped");
    }
    return this.queue.enqueue(change.path, { kind: "change", change });
  }

  sync(path: string): Promise<ProcessOutcome> {
    if (this.stopping) {
      return Promise.resolve("skipped");
    }
    return this.queue.enqueue(path, { kind: "sync" });
  }

  /** Issues one `synced` event per note in the store. */
  async syncAll(): Promise<SyncSummary> {
    const paths = await this.store.list();
    const outcomes = await Promise.all(paths.map((path) => this.sync(path)));
    const count = (outcome: ProcessOutcome) => outcomes.filter((value) => value === outcome).length;
    return {
      total: paths.length,
      changed: count("changed"),
      unchanged: count("unchanged") + count("skipped"),
      conflicts: count("conflict"),
      failed: count("failed") + count("interrupted"),
    };
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  /**
   * Stops watching and waits up to `graceMs` for jobs in flight. Whatever is
   * still running after that is aborted and never written.
   */
  async stop(graceMs: number = 5000): Promise<void> {
    this.stopping = true;
    await this.watcher?.stop();

    const idle = this.queue.onIdle();
    const grace = new AbortController();
    const finished = await Promise.race([
      idle.then(() => true),
      sleep(graceMs, false, { signal: grace.signal }).catch(() => true),
    ]);
    grace.abort();

    if (!finished) {
      this.logger.warn(`Abandoning ${this.queue.size} job(s) still running after ${graceMs}ms`);
      this.abort.abort(new Error("pipeline stopped"));
    }
    await this.interpreter?.dispose();
    await idle;
  }

  private async process(path: string, job: Job): Promise<ProcessOutcome> {
    const signal = this.abort.signal;
    if (signal.aborted) {
      return "interrupted";
    }

    try {
      const event =
        job.kind === "sync"
          ? ((await this.normalizer.normalizeSync(path)) ??
            (await this.normalizer.normalize({ path, kind: "remove", count: 1 })))
          : await this.normalizer.normalize(job.change);
      if (!event) {
        return "skipped";
      }

      this.logger.debug(`${event.kind} ${path}`);
      const dispatch = await this.dispatcher.dispatch(event, signal);

      for (const outcome of dispatch.outcomes) {
        if (outcome.result.status === "failed") {
          this.emit("observerFailed", { path, observer: outcome.observer, reason: outcome.result.reason });
        }
      }

      if (dispatch.interrupted) {
        return "interrupted";
      }

      const merged = dispatch.merged;
      if (!merged || !merged.changed) {
        this.report({ event, merged, committed: null, outcomes: dispatch.outcomes });
        return "unchanged";
      }

      if (signal.aborted) {
        return "interrupted";
      }

      const committed = await this.persistence.commit(merged, signal);
      this.normalizer.remember(committed);
      this.logger.info(`Updated ${path}`);
      this.report({ event, merged, committed, outcomes: dispatch.outcomes });
      return "changed";
    } catch (error) {
      if (error instanceof MergeConflictError) {
        this.logger.warn(`${error.message}; re-queued`);
        this.emit("conflict", error);
        this.requeue(path);
        return "conflict";
      }
      if (signal.aborted) {
        return "interrupted";
      }

      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to process ${path}: ${failure.message}`);
      this.emit("failed", path, failure);
      return "failed";
    }
  }

  // A listener failing must not turn a committed note into a failed one
  private report(report: ProcessedReport): void {
    try {
      this.emit("processed", report);
    } catch (error) {
      this.logger.error(`A processed listener failed for ${report.event.path}: ${errorMessage(error)}`);
    }
  }

  // Runs after the current job for the path, against whatever is on disk then
  private requeue(path: string): void {
    if (this.stopping) {
      return;
    }
    this.queue.enqueue(path, { kind: "change", change: { path, kind: "modify", count: 1 } }).catch((error: unknown) => {
      this.logger.error(`Re-queue of ${path} failed: ${errorMessage(error)}`);
    });
  }
}
