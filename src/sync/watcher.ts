import chokidar, { FSWatcher } from "chokidar";
import { EventEmitter } from "events";
import { stat } from "fs/promises";
import { relative, sep } from "path";
import { WatchError, errorMessage } from "../errors.js";

export type ChangeKind = "create" | "modify" | "remove";

export interface CoalescedChange {
  path: string;
  kind: ChangeKind; // Latest kind seen within the debounce window
  count: number; // Raw notifications folded into this one
}

export interface ChangeWatcherEvents {
  change: [change: CoalescedChange];
  error: [error: WatchError];
  ready: [];
}

export interface ChangeWatcherOptions {
  root: string;
  debounceMs: number;
  ignored?: string[];
  accept?: (filePath: string) => boolean;
}

/**
 * Dotfiles and dot-directories below the root (temp files, `.index`). Only
 * the part of the path under the root counts, so the root itself may live
 * under a dot-directory such as `~/.notes`.
 */
export function isHiddenUnder(root: string, filePath: string): boolean {
  const rel = relative(root, filePath);
  return rel.split(sep).some((segment) => segment.startsWith(".") && segment !== "..");
}

interface PendingChange {
  kind: ChangeKind;
  count: number;
  timer: NodeJS.Timeout;
}

export class ChangeWatcher extends EventEmitter<ChangeWatcherEvents> {
  private readonly options: ChangeWatcherOptions;
  private watcher: FSWatcher | null = null;
  private pending = new Map<string, PendingChange>();

  constructor(options: ChangeWatcherOptions) {
    super();
    this.options = options;
  }

  /**
   * Feeds one raw notification through the per-path debounce window. Every
   * notification restarts the window for its path.
   */
  ingest(filePath: string, kind: ChangeKind): void {
    if (this.options.accept && !this.options.accept(filePath)) {
      return;
    }

    const existing = this.pending.get(filePath);
    if (existing) {
      clearTimeout(existing.timer);
    }

    const count = (existing?.count ?? 0) + 1;
    const timer = setTimeout(() => {
      this.pending.delete(filePath);
      this.emit("change", { path: filePath, kind, count });
    }, this.options.debounceMs);

    this.pending.set(filePath, { kind, count, timer });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async start(): Promise<void> {
    if (this.watcher) {
      return;
    }

    const { root } = this.options;
    try {
      const info = await stat(root);
      if (!info.isDirectory()) {
        throw new WatchError(root, "not a directory");
      }
    } catch (error) {
      if (error instanceof WatchError) {
        throw error;
      }
      throw new WatchError(root, errorMessage(error));
    }

    const watcher = chokidar.watch(root, {
      ignored: [
        (filePath: string) => isHiddenUnder(root, filePath),
        "**/node_modules/**",
        ...(this.options.ignored ?? []),
      ],
      persistent: true,
      ignoreInitial: true,
    });
    this.watcher = watcher;

    watcher
      .on("add", (path) => this.ingest(path, "create"))
      .on("change", (path) => this.ingest(path, "modify"))
      .on("unlink", (path) => this.ingest(path, "remove"));

    await new Promise<void>((resolve, reject) => {
      const onStartupError = (error: unknown) => {
        reject(new WatchError(root, errorMessage(error)));
      };
      watcher.once("error", onStartupError);
      watcher.once("ready", () => {
        watcher.off("error", onStartupError);
        watcher.on("error", (error) => this.emit("error", new WatchError(root, errorMessage(error))));
        this.emit("ready");
        resolve();
      });
    }).catch(async (error: unknown) => {
      this.watcher = null;
      await watcher.close();
      throw error;
    });
  }

  async stop(): Promise<void> {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
    }
    this.pending.clear();

    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
  }

  isRunning(): boolean {
    return this.watcher !== null;
  }
}
