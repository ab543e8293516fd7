import { setTimeout as sleep } from "node:timers/promises";
import { type Config, getDatabasePath, getNotesDirectory, getScriptsDirectory } from "./config/index.js";
import { WatchError } from "./errors.js";
import { NoteIndex } from "./index/indexer.js";
import { Logger, silentLogger } from "./logging.js";
import { NoteStore } from "./notes/store.js";
import { registerBuiltinObservers } from "./observers/index.js";
import { ScriptLoader } from "./observers/loader.js";
import type { Clock } from "./observers/timestamp.js";
import { Dispatcher } from "./pipeline/dispatcher.js";
import { MergeEngine } from "./pipeline/merge.js";
import { EventNormalizer } from "./pipeline/normalizer.js";
import { Persistence } from "./pipeline/persistence.js";
import { NotePipeline } from "./pipeline/pipeline.js";
import { ObserverRegistry } from "./pipeline/registry.js";
import { InterpreterHost } from "./runtimes/interpreter.js";
import { ScriptSandbox } from "./runtimes/sandbox.js";
import { ChangeWatcher } from "./sync/watcher.js";

export interface AppOptions {
  logger?: Logger;
  /** Watch the note tree (and the scripts directory) after start(). */
  watch?: boolean;
  /** Keep the sql.js note index in step with the pipeline. */
  index?: boolean;
  clock?: Clock;
  /** Base delay between watcher start attempts. */
  retryDelayMs?: number;
}

export interface NoteflowApp {
  readonly config: Config;
  readonly store: NoteStore;
  readonly registry: ObserverRegistry;
  readonly loader: ScriptLoader;
  readonly pipeline: NotePipeline;
  readonly index: NoteIndex | null;
  start(): Promise<void>;
  close(graceMs?: number): Promise<void>;
}

/** Wires the pipeline together from config and loads every observer. */
export async function createApp(config: Config, options: AppOptions = {}): Promise<NoteflowApp> {
  const logger = options.logger ?? silentLogger;
  const store = new NoteStore(getNotesDirectory(config), config.fileExtension, logger.child("store"));

  const sandbox = new ScriptSandbox(config.runtimes.restrictedPoolSize);
  const interpreter = new InterpreterHost(logger.child("interpreter"));
  const registry = new ObserverRegistry();
  registerBuiltinObservers(registry, config, { sandbox, logger: logger.child("observers"), clock: options.clock });

  const loader = new ScriptLoader({
    directory: getScriptsDirectory(config),
    registry,
    sandbox,
    interpreter,
    config,
    logger: logger.child("scripts"),
  });
  await loader.loadAll();

  const watcher = options.watch
    ? new ChangeWatcher({
        root: store.root,
        debounceMs: config.watcher.debounceMs,
        ignored: config.watcher.ignored,
        accept: (filePath) => store.isNotePath(filePath),
      })
    : undefined;

  const pipeline = new NotePipeline({
    store,
    normalizer: new EventNormalizer(store),
    dispatcher: new Dispatcher(registry, new MergeEngine(), logger.child("dispatch")),
    persistence: new Persistence(
      store,
      { retries: config.pipeline.persistRetries, backoffMs: config.pipeline.persistBackoffMs },
      logger.child("persist"),
    ),
    watcher,
    interpreter,
    concurrency: config.pipeline.concurrency,
    logger: logger.child("pipeline"),
  });

  const index = options.index ? await NoteIndex.create(getDatabasePath(config)) : null;
  index?.attach(pipeline);

  const retryDelayMs = options.retryDelayMs ?? 1000;

  return {
    config,
    store,
    registry,
    loader,
    pipeline,
    index,

    async start() {
      const retries = config.watcher.startRetries;
      for (let attempt = 0; ; attempt++) {
        try {
          await pipeline.start();
          break;
        } catch (error) {
          if (!(error instanceof WatchError) || attempt >= retries) {
            throw error;
          }
          const delay = retryDelayMs * 2 ** attempt;
          logger.warn(`${error.message}; retrying in ${delay}ms (${attempt + 1}/${retries})`);
          await sleep(delay);
        }
      }
      if (options.watch) {
        await loader.watch();
      }
    },

    async close(graceMs = config.pipeline.shutdownGraceMs) {
      await loader.close();
      await pipeline.stop(graceMs);
      index?.close();
    },
  };
}
