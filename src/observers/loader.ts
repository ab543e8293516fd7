import chokidar, { FSWatcher } from "chokidar";
import { readFile, readdir } from "fs/promises";
import { basename, dirname, extname, join } from "path";
import type { Config } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { Logger, silentLogger } from "../logging.js";
import type { ObserverRegistry } from "../pipeline/registry.js";
import { InterpreterRuntime, type InterpreterHost } from "../runtimes/interpreter.js";
import { RestrictedScriptRuntime } from "../runtimes/restricted.js";
import type { ScriptSandbox } from "../runtimes/sandbox.js";
import type { ObserverDescriptor, RuntimeKind } from "../runtimes/types.js";
import { resolveDescriptor } from "./index.js";

export const RESTRICTED_DIR = "restricted";
export const INTERPRETER_DIR = "interpreter";

const SCRIPT_KINDS: Record<string, { extension: string; runtime: RuntimeKind }> = {
  [RESTRICTED_DIR]: { extension: ".js", runtime: "restricted-script" },
  [INTERPRETER_DIR]: { extension: ".mjs", runtime: "interpreter" },
};

export interface ScriptLoaderOptions {
  directory: string;
  registry: ObserverRegistry;
  sandbox: ScriptSandbox;
  interpreter: InterpreterHost;
  config: Config;
  logger?: Logger;
}

/**
 * Registers user observers from `<scripts>/restricted/*.js` and
 * `<scripts>/interpreter/*.mjs`, named after the file. While watching, an
 * edited script is registered again under the same name, which swaps the
 * binding in place.
 */
export class ScriptLoader {
  private readonly options: ScriptLoaderOptions;
  private readonly logger: Logger;
  private readonly loaded = new Map<string, string>(); // file path -> observer name
  private readonly versions = new Map<string, number>();
  private watcher: FSWatcher | null = null;

  constructor(options: ScriptLoaderOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  runtimeFor(filePath: string): RuntimeKind | null {
    const kind = SCRIPT_KINDS[basename(dirname(filePath))];
    if (!kind || extname(filePath) !== kind.extension || basename(filePath).startsWith(".")) {
      return null;
    }
    return kind.runtime;
  }

  async loadAll(): Promise<ObserverDescriptor[]> {
    const descriptors: ObserverDescriptor[] = [];
    for (const dir of Object.keys(SCRIPT_KINDS)) {
      const fullDir = join(this.options.directory, dir);
      let files: string[];
      try {
        files = await readdir(fullDir);
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === "ENOENT") {
          continue;
        }
        throw error;
      }

      for (const file of files.sort()) {
        const descriptor = await this.load(join(fullDir, file));
        if (descriptor) {
          descriptors.push(descriptor);
        }
      }
    }
    return descriptors;
  }

  /** Registers (or re-registers) the observer in one script file. */
  async load(filePath: string): Promise<ObserverDescriptor | null> {
    const runtime = this.runtimeFor(filePath);
    if (!runtime) {
      return null;
    }

    const name = basename(filePath, extname(filePath));
    const descriptor = resolveDescriptor({ name, runtime }, this.options.config);
    if (!descriptor) {
      this.logger.debug(`Observer ${name} is disabled in config`);
      this.unload(filePath);
      return null;
    }

    const { registry, sandbox, interpreter } = this.options;
    const replacing = registry.has(name);

    try {
      if (runtime === "restricted-script") {
        const source = await readFile(filePath, "utf-8");
        sandbox.compile(source, filePath);
        registry.register(descriptor, new RestrictedScriptRuntime(source, sandbox, filePath, this.logger.child(name)));
      } else {
        const version = (this.versions.get(filePath) ?? 0) + 1;
        this.versions.set(filePath, version);
        registry.register(descriptor, new InterpreterRuntime(interpreter, filePath, version));
      }
    } catch (error) {
      this.logger.error(`Could not load observer script ${filePath}: ${errorMessage(error)}`);
      return null;
    }

    this.loaded.set(filePath, name);
    this.logger.info(`${replacing ? "Reloaded" : "Loaded"} ${runtime} observer ${name}`);
    return descriptor;
  }

  unload(filePath: string): boolean {
    const name = this.loaded.get(filePath);
    if (name === undefined) {
      return false;
    }
    this.loaded.delete(filePath);
    this.versions.delete(filePath);
    this.logger.info(`Unloaded observer ${name}`);
    return this.options.registry.unregister(name);
  }

  get loadedNames(): string[] {
    return [...this.loaded.values()].sort();
  }

  async watch(): Promise<void> {
    if (this.watcher) {
      return;
    }

    const reload = (filePath: string) => {
      this.load(filePath).catch((error: unknown) => {
        this.logger.error(`Reload of ${filePath} failed: ${errorMessage(error)}`);
      });
    };

    const watcher = chokidar.watch(
      Object.keys(SCRIPT_KINDS).map((dir) => join(this.options.directory, dir)),
      { ignoreInitial: true, depth: 0, persistent: true },
    );
    watcher
      .on("add", reload)
      .on("change", reload)
      .on("unlink", (filePath) => this.unload(filePath))
      .on("error", (error) => this.logger.error(`Script watcher error: ${errorMessage(error)}`));

    this.watcher = watcher;
    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
  }

  async close(): Promise<void> {
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
  }
}
