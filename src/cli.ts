#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { fileURLToPath } from "url";
import { dirname, join, resolve } from "path";
import { readFileSync } from "fs";
import { createApp, type NoteflowApp } from "./app.js";
import {
  type Config,
  loadConfig,
  configExists,
  getConfigPath,
  ensureDirectories,
  getDatabasePath,
  getNotesDirectory,
  getScriptsDirectory,
} from "./config/index.js";
import { runInteractiveSetup, checkFirstRun } from "./setup/interactive.js";
import { runDaemon, stopDaemon, getDaemonStatus, startDaemonBackground } from "./daemon.js";
import { NoteflowError, errorMessage } from "./errors.js";
import { NoteIndex } from "./index/indexer.js";
import { Logger } from "./logging.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

const program = new Command();

program
  .name("noteflow")
  .description("Keeps derived note content in sync through a pipeline of observers")
  .version(packageJson.version);

function requireConfig(): Config {
  if (!configExists()) {
    console.error(chalk.red("No configuration found. Run 'noteflow init' first."));
    process.exit(1);
  }
  try {
    return loadConfig();
  } catch (error) {
    console.error(chalk.red(errorMessage(error)));
    process.exit(1);
  }
}

function cliLogger(config: Config, verbose?: boolean): Logger {
  return new Logger("noteflow", { level: verbose ? "debug" : config.logLevel });
}

function reportPipeline(app: NoteflowApp): void {
  app.pipeline.on("processed", (report) => {
    if (report.committed) {
      console.log(`${chalk.green("updated")} ${report.event.path}`);
    }
  });
  app.pipeline.on("conflict", (error) => {
    console.log(`${chalk.yellow("conflict")} ${error.path} ${chalk.dim("(re-queued)")}`);
  });
  app.pipeline.on("observerFailed", (failure) => {
    console.log(`${chalk.red("observer")} ${failure.observer} on ${failure.path}: ${failure.reason}`);
  });
  app.pipeline.on("failed", (path, error) => {
    console.log(`${chalk.red("failed")} ${path}: ${error.message}`);
  });
}

// Init command
program
  .command("init")
  .description("Initialize noteflow with interactive setup")
  .option("-f, --force", "Overwrite existing configuration")
  .action(async (options: { force?: boolean }) => {
    await runInteractiveSetup({ force: options.force });
  });

// Watch command
program
  .command("watch")
  .description("Watch the notes directory and run observers on every change")
  .option("-v, --verbose", "Log debug output")
  .action(async (options: { verbose?: boolean }) => {
    if (!(await checkFirstRun())) {
      return;
    }
    const config = requireConfig();
    ensureDirectories(config);

    const app = await createApp(config, { logger: cliLogger(config, options.verbose), watch: true, index: true });
    reportPipeline(app);
    await app.start();
    console.log(chalk.green(`Watching ${getNotesDirectory(config)} with ${app.registry.size} observer(s). Ctrl+C to stop.`));

    const shutdown = () => {
      console.log(chalk.dim("\nStopping..."));
      app
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error(chalk.red(`Shutdown failed: ${errorMessage(error)}`));
          process.exit(1);
        });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

// Sync command
program
  .command("sync [paths...]")
  .description("Re-run every observer over all notes, or over the given files")
  .option("-v, --verbose", "Log debug output")
  .action(async (paths: string[], options: { verbose?: boolean }) => {
    const config = requireConfig();
    ensureDirectories(config);

    const app = await createApp(config, { logger: cliLogger(config, options.verbose), index: true });
    reportPipeline(app);
    await app.pipeline.prime();

    try {
      if (paths.length === 0) {
        const summary = await app.pipeline.syncAll();
        console.log(
          chalk.bold(`\nSynced ${summary.total} note(s): `) +
            `${summary.changed} changed, ${summary.unchanged} unchanged, ` +
            `${summary.conflicts} conflict(s), ${summary.failed} failed`
        );
      } else {
        for (const path of paths) {
          const outcome = await app.pipeline.sync(resolve(path));
          console.log(`${chalk.cyan(outcome)} ${path}`);
        }
      }
      await app.pipeline.onIdle();
    } finally {
      await app.close();
    }
  });

// Observers command
program
  .command("observers")
  .description("List registered observers in dispatch order")
  .action(async () => {
    const config = requireConfig();
    const app = await createApp(config, { logger: cliLogger(config) });

    const entries = app.registry.list();
    if (entries.length === 0) {
      console.log(chalk.yellow("No observers registered."));
    } else {
      console.log(chalk.bold(`\nObservers (${entries.length}):\n`));
      for (const { descriptor } of entries) {
        console.log(
          `  ${chalk.cyan(descriptor.name.padEnd(20))} ${descriptor.runtime.padEnd(18)} ` +
            chalk.dim(
              `priority=${descriptor.priority} timeout=${descriptor.timeoutMs}ms ` +
                `events=${[...descriptor.events].join(",")} may=${[...descriptor.capabilities].join(",") || "none"}`
            )
        );
      }
      console.log(chalk.dim(`\nScripts directory: ${getScriptsDirectory(config)}\n`));
    }
    await app.close(0);
  });

// Tags command
program
  .command("tags [tag]")
  .description("List indexed tags, or the notes carrying one tag")
  .action(async (tag: string | undefined) => {
    const config = requireConfig();
    const index = await NoteIndex.create(getDatabasePath(config));

    if (tag) {
      const paths = index.notesWithTag(tag);
      if (paths.length === 0) {
        console.log(chalk.yellow(`No notes tagged '${tag}'.`));
      }
      for (const path of paths) {
        console.log(path);
      }
    } else {
      const tags = index.listTags();
      if (tags.length === 0) {
        console.log(chalk.yellow("No tags indexed yet. Run 'noteflow sync' first."));
      }
      for (const { tag: name, count } of tags) {
        console.log(`${chalk.cyan(name)} ${chalk.dim(String(count))}`);
      }
    }
    index.close();
  });

// Daemon commands
const daemonCmd = program.command("daemon").description("Manage the background daemon");

daemonCmd
  .command("start")
  .description("Start the background daemon")
  .option("-f, --foreground", "Run in foreground (don't detach)")
  .action(async (options: { foreground?: boolean }) => {
    requireConfig();

    const status = getDaemonStatus();
    if (status.running) {
      console.log(chalk.yellow(`Daemon is already running (PID: ${status.pid})`));
      return;
    }

    if (options.foreground) {
      await runDaemon();
    } else {
      console.log("Starting daemon in background...");
      startDaemonBackground();

      // Wait for daemon to initialize (sql.js needs time to load)
      await new Promise((resolve) => setTimeout(resolve, 3000));
      const newStatus = getDaemonStatus();
      if (newStatus.running) {
        console.log(chalk.green(`Daemon started (PID: ${newStatus.pid})`));
      } else {
        console.log(chalk.yellow("Daemon may have failed to start. Check logs."));
      }
    }
  });

daemonCmd
  .command("stop")
  .description("Stop the background daemon")
  .action(() => {
    stopDaemon();
  });

daemonCmd
  .command("status")
  .description("Check daemon status")
  .action(() => {
    const status = getDaemonStatus();
    if (status.running) {
      console.log(chalk.green(`Daemon is running (PID: ${status.pid})`));
      if (status.logFile) {
        console.log(chalk.dim(`Log: ${status.logFile}`));
      }
    } else {
      console.log(chalk.yellow("Daemon is not running"));
    }
  });

// Hidden run command - used by startDaemonBackground() to spawn the daemon process
daemonCmd
  .command("run", { hidden: true })
  .action(async () => {
    await runDaemon();
  });

// Config command
program
  .command("config")
  .description("Show current configuration")
  .action(() => {
    const config = requireConfig();
    console.log(chalk.bold("\nConfiguration:\n"));
    console.log(`Config file: ${getConfigPath()}`);
    console.log(`Notes directory: ${getNotesDirectory(config)} (*.${config.fileExtension})`);
    console.log(`Scripts directory: ${getScriptsDirectory(config)}`);
    console.log(`Built-in observers: ${config.enabledObservers.join(", ") || "none"}`);
    console.log(`Executed fence languages: ${config.codeFence.languages.join(", ")}`);
    console.log(`Debounce: ${config.watcher.debounceMs}ms`);
    console.log(`Concurrency: ${config.pipeline.concurrency}`);
    console.log(`Log level: ${config.logLevel}`);
  });

program.parseAsync().catch((error: unknown) => {
  if (error instanceof NoteflowError) {
    console.error(chalk.red(`${error.message} (${error.code})`));
  } else {
    console.error(chalk.red(`Unexpected error: ${errorMessage(error)}`));
  }
  process.exit(1);
});
