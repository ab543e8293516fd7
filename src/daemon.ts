import { readFileSync, writeFileSync, existsSync, unlinkSync } from "fs";
import { spawn, ChildProcess } from "child_process";
import { createApp } from "./app.js";
import {
  loadConfig,
  configExists,
  getPidFilePath,
  getLogFilePath,
  ensureDirectories,
} from "./config/index.js";
import { errorMessage } from "./errors.js";
import { Logger } from "./logging.js";

function writePidFile(pidPath: string): void {
  writeFileSync(pidPath, process.pid.toString());
}

function removePidFile(pidPath: string): void {
  if (existsSync(pidPath)) {
    unlinkSync(pidPath);
  }
}

function readPidFile(pidPath: string): number | null {
  if (!existsSync(pidPath)) {
    return null;
  }
  try {
    const pid = parseInt(readFileSync(pidPath, "utf-8").trim(), 10);
    return isNaN(pid) ? null : pid;
  } catch {
    return null;
  }
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/** Runs the watch pipeline in the foreground, logging to the daemon log file. */
export async function runDaemon(): Promise<void> {
  if (!configExists()) {
    console.error("No configuration found. Run 'noteflow init' first.");
    process.exit(1);
  }

  const config = loadConfig();
  ensureDirectories(config);

  const pidPath = getPidFilePath(config);
  const existingPid = readPidFile(pidPath);

  if (existingPid && existingPid !== process.pid && isProcessRunning(existingPid)) {
    console.error(`Daemon is already running (PID: ${existingPid})`);
    process.exit(1);
  }

  // Clean up stale PID file
  if (existingPid) {
    removePidFile(pidPath);
  }

  const logger = new Logger("daemon", { level: config.logLevel, logFile: getLogFilePath(config) });
  logger.info("Starting noteflow daemon...");
  writePidFile(pidPath);

  const app = await createApp(config, { logger, watch: true, index: true });

  app.pipeline.on("conflict", (error) => {
    logger.warn(`Conflict on ${error.path}, re-queued`);
  });
  app.pipeline.on("observerFailed", (failure) => {
    logger.warn(`Observer ${failure.observer} failed on ${failure.path}: ${failure.reason}`);
  });
  app.pipeline.on("failed", (path, error) => {
    logger.error(`Could not process ${path}: ${error.message}`);
  });

  try {
    await app.start();
  } catch (error) {
    logger.error(`Failed to start watching: ${errorMessage(error)}`);
    await app.close(0);
    removePidFile(pidPath);
    process.exit(1);
  }

  // Handle shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("Shutting down daemon...");

    try {
      await app.close(config.pipeline.shutdownGraceMs);
    } catch (error) {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
    }

    removePidFile(pidPath);
    logger.info("Daemon stopped");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
  if (process.platform !== "win32") {
    process.on("SIGHUP", onSignal);
  }

  logger.info(`Daemon started (PID: ${process.pid}), ${app.registry.size} observer(s) registered`);
}

export function stopDaemon(): void {
  if (!configExists()) {
    console.error("No configuration found.");
    process.exit(1);
  }

  const config = loadConfig();
  const pidPath = getPidFilePath(config);
  const pid = readPidFile(pidPath);

  if (!pid) {
    console.log("Daemon is not running (no PID file)");
    return;
  }

  if (!isProcessRunning(pid)) {
    console.log("Daemon is not running (stale PID file)");
    removePidFile(pidPath);
    return;
  }

  try {
    process.kill(pid, "SIGTERM");
    console.log(`Sent SIGTERM to daemon (PID: ${pid})`);

    // Wait past the shutdown grace period before forcing it
    const maxAttempts = Math.ceil(config.pipeline.shutdownGraceMs / 500) + 4;
    let attempts = 0;
    const checkInterval = setInterval(() => {
      if (!isProcessRunning(pid)) {
        clearInterval(checkInterval);
        console.log("Daemon stopped");
        removePidFile(pidPath);
      } else if (attempts++ > maxAttempts) {
        clearInterval(checkInterval);
        console.log("Daemon did not stop gracefully, sending SIGKILL");
        try {
          process.kill(pid, "SIGKILL");
        } catch {
          // Already dead
        }
        removePidFile(pidPath);
      }
    }, 500);
  } catch (error) {
    console.error(`Failed to stop daemon: ${errorMessage(error)}`);
    process.exit(1);
  }
}

export function getDaemonStatus(): {
  running: boolean;
  pid: number | null;
  logFile?: string;
} {
  if (!configExists()) {
    return { running: false, pid: null };
  }

  const config = loadConfig();
  const pidPath = getPidFilePath(config);
  const pid = readPidFile(pidPath);

  if (!pid) {
    return { running: false, pid: null };
  }

  const running = isProcessRunning(pid);

  if (!running) {
    // Clean up stale PID file
    removePidFile(pidPath);
    return { running: false, pid: null };
  }

  return { running: true, pid, logFile: getLogFilePath(config) };
}

export function startDaemonBackground(): ChildProcess {
  const child = spawn(process.execPath, [process.argv[1], "daemon", "run"], {
    detached: true,
    stdio: "ignore",
  });

  child.unref();
  return child;
}
