import { appendFileSync } from "fs";
import type { LogLevel } from "./config/schema.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LogSink {
  write(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  logFile?: string;
  sink?: LogSink;
}

const stderrSink: LogSink = {
  write: (line) => console.error(line),
};

/**
 * Timestamped logger. Lines go to stderr (stdout is left to CLI output) and,
 * when a log file is configured, are appended to it as well.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly logFile?: string;
  private readonly sink: LogSink;

  constructor(
    private readonly scope: string,
    options: LoggerOptions = {},
  ) {
    this.level = options.level ?? "info";
    this.logFile = options.logFile;
    this.sink = options.sink ?? stderrSink;
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, {
      level: this.level,
      logFile: this.logFile,
      sink: this.sink,
    });
  }

  error(message: string): void {
    this.log("error", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${this.scope}: ${message}`;
    this.sink.write(line);

    if (this.logFile) {
      try {
        appendFileSync(this.logFile, line + "\n");
      } catch {
        // Ignore log file errors
      }
    }
  }
}

export const silentLogger = new Logger("silent", { sink: { write: () => undefined } });

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return new Logger(scope, options);
}
