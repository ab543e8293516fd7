import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ZodError } from "zod";
import { ConfigError } from "../errors.js";
import { type Config, ConfigSchema, DEFAULT_CONFIG } from "./schema.js";

const CONFIG_FILENAME = ".noteflow.json";
const CONFIG_ENV_VAR = "NOTEFLOW_CONFIG";

export function getConfigPath(): string {
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return expandPath(fromEnv);
  }
  return join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

export function parseConfig(raw: unknown, source: string = "config"): Config {
  try {
    return ConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid ${source}: ${issues}`);
    }
    throw error;
  }
}

export function loadConfig(): Config {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }
  return parseConfig(parsed, `config file ${configPath}`);
}

export function saveConfig(config: Config): void {
  const configPath = getConfigPath();
  const validated = ConfigSchema.parse(config);
  writeFileSync(configPath, JSON.stringify(validated, null, 2) + "\n");
}

export function getNotesDirectory(config: Config): string {
  return expandPath(config.notesDirectory);
}

export function getIndexDirectory(config: Config): string {
  return join(getNotesDirectory(config), ".index");
}

export function getDatabasePath(config: Config): string {
  return join(getIndexDirectory(config), "notes.db");
}

export function getScriptsDirectory(config: Config): string {
  if (config.scriptsDirectory) {
    return expandPath(config.scriptsDirectory);
  }
  return join(getNotesDirectory(config), ".scripts");
}

export function getPidFilePath(config: Config): string {
  if (config.daemon.pidFile) {
    return expandPath(config.daemon.pidFile);
  }
  return join(getIndexDirectory(config), "daemon.pid");
}

export function getLogFilePath(config: Config): string {
  if (config.daemon.logFile) {
    return expandPath(config.daemon.logFile);
  }
  return join(getIndexDirectory(config), "daemon.log");
}

export function ensureDirectories(config: Config): void {
  for (const dir of [getNotesDirectory(config), getIndexDirectory(config)]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

export * from "./schema.js";
