import prompts from "prompts";
import chalk from "chalk";
import { mkdirSync } from "fs";
import { join } from "path";
import {
  type Config,
  DEFAULT_CONFIG,
  LOG_LEVELS,
  parseConfig,
  saveConfig,
  getConfigPath,
  configExists,
  ensureDirectories,
  getDatabasePath,
  getNotesDirectory,
  getScriptsDirectory,
} from "../config/index.js";
import { NoteIndex } from "../index/indexer.js";
import { BUILTIN_OBSERVERS } from "../observers/index.js";
import { INTERPRETER_DIR, RESTRICTED_DIR } from "../observers/loader.js";

export async function runInteractiveSetup(
  options: { force?: boolean } = {}
): Promise<Config | null> {
  console.log(chalk.bold("\nnoteflow setup\n"));

  if (configExists() && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${getConfigPath()}. Overwrite?`,
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  const responses = await prompts(
    [
      {
        type: "text",
        name: "notesDirectory",
        message: "Which directory holds your notes?",
        initial: DEFAULT_CONFIG.notesDirectory,
        validate: (value: string) => {
          if (!value.trim()) return "Directory path is required";
          return true;
        },
      },
      {
        type: "multiselect",
        name: "enabledObservers",
        message: "Built-in observers to enable",
        choices: BUILTIN_OBSERVERS.map((name) => ({
          title: name,
          value: name,
          selected: DEFAULT_CONFIG.enabledObservers.includes(name),
        })),
      },
      {
        type: (_, values) => (values.enabledObservers?.includes("code_fence") ? "list" : null),
        name: "languages",
        message: "Fence languages to execute (comma-separated):",
        initial: DEFAULT_CONFIG.codeFence.languages.join(", "),
        separator: ",",
      },
      {
        type: "number",
        name: "debounceMs",
        message: "Debounce window for file changes (ms)?",
        initial: DEFAULT_CONFIG.watcher.debounceMs,
        min: 50,
        max: 5000,
      },
      {
        type: "select",
        name: "logLevel",
        message: "Log level",
        choices: LOG_LEVELS.map((level) => ({ title: level, value: level })),
        initial: LOG_LEVELS.indexOf(DEFAULT_CONFIG.logLevel),
      },
    ],
    {
      onCancel: () => {
        console.log(chalk.yellow("\nSetup cancelled."));
        process.exit(0);
      },
    }
  );

  const languages: unknown = responses.languages;
  const config = parseConfig(
    {
      notesDirectory: responses.notesDirectory,
      enabledObservers: responses.enabledObservers,
      codeFence: {
        languages: Array.isArray(languages)
          ? languages.map((language) => String(language).trim()).filter(Boolean)
          : DEFAULT_CONFIG.codeFence.languages,
      },
      watcher: { debounceMs: responses.debounceMs ?? DEFAULT_CONFIG.watcher.debounceMs },
      logLevel: responses.logLevel,
    },
    "setup answers"
  );

  console.log(chalk.dim("\nCreating configuration..."));
  saveConfig(config);
  console.log(chalk.green(`✓ Created ${getConfigPath()}`));

  console.log(chalk.dim("Creating directories..."));
  ensureDirectories(config);
  const scriptsDir = getScriptsDirectory(config);
  for (const dir of [RESTRICTED_DIR, INTERPRETER_DIR]) {
    mkdirSync(join(scriptsDir, dir), { recursive: true });
  }
  console.log(chalk.green(`✓ Created ${getNotesDirectory(config)}`));
  console.log(chalk.green(`✓ Created ${scriptsDir}`));

  console.log(chalk.dim("Initializing note index..."));
  try {
    const index = await NoteIndex.create(getDatabasePath(config));
    index.close();
    console.log(chalk.green("✓ Created SQLite index"));
  } catch {
    console.log(chalk.yellow("⚠ Could not initialize the index (will retry on first use)"));
  }

  console.log(chalk.bold.green("\nSetup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Process existing notes:  ") + "noteflow sync");
  console.log(chalk.dim("  2. Start the daemon:        ") + "noteflow daemon start");
  console.log(chalk.dim("  3. Add your own observers under:"));
  console.log(chalk.dim("     ") + join(scriptsDir, RESTRICTED_DIR) + chalk.dim("  (onEvent(event) scripts)"));
  console.log(chalk.dim("     ") + join(scriptsDir, INTERPRETER_DIR) + chalk.dim("  (modules exporting processEvent)\n"));

  return config;
}

export async function checkFirstRun(): Promise<boolean> {
  if (!configExists()) {
    console.log(chalk.yellow("No configuration found. Running first-time setup...\n"));
    const config = await runInteractiveSetup();
    return config !== null;
  }
  return true;
}
