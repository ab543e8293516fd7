export class NoteflowError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "NoteflowError";
  }
}

export class ConfigError extends NoteflowError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/** The note directory could not be watched. Fatal to the watch loop only. */
export class WatchError extends NoteflowError {
  constructor(
    public readonly directory: string,
    cause: string,
  ) {
    super(`Cannot watch '${directory}': ${cause}`, "WATCH_ERROR");
    this.name = "WatchError";
  }
}

export class ObserverExecutionError extends NoteflowError {
  constructor(
    public readonly observer: string,
    message: string,
    code: string = "OBSERVER_EXECUTION_ERROR",
  ) {
    super(message, code);
    this.name = "ObserverExecutionError";
  }
}

export class ObserverTimeoutError extends ObserverExecutionError {
  constructor(observer: string, timeoutMs: number) {
    super(observer, `Observer '${observer}' timed out after ${timeoutMs}ms`, "OBSERVER_TIMEOUT");
    this.name = "ObserverTimeoutError";
  }
}

export class PluginContractError extends ObserverExecutionError {
  constructor(observer: string, detail: string) {
    super(observer, `Observer '${observer}' returned an invalid result: ${detail}`, "PLUGIN_CONTRACT");
    this.name = "PluginContractError";
  }
}

/** The file changed on disk between dispatch start and commit. */
export class MergeConflictError extends NoteflowError {
  constructor(
    public readonly path: string,
    public readonly expectedHash: string,
    public readonly actualHash: string | null,
  ) {
    super(`Note '${path}' changed on disk during processing`, "MERGE_CONFLICT");
    this.name = "MergeConflictError";
  }
}

export class PersistenceError extends NoteflowError {
  constructor(
    public readonly path: string,
    cause: string,
    public readonly attempts: number,
  ) {
    super(`Failed to write '${path}' after ${attempts} attempt(s): ${cause}`, "PERSISTENCE_ERROR");
    this.name = "PersistenceError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
