export { createApp, type AppOptions, type NoteflowApp } from "./app.js";
export * from "./config/index.js";
export * from "./errors.js";
export { Logger, createLogger, silentLogger, type LogSink, type LoggerOptions } from "./logging.js";
export { NoteIndex, type IndexedNote, type TagCount } from "./index/indexer.js";
export { NoteStore, hashContent } from "./notes/store.js";
export { parseNoteFile, serializeNoteFile } from "./notes/frontmatter.js";
export type { Frontmatter, FrontmatterValue, Note } from "./notes/types.js";
export { BUILTIN_OBSERVERS, registerBuiltinObservers, resolveDescriptor } from "./observers/index.js";
export { ScriptLoader } from "./observers/loader.js";
export { toPluginPayload, type NoteEvent, type NoteEventKind } from "./pipeline/events.js";
export { Dispatcher, type DispatchResult } from "./pipeline/dispatcher.js";
export { MergeEngine, type MergedNote, type MergeReport, type ObserverOutcome } from "./pipeline/merge.js";
export { NotePipeline, type PipelineEvents, type ProcessOutcome, type SyncSummary } from "./pipeline/pipeline.js";
export { ObserverRegistry } from "./pipeline/registry.js";
export { NativeRuntime, type NativeHandler } from "./runtimes/native.js";
export {
  UNCHANGED,
  defineObserver,
  failed,
  type Capability,
  type ObserverDescriptor,
  type ObserverResult,
  type ObserverRuntime,
} from "./runtimes/types.js";
