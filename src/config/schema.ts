import { z } from "zod";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export const NoteEventKindSchema = z.enum(["created", "updated", "synced", "deleted"]);
export const CapabilitySchema = z.enum(["metadata", "body"]);

export const WatcherConfigSchema = z.object({
  debounceMs: z.number().int().min(50).max(5000).default(400),
  ignored: z.array(z.string()).default([]),
  startRetries: z.number().int().min(0).max(20).default(5),
});

export const PipelineConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
  shutdownGraceMs: z.number().int().min(0).default(5000),
  persistRetries: z.number().int().min(1).max(10).default(3),
  persistBackoffMs: z.number().int().min(0).default(100),
});

export const RuntimesConfigSchema = z.object({
  restrictedPoolSize: z.number().int().min(1).max(32).default(4),
  defaultTimeoutMs: z.number().int().min(10).default(5000),
});

export const CodeFenceConfigSchema = z.object({
  languages: z.array(z.string()).min(1).default(["js"]),
  blockTimeoutMs: z.number().int().min(10).default(1000),
});

export const ObserverOverrideSchema = z.object({
  enabled: z.boolean().optional(),
  priority: z.number().int().optional(),
  timeoutMs: z.number().int().min(10).optional(),
  events: z.array(NoteEventKindSchema).optional(),
  capabilities: z.array(CapabilitySchema).optional(),
});

export const DaemonConfigSchema = z.object({
  pidFile: z.string().optional(),
  logFile: z.string().optional(),
});

export const ConfigSchema = z.object({
  notesDirectory: z.string().default("~/notes"),
  fileExtension: z.string().regex(/^[\w-]+$/).default("md"),
  scriptsDirectory: z.string().optional(),
  watcher: WatcherConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  runtimes: RuntimesConfigSchema.default({}),
  codeFence: CodeFenceConfigSchema.default({}),
  enabledObservers: z
    .array(z.string())
    .default(["code_fence", "inline_tags", "timestamp"]),
  observers: z.record(z.string(), ObserverOverrideSchema).default({}),
  daemon: DaemonConfigSchema.default({}),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type WatcherConfig = z.infer<typeof WatcherConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RuntimesConfig = z.infer<typeof RuntimesConfigSchema>;
export type CodeFenceConfig = z.infer<typeof CodeFenceConfigSchema>;
export type ObserverOverride = z.infer<typeof ObserverOverrideSchema>;
export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
