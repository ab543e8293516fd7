import type { Config } from "../config/index.js";
import type { Logger } from "../logging.js";
import type { ObserverRegistry } from "../pipeline/registry.js";
import { NativeRuntime } from "../runtimes/native.js";
import type { ScriptSandbox } from "../runtimes/sandbox.js";
import {
  defineObserver,
  type DescriptorInput,
  type ObserverDescriptor,
  type ObserverRuntime,
} from "../runtimes/types.js";
import { CodeFenceObserver } from "./code-fence.js";
import { contentMetricsHandler } from "./content-metrics.js";
import { inlineTagsHandler } from "./inline-tags.js";
import { createTimestampHandler, type Clock } from "./timestamp.js";
import { timeTrackingHandler } from "./time-tracking.js";
import { tocHandler } from "./toc.js";

export const BUILTIN_OBSERVERS = [
  "code_fence",
  "inline_tags",
  "timestamp",
  "toc",
  "time_tracking",
  "content_metrics",
] as const;
export type BuiltinObserverName = (typeof BUILTIN_OBSERVERS)[number];

export interface ObserverDefinition {
  descriptor: ObserverDescriptor;
  runtime: ObserverRuntime;
}

/**
 * Applies the per-observer overrides from config on top of an observer's own
 * defaults. Returns null when config disables it.
 */
export function resolveDescriptor(input: DescriptorInput, config: Config): ObserverDescriptor | null {
  const override = config.observers[input.name];
  if (override?.enabled === false) {
    return null;
  }
  return defineObserver({
    ...input,
    timeoutMs: override?.timeoutMs ?? input.timeoutMs ?? config.runtimes.defaultTimeoutMs,
    priority: override?.priority ?? input.priority,
    events: override?.events ?? input.events,
    capabilities: override?.capabilities ?? input.capabilities,
  });
}

export interface BuiltinDependencies {
  sandbox: ScriptSandbox;
  logger?: Logger;
  clock?: Clock;
}

function builtin(name: BuiltinObserverName, config: Config, deps: BuiltinDependencies): ObserverDefinition | null {
  switch (name) {
    case "code_fence": {
      const descriptor = resolveDescriptor(
        { name, runtime: "restricted-script", capabilities: ["body"], priority: 10 },
        config,
      );
      const runtime = new CodeFenceObserver(deps.sandbox, config.codeFence, deps.logger?.child(name));
      return descriptor && { descriptor, runtime };
    }
    case "inline_tags": {
      const descriptor = resolveDescriptor(
        { name, runtime: "native", capabilities: ["metadata"], priority: 5 },
        config,
      );
      return descriptor && { descriptor, runtime: new NativeRuntime(inlineTagsHandler) };
    }
    case "timestamp": {
      const descriptor = resolveDescriptor(
        { name, runtime: "native", capabilities: ["metadata"], priority: 0 },
        config,
      );
      return descriptor && { descriptor, runtime: new NativeRuntime(createTimestampHandler(deps.clock)) };
    }
    case "toc": {
      const descriptor = resolveDescriptor({ name, runtime: "native", capabilities: ["body"], priority: 1 }, config);
      return descriptor && { descriptor, runtime: new NativeRuntime(tocHandler) };
    }
    case "time_tracking": {
      const descriptor = resolveDescriptor(
        { name, runtime: "native", capabilities: ["metadata"], priority: 0 },
        config,
      );
      return descriptor && { descriptor, runtime: new NativeRuntime(timeTrackingHandler) };
    }
    case "content_metrics": {
      const descriptor = resolveDescriptor(
        { name, runtime: "native", capabilities: ["metadata"], priority: 0 },
        config,
      );
      return descriptor && { descriptor, runtime: new NativeRuntime(contentMetricsHandler) };
    }
  }
}

function isBuiltinName(name: string): name is BuiltinObserverName {
  return BUILTIN_OBSERVERS.some((builtinName) => builtinName === name);
}

/** The built-in observers named in `enabledObservers`, in that order. */
export function createBuiltinObservers(config: Config, deps: BuiltinDependencies): ObserverDefinition[] {
  const definitions: ObserverDefinition[] = [];
  for (const name of config.enabledObservers) {
    if (!isBuiltinName(name)) {
      deps.logger?.warn(`Unknown built-in observer '${name}' in enabledObservers`);
      continue;
    }
    const definition = builtin(name, config, deps);
    if (definition) {
      definitions.push(definition);
    }
  }
  return definitions;
}

export function registerBuiltinObservers(
  registry: ObserverRegistry,
  config: Config,
  deps: BuiltinDependencies,
): ObserverDefinition[] {
  const definitions = createBuiltinObservers(config, deps);
  for (const { descriptor, runtime } of definitions) {
    registry.register(descriptor, runtime);
  }
  return definitions;
}
