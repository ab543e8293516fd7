import { describe, expect, it } from "vitest";
import { NativeRuntime } from "../runtimes/native.js";
import { UNCHANGED, defineObserver } from "../runtimes/types.js";
import { ObserverRegistry } from "./registry.js";

const runtime = new NativeRuntime(() => UNCHANGED);

function names(registry: ObserverRegistry, kind?: "created" | "deleted"): string[] {
  const entries = kind ? registry.listFor(kind) : registry.list();
  return entries.map(({ descriptor }) => descriptor.name);
}

describe("ObserverRegistry", () => {
  it("orders by priority, then by registration", () => {
    const registry = new ObserverRegistry();
    registry.register(defineObserver({ name: "low", runtime: "native", priority: 0 }), runtime);
    registry.register(defineObserver({ name: "first-high", runtime: "native", priority: 5 }), runtime);
    registry.register(defineObserver({ name: "second-high", runtime: "native", priority: 5 }), runtime);

    expect(names(registry)).toEqual(["first-high", "second-high", "low"]);
  });

  it("keeps the original slot when a name is registered again", () => {
    const registry = new ObserverRegistry();
    registry.register(defineObserver({ name: "a", runtime: "native", priority: 1 }), runtime);
    registry.register(defineObserver({ name: "b", runtime: "native", priority: 1 }), runtime);
    const replacement = new NativeRuntime(() => UNCHANGED);
    registry.register(defineObserver({ name: "a", runtime: "native", priority: 1 }), replacement);

    expect(names(registry)).toEqual(["a", "b"]);
    expect(registry.get("a")?.runtime).toBe(replacement);
    expect(registry.size).toBe(2);
  });

  it("filters by the events an observer subscribes to", () => {
    const registry = new ObserverRegistry();
    registry.register(defineObserver({ name: "edits", runtime: "native" }), runtime);
    registry.register(defineObserver({ name: "cleanup", runtime: "native", events: ["deleted"] }), runtime);

    expect(names(registry, "created")).toEqual(["edits"]);
    expect(names(registry, "deleted")).toEqual(["cleanup"]);
  });

  it("forgets unregistered observers", () => {
    const registry = new ObserverRegistry();
    registry.register(defineObserver({ name: "a", runtime: "native" }), runtime);

    expect(registry.unregister("a")).toBe(true);
    expect(registry.unregister("a")).toBe(false);
    expect(registry.has("a")).toBe(false);
  });
});
