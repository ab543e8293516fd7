import { describe, expect, it } from "vitest";
import { PluginContractError } from "../errors.js";
import { parsePluginResult } from "./contract.js";

describe("parsePluginResult", () => {
  it("reads null, undefined and an empty object as no change", () => {
    expect(parsePluginResult("demo", null)).toEqual({ status: "unchanged" });
    expect(parsePluginResult("demo", undefined)).toEqual({ status: "unchanged" });
    expect(parsePluginResult("demo", "{}")).toEqual({ status: "unchanged" });
  });

  it("maps content to the body and keeps metadata and markers", () => {
    const result = parsePluginResult(
      "demo",
      '{"metadata":{"reviewed":true,"old":null},"content":"New body\\n","markers":["v2"]}',
    );

    expect(result).toEqual({
      status: "modified",
      metadata: { reviewed: true, old: null },
      body: "New body\n",
      markers: ["v2"],
    });
  });

  it("accepts an already decoded object", () => {
    expect(parsePluginResult("demo", { metadata: { tags: ["a"] } })).toEqual({
      status: "modified",
      metadata: { tags: ["a"] },
    });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parsePluginResult("demo", "not json")).toThrow(
      new PluginContractError("demo", "result is not valid JSON"),
    );
  });

  it("rejects values outside the result shape", () => {
    expect(() => parsePluginResult("demo", { metadata: { nested: { a: 1 } } })).toThrow(PluginContractError);
    expect(() => parsePluginResult("demo", { content: 42 })).toThrow(PluginContractError);
    expect(() => parsePluginResult("demo", [1, 2])).toThrow(PluginContractError);
  });
});
