import { describe, expect, it } from "vitest";
import { Logger } from "./logging.js";

describe("Logger", () => {
  it("drops lines below its level and prefixes the scope", () => {
    const lines: string[] = [];
    const logger = new Logger("app", { level: "warn", sink: { write: (line) => lines.push(line) } });

    logger.info("hidden");
    logger.child("pipeline").warn("careful");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[.+\] WARN  app:pipeline: careful$/);
  });
});
