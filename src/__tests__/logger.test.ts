import { describe, expect, it } from "vitest";
import { createLogger, silentLogger, type LoggerOptions } from "../logger.js";

function capture(opts: LoggerOptions) {
  const lines: string[] = [];
  const logger = createLogger({ ...opts, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe("createLogger", () => {
  it("writes the name, message and fields", () => {
    const { logger, lines } = capture({ level: "info", name: "demo" });
    logger.info("hello", { a: 1, who: "you" });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("INFO");
    expect(lines[0]).toContain("[demo] hello a=1 who=you");
  });

  it("drops messages below the level", () => {
    const { logger, lines } = capture({ level: "warn" });
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/ w$/);
    expect(lines[1]).toMatch(/ e$/);
  });

  it("defaults to warn", () => {
    const { logger, lines } = capture({});
    logger.info("quiet");
    logger.warn("loud");
    expect(lines).toHaveLength(1);
  });

  it("writes nothing when silent", () => {
    const { logger, lines } = capture({ level: "silent" });
    logger.error("nope");
    expect(lines).toEqual([]);
  });

  it("renders errors by message and other values as JSON", () => {
    const { logger, lines } = capture({ level: "debug" });
    logger.debug("x", { error: new Error("bad thing"), ids: [1, 2], none: undefined });
    expect(lines[0]).toContain("x error=bad thing ids=[1,2] none=undefined");
  });

  it("omits the field list when empty", () => {
    const { logger, lines } = capture({ level: "debug", name: "n" });
    logger.debug("bare", {});
    expect(lines[0]?.endsWith("[n] bare")).toBe(true);
  });
});

describe("silentLogger", () => {
  it("accepts every level without throwing", () => {
    expect(() => {
      silentLogger.debug("a");
      silentLogger.error("b", { c: 1 });
    }).not.toThrow();
  });
});
