import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "../src/core/logger.js";

describe("createLogger", () => {
  it("writes one tagged line per record with sorted fields", () => {
    const lines: string[] = [];
    const log = createLogger("commitfs", "info", (l) => lines.push(l));
    log.info("committed", { path: "a.txt", op: "add", skipped: undefined });
    log.warn("slow", { ms: 120, nested: { a: 1 } });
    expect(lines).toEqual([
      "[commitfs] info committed op=add path=a.txt",
      '[commitfs] warn slow ms=120 nested={"a":1}',
    ]);
  });

  it("drops records below the threshold", () => {
    const lines: string[] = [];
    const log = createLogger("commitfs", "warn", (l) => lines.push(l));
    log.debug("d");
    log.info("i");
    log.error("e");
    expect(lines).toEqual(["[commitfs] error e"]);
  });

  it("extends the component tag for children", () => {
    const lines: string[] = [];
    const log = createLogger("commitfs", "debug", (l) => lines.push(l)).child("lock");
    log.debug("waiting");
    expect(lines).toEqual(["[commitfs/lock] debug waiting"]);
  });

  it("silentLogger discards everything", () => {
    expect(() => silentLogger.child("x").error("nothing")).not.toThrow();
  });
});
