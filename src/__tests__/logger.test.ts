import { describe, expect, it } from "vitest";
import { createLogger, isLogLevel } from "../logger.js";

describe("createLogger", () => {
  it("drops messages below the level", () => {
    const lines: string[] = [];
    const log = createLogger({ level: "warn", sink: (line) => lines.push(line) });
    log.debug("d");
    log.info("i");
    log.warn("w");
    log.error("e");
    expect(lines).toEqual(["[freqdict] WARN w", "[freqdict] ERROR e"]);
  });

  it("nests module prefixes in children", () => {
    const lines: string[] = [];
    const log = createLogger({ level: "debug", module: "build", sink: (line) => lines.push(line) });
    log.child("nwjc").debug("merged");
    expect(lines).toEqual(["[freqdict] DEBUG [build:nwjc] merged"]);
  });

  it("passes extra arguments to the sink", () => {
    const calls: unknown[][] = [];
    createLogger({ sink: (...args) => calls.push(args) }).info("count", 3);
    expect(calls).toEqual([["[freqdict] INFO count", 3]]);
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(["debug", "info", "warn", "error", "trace", "toString"].map(isLogLevel)).toEqual([
      true,
      true,
      true,
      true,
      false,
      false,
    ]);
  });
});
