import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { RunLogger, type LogWriter } from "./run-logger";

function captureWriter() {
  const calls: Array<{ method: keyof LogWriter; args: unknown[] }> = [];
  const writer: LogWriter = {
    log: (...args: unknown[]) => {
      calls.push({ method: "log", args });
    },
    warn: (...args: unknown[]) => {
      calls.push({ method: "warn", args });
    },
    error: (...args: unknown[]) => {
      calls.push({ method: "error", args });
    },
  };
  return { writer, calls };
}

const fixedNow = () => new Date("2026-02-01T12:00:00.000Z");

describe("RunLogger", () => {
  it("records structured entries and forwards them with a level prefix", () => {
    const { writer, calls } = captureWriter();
    const logger = new RunLogger({ writer, now: fixedNow });

    logger.info("Palette cache written", { cachePath: "/state/colors.json" });
    logger.warn("External sink git failed");
    logger.error("Renderer failed", {});

    assert.deepEqual(logger.getEntries(), [
      {
        ts: "2026-02-01T12:00:00.000Z",
        level: "info",
        msg: "Palette cache written",
        data: { cachePath: "/state/colors.json" },
      },
      { ts: "2026-02-01T12:00:00.000Z", level: "warn", msg: "External sink git failed" },
      { ts: "2026-02-01T12:00:00.000Z", level: "error", msg: "Renderer failed" },
    ]);
    assert.deepEqual(calls, [
      { method: "log", args: ["[INFO] Palette cache written", { cachePath: "/state/colors.json" }] },
      { method: "warn", args: ["[WARN] External sink git failed"] },
      { method: "error", args: ["[ERROR] Renderer failed", {}] },
    ]);
  });

  it("forwards debug entries only when enabled", () => {
    const quiet = captureWriter();
    const quietLogger = new RunLogger({ writer: quiet.writer });
    quietLogger.debug("term1: #CC241D -> #E0556B");
    assert.equal(quiet.calls.length, 0);
    assert.equal(quietLogger.getEntries()[0]?.level, "debug");

    const verbose = captureWriter();
    new RunLogger({ writer: verbose.writer, debug: true }).debug("term1: #CC241D -> #E0556B");
    assert.deepEqual(verbose.calls, [{ method: "log", args: ["[DEBUG] term1: #CC241D -> #E0556B"] }]);
  });

  it("drops the oldest entries when full", () => {
    const { writer } = captureWriter();
    const logger = new RunLogger({ writer, maxEntries: 5 });
    for (let index = 0; index < 6; index++) {
      logger.info(`m${index}`);
    }
    assert.deepEqual(
      logger.getEntries().map((entry) => entry.msg),
      ["m1", "m2", "m3", "m4", "m5"]
    );
  });
});
