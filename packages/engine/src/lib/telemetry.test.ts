import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  configureTelemetry,
  flushTelemetry,
  toTelemetryProperties,
  trackEvent,
  trackException,
  trackMetric,
} from "./telemetry";

describe("toTelemetryProperties", () => {
  it("stringifies values and drops absent ones", () => {
    assert.deepEqual(
      toTelemetryProperties({ mode: "dark", renderers: 2, transparent: false, image: null, output: undefined }),
      { mode: "dark", renderers: "2", transparent: "false" }
    );
  });

  it("returns undefined when nothing is left", () => {
    assert.equal(toTelemetryProperties(), undefined);
    assert.equal(toTelemetryProperties({ image: null }), undefined);
  });
});

describe("telemetry without a connection string", () => {
  it("stays unconfigured for a missing or blank connection string", () => {
    assert.equal(configureTelemetry(undefined), false);
    assert.equal(configureTelemetry("   "), false);
  });

  it("accepts every track call and flushes immediately", async () => {
    assert.doesNotThrow(() => {
      trackEvent("palette.generated", { mode: "dark" });
      trackMetric("palette.duration_ms", 12, { source: "color" });
      trackException("not an Error instance", { stage: "generate-palette" });
    });
    await flushTelemetry();
  });
});
