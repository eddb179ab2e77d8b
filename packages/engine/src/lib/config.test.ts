import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { resolveEngineConfig } from "./config";
import { PaletteInputError } from "./errors";
import { DEFAULT_HARMONIZE_OPTIONS } from "./harmonizer";

const HOME = "/home/tester";

describe("resolveEngineConfig", () => {
  it("applies defaults around a literal color", () => {
    const config = resolveEngineConfig({}, { HUESHIFT_COLOR: "3366cc" }, HOME);

    assert.deepEqual(config, {
      source: { kind: "color", hex: "#3366CC" },
      mode: "dark",
      variant: "vibrant",
      smart: false,
      transparent: false,
      imageSize: 128,
      maxColors: 128,
      harmonize: DEFAULT_HARMONIZE_OPTIONS,
      terminalSchemePath: null,
      paths: { stateDir: "/home/tester/.local/state/hueshift", configDir: "/home/tester/.config" },
      renderers: ["kitty", "scss"],
      outputs: {},
      debug: false,
    });
  });

  it("requires exactly one source", () => {
    assert.throws(() => resolveEngineConfig({}, {}, HOME), PaletteInputError);
    assert.throws(
      () => resolveEngineConfig({}, { HUESHIFT_IMAGE: "/tmp/wall.png", HUESHIFT_COLOR: "#3366CC" }, HOME),
      /not both/
    );
    assert.throws(() => resolveEngineConfig({}, { HUESHIFT_COLOR: "#33GG00" }, HOME), PaletteInputError);
  });

  it("lets a source override replace the environment sources", () => {
    const config = resolveEngineConfig({ color: "#ff0000" }, { HUESHIFT_IMAGE: "/tmp/wall.png" }, HOME);
    assert.deepEqual(config.source, { kind: "color", hex: "#FF0000" });
  });

  it("reads an image source from the environment", () => {
    const config = resolveEngineConfig({}, { HUESHIFT_IMAGE: "  /tmp/wall.png  " }, HOME);
    assert.deepEqual(config.source, { kind: "image", path: "/tmp/wall.png" });
  });

  it("clamps numeric settings", () => {
    const config = resolveEngineConfig(
      {},
      {
        HUESHIFT_COLOR: "#3366CC",
        HUESHIFT_IMAGE_SIZE: "4096",
        HUESHIFT_MAX_COLORS: "0",
        HUESHIFT_HARMONY: "1.5",
        HUESHIFT_HARMONY_THRESHOLD: "400",
        HUESHIFT_FG_BOOST: "-1",
      },
      HOME
    );
    assert.equal(config.imageSize, 1024);
    assert.equal(config.maxColors, 1);
    assert.equal(config.harmonize.strength, 1);
    assert.equal(config.harmonize.threshold, 180);
    assert.equal(config.harmonize.foregroundBoost, 0);
  });

  it("parses flags, enumerations and the hue budget", () => {
    const config = resolveEngineConfig(
      {},
      {
        HUESHIFT_COLOR: "#3366CC",
        HUESHIFT_MODE: "Light",
        HUESHIFT_SCHEME: "scheme-expressive",
        HUESHIFT_SMART: "yes",
        HUESHIFT_TRANSPARENT: "1",
        HUESHIFT_BLEND_BG_FG: "true",
        HUESHIFT_CHROMA_TONE: "preserve",
        HUESHIFT_HUE_BUDGET: "off",
        HUESHIFT_RENDERERS: "scss",
        HUESHIFT_DEBUG: "on",
      },
      HOME
    );
    assert.equal(config.mode, "light");
    assert.equal(config.variant, "expressive");
    assert.equal(config.smart, true);
    assert.equal(config.transparent, true);
    assert.equal(config.harmonize.blendBackground, true);
    assert.equal(config.harmonize.chromaTone, "preserve");
    assert.equal(config.harmonize.hueBudget, null);
    assert.deepEqual(config.renderers, ["scss"]);
    assert.equal(config.debug, true);
  });

  it("falls back to tonal-spot for an unknown scheme name", () => {
    const config = resolveEngineConfig({}, { HUESHIFT_COLOR: "#3366CC", HUESHIFT_SCHEME: "sparkly" }, HOME);
    assert.equal(config.variant, "tonal-spot");
  });

  it("rejects invalid enumerations", () => {
    const base = { HUESHIFT_COLOR: "#3366CC" };
    assert.throws(() => resolveEngineConfig({}, { ...base, HUESHIFT_MODE: "dim" }, HOME), PaletteInputError);
    assert.throws(() => resolveEngineConfig({}, { ...base, HUESHIFT_CHROMA_TONE: "loud" }, HOME), PaletteInputError);
    assert.throws(() => resolveEngineConfig({}, { ...base, HUESHIFT_SMART: "maybe" }, HOME), PaletteInputError);
    assert.throws(() => resolveEngineConfig({}, { ...base, HUESHIFT_RENDERERS: "kitty,vim" }, HOME), /vim/);
  });

  it("resolves directories from XDG and explicit settings", () => {
    const xdg = resolveEngineConfig(
      {},
      { HUESHIFT_COLOR: "#3366CC", XDG_STATE_HOME: "/xdg/state", XDG_CONFIG_HOME: "/xdg/config" },
      HOME
    );
    assert.deepEqual(xdg.paths, { stateDir: "/xdg/state/hueshift", configDir: "/xdg/config" });

    const explicit = resolveEngineConfig(
      { paths: { configDir: "/override/config" } },
      { HUESHIFT_COLOR: "#3366CC", HUESHIFT_STATE_DIR: "/var/hueshift", XDG_CONFIG_HOME: "/xdg/config" },
      HOME
    );
    assert.deepEqual(explicit.paths, { stateDir: "/var/hueshift", configDir: "/override/config" });
  });

  it("prefers overrides to environment values", () => {
    const config = resolveEngineConfig(
      { mode: "dark", harmonize: { strength: 0.2, hueBudget: null }, renderers: [], outputs: { kitty: "/out/kitty.conf" } },
      {
        HUESHIFT_COLOR: "#3366CC",
        HUESHIFT_MODE: "light",
        HUESHIFT_HARMONY: "0.9",
        HUESHIFT_HUE_BUDGET: "30",
        HUESHIFT_KITTY_OUTPUT: "/env/kitty.conf",
        HUESHIFT_SCSS_OUTPUT: "/env/colors.scss",
      },
      HOME
    );
    assert.equal(config.mode, "dark");
    assert.equal(config.harmonize.strength, 0.2);
    assert.equal(config.harmonize.hueBudget, null);
    assert.deepEqual(config.renderers, []);
    assert.deepEqual(config.outputs, { kitty: "/out/kitty.conf", scss: "/env/colors.scss" });
  });
});
