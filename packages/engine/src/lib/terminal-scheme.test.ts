import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TERMINAL_SLOTS } from "hueshift-shared";
import { PaletteInputError } from "./errors";
import { loadTerminalScheme, mapTerminalSlots, parseTerminalSchemeDefinition } from "./terminal-scheme";

const catppuccin = {
  base: "#1e1e2e",
  text: "#cdd6f4",
  surface2: "#585b70",
  subtext1: "#bac2de",
  red: "#f38ba8",
  green: "#a6e3a1",
  yellow: "#f9e2af",
  blue: "#89b4fa",
  pink: "#f5c2e7",
  teal: "#94e2d5",
};

const slots = (hex: string) => mapTerminalSlots(() => hex);

describe("parseTerminalSchemeDefinition", () => {
  it("selects the variant for the current mode", () => {
    const raw = { dark: slots("#111111"), light: slots("#eeeeee") };
    assert.equal(parseTerminalSchemeDefinition(raw, true).term3, "#111111");
    assert.equal(parseTerminalSchemeDefinition(raw, false).term3, "#EEEEEE");
  });

  it("rejects a file without the current mode", () => {
    assert.throws(() => parseTerminalSchemeDefinition({ dark: slots("#111111") }, false), PaletteInputError);
  });

  it("rejects a variant missing a slot", () => {
    const { term9: _dropped, ...partial } = slots("#222222");
    assert.throws(() => parseTerminalSchemeDefinition({ dark: partial }, true), /missing term9/);
  });

  it("accepts a flat 16-slot object", () => {
    const palette = parseTerminalSchemeDefinition(slots("#abcdef"), true);
    for (const slot of TERMINAL_SLOTS) {
      assert.equal(palette[slot], "#ABCDEF");
    }
  });

  it("remaps a Catppuccin-style named palette onto 16 slots", () => {
    const palette = parseTerminalSchemeDefinition(catppuccin, true);
    assert.equal(palette.term0, "#1E1E2E");
    assert.equal(palette.term7, "#CDD6F4");
    assert.equal(palette.term8, "#585B70");
    assert.equal(palette.term15, "#BAC2DE");
    assert.equal(palette.term1, "#F38BA8");
    assert.equal(palette.term9, "#F38BA8");
    assert.equal(palette.term5, "#F5C2E7");
    assert.equal(palette.term14, "#94E2D5");
  });

  it("fills missing named roles from the defaults", () => {
    const palette = parseTerminalSchemeDefinition({ background: "#000000", red: "#ff0000" }, true);
    assert.equal(palette.term0, "#000000");
    assert.equal(palette.term1, "#FF0000");
    assert.equal(palette.term2, "#A6E3A1");
    assert.equal(palette.term7, "#CDD6F4");
  });

  it("rejects malformed definitions", () => {
    assert.throws(() => parseTerminalSchemeDefinition([], true), PaletteInputError);
    assert.throws(() => parseTerminalSchemeDefinition("#000000", true), PaletteInputError);
    assert.throws(() => parseTerminalSchemeDefinition({}, true), PaletteInputError);
    assert.throws(() => parseTerminalSchemeDefinition({ ...catppuccin, red: "crimson" }, true), PaletteInputError);
  });
});

describe("loadTerminalScheme", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hueshift-scheme-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the built-in scheme for both modes", async () => {
    assert.equal((await loadTerminalScheme(null, true)).term0, "#282828");
    assert.equal((await loadTerminalScheme(null, false)).term0, "#FDF9F3");
  });

  it("loads a named-role file", async () => {
    const path = join(dir, "catppuccin.json");
    await writeFile(path, JSON.stringify(catppuccin));
    const palette = await loadTerminalScheme(path, true);
    assert.equal(palette.term13, "#F5C2E7");
  });

  it("reports unreadable and invalid files as input errors", async () => {
    await assert.rejects(loadTerminalScheme(join(dir, "missing.json"), true), PaletteInputError);

    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json");
    await assert.rejects(loadTerminalScheme(path, true), PaletteInputError);
  });
});
