import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { SCHEME_ROLE_NAMES, SCHEME_VARIANTS } from "hueshift-shared";
import { hexToColor } from "./color-model";
import { accentFromArgb } from "./image-quantizer";
import { chooseVariant, generateScheme, parseSchemeVariant } from "./scheme-generator";

const HEX = /^#[0-9A-F]{6}$/;
const blueAccent = accentFromArgb(hexToColor("#3366CC"));
const grayAccent = accentFromArgb(hexToColor("#808080"));

describe("parseSchemeVariant", () => {
  it("accepts plain and prefixed names in any case", () => {
    assert.equal(parseSchemeVariant("vibrant"), "vibrant");
    assert.equal(parseSchemeVariant("scheme-fruit-salad"), "fruit-salad");
    assert.equal(parseSchemeVariant("SCHEME_MONOCHROME"), "monochrome");
    assert.equal(parseSchemeVariant("Tonal Spot"), "tonal-spot");
    assert.equal(parseSchemeVariant("tonalspot"), "tonal-spot");
  });

  it("falls back to tonal-spot for unknown or empty names", () => {
    assert.equal(parseSchemeVariant("psychedelic"), "tonal-spot");
    assert.equal(parseSchemeVariant(""), "tonal-spot");
    assert.equal(parseSchemeVariant(undefined), "tonal-spot");
  });
});

describe("generateScheme", () => {
  it("returns every role for every variant and mode", () => {
    for (const variant of SCHEME_VARIANTS) {
      for (const isDark of [true, false]) {
        const roles = generateScheme(blueAccent, isDark, variant);
        for (const role of SCHEME_ROLE_NAMES) {
          assert.match(roles[role], HEX, `${variant}/${isDark ? "dark" : "light"}/${role}`);
        }
      }
    }
  });

  it("covers unknown names through the tonal-spot fallback", () => {
    const fallback = generateScheme(blueAccent, true, parseSchemeVariant("not-a-scheme"));
    assert.deepEqual(fallback, generateScheme(blueAccent, true, "tonal-spot"));
  });

  it("is deterministic", () => {
    assert.deepEqual(generateScheme(blueAccent, false, "expressive"), generateScheme(blueAccent, false, "expressive"));
  });

  it("uses fixed success roles per mode", () => {
    const dark = generateScheme(blueAccent, true, "vibrant");
    const light = generateScheme(grayAccent, false, "rainbow");
    assert.equal(dark.success, "#B5CCBA");
    assert.equal(dark.onSuccessContainer, "#D1E9D6");
    assert.equal(light.success, "#4F6354");
    assert.equal(light.onSuccess, "#FFFFFF");
  });

  it("gives dark schemes a darker surface than light ones", () => {
    const dark = generateScheme(blueAccent, true, "tonal-spot");
    const light = generateScheme(blueAccent, false, "tonal-spot");
    assert.notEqual(dark.surface, light.surface);
    assert.ok(Number.parseInt(dark.surface.slice(1), 16) < Number.parseInt(light.surface.slice(1), 16));
  });
});

describe("chooseVariant", () => {
  it("switches gray image accents to neutral in smart mode", () => {
    assert.equal(chooseVariant({ requested: "vibrant", accent: grayAccent, fromImage: true, smart: true }), "neutral");
  });

  it("keeps the requested variant otherwise", () => {
    assert.equal(chooseVariant({ requested: "vibrant", accent: grayAccent, fromImage: false, smart: true }), "vibrant");
    assert.equal(chooseVariant({ requested: "vibrant", accent: grayAccent, fromImage: true, smart: false }), "vibrant");
    assert.equal(chooseVariant({ requested: "content", accent: blueAccent, fromImage: true, smart: true }), "content");
  });
});
