import {
  Hct,
  argbFromRgb,
  blueFromArgb,
  greenFromArgb,
  redFromArgb,
} from "@material/material-color-utilities";
import { FormatError } from "./errors";

// ── HCT value type ───────────────────────────────────────────

export interface HctColor {
  readonly hue: number; // 0-360
  readonly chroma: number; // >= 0
  readonly tone: number; // 0-100
}

export interface RGB {
  r: number;
  g: number;
  b: number;
}

const HEX_PATTERN = /^#?([0-9a-fA-F]{6})$/;

export function hct(hue: number, chroma: number, tone: number): HctColor {
  return Object.freeze({ hue, chroma, tone });
}

export function toHct(argb: number): HctColor {
  const value = Hct.fromInt(argb);
  return hct(value.hue, value.chroma, value.tone);
}

/**
 * Solve an HCT triple back to an opaque ARGB integer. Chroma outside the
 * sRGB gamut for the given hue/tone is reduced by the solver; tone is
 * clamped to [0, 100] first.
 */
export function fromHct({ hue, chroma, tone }: HctColor): number {
  return Hct.from(hue, Math.max(0, chroma), clamp(tone, 0, 100)).toInt();
}

// ── Hex ↔ ARGB ───────────────────────────────────────────────

export function hexToColor(hex: string): number {
  if (typeof hex !== "string") {
    throw new FormatError(`Expected a hex color string, got ${typeof hex}`);
  }
  const match = hex.trim().match(HEX_PATTERN);
  if (!match) {
    throw new FormatError(`Invalid hex color "${hex}": expected 6 hex digits (#RRGGBB)`);
  }
  const value = Number.parseInt(match[1], 16);
  return argbFromRgb((value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff);
}

export function colorToHex(argb: number): string {
  const toHex = (n: number) => n.toString(16).padStart(2, "0");
  return `#${toHex(redFromArgb(argb))}${toHex(greenFromArgb(argb))}${toHex(blueFromArgb(argb))}`.toUpperCase();
}

export function isHexColor(value: unknown): value is string {
  return typeof value === "string" && HEX_PATTERN.test(value.trim());
}

/** Canonical `#RRGGBB` form; throws FormatError on malformed input. */
export function normalizeHex(hex: string): string {
  return colorToHex(hexToColor(hex));
}

export function rgbChannels(argb: number): RGB {
  return { r: redFromArgb(argb), g: greenFromArgb(argb), b: blueFromArgb(argb) };
}

export function hexToHct(hex: string): HctColor {
  return toHct(hexToColor(hex));
}

export function hctToHex(color: HctColor): string {
  return colorToHex(fromHct(color));
}

// ── Derivation helpers ───────────────────────────────────────

/** Scale chroma and tone of a color, returning a new triple. */
export function withChromaTone(color: HctColor, chromaScale: number, toneScale: number): HctColor {
  return hct(color.hue, color.chroma * chromaScale, clamp(color.tone * toneScale, 0, 100));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
