import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  SCHEME_ROLE_NAMES,
  SCHEME_VARIANTS,
  type CanonicalPalette,
  type SchemeRoles,
  type SchemeVariant,
  type TerminalPalette,
  type ThemeMode,
} from "hueshift-shared";
import { isHexColor, normalizeHex } from "./color-model";
import { PaletteInputError, describeError } from "./errors";
import type { AccentColor } from "./image-quantizer";
import { parseSlotPalette } from "./terminal-scheme";

export const PALETTE_CACHE_FILE = "colors.json";
export const ACCENT_CACHE_FILE = "source-color.txt";

export interface AssemblePaletteInput {
  mode: ThemeMode;
  transparent: boolean;
  variant: SchemeVariant;
  scheme: SchemeRoles;
  terminal: TerminalPalette;
  accent: AccentColor;
  generatedAt?: Date;
}

export function assembleCanonicalPalette(input: AssemblePaletteInput): CanonicalPalette {
  return {
    mode: input.mode,
    transparent: input.transparent,
    variant: input.variant,
    material: { ...input.scheme },
    terminal: { ...input.terminal },
    sourceColor: input.accent.hex,
    accent: {
      hex: input.accent.hex,
      hue: input.accent.hct.hue,
      chroma: input.accent.hct.chroma,
      tone: input.accent.hct.tone,
    },
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
  };
}

export function paletteCachePath(stateDir: string): string {
  return join(stateDir, PALETTE_CACHE_FILE);
}

export function accentCachePath(stateDir: string): string {
  return join(stateDir, ACCENT_CACHE_FILE);
}

/** Overwrite `<stateDir>/colors.json` with the palette. Returns the path. */
export async function writePaletteCache(palette: CanonicalPalette, stateDir: string): Promise<string> {
  const path = paletteCachePath(stateDir);
  await mkdir(stateDir, { recursive: true });
  await writeFile(path, `${JSON.stringify(palette, null, 2)}\n`, "utf8");
  return path;
}

export async function writeAccentCache(accentHex: string, stateDir: string): Promise<string> {
  const path = accentCachePath(stateDir);
  await mkdir(stateDir, { recursive: true });
  await writeFile(path, `${normalizeHex(accentHex)}\n`, "utf8");
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isThemeMode(value: unknown): value is ThemeMode {
  return value === "dark" || value === "light";
}

function isSchemeVariant(value: unknown): value is SchemeVariant {
  return SCHEME_VARIANTS.some((variant) => variant === value);
}

function isSchemeRoles(value: unknown): value is SchemeRoles {
  if (!isRecord(value)) return false;
  return SCHEME_ROLE_NAMES.every((role) => isHexColor(value[role]));
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

async function readCacheText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    throw new PaletteInputError(`Cannot read palette cache ${path}: ${describeError(error)}`, { cause: error });
  }
}

/** Validate a parsed `colors.json` document. */
export function parseCanonicalPalette(raw: unknown, label = PALETTE_CACHE_FILE): CanonicalPalette {
  if (!isRecord(raw)) {
    throw new PaletteInputError(`${label} must contain a JSON object`);
  }

  const { mode, transparent, variant, material, terminal, sourceColor, accent, generatedAt } = raw;
  if (!isThemeMode(mode)) {
    throw new PaletteInputError(`${label}: mode must be "dark" or "light"`);
  }
  if (typeof transparent !== "boolean") {
    throw new PaletteInputError(`${label}: transparent must be a boolean`);
  }
  if (!isSchemeVariant(variant)) {
    throw new PaletteInputError(`${label}: unknown variant ${JSON.stringify(variant)}`);
  }
  if (!isSchemeRoles(material)) {
    const missing = SCHEME_ROLE_NAMES.filter((role) => !isRecord(material) || !isHexColor(material[role]));
    throw new PaletteInputError(`${label}: material is missing or has invalid roles: ${missing.join(", ")}`);
  }
  if (!isHexColor(sourceColor)) {
    throw new PaletteInputError(`${label}: sourceColor must be a #RRGGBB color`);
  }
  if (
    !isRecord(accent) ||
    !isHexColor(accent.hex) ||
    !isFiniteNumber(accent.hue) ||
    !isFiniteNumber(accent.chroma) ||
    !isFiniteNumber(accent.tone)
  ) {
    throw new PaletteInputError(`${label}: accent must hold hex, hue, chroma and tone`);
  }

  return {
    mode,
    transparent,
    variant,
    material,
    terminal: parseSlotPalette(terminal, `${label} terminal`),
    sourceColor: normalizeHex(sourceColor),
    accent: {
      hex: normalizeHex(accent.hex),
      hue: accent.hue,
      chroma: accent.chroma,
      tone: accent.tone,
    },
    generatedAt: typeof generatedAt === "string" ? generatedAt : "",
  };
}

export async function readPaletteCache(stateDir: string): Promise<CanonicalPalette> {
  const path = paletteCachePath(stateDir);
  const text = await readCacheText(path);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new PaletteInputError(`Palette cache ${path} is not valid JSON: ${describeError(error)}`, { cause: error });
  }
  return parseCanonicalPalette(parsed, path);
}

export async function readAccentCache(stateDir: string): Promise<string> {
  const path = accentCachePath(stateDir);
  const text = (await readCacheText(path)).trim();
  if (!isHexColor(text)) {
    throw new PaletteInputError(`Accent cache ${path} does not hold a #RRGGBB color`);
  }
  return normalizeHex(text);
}
