import { homedir } from "node:os";
import { join } from "node:path";
import {
  RENDERER_IDS,
  type ChromaToneMode,
  type EngineConfig,
  type EnginePaths,
  type HarmonizeOptions,
  type PaletteSource,
  type RendererId,
  type SchemeVariant,
  type ThemeMode,
} from "hueshift-shared";
import { isHexColor, normalizeHex } from "./color-model";
import { PaletteInputError } from "./errors";
import { DEFAULT_HARMONIZE_OPTIONS, resolveHarmonizeOptions } from "./harmonizer";
import { DEFAULT_IMAGE_SIZE, DEFAULT_MAX_COLORS } from "./image-quantizer";
import { parseSchemeVariant } from "./scheme-generator";

export type EngineEnv = Record<string, string | undefined>;

/** Programmatic settings; each one wins over its environment variable. */
export interface EngineConfigOverrides {
  image?: string | null;
  color?: string | null;
  mode?: ThemeMode;
  variant?: SchemeVariant | string;
  smart?: boolean;
  transparent?: boolean;
  imageSize?: number;
  maxColors?: number;
  harmonize?: Partial<HarmonizeOptions>;
  terminalSchemePath?: string | null;
  paths?: Partial<EnginePaths>;
  renderers?: RendererId[];
  outputs?: Partial<Record<RendererId, string>>;
  debug?: boolean;
}

export const DEFAULT_VARIANT: SchemeVariant = "vibrant";
export const DEFAULT_RENDERERS: readonly RendererId[] = ["kitty", "scss"];

const IMAGE_SIZE_RANGE = { min: 16, max: 1024 } as const;
const MAX_COLORS_RANGE = { min: 1, max: 256 } as const;

const TRUE_VALUES: ReadonlySet<string> = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES: ReadonlySet<string> = new Set(["0", "false", "no", "off"]);

function asNonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseClampedInt(raw: string | undefined, min: number, max: number): number | undefined {
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) return undefined;
  return Math.min(max, Math.max(min, value));
}

function parseFloatValue(raw: string | undefined, name: string): number | undefined {
  if (!raw) return undefined;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    throw new PaletteInputError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseBoolean(raw: string | undefined, name: string): boolean | undefined {
  if (!raw) return undefined;
  const normalized = raw.toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new PaletteInputError(`${name} must be true or false, got "${raw}"`);
}

function parseMode(raw: string | undefined): ThemeMode | undefined {
  if (!raw) return undefined;
  const normalized = raw.toLowerCase();
  if (normalized === "dark" || normalized === "light") return normalized;
  throw new PaletteInputError(`HUESHIFT_MODE must be "dark" or "light", got "${raw}"`);
}

function parseChromaTone(raw: string | undefined): ChromaToneMode | undefined {
  if (!raw) return undefined;
  const normalized = raw.toLowerCase();
  if (normalized === "vibrant" || normalized === "preserve") return normalized;
  throw new PaletteInputError(`HUESHIFT_CHROMA_TONE must be "vibrant" or "preserve", got "${raw}"`);
}

function parseHueBudget(raw: string | undefined): number | null | undefined {
  if (!raw) return undefined;
  const normalized = raw.toLowerCase();
  if (normalized === "off" || normalized === "none") return null;
  return parseFloatValue(raw, "HUESHIFT_HUE_BUDGET");
}

function isRendererId(value: string): value is RendererId {
  return RENDERER_IDS.some((id) => id === value);
}

function parseRenderers(raw: string | undefined): RendererId[] | undefined {
  if (!raw) return undefined;
  if (raw.toLowerCase() === "none") return [];

  const ids: RendererId[] = [];
  for (const part of raw.split(",")) {
    const id = part.trim().toLowerCase();
    if (!id) continue;
    if (!isRendererId(id)) {
      throw new PaletteInputError(
        `Unknown renderer "${id}" in HUESHIFT_RENDERERS (expected one of: ${RENDERER_IDS.join(", ")})`
      );
    }
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

/**
 * Exactly one of image path or literal color selects the accent source.
 */
export function resolvePaletteSource(image: string | undefined, color: string | undefined): PaletteSource {
  if (image && color) {
    throw new PaletteInputError("Provide either an image or a color, not both");
  }
  if (image) {
    return { kind: "image", path: image };
  }
  if (color) {
    if (!isHexColor(color)) {
      throw new PaletteInputError(`Color "${color}" is not a 6-digit hex color (#RRGGBB)`);
    }
    return { kind: "color", hex: normalizeHex(color) };
  }
  throw new PaletteInputError("No palette source: set an image path or a color");
}

export function resolveEnginePaths(
  overrides: Partial<EnginePaths> = {},
  env: EngineEnv = process.env,
  home: string = homedir()
): EnginePaths {
  const stateHome = asNonEmpty(env.XDG_STATE_HOME) ?? join(home, ".local", "state");
  const configHome = asNonEmpty(env.XDG_CONFIG_HOME) ?? join(home, ".config");
  return {
    stateDir: overrides.stateDir ?? asNonEmpty(env.HUESHIFT_STATE_DIR) ?? join(stateHome, "hueshift"),
    configDir: overrides.configDir ?? asNonEmpty(env.HUESHIFT_CONFIG_DIR) ?? configHome,
  };
}

/**
 * Build the run configuration once: overrides first, then `HUESHIFT_*`
 * environment variables, then defaults. Out-of-range numbers are clamped;
 * unusable values raise PaletteInputError.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  env: EngineEnv = process.env,
  home: string = homedir()
): EngineConfig {
  // A source given in code replaces both environment sources.
  const sourceOverridden = overrides.image !== undefined || overrides.color !== undefined;
  const source = sourceOverridden
    ? resolvePaletteSource(asNonEmpty(overrides.image), asNonEmpty(overrides.color))
    : resolvePaletteSource(asNonEmpty(env.HUESHIFT_IMAGE), asNonEmpty(env.HUESHIFT_COLOR));

  const variantName = overrides.variant ?? asNonEmpty(env.HUESHIFT_SCHEME);
  const variant = variantName ? parseSchemeVariant(variantName) : DEFAULT_VARIANT;

  const harmonizeOverrides = overrides.harmonize ?? {};
  const envHueBudget = parseHueBudget(asNonEmpty(env.HUESHIFT_HUE_BUDGET));
  const harmonize = resolveHarmonizeOptions({
    strength:
      harmonizeOverrides.strength ??
      parseFloatValue(asNonEmpty(env.HUESHIFT_HARMONY), "HUESHIFT_HARMONY") ??
      DEFAULT_HARMONIZE_OPTIONS.strength,
    threshold:
      harmonizeOverrides.threshold ??
      parseFloatValue(asNonEmpty(env.HUESHIFT_HARMONY_THRESHOLD), "HUESHIFT_HARMONY_THRESHOLD") ??
      DEFAULT_HARMONIZE_OPTIONS.threshold,
    foregroundBoost:
      harmonizeOverrides.foregroundBoost ??
      parseFloatValue(asNonEmpty(env.HUESHIFT_FG_BOOST), "HUESHIFT_FG_BOOST") ??
      DEFAULT_HARMONIZE_OPTIONS.foregroundBoost,
    blendBackground:
      harmonizeOverrides.blendBackground ??
      parseBoolean(asNonEmpty(env.HUESHIFT_BLEND_BG_FG), "HUESHIFT_BLEND_BG_FG") ??
      DEFAULT_HARMONIZE_OPTIONS.blendBackground,
    chromaTone:
      harmonizeOverrides.chromaTone ??
      parseChromaTone(asNonEmpty(env.HUESHIFT_CHROMA_TONE)) ??
      DEFAULT_HARMONIZE_OPTIONS.chromaTone,
    hueBudget:
      harmonizeOverrides.hueBudget !== undefined
        ? harmonizeOverrides.hueBudget
        : envHueBudget !== undefined
          ? envHueBudget
          : DEFAULT_HARMONIZE_OPTIONS.hueBudget,
  });

  const imageSize =
    overrides.imageSize ??
    parseClampedInt(asNonEmpty(env.HUESHIFT_IMAGE_SIZE), IMAGE_SIZE_RANGE.min, IMAGE_SIZE_RANGE.max) ??
    DEFAULT_IMAGE_SIZE;
  const maxColors =
    overrides.maxColors ??
    parseClampedInt(asNonEmpty(env.HUESHIFT_MAX_COLORS), MAX_COLORS_RANGE.min, MAX_COLORS_RANGE.max) ??
    DEFAULT_MAX_COLORS;

  const outputs: Partial<Record<RendererId, string>> = { ...overrides.outputs };
  const kittyOutput = asNonEmpty(env.HUESHIFT_KITTY_OUTPUT);
  const scssOutput = asNonEmpty(env.HUESHIFT_SCSS_OUTPUT);
  if (kittyOutput && !outputs.kitty) outputs.kitty = kittyOutput;
  if (scssOutput && !outputs.scss) outputs.scss = scssOutput;

  return {
    source,
    mode: overrides.mode ?? parseMode(asNonEmpty(env.HUESHIFT_MODE)) ?? "dark",
    variant,
    smart: overrides.smart ?? parseBoolean(asNonEmpty(env.HUESHIFT_SMART), "HUESHIFT_SMART") ?? false,
    transparent:
      overrides.transparent ?? parseBoolean(asNonEmpty(env.HUESHIFT_TRANSPARENT), "HUESHIFT_TRANSPARENT") ?? false,
    imageSize: Math.min(IMAGE_SIZE_RANGE.max, Math.max(IMAGE_SIZE_RANGE.min, Math.round(imageSize))),
    maxColors: Math.min(MAX_COLORS_RANGE.max, Math.max(MAX_COLORS_RANGE.min, Math.round(maxColors))),
    harmonize,
    terminalSchemePath:
      overrides.terminalSchemePath !== undefined
        ? overrides.terminalSchemePath
        : asNonEmpty(env.HUESHIFT_TERMSCHEME) ?? null,
    paths: resolveEnginePaths(overrides.paths, env, home),
    renderers: overrides.renderers ?? parseRenderers(asNonEmpty(env.HUESHIFT_RENDERERS)) ?? [...DEFAULT_RENDERERS],
    outputs,
    debug: overrides.debug ?? parseBoolean(asNonEmpty(env.HUESHIFT_DEBUG), "HUESHIFT_DEBUG") ?? false,
  };
}
