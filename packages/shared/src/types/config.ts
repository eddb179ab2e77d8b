import type { SchemeVariant, ThemeMode } from "./palette";

export type PaletteSource =
  | { kind: "image"; path: string }
  | { kind: "color"; hex: string };

/**
 * How harmonized slots get their chroma and tone:
 * - `preserve` keeps the source slot's values (only the hue moves);
 * - `vibrant` replaces them with the fixed per-slot table.
 */
export type ChromaToneMode = "preserve" | "vibrant";

export interface HarmonizeOptions {
  /** 0-1 share of the hue distance rotated toward the accent. */
  strength: number;
  /** 0-180 maximum rotation in degrees. */
  threshold: number;
  /** Foreground tone push away from the background (0-1). */
  foregroundBoost: number;
  /** Derive `term0` / `term15` from the accent and scheme instead of the source. */
  blendBackground: boolean;
  chromaTone: ChromaToneMode;
  /** Maximum hue distance left after rotation, or null to disable. */
  hueBudget: number | null;
}

export const RENDERER_IDS = ["kitty", "scss"] as const;

export type RendererId = (typeof RENDERER_IDS)[number];

export interface EnginePaths {
  /** Holds `colors.json`, `source-color.txt` and `colors.scss`. */
  stateDir: string;
  /** Root of per-application config directories (`~/.config`). */
  configDir: string;
}

export interface EngineConfig {
  source: PaletteSource;
  mode: ThemeMode;
  variant: SchemeVariant;
  /** Switch low-chroma image accents to the neutral variant. */
  smart: boolean;
  transparent: boolean;
  /** Edge length whose square bounds the processed image area. */
  imageSize: number;
  /** Quantizer bucket count. */
  maxColors: number;
  harmonize: HarmonizeOptions;
  /** Terminal palette definition file; null uses the built-in scheme. */
  terminalSchemePath: string | null;
  paths: EnginePaths;
  renderers: RendererId[];
  /** Per-renderer output path overrides. */
  outputs: Partial<Record<RendererId, string>>;
  debug: boolean;
}
