import type {
  HarmonizeOptions,
  SchemeRoles,
  SchemeVariant,
  TerminalPalette,
  TerminalSlot,
  ThemeMode,
} from "hueshift-shared";
import { clamp, hct, hctToHex, hexToHct, withChromaTone, type HctColor } from "./color-model";
import { mapTerminalSlots } from "./terminal-scheme";

export const DEFAULT_HARMONIZE_OPTIONS: HarmonizeOptions = {
  strength: 0.8,
  threshold: 100,
  foregroundBoost: 0.35,
  blendBackground: false,
  chromaTone: "vibrant",
  hueBudget: 60,
};

/**
 * At or below this chroma the accent has no hue. Pure grays round-trip
 * through HCT with chroma under this bound.
 */
export const ACHROMATIC_CHROMA = 1e-4;

interface ChromaTone {
  chroma: number;
  tone: number;
}

type SlotTarget = Record<ThemeMode, ChromaTone>;

const RED: SlotTarget = { dark: { chroma: 90, tone: 65 }, light: { chroma: 90, tone: 50 } };
const GREEN: SlotTarget = { dark: { chroma: 95, tone: 70 }, light: { chroma: 95, tone: 45 } };
const YELLOW: SlotTarget = { dark: { chroma: 90, tone: 75 }, light: { chroma: 90, tone: 55 } };
const BLUE: SlotTarget = { dark: { chroma: 95, tone: 70 }, light: { chroma: 95, tone: 50 } };
const MAGENTA: SlotTarget = { dark: { chroma: 92, tone: 68 }, light: { chroma: 92, tone: 48 } };
const CYAN: SlotTarget = { dark: { chroma: 95, tone: 72 }, light: { chroma: 95, tone: 52 } };

/**
 * Chroma/tone per slot for `vibrant` mode. For the background slots
 * (`term0`, `term8`) the chroma is a cap on the accent-derived chroma.
 */
export const VIBRANT_SLOT_TARGETS: Record<TerminalSlot, SlotTarget> = {
  term0: { dark: { chroma: 25, tone: 6 }, light: { chroma: 25, tone: 94 } },
  term1: RED,
  term2: GREEN,
  term3: YELLOW,
  term4: BLUE,
  term5: MAGENTA,
  term6: CYAN,
  term7: { dark: { chroma: 20, tone: 85 }, light: { chroma: 20, tone: 30 } },
  term8: { dark: { chroma: 20, tone: 15 }, light: { chroma: 20, tone: 85 } },
  term9: RED,
  term10: GREEN,
  term11: YELLOW,
  term12: BLUE,
  term13: MAGENTA,
  term14: CYAN,
  term15: { dark: { chroma: 30, tone: 90 }, light: { chroma: 30, tone: 25 } },
};

const BACKGROUND_CHROMA_FACTOR = { term0: 0.6, term8: 0.5 } as const;

// term0 under blendBackground: a touch lifted and more saturated.
const BLENDED_BACKGROUND = {
  chromaScale: 1.2,
  tone: { dark: 7.6, light: 92.4 } satisfies Record<ThemeMode, number>,
};

const BLENDED_FOREGROUND_CHROMA_SCALE = 3;

const FOREGROUND_SLOTS: ReadonlySet<TerminalSlot> = new Set(["term7", "term15"]);

// ── Hue math ─────────────────────────────────────────────────

export function sanitizeDegrees(degrees: number): number {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/** Length of the shorter arc between two hues, 0-180. */
export function differenceDegrees(a: number, b: number): number {
  return 180 - Math.abs(Math.abs(sanitizeDegrees(a) - sanitizeDegrees(b)) - 180);
}

/** +1 when `to` is reached fastest by increasing `from`, -1 otherwise. */
export function rotationDirection(from: number, to: number): 1 | -1 {
  return sanitizeDegrees(to - from) <= 180 ? 1 : -1;
}

export interface HueShift {
  hue: number;
  /** Degrees actually rotated (always >= 0). */
  rotation: number;
  direction: 1 | -1;
}

export function resolveHarmonizeOptions(options: Partial<HarmonizeOptions> = {}): HarmonizeOptions {
  const merged = { ...DEFAULT_HARMONIZE_OPTIONS, ...options };
  return {
    ...merged,
    strength: clamp(merged.strength, 0, 1),
    threshold: clamp(merged.threshold, 0, 180),
    foregroundBoost: clamp(merged.foregroundBoost, 0, 1),
    hueBudget: merged.hueBudget === null ? null : clamp(merged.hueBudget, 0, 180),
  };
}

/**
 * Rotate `sourceHue` toward the accent by `min(distance × strength,
 * threshold)`, never past it. When a hue budget is set and the slot would
 * stay further than the budget from the accent, it is pulled in to exactly
 * the budget. Any accent with chroma is rotated toward, however faint; only
 * a hueless gray rotates clockwise and skips the budget.
 */
export function harmonizeHue(
  sourceHue: number,
  accent: HctColor,
  options: Pick<HarmonizeOptions, "strength" | "threshold" | "hueBudget">
): HueShift {
  const strength = clamp(options.strength, 0, 1);
  const threshold = clamp(options.threshold, 0, 180);
  const achromatic = accent.chroma <= ACHROMATIC_CHROMA;

  const distance = differenceDegrees(sourceHue, accent.hue);
  const direction = achromatic ? 1 : rotationDirection(sourceHue, accent.hue);
  let rotation = Math.min(distance * strength, threshold);

  if (!achromatic && options.hueBudget !== null) {
    const budget = clamp(options.hueBudget, 0, 180);
    if (distance - rotation > budget) {
      rotation = distance - budget;
    }
  }

  return { hue: sanitizeDegrees(sourceHue + rotation * direction), rotation, direction };
}

/** Foreground tone pushed away from the background: up in dark mode, down in light. */
export function boostForegroundTone(tone: number, boost: number, mode: ThemeMode): number {
  const sign = mode === "dark" ? 1 : -1;
  return clamp(tone * (1 + boost * sign), 0, 100);
}

function synthesizeBackground(
  slot: "term0" | "term8",
  accent: HctColor,
  mode: ThemeMode,
  blend: boolean
): HctColor {
  const target = VIBRANT_SLOT_TARGETS[slot][mode];
  const chroma = Math.min(accent.chroma * BACKGROUND_CHROMA_FACTOR[slot], target.chroma);
  if (slot === "term0" && blend) {
    return hct(accent.hue, chroma * BLENDED_BACKGROUND.chromaScale, BLENDED_BACKGROUND.tone[mode]);
  }
  return hct(accent.hue, chroma, target.tone);
}

export interface HarmonizeTerminalInput {
  accent: HctColor;
  source: TerminalPalette;
  isDark: boolean;
  variant: SchemeVariant;
  /** Needed for the blended foreground (`onSurface`). */
  scheme: SchemeRoles;
  options?: Partial<HarmonizeOptions>;
}

export function harmonizeTerminalPalette(input: HarmonizeTerminalInput): TerminalPalette {
  if (input.variant === "monochrome") {
    return { ...input.source };
  }

  const options = resolveHarmonizeOptions(input.options);
  const mode: ThemeMode = input.isDark ? "dark" : "light";
  const synthesizeBackgrounds = options.chromaTone === "vibrant" || options.blendBackground;

  return mapTerminalSlots((slot) => {
    if ((slot === "term0" || slot === "term8") && synthesizeBackgrounds) {
      return hctToHex(synthesizeBackground(slot, input.accent, mode, options.blendBackground));
    }

    if (slot === "term15" && options.blendBackground) {
      return hctToHex(withChromaTone(hexToHct(input.scheme.onSurface), BLENDED_FOREGROUND_CHROMA_SCALE, 1));
    }

    const source = hexToHct(input.source[slot]);
    const { hue } = harmonizeHue(source.hue, input.accent, options);
    const target: ChromaTone =
      options.chromaTone === "vibrant"
        ? VIBRANT_SLOT_TARGETS[slot][mode]
        : { chroma: source.chroma, tone: source.tone };
    const tone = FOREGROUND_SLOTS.has(slot)
      ? boostForegroundTone(target.tone, options.foregroundBoost, mode)
      : target.tone;

    return hctToHex(hct(hue, target.chroma, tone));
  });
}
