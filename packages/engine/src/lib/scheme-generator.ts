import {
  type DynamicColor,
  type DynamicScheme,
  Hct,
  MaterialDynamicColors,
  SchemeContent,
  SchemeExpressive,
  SchemeFidelity,
  SchemeFruitSalad,
  SchemeMonochrome,
  SchemeNeutral,
  SchemeRainbow,
  SchemeTonalSpot,
  SchemeVibrant,
} from "@material/material-color-utilities";
import {
  SCHEME_VARIANTS,
  type MaterialRoleName,
  type SchemeRoles,
  type SchemeVariant,
  type SuccessRoleName,
} from "hueshift-shared";
import { colorToHex } from "./color-model";
import type { AccentColor } from "./image-quantizer";

export const DEFAULT_SCHEME_VARIANT: SchemeVariant = "tonal-spot";

/** Image accents below this chroma read as gray; smart mode goes neutral. */
export const SMART_NEUTRAL_CHROMA = 20;

const CONTRAST_LEVEL = 0.0;

type SchemeFactory = (source: Hct, isDark: boolean) => DynamicScheme;

const SCHEME_FACTORIES: Record<SchemeVariant, SchemeFactory> = {
  vibrant: (source, isDark) => new SchemeVibrant(source, isDark, CONTRAST_LEVEL),
  expressive: (source, isDark) => new SchemeExpressive(source, isDark, CONTRAST_LEVEL),
  neutral: (source, isDark) => new SchemeNeutral(source, isDark, CONTRAST_LEVEL),
  monochrome: (source, isDark) => new SchemeMonochrome(source, isDark, CONTRAST_LEVEL),
  fidelity: (source, isDark) => new SchemeFidelity(source, isDark, CONTRAST_LEVEL),
  content: (source, isDark) => new SchemeContent(source, isDark, CONTRAST_LEVEL),
  "tonal-spot": (source, isDark) => new SchemeTonalSpot(source, isDark, CONTRAST_LEVEL),
  "fruit-salad": (source, isDark) => new SchemeFruitSalad(source, isDark, CONTRAST_LEVEL),
  rainbow: (source, isDark) => new SchemeRainbow(source, isDark, CONTRAST_LEVEL),
};

function materialRoles(scheme: DynamicScheme): Record<MaterialRoleName, string> {
  const hex = (color: DynamicColor) => colorToHex(color.getArgb(scheme));
  return {
    primary_paletteKeyColor: hex(MaterialDynamicColors.primaryPaletteKeyColor),
    secondary_paletteKeyColor: hex(MaterialDynamicColors.secondaryPaletteKeyColor),
    tertiary_paletteKeyColor: hex(MaterialDynamicColors.tertiaryPaletteKeyColor),
    neutral_paletteKeyColor: hex(MaterialDynamicColors.neutralPaletteKeyColor),
    neutral_variant_paletteKeyColor: hex(MaterialDynamicColors.neutralVariantPaletteKeyColor),
    background: hex(MaterialDynamicColors.background),
    onBackground: hex(MaterialDynamicColors.onBackground),
    surface: hex(MaterialDynamicColors.surface),
    surfaceDim: hex(MaterialDynamicColors.surfaceDim),
    surfaceBright: hex(MaterialDynamicColors.surfaceBright),
    surfaceContainerLowest: hex(MaterialDynamicColors.surfaceContainerLowest),
    surfaceContainerLow: hex(MaterialDynamicColors.surfaceContainerLow),
    surfaceContainer: hex(MaterialDynamicColors.surfaceContainer),
    surfaceContainerHigh: hex(MaterialDynamicColors.surfaceContainerHigh),
    surfaceContainerHighest: hex(MaterialDynamicColors.surfaceContainerHighest),
    onSurface: hex(MaterialDynamicColors.onSurface),
    surfaceVariant: hex(MaterialDynamicColors.surfaceVariant),
    onSurfaceVariant: hex(MaterialDynamicColors.onSurfaceVariant),
    inverseSurface: hex(MaterialDynamicColors.inverseSurface),
    inverseOnSurface: hex(MaterialDynamicColors.inverseOnSurface),
    outline: hex(MaterialDynamicColors.outline),
    outlineVariant: hex(MaterialDynamicColors.outlineVariant),
    shadow: hex(MaterialDynamicColors.shadow),
    scrim: hex(MaterialDynamicColors.scrim),
    surfaceTint: hex(MaterialDynamicColors.surfaceTint),
    primary: hex(MaterialDynamicColors.primary),
    onPrimary: hex(MaterialDynamicColors.onPrimary),
    primaryContainer: hex(MaterialDynamicColors.primaryContainer),
    onPrimaryContainer: hex(MaterialDynamicColors.onPrimaryContainer),
    inversePrimary: hex(MaterialDynamicColors.inversePrimary),
    secondary: hex(MaterialDynamicColors.secondary),
    onSecondary: hex(MaterialDynamicColors.onSecondary),
    secondaryContainer: hex(MaterialDynamicColors.secondaryContainer),
    onSecondaryContainer: hex(MaterialDynamicColors.onSecondaryContainer),
    tertiary: hex(MaterialDynamicColors.tertiary),
    onTertiary: hex(MaterialDynamicColors.onTertiary),
    tertiaryContainer: hex(MaterialDynamicColors.tertiaryContainer),
    onTertiaryContainer: hex(MaterialDynamicColors.onTertiaryContainer),
    error: hex(MaterialDynamicColors.error),
    onError: hex(MaterialDynamicColors.onError),
    errorContainer: hex(MaterialDynamicColors.errorContainer),
    onErrorContainer: hex(MaterialDynamicColors.onErrorContainer),
    primaryFixed: hex(MaterialDynamicColors.primaryFixed),
    primaryFixedDim: hex(MaterialDynamicColors.primaryFixedDim),
    onPrimaryFixed: hex(MaterialDynamicColors.onPrimaryFixed),
    onPrimaryFixedVariant: hex(MaterialDynamicColors.onPrimaryFixedVariant),
    secondaryFixed: hex(MaterialDynamicColors.secondaryFixed),
    secondaryFixedDim: hex(MaterialDynamicColors.secondaryFixedDim),
    onSecondaryFixed: hex(MaterialDynamicColors.onSecondaryFixed),
    onSecondaryFixedVariant: hex(MaterialDynamicColors.onSecondaryFixedVariant),
    tertiaryFixed: hex(MaterialDynamicColors.tertiaryFixed),
    tertiaryFixedDim: hex(MaterialDynamicColors.tertiaryFixedDim),
    onTertiaryFixed: hex(MaterialDynamicColors.onTertiaryFixed),
    onTertiaryFixedVariant: hex(MaterialDynamicColors.onTertiaryFixedVariant),
  };
}

// Fixed extended roles; they do not follow the accent.
const SUCCESS_ROLES: Record<"dark" | "light", Record<SuccessRoleName, string>> = {
  dark: {
    success: "#B5CCBA",
    onSuccess: "#213528",
    successContainer: "#374B3E",
    onSuccessContainer: "#D1E9D6",
  },
  light: {
    success: "#4F6354",
    onSuccess: "#FFFFFF",
    successContainer: "#D1E8D5",
    onSuccessContainer: "#0C1F13",
  },
};

function isSchemeVariant(value: string): value is SchemeVariant {
  return SCHEME_VARIANTS.some((variant) => variant === value);
}

/**
 * Resolve a user-facing scheme name ("vibrant", "scheme-fruit-salad",
 * "Tonal Spot", …). Unknown names resolve to tonal-spot.
 */
export function parseSchemeVariant(name: string | null | undefined): SchemeVariant {
  if (!name) return DEFAULT_SCHEME_VARIANT;
  const normalized = name
    .trim()
    .toLowerCase()
    .replace(/^scheme[-_ ]/, "")
    .replace(/[_\s]+/g, "-");
  if (isSchemeVariant(normalized)) return normalized;
  if (normalized === "tonalspot") return "tonal-spot";
  if (normalized === "fruitsalad") return "fruit-salad";
  return DEFAULT_SCHEME_VARIANT;
}

/**
 * Pick the variant for a run. With `smart` on, a grayish image accent
 * switches to neutral so the scheme doesn't invent color.
 */
export function chooseVariant(options: {
  requested: SchemeVariant;
  accent: AccentColor;
  fromImage: boolean;
  smart: boolean;
}): SchemeVariant {
  if (options.smart && options.fromImage && options.accent.hct.chroma < SMART_NEUTRAL_CHROMA) {
    return "neutral";
  }
  return options.requested;
}

export function buildDynamicScheme(accent: AccentColor, isDark: boolean, variant: SchemeVariant): DynamicScheme {
  return SCHEME_FACTORIES[variant](Hct.fromInt(accent.argb), isDark);
}

export function generateScheme(accent: AccentColor, isDark: boolean, variant: SchemeVariant): SchemeRoles {
  const scheme = buildDynamicScheme(accent, isDark, variant);
  return { ...materialRoles(scheme), ...SUCCESS_ROLES[isDark ? "dark" : "light"] };
}
