export type ThemeMode = "dark" | "light";

export const SCHEME_VARIANTS = [
  "vibrant",
  "expressive",
  "neutral",
  "monochrome",
  "fidelity",
  "content",
  "tonal-spot",
  "fruit-salad",
  "rainbow",
] as const;

export type SchemeVariant = (typeof SCHEME_VARIANTS)[number];

/**
 * Dynamic-color roles produced for every scheme variant. Names follow the
 * keys consumers already read from `colors.json`, including the
 * `*_paletteKeyColor` entries.
 */
export const MATERIAL_ROLE_NAMES = [
  "primary_paletteKeyColor",
  "secondary_paletteKeyColor",
  "tertiary_paletteKeyColor",
  "neutral_paletteKeyColor",
  "neutral_variant_paletteKeyColor",
  "background",
  "onBackground",
  "surface",
  "surfaceDim",
  "surfaceBright",
  "surfaceContainerLowest",
  "surfaceContainerLow",
  "surfaceContainer",
  "surfaceContainerHigh",
  "surfaceContainerHighest",
  "onSurface",
  "surfaceVariant",
  "onSurfaceVariant",
  "inverseSurface",
  "inverseOnSurface",
  "outline",
  "outlineVariant",
  "shadow",
  "scrim",
  "surfaceTint",
  "primary",
  "onPrimary",
  "primaryContainer",
  "onPrimaryContainer",
  "inversePrimary",
  "secondary",
  "onSecondary",
  "secondaryContainer",
  "onSecondaryContainer",
  "tertiary",
  "onTertiary",
  "tertiaryContainer",
  "onTertiaryContainer",
  "error",
  "onError",
  "errorContainer",
  "onErrorContainer",
  "primaryFixed",
  "primaryFixedDim",
  "onPrimaryFixed",
  "onPrimaryFixedVariant",
  "secondaryFixed",
  "secondaryFixedDim",
  "onSecondaryFixed",
  "onSecondaryFixedVariant",
  "tertiaryFixed",
  "tertiaryFixedDim",
  "onTertiaryFixed",
  "onTertiaryFixedVariant",
] as const;

export type MaterialRoleName = (typeof MATERIAL_ROLE_NAMES)[number];

export const SUCCESS_ROLE_NAMES = [
  "success",
  "onSuccess",
  "successContainer",
  "onSuccessContainer",
] as const;

export type SuccessRoleName = (typeof SUCCESS_ROLE_NAMES)[number];

export type SchemeRoleName = MaterialRoleName | SuccessRoleName;

export const SCHEME_ROLE_NAMES: readonly SchemeRoleName[] = [
  ...MATERIAL_ROLE_NAMES,
  ...SUCCESS_ROLE_NAMES,
];

/** Role name → `#RRGGBB`. Every key is always present. */
export type SchemeRoles = Record<SchemeRoleName, string>;

export const TERMINAL_SLOTS = [
  "term0",
  "term1",
  "term2",
  "term3",
  "term4",
  "term5",
  "term6",
  "term7",
  "term8",
  "term9",
  "term10",
  "term11",
  "term12",
  "term13",
  "term14",
  "term15",
] as const;

export type TerminalSlot = (typeof TERMINAL_SLOTS)[number];

/** Slot → uppercase `#RRGGBB`. */
export type TerminalPalette = Record<TerminalSlot, string>;

export interface AccentSummary {
  hex: string;
  hue: number;
  chroma: number;
  tone: number;
}

/**
 * The artifact of one run. Written to `colors.json` and handed unchanged to
 * every renderer.
 */
export interface CanonicalPalette {
  mode: ThemeMode;
  transparent: boolean;
  variant: SchemeVariant;
  material: SchemeRoles;
  terminal: TerminalPalette;
  /** Accent hex, kept at the top level for consumers that only need the seed. */
  sourceColor: string;
  accent: AccentSummary;
  generatedAt: string;
}
