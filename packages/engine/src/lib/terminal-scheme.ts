import { readFile } from "node:fs/promises";
import { TERMINAL_SLOTS, type TerminalPalette, type TerminalSlot } from "hueshift-shared";
import { isHexColor, normalizeHex } from "./color-model";
import { PaletteInputError, describeError } from "./errors";

export const DEFAULT_TERMINAL_SCHEME_URL = new URL("../../data/terminal-scheme.default.json", import.meta.url);

type NamedRole =
  | "background"
  | "foreground"
  | "brightBlack"
  | "brightForeground"
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan";

/**
 * Flat palette files name roles instead of slots. Aliases cover the
 * Catppuccin naming (`base`, `text`, `surface2`, `subtext1`, `pink`,
 * `teal`); missing roles fall back to Catppuccin Mocha.
 */
const NAMED_ROLES: Record<NamedRole, { aliases: readonly string[]; fallback: string }> = {
  background: { aliases: ["background", "base"], fallback: "#1E1E2E" },
  foreground: { aliases: ["foreground", "text"], fallback: "#CDD6F4" },
  brightBlack: { aliases: ["brightBlack", "surface2"], fallback: "#585B70" },
  brightForeground: { aliases: ["brightForeground", "subtext1"], fallback: "#BAC2DE" },
  red: { aliases: ["red"], fallback: "#F38BA8" },
  green: { aliases: ["green"], fallback: "#A6E3A1" },
  yellow: { aliases: ["yellow"], fallback: "#F9E2AF" },
  blue: { aliases: ["blue"], fallback: "#89B4FA" },
  magenta: { aliases: ["magenta", "pink"], fallback: "#F5C2E7" },
  cyan: { aliases: ["cyan", "teal"], fallback: "#94E2D5" },
};

const SLOT_ROLES: Record<TerminalSlot, NamedRole> = {
  term0: "background",
  term1: "red",
  term2: "green",
  term3: "yellow",
  term4: "blue",
  term5: "magenta",
  term6: "cyan",
  term7: "foreground",
  term8: "brightBlack",
  term9: "red",
  term10: "green",
  term11: "yellow",
  term12: "blue",
  term13: "magenta",
  term14: "cyan",
  term15: "brightForeground",
};

export function mapTerminalSlots(fn: (slot: TerminalSlot) => string): TerminalPalette {
  return {
    term0: fn("term0"),
    term1: fn("term1"),
    term2: fn("term2"),
    term3: fn("term3"),
    term4: fn("term4"),
    term5: fn("term5"),
    term6: fn("term6"),
    term7: fn("term7"),
    term8: fn("term8"),
    term9: fn("term9"),
    term10: fn("term10"),
    term11: fn("term11"),
    term12: fn("term12"),
    term13: fn("term13"),
    term14: fn("term14"),
    term15: fn("term15"),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readHex(value: unknown, label: string): string {
  if (!isHexColor(value)) {
    throw new PaletteInputError(`Terminal scheme ${label} must be a #RRGGBB color, got ${JSON.stringify(value)}`);
  }
  return normalizeHex(value);
}

export function parseSlotPalette(raw: unknown, label: string): TerminalPalette {
  if (!isRecord(raw)) {
    throw new PaletteInputError(`Terminal scheme ${label} must be an object of term0-term15 colors`);
  }
  const record = raw;
  return mapTerminalSlots((slot) => {
    if (!(slot in record)) {
      throw new PaletteInputError(`Terminal scheme ${label} is missing ${slot}`);
    }
    return readHex(record[slot], `${label}.${slot}`);
  });
}

function hasAllSlots(raw: Record<string, unknown>): boolean {
  return TERMINAL_SLOTS.every((slot) => slot in raw);
}

/**
 * Remap a flat named-role palette (background, foreground and hue names)
 * onto the 16 terminal slots.
 */
export function remapNamedRoles(raw: Record<string, unknown>): TerminalPalette {
  const resolveRole = (role: NamedRole): string => {
    const { aliases, fallback } = NAMED_ROLES[role];
    const key = aliases.find((alias) => alias in raw);
    return key ? readHex(raw[key], key) : fallback;
  };
  return mapTerminalSlots((slot) => resolveRole(SLOT_ROLES[slot]));
}

function hasNamedRole(raw: Record<string, unknown>): boolean {
  return Object.values(NAMED_ROLES).some(({ aliases }) => aliases.some((alias) => alias in raw));
}

/**
 * Accepts either `{ dark: {...}, light: {...} }` with 16 slots per mode, a
 * flat 16-slot object, or a flat named-role object.
 */
export function parseTerminalSchemeDefinition(raw: unknown, isDark: boolean): TerminalPalette {
  if (!isRecord(raw)) {
    throw new PaletteInputError("Terminal scheme must be a JSON object");
  }

  if ("dark" in raw || "light" in raw) {
    const mode = isDark ? "dark" : "light";
    if (!(mode in raw)) {
      throw new PaletteInputError(`Terminal scheme has no "${mode}" variant`);
    }
    return parseSlotPalette(raw[mode], mode);
  }

  if (hasAllSlots(raw)) {
    return parseSlotPalette(raw, "palette");
  }

  if (hasNamedRole(raw)) {
    return remapNamedRoles(raw);
  }

  throw new PaletteInputError(
    "Terminal scheme must contain dark/light variants, term0-term15 slots, or named roles (background, foreground, red, …)"
  );
}

/** Load a palette definition file, or the built-in scheme when `path` is null. */
export async function loadTerminalScheme(path: string | null, isDark: boolean): Promise<TerminalPalette> {
  const location = path ?? DEFAULT_TERMINAL_SCHEME_URL;
  let text: string;
  try {
    text = await readFile(location, "utf8");
  } catch (error) {
    throw new PaletteInputError(`Cannot read terminal scheme ${String(location)}: ${describeError(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new PaletteInputError(`Terminal scheme ${String(location)} is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  return parseTerminalSchemeDefinition(parsed, isDark);
}
