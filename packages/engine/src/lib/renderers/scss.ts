import { join } from "node:path";
import { SCHEME_ROLE_NAMES, TERMINAL_SLOTS, type CanonicalPalette } from "hueshift-shared";
import type { PaletteRenderer } from "./types";

/** One `$name: value;` line per flag, role and slot. */
export function renderScssVariables(palette: CanonicalPalette): string {
  const lines = [`$darkmode: ${palette.mode === "dark"};`, `$transparent: ${palette.transparent};`];
  for (const role of SCHEME_ROLE_NAMES) {
    lines.push(`$${role}: ${palette.material[role]};`);
  }
  for (const slot of TERMINAL_SLOTS) {
    lines.push(`$${slot}: ${palette.terminal[slot]};`);
  }
  return `${lines.join("\n")}\n`;
}

export const scssRenderer: PaletteRenderer = {
  id: "scss",
  defaultPath: (paths) => join(paths.stateDir, "colors.scss"),
  render: renderScssVariables,
};
