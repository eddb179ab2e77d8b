import { join } from "node:path";
import type { CanonicalPalette } from "hueshift-shared";
import type { PaletteRenderer } from "./types";

export function renderKittyTheme(palette: CanonicalPalette): string {
  const { material, terminal } = palette;
  const background = material.surface;
  const foreground = material.onSurface;

  const lines = [
    "# Auto-generated Kitty colors (Material You theme)",
    "",
    "# Main colors",
    `background ${background}`,
    `foreground ${foreground}`,
    "",
    "# Cursor colors",
    `cursor ${foreground}`,
    `cursor_text_color ${background}`,
    "",
    "# Selection colors",
    `selection_foreground ${background}`,
    `selection_background ${material.primaryContainer}`,
    "",
    "# URL underline color",
    `url_color ${terminal.term12}`,
    "",
    "# Tab bar colors",
    `active_tab_foreground ${foreground}`,
    `active_tab_background ${material.surfaceContainerHigh}`,
    `inactive_tab_foreground ${foreground}`,
    `inactive_tab_background ${material.surfaceContainerLow}`,
    `tab_bar_background ${background}`,
    "",
    "# Marks",
    `mark1_foreground ${background}`,
    `mark1_background ${terminal.term12}`,
    `mark2_foreground ${background}`,
    `mark2_background ${terminal.term13}`,
    `mark3_foreground ${background}`,
    `mark3_background ${terminal.term14}`,
    "",
    "# Terminal ANSI colors",
    `color0 ${terminal.term0}`,
    `color1 ${terminal.term1}`,
    `color2 ${terminal.term2}`,
    `color3 ${terminal.term3}`,
    `color4 ${terminal.term4}`,
    `color5 ${terminal.term5}`,
    `color6 ${terminal.term6}`,
    `color7 ${terminal.term7}`,
    `color8 ${terminal.term8}`,
    `color9 ${terminal.term9}`,
    `color10 ${terminal.term10}`,
    `color11 ${terminal.term11}`,
    `color12 ${terminal.term12}`,
    `color13 ${terminal.term13}`,
    `color14 ${terminal.term14}`,
    `color15 ${terminal.term15}`,
  ];
  return `${lines.join("\n")}\n`;
}

export const kittyRenderer: PaletteRenderer = {
  id: "kitty",
  defaultPath: (paths) => join(paths.configDir, "kitty", "current-theme.conf"),
  render: renderKittyTheme,
};
