import type { CanonicalPalette, EnginePaths, RendererId } from "hueshift-shared";
import type { RendererWriteError } from "../errors";

/**
 * Maps a finished palette to one application's configuration text.
 * `render` is pure; writing is left to `runRenderers`.
 */
export interface PaletteRenderer {
  id: RendererId;
  defaultPath(paths: EnginePaths): string;
  render(palette: CanonicalPalette): string;
}

export type RendererResult =
  | { id: RendererId; path: string; ok: true }
  | { id: RendererId; path: string; ok: false; error: RendererWriteError };

export type OutputWriter = (path: string, contents: string) => Promise<void>;
