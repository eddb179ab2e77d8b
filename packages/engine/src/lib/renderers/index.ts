import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { CanonicalPalette, EnginePaths, RendererId } from "hueshift-shared";
import { RendererWriteError } from "../errors";
import type { RunLogger } from "../run-logger";
import { trackException } from "../telemetry";
import { kittyRenderer } from "./kitty";
import { scssRenderer } from "./scss";
import type { OutputWriter, PaletteRenderer, RendererResult } from "./types";

export { kittyRenderer, renderKittyTheme } from "./kitty";
export { scssRenderer, renderScssVariables } from "./scss";
export type { OutputWriter, PaletteRenderer, RendererResult } from "./types";

export const RENDERERS: Record<RendererId, PaletteRenderer> = {
  kitty: kittyRenderer,
  scss: scssRenderer,
};

export function renderersFor(ids: readonly RendererId[]): PaletteRenderer[] {
  return ids.map((id) => RENDERERS[id]);
}

export const writeOutputFile: OutputWriter = async (path, contents) => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents, "utf8");
};

export interface RunRenderersOptions {
  paths: EnginePaths;
  outputs?: Partial<Record<RendererId, string>>;
  logger: RunLogger;
  writeOutput?: OutputWriter;
}

/**
 * Render and write each target in turn. A failing renderer is recorded and
 * logged; the remaining renderers still run.
 */
export async function runRenderers(
  palette: CanonicalPalette,
  renderers: readonly PaletteRenderer[],
  options: RunRenderersOptions
): Promise<RendererResult[]> {
  const write = options.writeOutput ?? writeOutputFile;
  const results: RendererResult[] = [];

  for (const renderer of renderers) {
    const path = options.outputs?.[renderer.id] ?? renderer.defaultPath(options.paths);
    try {
      await write(path, renderer.render(palette));
      options.logger.info(`Wrote ${renderer.id} theme`, { path });
      results.push({ id: renderer.id, path, ok: true });
    } catch (cause) {
      const error = new RendererWriteError(renderer.id, path, { cause });
      options.logger.error(error.message, { renderer: renderer.id, path });
      trackException(error, { renderer: renderer.id });
      results.push({ id: renderer.id, path, ok: false, error });
    }
  }

  return results;
}
