import {
  SCHEME_ROLE_NAMES,
  TERMINAL_SLOTS,
  type CanonicalPalette,
  type EngineConfig,
  type PaletteSource,
  type SchemeVariant,
  type TerminalPalette,
} from "hueshift-shared";
import { hexToColor } from "../lib/color-model";
import { resolveEngineConfig, type EngineConfigOverrides, type EngineEnv } from "../lib/config";
import { describeError } from "../lib/errors";
import { applyExternalSinks, type ExternalSink, type SinkResult } from "../lib/external-sink";
import { harmonizeTerminalPalette } from "../lib/harmonizer";
import {
  accentFromArgb,
  extractAccentFromImage,
  type AccentColor,
  type DecodedImage,
} from "../lib/image-quantizer";
import { assembleCanonicalPalette, writeAccentCache, writePaletteCache } from "../lib/palette-store";
import {
  renderersFor,
  runRenderers,
  type OutputWriter,
  type PaletteRenderer,
  type RendererResult,
} from "../lib/renderers";
import { RunLogger } from "../lib/run-logger";
import { chooseVariant, generateScheme } from "../lib/scheme-generator";
import { trackEvent, trackException, trackMetric } from "../lib/telemetry";
import { loadTerminalScheme } from "../lib/terminal-scheme";

export interface GeneratePaletteDeps {
  logger?: RunLogger;
  /** Defaults to the renderers named in `config.renderers`. */
  renderers?: readonly PaletteRenderer[];
  sinks?: readonly ExternalSink[];
  writeOutput?: OutputWriter;
  now?: () => Date;
}

export interface GeneratePaletteResult {
  palette: CanonicalPalette;
  accent: AccentColor;
  variant: SchemeVariant;
  sourceTerminal: TerminalPalette;
  cachePath: string;
  accentPath: string;
  renderers: RendererResult[];
  sinks: SinkResult[];
}

interface ResolvedAccent {
  accent: AccentColor;
  image: DecodedImage | null;
}

async function resolveAccent(source: PaletteSource, config: EngineConfig): Promise<ResolvedAccent> {
  switch (source.kind) {
    case "image": {
      const result = await extractAccentFromImage(source.path, {
        imageSize: config.imageSize,
        maxColors: config.maxColors,
      });
      return { accent: result.accent, image: result.image };
    }
    case "color":
      return { accent: accentFromArgb(hexToColor(source.hex)), image: null };
    default: {
      const unreachable: never = source;
      throw new Error(`Unsupported palette source: ${JSON.stringify(unreachable)}`);
    }
  }
}

function logDebugReport(
  logger: RunLogger,
  resolved: ResolvedAccent,
  palette: CanonicalPalette,
  sourceTerminal: TerminalPalette
): void {
  if (resolved.image) {
    logger.debug("Image properties", {
      original: `${resolved.image.original.width}x${resolved.image.original.height}`,
      processed: `${resolved.image.processed.width}x${resolved.image.processed.height}`,
    });
  }
  logger.debug("Selected accent", { ...palette.accent });
  for (const role of SCHEME_ROLE_NAMES) {
    logger.debug(`${role}: ${palette.material[role]}`);
  }
  for (const slot of TERMINAL_SLOTS) {
    logger.debug(`${slot}: ${sourceTerminal[slot]} -> ${palette.terminal[slot]}`);
  }
}

/**
 * One theming run: accent, scheme, harmonized terminal palette, cache,
 * renderers, external sinks. Nothing is written until the palette is
 * complete; renderer and sink failures are reported, not thrown.
 */
export async function generatePalette(
  config: EngineConfig,
  deps: GeneratePaletteDeps = {}
): Promise<GeneratePaletteResult> {
  const logger = deps.logger ?? new RunLogger({ debug: config.debug });
  const now = deps.now ?? (() => new Date());
  const startTime = Date.now();
  const isDark = config.mode === "dark";

  try {
    logger.info(`Generating ${config.mode} palette`, {
      source: config.source.kind,
      variant: config.variant,
    });

    const resolved = await resolveAccent(config.source, config);
    const variant = chooseVariant({
      requested: config.variant,
      accent: resolved.accent,
      fromImage: config.source.kind === "image",
      smart: config.smart,
    });
    if (variant !== config.variant) {
      logger.info(`Accent chroma ${resolved.accent.hct.chroma.toFixed(1)} is low; using ${variant} scheme`);
    }

    const scheme = generateScheme(resolved.accent, isDark, variant);
    const sourceTerminal = await loadTerminalScheme(config.terminalSchemePath, isDark);
    const terminal = harmonizeTerminalPalette({
      accent: resolved.accent.hct,
      source: sourceTerminal,
      isDark,
      variant,
      scheme,
      options: config.harmonize,
    });

    const palette = assembleCanonicalPalette({
      mode: config.mode,
      transparent: config.transparent,
      variant,
      scheme,
      terminal,
      accent: resolved.accent,
      generatedAt: now(),
    });
    logDebugReport(logger, resolved, palette, sourceTerminal);

    const cachePath = await writePaletteCache(palette, config.paths.stateDir);
    const accentPath = await writeAccentCache(palette.sourceColor, config.paths.stateDir);
    logger.info("Palette cache written", { cachePath, accent: palette.sourceColor });

    const renderers = await runRenderers(palette, deps.renderers ?? renderersFor(config.renderers), {
      paths: config.paths,
      outputs: config.outputs,
      logger,
      writeOutput: deps.writeOutput,
    });
    const sinks = await applyExternalSinks(palette, deps.sinks ?? [], logger);

    const durationMs = Date.now() - startTime;
    const failedRenderers = renderers.filter((result) => !result.ok).length;
    trackEvent("palette.generated", {
      mode: config.mode,
      variant,
      source: config.source.kind,
      failedRenderers,
    });
    trackMetric("palette.duration_ms", durationMs, { source: config.source.kind });
    logger.info(`Palette generated in ${durationMs}ms`, {
      accent: palette.sourceColor,
      variant,
      renderers: renderers.length,
      failedRenderers,
    });

    return { palette, accent: resolved.accent, variant, sourceTerminal, cachePath, accentPath, renderers, sinks };
  } catch (error) {
    logger.error(`Palette generation failed: ${describeError(error)}`);
    trackException(error, { stage: "generate-palette" });
    throw error;
  }
}

/** Resolve configuration from overrides and the environment, then run. */
export async function generatePaletteFromEnvironment(
  overrides: EngineConfigOverrides = {},
  env: EngineEnv = process.env,
  deps: GeneratePaletteDeps = {}
): Promise<GeneratePaletteResult> {
  const config = resolveEngineConfig(overrides, env);
  return generatePalette(config, deps);
}
