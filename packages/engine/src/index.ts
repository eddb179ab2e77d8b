export * from "./lib/color-model";
export * from "./lib/config";
export * from "./lib/errors";
export * from "./lib/external-sink";
export * from "./lib/harmonizer";
export * from "./lib/image-quantizer";
export * from "./lib/palette-store";
export * from "./lib/renderers";
export * from "./lib/run-logger";
export * from "./lib/scheme-generator";
export * from "./lib/terminal-scheme";
export { configureTelemetry, flushTelemetry } from "./lib/telemetry";
export {
  generatePalette,
  generatePaletteFromEnvironment,
  type GeneratePaletteDeps,
  type GeneratePaletteResult,
} from "./functions/generate-palette";
