import type { EngineConfig } from "hueshift-shared";
import { generatePalette } from "./functions/generate-palette";
import { resolveEngineConfig } from "./lib/config";
import { describeError } from "./lib/errors";
import { RunLogger } from "./lib/run-logger";
import { configureTelemetry, flushTelemetry } from "./lib/telemetry";

const EXIT_FAILED = 1;
const EXIT_PARTIAL = 2;

async function main(): Promise<number> {
  configureTelemetry(process.env.APPLICATIONINSIGHTS_CONNECTION_STRING);

  let config: EngineConfig;
  try {
    config = resolveEngineConfig({}, process.env);
  } catch (error) {
    console.error(`[hueshift] ${describeError(error)}`);
    return EXIT_FAILED;
  }

  const logger = new RunLogger({ debug: config.debug });
  try {
    const result = await generatePalette(config, { logger });
    return result.renderers.every((renderer) => renderer.ok) ? 0 : EXIT_PARTIAL;
  } catch {
    // generatePalette has already logged and tracked the failure.
    return EXIT_FAILED;
  } finally {
    await flushTelemetry();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[hueshift] Unexpected failure", error);
    process.exitCode = EXIT_FAILED;
  }
);
