import type { CanonicalPalette } from "hueshift-shared";
import { describeError } from "./errors";
import type { RunLogger } from "./run-logger";

/**
 * Optional post-processing target outside the engine, such as a desktop
 * hook. Failures never fail the run.
 */
export interface ExternalSink {
  name: string;
  apply(palette: CanonicalPalette): Promise<void>;
}

export type SinkResult =
  | { name: string; ok: true }
  | { name: string; ok: false; error: string };

export const noopExternalSink: ExternalSink = {
  name: "noop",
  apply: async () => {},
};

export async function applyExternalSinks(
  palette: CanonicalPalette,
  sinks: readonly ExternalSink[],
  logger: RunLogger
): Promise<SinkResult[]> {
  const results: SinkResult[] = [];
  for (const sink of sinks) {
    try {
      await sink.apply(palette);
      logger.debug(`External sink ${sink.name} applied`);
      results.push({ name: sink.name, ok: true });
    } catch (error) {
      const message = describeError(error);
      logger.warn(`External sink ${sink.name} failed; continuing`, { error: message });
      results.push({ name: sink.name, ok: false, error: message });
    }
  }
  return results;
}

