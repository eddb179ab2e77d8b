import type { RendererId } from "hueshift-shared";

export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

/**
 * Bad or ambiguous input: source selection, config values, palette
 * definition files and caches. Always raised before any output is written.
 */
export class PaletteInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PaletteInputError";
  }
}

export class ImageDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageDecodeError";
  }
}

export class RendererWriteError extends Error {
  constructor(
    public readonly rendererId: RendererId,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Renderer "${rendererId}" failed to write ${path}: ${describeError(options?.cause)}`, options);
    this.name = "RendererWriteError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
