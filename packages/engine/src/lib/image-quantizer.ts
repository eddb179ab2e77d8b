import { QuantizerCelebi, Score, argbFromRgb } from "@material/material-color-utilities";
import sharp from "sharp";
import { colorToHex, toHct, type HctColor } from "./color-model";
import { ImageDecodeError, describeError } from "./errors";

export const DEFAULT_IMAGE_SIZE = 128;
export const DEFAULT_MAX_COLORS = 128;

export interface AccentColor {
  argb: number;
  hex: string;
  hct: HctColor;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface DecodedImage {
  pixels: number[];
  original: ImageDimensions;
  processed: ImageDimensions;
}

export interface ImageAccentResult {
  accent: AccentColor;
  image: DecodedImage;
  /** Number of distinct colors the quantizer produced. */
  candidateCount: number;
}

export interface ImageQuantizeOptions {
  imageSize?: number;
  maxColors?: number;
}

export function accentFromArgb(argb: number): AccentColor {
  return { argb, hex: colorToHex(argb), hct: toHct(argb) };
}

/**
 * Downscale target that keeps the aspect ratio and caps the area at
 * `targetSize²`. Images already within the area are left as-is.
 */
export function calculateOptimalSize(width: number, height: number, targetSize: number): ImageDimensions {
  const imageArea = width * height;
  const targetArea = targetSize ** 2;
  const scale = imageArea > targetArea ? Math.sqrt(targetArea / imageArea) : 1;
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

/**
 * Decode the first frame of an image into opaque ARGB pixels, downscaling
 * with a cubic kernel when it exceeds the target area.
 */
export async function decodeImagePixels(
  input: string | Buffer,
  options: { imageSize?: number } = {}
): Promise<DecodedImage> {
  const imageSize = options.imageSize ?? DEFAULT_IMAGE_SIZE;
  const label = typeof input === "string" ? input : `<buffer ${input.length} bytes>`;

  try {
    const image = sharp(input, { failOn: "none" });
    const metadata = await image.metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error("Image has no dimensions");
    }

    const original = { width: metadata.width, height: metadata.height };
    const target = calculateOptimalSize(original.width, original.height, imageSize);

    const pipeline = image.removeAlpha().toColourspace("srgb");
    if (target.width < original.width || target.height < original.height) {
      pipeline.resize({ width: target.width, height: target.height, fit: "fill", kernel: "cubic" });
    }

    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    const channels = info.channels;
    const pixels: number[] = [];
    for (let offset = 0; offset + channels <= data.length; offset += channels) {
      if (channels >= 3) {
        pixels.push(argbFromRgb(data[offset], data[offset + 1], data[offset + 2]));
      } else {
        pixels.push(argbFromRgb(data[offset], data[offset], data[offset]));
      }
    }

    return {
      pixels,
      original,
      processed: { width: info.width, height: info.height },
    };
  } catch (error) {
    throw new ImageDecodeError(`Failed to decode image ${label}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Cluster pixels into at most `maxColors` colors and return the best-scoring
 * one. Near-gray and sparse candidates are filtered first; when that filter
 * leaves nothing (a monochrome image) the ranking is repeated unfiltered so
 * the image's own color wins over the library's fallback.
 */
export function quantizeAndScore(pixels: number[], maxColors: number = DEFAULT_MAX_COLORS): {
  argb: number;
  candidateCount: number;
} {
  if (pixels.length === 0) {
    throw new ImageDecodeError("Image contains no pixels");
  }

  const population = QuantizerCelebi.quantize(pixels, maxColors);
  if (population.size === 0) {
    throw new ImageDecodeError("Quantizer produced no colors");
  }

  const [filtered] = Score.score(population, { desired: 1, filter: true });
  if (filtered !== undefined && population.has(filtered)) {
    return { argb: filtered, candidateCount: population.size };
  }

  const [unfiltered] = Score.score(population, { desired: 1, filter: false });
  return { argb: unfiltered, candidateCount: population.size };
}

export async function extractAccentFromImage(
  input: string | Buffer,
  options: ImageQuantizeOptions = {}
): Promise<ImageAccentResult> {
  const image = await decodeImagePixels(input, { imageSize: options.imageSize });
  const { argb, candidateCount } = quantizeAndScore(image.pixels, options.maxColors ?? DEFAULT_MAX_COLORS);
  return { accent: accentFromArgb(argb), image, candidateCount };
}
