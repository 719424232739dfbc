import sharp from "sharp";
import { createLogger } from "../logger";
import { DecodeError, EncodeError, ValidationError, errorMessage } from "../errors";
import { buildCaptureExif, type CaptureExif } from "./exif";
import { applyOrientation, readOrientation } from "./orientation";
import { fromRaster, toRaster } from "./raster";
import type { Dimensions, NormalizedImage, NormalizeOptions, Raster } from "./types";

const log = createLogger("normalizer");

const WHITE = { r: 255, g: 255, b: 255 };

/**
 * Largest size that fits in a `maxDimension` square with the same aspect
 * ratio. Never enlarges; the shorter side is rounded down.
 */
export function fitWithin(width: number, height: number, maxDimension: number): Dimensions {
  if (width <= maxDimension && height <= maxDimension) {
    return { width, height };
  }

  if (width > height) {
    return {
      width: maxDimension,
      height: Math.max(1, Math.floor((height * maxDimension) / width)),
    };
  }
  return {
    width: Math.max(1, Math.floor((width * maxDimension) / height)),
    height: maxDimension,
  };
}

function validateOptions({ maxDimension, quality }: NormalizeOptions): void {
  if (!Number.isInteger(maxDimension) || maxDimension < 1) {
    throw new ValidationError(`maxDimension must be a positive integer, got ${maxDimension}`);
  }
  if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
    throw new ValidationError(`quality must be an integer between 1 and 100, got ${quality}`);
  }
}

// Converted to 8-bit sRGB while decoding, so grayscale, CMYK and 16-bit
// sources all come out with 3 channels (4 with alpha).
async function decode(input: Buffer): Promise<Raster> {
  try {
    return await toRaster(sharp(input).toColourspace("srgb"));
  } catch (error) {
    throw new DecodeError(`Could not decode image: ${errorMessage(error)}`, error);
  }
}

/** Composite any alpha onto white and drop it. */
export async function flattenToRgb(raster: Raster): Promise<Raster> {
  if (raster.channels === 3) {
    return raster;
  }
  return toRaster(fromRaster(raster).flatten({ background: WHITE }).toColourspace("srgb"));
}

export async function resizeWithin(raster: Raster, maxDimension: number): Promise<Raster> {
  const target = fitWithin(raster.width, raster.height, maxDimension);
  if (target.width === raster.width && target.height === raster.height) {
    return raster;
  }
  return toRaster(
    fromRaster(raster).resize(target.width, target.height, { fit: "fill", kernel: "lanczos3" })
  );
}

async function encode(raster: Raster, quality: number, exif: CaptureExif): Promise<Buffer> {
  try {
    return await fromRaster(raster).jpeg({ quality }).withExif(exif).toBuffer();
  } catch (error) {
    throw new EncodeError(`Could not encode JPEG: ${errorMessage(error)}`, error);
  }
}

/**
 * Turn an encoded PNG or JPEG into an upright, RGB, size-bounded JPEG
 * carrying capture-time EXIF for `options.date`.
 *
 * @throws DecodeError when the input is not a readable image
 * @throws EncodeError when the JPEG can't be produced
 */
export async function normalizeImage(input: Buffer, options: NormalizeOptions): Promise<NormalizedImage> {
  validateOptions(options);

  const orientation = await readOrientation(input);
  const decoded = await decode(input);
  log.debug(
    { width: decoded.width, height: decoded.height, channels: decoded.channels, orientation },
    "Decoded image"
  );

  const upright = await applyOrientation(decoded, orientation);
  const rgb = await flattenToRgb(upright);
  const resized = await resizeWithin(rgb, options.maxDimension);
  const exif = buildCaptureExif(options.date, options.software);
  const data = await encode(resized, options.quality, exif);

  return { data, width: resized.width, height: resized.height, orientation };
}
