import sharp from "sharp";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import { fromRaster, toRaster } from "./raster";
import type { Dimensions, OrientationOperation, OrientationTag, Raster } from "./types";

const log = createLogger("orientation");

/**
 * EXIF orientation tag to the operations that bring the stored pixels
 * upright, applied in order.
 */
const ORIENTATION_OPERATIONS: Record<OrientationTag, readonly OrientationOperation[]> = {
  1: [],
  2: ["flip-horizontal"],
  3: ["rotate-180"],
  4: ["flip-vertical"],
  5: ["flip-horizontal", "rotate-270"],
  6: ["rotate-90"],
  7: ["flip-horizontal", "rotate-90"],
  8: ["rotate-270"],
};

export function isOrientationTag(value: unknown): value is OrientationTag {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 8;
}

export function orientationOperations(tag: OrientationTag): readonly OrientationOperation[] {
  return ORIENTATION_OPERATIONS[tag];
}

/** Displayed size of a stored `width` x `height` image. */
export function orientedSize(width: number, height: number, tag: OrientationTag): Dimensions {
  return tag >= 5 ? { width: height, height: width } : { width, height };
}

/**
 * Orientation tag of an encoded image, 1 when the tag is missing, out of
 * range or the metadata can't be read.
 */
export async function readOrientation(input: Buffer): Promise<OrientationTag> {
  try {
    const { orientation } = await sharp(input).metadata();
    return isOrientationTag(orientation) ? orientation : 1;
  } catch (error) {
    log.debug({ error: errorMessage(error) }, "Could not read orientation, assuming 1");
    return 1;
  }
}

export async function applyOperation(raster: Raster, operation: OrientationOperation): Promise<Raster> {
  const image = fromRaster(raster);
  switch (operation) {
    case "flip-horizontal":
      return toRaster(image.flop());
    case "flip-vertical":
      return toRaster(image.flip());
    case "rotate-90":
      return toRaster(image.rotate(90));
    case "rotate-180":
      return toRaster(image.rotate(180));
    case "rotate-270":
      return toRaster(image.rotate(270));
  }
}

export async function applyOrientation(raster: Raster, tag: OrientationTag): Promise<Raster> {
  let result = raster;
  for (const operation of orientationOperations(tag)) {
    result = await applyOperation(result, operation);
  }
  return result;
}
