import sharp, { type Sharp } from "sharp";
import type { Channels, Raster } from "./types";

function asChannels(count: number): Channels {
  if (count === 1 || count === 2 || count === 3 || count === 4) {
    return count;
  }
  throw new RangeError(`Unsupported channel count: ${count}`);
}

export async function toRaster(pipeline: Sharp): Promise<Raster> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    data,
    width: info.width,
    height: info.height,
    channels: asChannels(info.channels),
  };
}

export function fromRaster(raster: Raster): Sharp {
  return sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: raster.channels },
  });
}
