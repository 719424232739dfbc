// test/fixtures.ts
import sharp from "sharp";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

export interface SolidImageOptions {
  width: number;
  height: number;
  format: "png" | "jpeg";
  alpha?: number;
  orientation?: number;
}

/** Solid orange image, optionally translucent or with an EXIF orientation tag. */
export async function createSolidImage(options: SolidImageOptions): Promise<Buffer> {
  const { width, height, format, alpha, orientation } = options;
  let image = sharp({
    create: {
      width,
      height,
      channels: alpha === undefined ? 3 : 4,
      background: { r: 230, g: 120, b: 20, alpha: alpha ?? 1 },
    },
  });
  image = format === "png" ? image.png() : image.jpeg({ quality: 90 });
  if (orientation !== undefined) {
    image = image.withMetadata({ orientation });
  }
  return image.toBuffer();
}

export async function createTempDir(prefix = "imgdate-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
