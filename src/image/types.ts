import type { FilenameDate } from "../utils/date";

export type Channels = 1 | 2 | 3 | 4;

/** Uncompressed 8-bit pixels, interleaved, row-major. */
export interface Raster {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
}

export interface Dimensions {
  width: number;
  height: number;
}

export type OrientationTag = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

/** Rotations are clockwise. */
export type OrientationOperation =
  | "flip-horizontal"
  | "flip-vertical"
  | "rotate-90"
  | "rotate-180"
  | "rotate-270";

export interface NormalizeOptions {
  maxDimension: number;
  quality: number;
  date: FilenameDate;
  software?: string;
}

export interface NormalizedImage {
  data: Buffer;
  width: number;
  height: number;
  /** Orientation tag found in the source (1 when absent) */
  orientation: OrientationTag;
}

export interface CaptureMetadata {
  dateTime?: string;
  dateTimeOriginal?: string;
  dateTimeDigitized?: string;
  software?: string;
  orientation?: number;
}
