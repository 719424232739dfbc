import * as exifr from "exifr";
import { z } from "zod";
import { SOFTWARE_TAG } from "../config";
import { DecodeError, errorMessage } from "../errors";
import { formatExifDateTime, type FilenameDate } from "../utils/date";
import type { CaptureMetadata } from "./types";

/** EXIF directories in the shape sharp's `withExif` takes (IFD2 is the Exif sub-IFD). */
export type CaptureExif = {
  IFD0: Record<string, string>;
  IFD2: Record<string, string>;
};

export function buildCaptureExif(date: FilenameDate, software: string = SOFTWARE_TAG): CaptureExif {
  const stamp = formatExifDateTime(date);
  return {
    IFD0: {
      DateTime: stamp,
      Software: software,
    },
    IFD2: {
      DateTimeOriginal: stamp,
      DateTimeDigitized: stamp,
    },
  };
}

// Numeric tag ids, read untranslated so the names don't depend on exifr's dictionary
const TAG_ORIENTATION = "274";
const TAG_SOFTWARE = "305";
const TAG_DATE_TIME = "306";
const TAG_DATE_TIME_ORIGINAL = "36867";
const TAG_DATE_TIME_DIGITIZED = "36868";

const asciiTag = z
  .string()
  .transform((value) => value.replace(/\0+$/, "").trim())
  .optional()
  .catch(undefined);

const rawExifSchema = z.object({
  [TAG_ORIENTATION]: z.number().optional().catch(undefined),
  [TAG_SOFTWARE]: asciiTag,
  [TAG_DATE_TIME]: asciiTag,
  [TAG_DATE_TIME_ORIGINAL]: asciiTag,
  [TAG_DATE_TIME_DIGITIZED]: asciiTag,
});

/**
 * Read the capture-time fields of an encoded image's EXIF block.
 * Fields that are missing come back undefined.
 */
export async function readCaptureMetadata(input: Buffer): Promise<CaptureMetadata> {
  let raw: unknown;
  try {
    raw = await exifr.parse(input, {
      gps: false,
      interop: false,
      ifd1: false,
      translateKeys: false,
      translateValues: false,
      reviveValues: false,
    });
  } catch (error) {
    throw new DecodeError(`Could not read EXIF metadata: ${errorMessage(error)}`, error);
  }

  const tags = rawExifSchema.parse(raw ?? {});
  return {
    dateTime: tags[TAG_DATE_TIME],
    dateTimeOriginal: tags[TAG_DATE_TIME_ORIGINAL],
    dateTimeDigitized: tags[TAG_DATE_TIME_DIGITIZED],
    software: tags[TAG_SOFTWARE],
    orientation: tags[TAG_ORIENTATION],
  };
}
