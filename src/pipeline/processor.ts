import { mkdir, readFile, writeFile } from "fs/promises";
import { basename, dirname } from "path";
import { createLogger } from "../logger";
import { DecodeError, WriteError, errorMessage } from "../errors";
import { normalizeImage } from "../image";
import { destinationFor } from "../sources/local";
import type { ImageFile } from "../sources/types";
import { formatIsoDate, inferDateFromFilename, toLocalDate, type FilenameDate } from "../utils/date";
import {
  noopCreationTimeSetter,
  setFileTimestamps,
  type CreationTimeSetter,
} from "../utils/timestamps";

const log = createLogger("processor");

export type ProcessResult =
  | {
      status: "processed";
      source: string;
      destination: string;
      date: FilenameDate;
      width: number;
      height: number;
    }
  | { status: "skipped"; source: string; reason: "no-date" }
  | { status: "failed"; source: string; destination: string; error: string };

export interface BatchSummary {
  total: number;
  processed: number;
  skipped: number;
  failed: number;
  results: ProcessResult[];
}

export interface ProcessProgress {
  total: number;
  done: number;
  processed: number;
  currentFile: string;
}

export type ProgressCallback = (progress: ProcessProgress) => void;

export interface ProcessorOptions {
  maxDimension: number;
  quality: number;
  creationTimeSetter?: CreationTimeSetter;
}

export class ImageProcessor {
  private maxDimension: number;
  private quality: number;
  private creationTimeSetter: CreationTimeSetter;

  constructor(options: ProcessorOptions) {
    this.maxDimension = options.maxDimension;
    this.quality = options.quality;
    this.creationTimeSetter = options.creationTimeSetter ?? noopCreationTimeSetter;
  }

  /**
   * Convert one file. Never throws: files without a date are skipped and
   * every other failure is reported in the result.
   */
  async processFile(source: string, destination: string): Promise<ProcessResult> {
    const filename = basename(source);
    const date = inferDateFromFilename(filename);
    if (!date) {
      log.warn({ source }, "No valid date found in filename, skipping");
      return { status: "skipped", source, reason: "no-date" };
    }

    try {
      let input: Buffer;
      try {
        input = await readFile(source);
      } catch (error) {
        throw new DecodeError(`Could not read ${filename}: ${errorMessage(error)}`, error);
      }

      const image = await normalizeImage(input, {
        maxDimension: this.maxDimension,
        quality: this.quality,
        date,
      });

      try {
        await mkdir(dirname(destination), { recursive: true });
        await writeFile(destination, image.data);
      } catch (error) {
        throw new WriteError(`Could not write ${destination}: ${errorMessage(error)}`, error);
      }

      await this.applyTimestamps(destination, date);

      log.info(
        { source, destination, date: formatIsoDate(date), width: image.width, height: image.height },
        "Processed image"
      );
      return { status: "processed", source, destination, date, width: image.width, height: image.height };
    } catch (error) {
      const message = errorMessage(error);
      log.error({ source, destination, error: message }, "Failed to process image");
      return { status: "failed", source, destination, error: message };
    }
  }

  /**
   * Process every image in order. One file's failure never stops the batch.
   */
  async processAll(
    images: AsyncIterable<ImageFile>,
    destinationRoot: string,
    total: number,
    onProgress?: ProgressCallback
  ): Promise<BatchSummary> {
    const summary: BatchSummary = { total: 0, processed: 0, skipped: 0, failed: 0, results: [] };

    for await (const image of images) {
      const result = await this.processFile(image.path, destinationFor(image, destinationRoot));
      summary.total++;
      summary[result.status]++;
      summary.results.push(result);

      onProgress?.({
        total: Math.max(total, summary.total),
        done: summary.total,
        processed: summary.processed,
        currentFile: image.relativePath,
      });
    }

    return summary;
  }

  // The output file stands even when its timestamps can't be set.
  private async applyTimestamps(destination: string, date: FilenameDate): Promise<void> {
    try {
      await setFileTimestamps(destination, toLocalDate(date), this.creationTimeSetter);
    } catch (error) {
      log.debug({ destination, error: errorMessage(error) }, "Could not set file timestamps");
    }
  }
}
