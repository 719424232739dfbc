import { readdirSync } from "fs";
import { join, extname, relative, dirname, parse } from "path";
import type { ImageFile, ImageSource } from "./types";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import { OUTPUT_EXTENSION, SUPPORTED_EXTENSIONS } from "../config";

const logger = createLogger("local-source");

export class LocalImageSource implements ImageSource {
  name = "local";
  private root: string;
  private extensions: Set<string>;

  constructor(root: string, extensions: string[] = SUPPORTED_EXTENSIONS) {
    this.root = root;
    this.extensions = new Set(extensions.map((e) => e.toLowerCase()));
  }

  async *scan(): AsyncGenerator<ImageFile> {
    yield* this.scanDirectory(this.root);
  }

  async count(): Promise<number> {
    let count = 0;
    for await (const _ of this.scan()) {
      count++;
    }
    return count;
  }

  /**
   * Files of a directory (sorted by name) come before its subdirectories,
   * which are walked in name order. Hidden entries are skipped.
   */
  private *scanDirectory(dirPath: string): Generator<ImageFile> {
    let entries;
    try {
      entries = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      logger.warn({ directory: dirPath, error: errorMessage(error) }, "Cannot read directory");
      return;
    }

    const files: ImageFile[] = [];
    const subdirs: string[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }

      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        subdirs.push(fullPath);
      } else if (entry.isFile()) {
        const ext = extname(entry.name).toLowerCase();
        if (this.extensions.has(ext)) {
          files.push({
            path: fullPath,
            relativePath: relative(this.root, fullPath),
            filename: entry.name,
            extension: ext,
          });
        }
      }
    }

    files.sort((a, b) => a.filename.localeCompare(b.filename));
    yield* files;

    subdirs.sort();
    for (const subdir of subdirs) {
      yield* this.scanDirectory(subdir);
    }
  }
}

/**
 * Output path for an image: same relative location under `destinationRoot`,
 * last extension replaced by `.jpg`.
 */
export function destinationFor(image: ImageFile, destinationRoot: string): string {
  const { name } = parse(image.relativePath);
  return join(destinationRoot, dirname(image.relativePath), `${name}${OUTPUT_EXTENSION}`);
}
