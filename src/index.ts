#!/usr/bin/env tsx

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { inferCommand } from "./commands/infer";
import { inspectCommand } from "./commands/inspect";
import { DEFAULT_MAX_DIMENSION, DEFAULT_QUALITY } from "./config";

const program = new Command();

program
  .name("imgdate")
  .description("Convert photos to JPEG, dated from their filenames")
  .version("0.1.0");

program
  .command("convert", { isDefault: true })
  .description("Convert every PNG/JPG under <source> into dated JPEGs under <destination>")
  .argument("<source>", "Source directory")
  .argument("<destination>", "Destination directory")
  .argument("[maxDimension]", `Maximum width/height in pixels (default: ${DEFAULT_MAX_DIMENSION})`)
  .argument("[quality]", `JPEG quality 1-100 (default: ${DEFAULT_QUALITY})`)
  .option("--dry-run", "Show the dates that would be used without writing anything")
  .option("-v, --verbose", "Show the result for every file")
  .option("--json", "Output the summary as JSON")
  .addHelpText(
    "after",
    `
Examples:
  $ imgdate convert ./input ./output 1024 85
  $ imgdate ./input ./output 800 90 --verbose

Supported filename date formats:
  YYYY.MM.DD or YYYY-MM-DD   2023.12.25_photo.jpg, 2023-12-25_photo.jpg
  YYYY.MM or YYYY-MM         2023.12_photo.jpg
  YYYY                       2023_photo.jpg`
  )
  .action(convertCommand);

program
  .command("infer")
  .description("Show the date inferred from each filename")
  .argument("<filename...>", "Filenames to check")
  .option("--json", "Output as JSON")
  .action(inferCommand);

program
  .command("inspect")
  .description("Show the capture-time EXIF fields of an image")
  .argument("<file>", "Image file")
  .option("--json", "Output as JSON")
  .action(inspectCommand);

await program.parseAsync();
