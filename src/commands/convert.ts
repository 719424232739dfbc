import ora from "ora";
import cliProgress from "cli-progress";
import { existsSync, statSync } from "fs";
import { parseConvertOptions, type ConvertOptions } from "../config";
import { errorMessage } from "../errors";
import { ImageProcessor, type BatchSummary } from "../pipeline/processor";
import { LocalImageSource, destinationFor } from "../sources/local";
import { inferDateFromFilename, formatIsoDate } from "../utils/date";
import { printPlanTable, formatResultLine, type PlanRow } from "../utils/table";
import { createCreationTimeSetter } from "../utils/timestamps";

interface ConvertFlags {
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
}

function summaryToJson(summary: BatchSummary): string {
  return JSON.stringify(
    {
      total: summary.total,
      processed: summary.processed,
      skipped: summary.skipped,
      failed: summary.failed,
      results: summary.results.map((result) =>
        result.status === "processed" ? { ...result, date: formatIsoDate(result.date) } : result
      ),
    },
    null,
    2
  );
}

async function printDryRun(source: LocalImageSource, options: ConvertOptions): Promise<void> {
  const rows: PlanRow[] = [];
  for await (const image of source.scan()) {
    rows.push({
      index: rows.length + 1,
      source: image.relativePath,
      destination: destinationFor(image, options.destination),
      date: inferDateFromFilename(image.filename),
    });
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        rows.map((row) => ({ ...row, date: row.date ? formatIsoDate(row.date) : null })),
        null,
        2
      )
    );
    return;
  }

  console.log("\n[Dry run] Would convert:");
  printPlanTable(rows);
  const dated = rows.filter((row) => row.date !== null).length;
  console.log(`\n${dated} of ${rows.length} images have a date in their filename`);
}

export async function convertCommand(
  sourcePath: string,
  destinationPath: string,
  maxDimension: string | undefined,
  quality: string | undefined,
  flags: ConvertFlags = {}
): Promise<void> {
  const spinner = ora();

  let options: ConvertOptions;
  try {
    options = parseConvertOptions({
      source: sourcePath,
      destination: destinationPath,
      maxDimension,
      quality,
      dryRun: flags.dryRun ?? false,
      verbose: flags.verbose ?? false,
      json: flags.json ?? false,
    });
  } catch (error) {
    spinner.fail(errorMessage(error));
    process.exit(1);
  }

  if (!existsSync(options.source)) {
    spinner.fail(`Source directory does not exist: ${options.source}`);
    process.exit(1);
  }
  if (!statSync(options.source).isDirectory()) {
    spinner.fail(`Source path is not a directory: ${options.source}`);
    process.exit(1);
  }

  const source = new LocalImageSource(options.source);

  if (!options.json) spinner.start("Counting images...");
  const totalImages = await source.count();

  if (totalImages === 0) {
    if (options.json) {
      console.log(summaryToJson({ total: 0, processed: 0, skipped: 0, failed: 0, results: [] }));
    } else {
      spinner.info(`No PNG or JPG files found in: ${options.source}`);
    }
    return;
  }
  if (!options.json) spinner.succeed(`Found ${totalImages} image files`);

  if (options.dryRun) {
    await printDryRun(source, options);
    return;
  }

  const processor = new ImageProcessor({
    maxDimension: options.maxDimension,
    quality: options.quality,
    creationTimeSetter: createCreationTimeSetter(),
  });

  const progressBar = options.json
    ? null
    : new cliProgress.SingleBar(
        {
          format: "Converting |{bar}| {percentage}% | {value}/{total} | Converted: {processed} | {file}",
          barsize: 20,
        },
        cliProgress.Presets.shades_classic
      );

  progressBar?.start(totalImages, 0, { processed: 0, file: "" });

  const summary = await processor.processAll(
    source.scan(),
    options.destination,
    totalImages,
    (progress) => {
      progressBar?.setTotal(progress.total);
      progressBar?.update(progress.done, {
        processed: progress.processed,
        file: progress.currentFile,
      });
    }
  );

  progressBar?.stop();

  if (options.json) {
    console.log(summaryToJson(summary));
    return;
  }

  if (options.verbose) {
    console.log("\nConverted files:");
    for (const result of summary.results) {
      console.log(formatResultLine(result));
    }
  } else {
    const failures = summary.results.filter((result) => result.status === "failed");
    if (failures.length > 0) {
      console.log("\nFailed:");
      for (const result of failures) {
        console.log(formatResultLine(result));
      }
    }
  }

  if (summary.skipped > 0) {
    console.log(`\nSkipped ${summary.skipped} images without a date in their filename`);
  }
  console.log(`\nProcessed ${summary.processed} out of ${summary.total} images`);
}
