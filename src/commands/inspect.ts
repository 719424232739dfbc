import { readFile } from "fs/promises";
import ora from "ora";
import { errorMessage } from "../errors";
import { readCaptureMetadata, type CaptureMetadata } from "../image";

interface InspectOptions {
  json?: boolean;
}

export async function inspectCommand(path: string, options: InspectOptions = {}): Promise<void> {
  const spinner = ora();

  let metadata: CaptureMetadata;
  try {
    metadata = await readCaptureMetadata(await readFile(path));
  } catch (error) {
    spinner.fail(`Could not inspect ${path}: ${errorMessage(error)}`);
    process.exit(1);
  }

  if (options.json) {
    console.log(JSON.stringify(metadata, null, 2));
    return;
  }

  console.log(`${path}:`);
  console.log(`  DateTime:          ${metadata.dateTime ?? "-"}`);
  console.log(`  DateTimeOriginal:  ${metadata.dateTimeOriginal ?? "-"}`);
  console.log(`  DateTimeDigitized: ${metadata.dateTimeDigitized ?? "-"}`);
  console.log(`  Software:          ${metadata.software ?? "-"}`);
  console.log(`  Orientation:       ${metadata.orientation ?? "-"}`);
}
