import { basename } from "path";
import { inferDateFromFilename, formatIsoDate, type FilenameDate } from "../utils/date";

interface InferOptions {
  json?: boolean;
}

function describe(date: FilenameDate | null): string {
  if (!date) return "no date";
  return `${formatIsoDate(date)} (${date.precision})`;
}

export function inferCommand(filenames: string[], options: InferOptions = {}): void {
  const results = filenames.map((filename) => ({
    filename,
    date: inferDateFromFilename(filename),
  }));

  if (options.json) {
    console.log(
      JSON.stringify(
        results.map(({ filename, date }) => ({
          filename,
          date: date ? formatIsoDate(date) : null,
          precision: date?.precision ?? null,
        })),
        null,
        2
      )
    );
    return;
  }

  const width = Math.max(...results.map(({ filename }) => basename(filename).length));
  for (const { filename, date } of results) {
    console.log(`${basename(filename).padEnd(width)}  ${describe(date)}`);
  }
}
