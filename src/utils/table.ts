import type { ProcessResult } from "../pipeline/processor";
import { formatIsoDate, type FilenameDate } from "./date";

export interface PlanRow {
  index: number;
  source: string;
  destination?: string;
  date: FilenameDate | null;
}

export interface ColumnWidths {
  source: number;
  destination: number;
}

const DEFAULT_COLUMN_WIDTHS: ColumnWidths = {
  source: 40,
  destination: 40,
};

function truncate(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 3) + "..." : value.padEnd(width);
}

function formatDate(date: FilenameDate | null): string {
  if (!date) return "no date   ";
  return formatIsoDate(date);
}

function formatPrecision(date: FilenameDate | null): string {
  return (date?.precision ?? "-").padEnd(9);
}

/**
 * Print the dates a conversion would use, one row per file
 */
export function printPlanTable(rows: PlanRow[], columns?: ColumnWidths): void {
  const { source: sourceWidth, destination: destinationWidth } = columns ?? DEFAULT_COLUMN_WIDTHS;

  console.log(` #   Date        Precision ${"Source".padEnd(sourceWidth)} Destination`);
  console.log("─".repeat(28 + sourceWidth + destinationWidth));

  for (const row of rows) {
    const destination = row.date && row.destination ? truncate(row.destination, destinationWidth).trimEnd() : "(skipped)";
    console.log(
      ` ${String(row.index).padStart(2)}  ${formatDate(row.date)}  ${formatPrecision(row.date)} ${truncate(row.source, sourceWidth)} ${destination}`
    );
  }
}

export function formatResultLine(result: ProcessResult): string {
  switch (result.status) {
    case "processed":
      return `  [OK]      ${result.source} -> ${result.destination} (date: ${formatIsoDate(result.date)}, ${result.width}x${result.height})`;
    case "skipped":
      return `  [SKIPPED] ${result.source} - no valid date in filename`;
    case "failed":
      return `  [FAILED]  ${result.source} - ${result.error}`;
  }
}
