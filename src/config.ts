import { z } from "zod";
import { homedir } from "os";
import { join, resolve } from "path";
import { fromZodError } from "./errors";

export const DEFAULT_MAX_DIMENSION = 2048;
export const DEFAULT_QUALITY = 85;
export const SOFTWARE_TAG = "imgdate";
export const OUTPUT_EXTENSION = ".jpg";
export const SUPPORTED_EXTENSIONS = [".png", ".jpg", ".jpeg"];

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const logLevelSchema = z.enum(LOG_LEVELS).catch("warn");

export const convertOptionsSchema = z.object({
  source: z.string().min(1, "source directory is required"),
  destination: z.string().min(1, "destination directory is required"),
  maxDimension: z.coerce
    .number()
    .int("maxDimension must be an integer")
    .positive("maxDimension must be positive")
    .default(DEFAULT_MAX_DIMENSION),
  quality: z.coerce
    .number()
    .int("quality must be an integer")
    .min(1, "quality must be between 1 and 100")
    .max(100, "quality must be between 1 and 100")
    .default(DEFAULT_QUALITY),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type ConvertOptions = z.infer<typeof convertOptionsSchema>;
export type ConvertOptionsInput = z.input<typeof convertOptionsSchema>;

export function expandPath(p: string): string {
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

/**
 * Validate raw CLI input into run options. Paths are expanded (`~/`) and
 * resolved against the working directory.
 */
export function parseConvertOptions(raw: unknown): ConvertOptions {
  const result = convertOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw fromZodError(result.error, "Invalid convert options");
  }

  return {
    ...result.data,
    source: expandPath(result.data.source),
    destination: expandPath(result.data.destination),
  };
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return logLevelSchema.parse(env.LOG_LEVEL?.toLowerCase());
}
