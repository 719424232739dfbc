import pino, { type Logger } from "pino";
import { getLogLevel } from "./config";

// stderr, so progress output and --json on stdout stay clean
const root = pino(
  { name: "imgdate", level: getLogLevel() },
  pino.destination({ dest: 2, sync: true })
);

export type { Logger };

export function createLogger(module: string): Logger {
  return root.child({ module });
}
