import { execFile } from "child_process";
import { utimes } from "fs/promises";
import { promisify } from "util";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import { formatSetFileDate } from "./date";

const log = createLogger("timestamps");
const execFileAsync = promisify(execFile);

/** Best-effort setter for a file's creation ("birth") time. */
export interface CreationTimeSetter {
  setCreationTime(path: string, date: Date): Promise<void>;
}

export const noopCreationTimeSetter: CreationTimeSetter = {
  async setCreationTime() {},
};

/**
 * macOS: SetFile from the Xcode command line tools. Missing tool or a
 * non-zero exit is logged and ignored.
 */
export class SetFileCreationTimeSetter implements CreationTimeSetter {
  private command: string;

  constructor(command = "SetFile") {
    this.command = command;
  }

  async setCreationTime(path: string, date: Date): Promise<void> {
    const stamp = formatSetFileDate(date);
    try {
      await execFileAsync(this.command, ["-d", stamp, "-m", stamp, path]);
    } catch (error) {
      log.debug({ path, error: errorMessage(error) }, "SetFile failed, creation time unchanged");
    }
  }
}

export function createCreationTimeSetter(platform: NodeJS.Platform = process.platform): CreationTimeSetter {
  return platform === "darwin" ? new SetFileCreationTimeSetter() : noopCreationTimeSetter;
}

/**
 * Set access and modification time to `date`, then creation time where the
 * setter supports it.
 */
export async function setFileTimestamps(
  path: string,
  date: Date,
  creationTimeSetter: CreationTimeSetter = noopCreationTimeSetter
): Promise<void> {
  await utimes(path, date, date);
  await creationTimeSetter.setCreationTime(path, date);
}
