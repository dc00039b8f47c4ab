import { promises as fs } from "node:fs";
import { PerFileError, errnoOf } from "@deckname/core";
import { isSameFile, pathExists } from "./reservation-book";

export interface FileMover {
  move(source: string, destination: string): Promise<void>;
}

const LINK_UNSUPPORTED = new Set(["ENOTSUP", "EOPNOTSUPP", "ENOSYS", "EPERM", "EMLINK"]);

/**
 * Moves a file without ever replacing an existing destination. A hard
 * link claims the new name atomically; the source name is dropped
 * afterwards. Volumes without hard links fall back to probe + rename.
 * Cross-volume moves fail with `EXDEV`.
 */
export async function moveNoClobber(source: string, destination: string): Promise<void> {
  try {
    await fs.link(source, destination);
  } catch (error) {
    const code = errnoOf(error);
    if (code === "EEXIST" && (await isSameFile(source, destination))) {
      // case-only rename on a case-insensitive volume
      await fs.rename(source, destination);
      return;
    }
    if (code === "EEXIST") {
      throw new PerFileError("destination_occupied", destination, `Destination already exists: ${destination}`);
    }
    if (code !== undefined && LINK_UNSUPPORTED.has(code)) {
      await renameIfAbsent(source, destination);
      return;
    }
    throw error;
  }

  try {
    await fs.unlink(source);
  } catch (error) {
    await fs.unlink(destination);
    throw error;
  }
}

async function renameIfAbsent(source: string, destination: string): Promise<void> {
  if (await pathExists(destination)) {
    throw new PerFileError("destination_occupied", destination, `Destination already exists: ${destination}`);
  }
  await fs.rename(source, destination);
}

export const noClobberMover: FileMover = {
  move: moveNoClobber
};
