import path from "node:path";
import { promises as fs } from "node:fs";
import { NotFoundError, errnoOf } from "@deckname/core";

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  ".mp3",
  ".flac",
  ".m4a",
  ".aac",
  ".aiff",
  ".aif",
  ".wav",
  ".ogg",
  ".opus"
]);

export interface FileEnumerator {
  list(root: string, recursive: boolean): Promise<string[]>;
}

export function isAudioFile(filePath: string): boolean {
  return AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Lists audio files under `root`, sorted by path. Dot-prefixed entries
 * (including AppleDouble `._` companions) are ignored. A root that is
 * itself an audio file yields just that file.
 */
export async function listAudioFiles(root: string, recursive: boolean): Promise<string[]> {
  const normalizedRoot = path.resolve(root);
  const rootStat = await statOrUndefined(normalizedRoot);
  if (!rootStat) {
    throw new NotFoundError(`Path not found: ${normalizedRoot}`);
  }
  if (!rootStat.isDirectory()) {
    return rootStat.isFile() && isAudioFile(normalizedRoot) ? [normalizedRoot] : [];
  }

  const results: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (recursive) {
          await walk(fullPath);
        }
        continue;
      }
      if (entry.isFile() && isAudioFile(fullPath)) {
        results.push(fullPath);
      }
    }
  };

  await walk(normalizedRoot);
  return results.sort(comparePaths);
}

export const fsFileEnumerator: FileEnumerator = {
  list: listAudioFiles
};

export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function statOrUndefined(filePath: string) {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (errnoOf(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}
