import { mkdtemp, readdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { PerFileError } from "@deckname/core";
import type { RawTags } from "@deckname/core";
import type { TagReader } from "../tag-reader";

export async function makeLibrary(names: readonly string[], prefix = "deckname-"): Promise<string> {
  const root = await mkdtemp(path.join(tmpdir(), prefix));
  for (const name of names) {
    await writeFile(path.join(root, name), `audio:${name}`);
  }
  return root;
}

export async function listNames(root: string): Promise<string[]> {
  return (await readdir(root)).sort();
}

/** Tags keyed by the file's base name; unknown files have unreadable tags. */
export function fakeTagReader(tagsByName: Record<string, RawTags>, delayMs = 0): TagReader {
  return {
    read: async (filePath) => {
      if (delayMs > 0) {
        await sleep(delayMs);
      }
      const tags = tagsByName[path.basename(filePath)];
      if (!tags) {
        throw new PerFileError("unreadable_metadata", filePath, "No readable tags");
      }
      return tags;
    }
  };
}

export function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
