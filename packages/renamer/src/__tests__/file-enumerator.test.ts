import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { NotFoundError } from "@deckname/core";
import { isAudioFile, listAudioFiles } from "../file-enumerator";
import { makeLibrary } from "./helpers";

describe("listAudioFiles", () => {
  async function makeTree(): Promise<string> {
    const root = await makeLibrary(["a.mp3", "B.FLAC", "notes.txt", "._a.mp3"], "deckname-enum-");
    await mkdir(path.join(root, "sub"));
    await writeFile(path.join(root, "sub", "c.wav"), "audio");
    return root;
  }

  it("lists audio files in sorted order", async () => {
    const root = await makeTree();

    expect(await listAudioFiles(root, false)).toEqual([path.join(root, "B.FLAC"), path.join(root, "a.mp3")]);
  });

  it("descends into subdirectories when recursive", async () => {
    const root = await makeTree();

    expect(await listAudioFiles(root, true)).toEqual([
      path.join(root, "B.FLAC"),
      path.join(root, "a.mp3"),
      path.join(root, "sub", "c.wav")
    ]);
  });

  it("accepts a single audio file as root", async () => {
    const root = await makeTree();

    expect(await listAudioFiles(path.join(root, "a.mp3"), false)).toEqual([path.join(root, "a.mp3")]);
    expect(await listAudioFiles(path.join(root, "notes.txt"), false)).toEqual([]);
  });

  it("rejects a missing root", async () => {
    const root = await makeTree();

    await expect(listAudioFiles(path.join(root, "missing"), true)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("matches extensions case-insensitively", () => {
    expect(isAudioFile("/music/Track.AIFF")).toBe(true);
    expect(isAudioFile("/music/cover.jpg")).toBe(false);
  });
});
