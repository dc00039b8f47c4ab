import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "@deckname/core";
import { RenameExecutor } from "../executor";
import type { FileMover } from "../file-mover";
import { moveNoClobber } from "../file-mover";
import { errnoError, fakeTagReader, listNames, makeLibrary } from "./helpers";

const COLLIDING_TAGS = {
  "a.mp3": { artist: "X", title: "Y" },
  "b.mp3": { artist: "X", title: "Y" },
  "c.mp3": { artist: "Z", title: "W" }
};

describe("RenameExecutor", () => {
  it("gives colliding files numbered names in discovery order", async () => {
    const root = await makeLibrary(["a.mp3", "b.mp3", "c.mp3"], "deckname-exec-");
    const executor = new RenameExecutor({ tagReader: fakeTagReader(COLLIDING_TAGS), workers: 4 });

    const { status, moves } = await executor.run({ path: root, template: "{artist} - {title}" });

    expect(status).toMatchObject({ total: 3, renamed: 3, skipped: 0, errors: 0, cancelled: false });
    expect(status.results.map((result) => path.basename(result.destination ?? ""))).toEqual([
      "X - Y.mp3",
      "X - Y_2.mp3",
      "Z - W.mp3"
    ]);
    expect(await listNames(root)).toEqual(["X - Y.mp3", "X - Y_2.mp3", "Z - W.mp3"]);
    expect(await readFile(path.join(root, "X - Y.mp3"), "utf8")).toBe("audio:a.mp3");
    expect(await readFile(path.join(root, "X - Y_2.mp3"), "utf8")).toBe("audio:b.mp3");
    expect(moves).toHaveLength(3);
  });

  it("previews without touching files and repeats identically", async () => {
    const root = await makeLibrary(["a.mp3", "b.mp3", "c.mp3"], "deckname-exec-");
    const executor = new RenameExecutor({ tagReader: fakeTagReader(COLLIDING_TAGS), workers: 2 });
    const request = { path: root, template: "{artist} - {title}", dryRun: true };

    const first = await executor.run(request);
    const second = await executor.run(request);

    expect(second.status).toEqual(first.status);
    expect(first.moves).toEqual([]);
    expect(first.status.results[1]).toEqual({
      source: path.join(root, "b.mp3"),
      destination: path.join(root, "X - Y_2.mp3"),
      status: "renamed",
      message: "dry-run",
      metadata: { artist: "X", title: "Y" }
    });
    expect(await listNames(root)).toEqual(["a.mp3", "b.mp3", "c.mp3"]);
  });

  it("rejects unknown template tokens before touching files", async () => {
    const root = await makeLibrary(["a.mp3"], "deckname-exec-");
    const executor = new RenameExecutor({ tagReader: fakeTagReader(COLLIDING_TAGS) });

    const error = await executor.run({ path: root, template: "{bogus}" }).then(
      () => undefined,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.invalidTokens).toEqual(["bogus"]);
    }
    expect(await listNames(root)).toEqual(["a.mp3"]);
  });

  it("rejects a missing root", async () => {
    const root = await makeLibrary([], "deckname-exec-");
    const executor = new RenameExecutor({ tagReader: fakeTagReader({}) });

    await expect(executor.run({ path: path.join(root, "nope") })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("records per-file failures without aborting the batch", async () => {
    const root = await makeLibrary(["a.mp3", "b.mp3", "c.mp3", "d.mp3"], "deckname-exec-");
    const mover: FileMover = {
      move: async (source, destination) => {
        if (path.basename(source) === "b.mp3") {
          throw errnoError("EACCES", "denied");
        }
        await moveNoClobber(source, destination);
      }
    };
    const executor = new RenameExecutor({ tagReader: fakeTagReader(COLLIDING_TAGS), mover });

    const { status, moves } = await executor.run({ path: root, template: "{artist} - {title}" });

    expect(status).toMatchObject({ total: 4, renamed: 2, skipped: 1, errors: 1 });
    expect(status.results[1]).toEqual({
      source: path.join(root, "b.mp3"),
      status: "error",
      message: "Permission denied: denied",
      metadata: { artist: "X", title: "Y" }
    });
    expect(status.results[3]).toEqual({
      source: path.join(root, "d.mp3"),
      status: "skipped",
      message: "No readable tags"
    });
    expect(moves.map((move) => path.basename(move.destination)).sort()).toEqual(["X - Y.mp3", "Z - W.mp3"]);
    expect(await listNames(root)).toEqual(["X - Y.mp3", "Z - W.mp3", "b.mp3", "d.mp3"]);
  });

  it("skips files that already carry their target name", async () => {
    const root = await makeLibrary(["X - Y.mp3", "a.mp3"], "deckname-exec-");
    const executor = new RenameExecutor({
      tagReader: fakeTagReader({ "X - Y.mp3": { artist: "X", title: "Y" }, "a.mp3": { artist: "X", title: "Y" } })
    });

    const { status } = await executor.run({ path: root, template: "{artist} - {title}" });

    expect(status.results).toEqual([
      {
        source: path.join(root, "X - Y.mp3"),
        destination: path.join(root, "X - Y.mp3"),
        status: "skipped",
        message: "Already named",
        metadata: { artist: "X", title: "Y" }
      },
      {
        source: path.join(root, "a.mp3"),
        destination: path.join(root, "X - Y_2.mp3"),
        status: "renamed",
        metadata: { artist: "X", title: "Y" }
      }
    ]);
  });

  it("attaches the normalized tags to each result", async () => {
    const root = await makeLibrary(["a.mp3"], "deckname-exec-");
    const executor = new RenameExecutor({
      tagReader: fakeTagReader({
        "a.mp3": { artist: "X", title: "Y (Extended Mix)", bpm: "127.6", key: "A minor" }
      })
    });

    const { status } = await executor.run({ path: root, dryRun: true });

    expect(status.results[0]?.destination).toBe(path.join(root, "X - Y (Extended Mix) [8A 128].mp3"));
    expect(status.results[0]?.metadata).toEqual({
      artist: "X",
      title: "Y",
      bpm: "128",
      key: "Am",
      camelot: "8A",
      mix: "Extended Mix"
    });
  });

  it("truncates long names and keeps the extension", async () => {
    const root = await makeLibrary(["a.MP3"], "deckname-exec-");
    const executor = new RenameExecutor({
      tagReader: fakeTagReader({ "a.MP3": { artist: "A", title: "t".repeat(300) } })
    });

    const { status } = await executor.run({ path: root, dryRun: true });
    const name = path.basename(status.results[0]?.destination ?? "");

    expect(name).toHaveLength(140);
    expect(name.startsWith("A - ttt")).toBe(true);
    expect(name.endsWith("t.mp3")).toBe(true);
  });

  it("reports progress after every settled file", async () => {
    const root = await makeLibrary(["a.mp3", "b.mp3", "c.mp3", "d.mp3"], "deckname-exec-");
    const executor = new RenameExecutor({ tagReader: fakeTagReader(COLLIDING_TAGS), workers: 1 });
    const counts: number[] = [];
    const names: string[] = [];

    await executor.run({
      path: root,
      dryRun: true,
      onProgress: (count, filename) => {
        counts.push(count);
        names.push(filename);
      }
    });

    expect(counts).toEqual([1, 2, 3, 4]);
    expect(names.sort()).toEqual(["a.mp3", "b.mp3", "c.mp3", "d.mp3"]);
  });

  it("stops submitting files once cancelled", async () => {
    const names = Array.from({ length: 10 }, (_, index) => `track${index}.mp3`);
    const tags = Object.fromEntries(names.map((name, index) => [name, { artist: "A", title: `T${index}` }]));
    const root = await makeLibrary(names, "deckname-exec-");
    const executor = new RenameExecutor({ tagReader: fakeTagReader(tags, 2), workers: 1 });
    let settled = 0;

    const { status, moves } = await executor.run({
      path: root,
      template: "{artist} - {title}",
      onProgress: (count) => {
        settled = count;
      },
      isCancelled: () => settled >= 3
    });

    expect(status.cancelled).toBe(true);
    expect(status.total).toBe(10);
    expect(status.results.length).toBeGreaterThanOrEqual(3);
    expect(status.results.length).toBeLessThan(10);
    expect(moves).toHaveLength(status.renamed);

    const untouched = names.slice(status.results.length);
    const remaining = await listNames(root);
    for (const name of untouched) {
      expect(remaining).toContain(name);
    }
  });

  it("limits a run to the selected audio files", async () => {
    const root = await makeLibrary(["a.mp3", "b.mp3", "c.mp3"], "deckname-exec-");
    await writeFile(path.join(root, "cover.jpg"), "image");
    const executor = new RenameExecutor({ tagReader: fakeTagReader(COLLIDING_TAGS) });

    const { status } = await executor.run({
      path: root,
      dryRun: true,
      template: "{artist} - {title}",
      selectedFiles: ["c.mp3", path.join(root, "cover.jpg")]
    });

    expect(status.total).toBe(1);
    expect(status.results).toEqual([
      {
        source: path.join(root, "c.mp3"),
        destination: path.join(root, "Z - W.mp3"),
        status: "renamed",
        message: "dry-run"
      }
    ]);
  });
});
