import path from "node:path";
import { promises as fs } from "node:fs";
import { errnoOf } from "@deckname/core";
import { splitExtension } from "@deckname/naming";

export type ExistsProbe = (filePath: string) => Promise<boolean>;
export type SameFileProbe = (a: string, b: string) => Promise<boolean>;

export interface ReservationBookOptions {
  exists?: ExistsProbe;
  sameFile?: SameFileProbe;
  maxSuffix?: number;
}

export class ReservationBookError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReservationBookError";
  }
}

/**
 * Hands out destination paths for a single batch. A path is claimed at
 * most once; later claimants get `_2`, `_3`, ... before the extension.
 * Every claim runs behind one promise chain, so the disk probe and the
 * claim act as a single step even with several movers in flight.
 */
export class ReservationBook {
  private readonly claims = new Set<string>();
  private readonly exists: ExistsProbe;
  private readonly sameFile: SameFileProbe;
  private readonly maxSuffix: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: ReservationBookOptions = {}) {
    this.exists = options.exists ?? pathExists;
    this.sameFile = options.sameFile ?? isSameFile;
    this.maxSuffix = Math.max(2, Math.floor(options.maxSuffix ?? 10_000));
  }

  get size(): number {
    return this.claims.size;
  }

  has(filePath: string): boolean {
    return this.claims.has(path.resolve(filePath));
  }

  reserve(proposedPath: string, sourcePath?: string): Promise<string> {
    const proposed = path.resolve(proposedPath);
    const source = sourcePath ? path.resolve(sourcePath) : undefined;
    return this.exclusive(() => this.allocate(proposed, source));
  }

  release(filePath: string): boolean {
    return this.claims.delete(path.resolve(filePath));
  }

  private async allocate(proposed: string, source: string | undefined): Promise<string> {
    const directory = path.dirname(proposed);
    const { stem, extension } = splitExtension(path.basename(proposed));

    for (let suffix = 1; suffix <= this.maxSuffix; suffix += 1) {
      const candidate = suffix === 1 ? proposed : path.join(directory, `${stem}_${suffix}${extension}`);
      if (await this.isFree(candidate, source)) {
        this.claims.add(candidate);
        return candidate;
      }
    }
    throw new ReservationBookError(`No free destination for ${proposed}`);
  }

  private async isFree(candidate: string, source: string | undefined): Promise<boolean> {
    if (this.claims.has(candidate)) {
      return false;
    }
    if (candidate === source) {
      return true;
    }
    if (!(await this.exists(candidate))) {
      return true;
    }
    // a case-only rename on a case-insensitive volume finds the source itself
    return source !== undefined && (await this.sameFile(candidate, source));
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export async function isSameFile(a: string, b: string): Promise<boolean> {
  try {
    const [left, right] = await Promise.all([fs.stat(a), fs.stat(b)]);
    return left.dev === right.dev && left.ino === right.ino;
  } catch (error) {
    const code = errnoOf(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (error) {
    if (errnoOf(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}
