import path from "node:path";
import {
  ValidationError,
  classifyFileError,
  emptyRenameStatus,
  silentLogger
} from "@deckname/core";
import type { FileMove, Logger, MetadataRecord, RenameResult, RenameStatus } from "@deckname/core";
import {
  DEFAULT_TEMPLATE,
  MAX_FILENAME_LENGTH,
  expandTemplate,
  normalizeMetadata,
  sanitizeStem,
  splitExtension,
  validateTemplate
} from "@deckname/naming";
import { comparePaths, fsFileEnumerator, isAudioFile } from "./file-enumerator";
import type { FileEnumerator } from "./file-enumerator";
import { noClobberMover } from "./file-mover";
import type { FileMover } from "./file-mover";
import { ReservationBook } from "./reservation-book";
import type { ExistsProbe } from "./reservation-book";
import type { TagReader } from "./tag-reader";
import { WorkerPool } from "./worker-pool";

export interface RenameRequest {
  path: string;
  recursive?: boolean;
  dryRun?: boolean;
  template?: string;
  selectedFiles?: readonly string[];
  onProgress?: (count: number, filename: string) => void;
  isCancelled?: () => boolean;
}

export interface BatchHooks {
  onDiscovered?: (total: number) => void;
}

export interface BatchOutcome {
  status: RenameStatus;
  /** Performed moves in completion order. Empty for dry runs. */
  moves: FileMove[];
}

export interface RenameExecutorOptions {
  tagReader: TagReader;
  enumerator?: FileEnumerator;
  mover?: FileMover;
  logger?: Logger;
  workers?: number;
  maxFilenameLength?: number;
  defaultTemplate?: string;
  exists?: ExistsProbe;
}

type PlannedFile =
  | { kind: "move"; destination: string; metadata: MetadataRecord }
  | { kind: "settled"; result: RenameResult };

export class RenameExecutor {
  private readonly tagReader: TagReader;
  private readonly enumerator: FileEnumerator;
  private readonly mover: FileMover;
  private readonly logger: Logger;
  private readonly workers: number;
  private readonly maxFilenameLength: number;
  private readonly defaultTemplate: string;
  private readonly exists?: ExistsProbe;

  constructor(options: RenameExecutorOptions) {
    this.tagReader = options.tagReader;
    this.enumerator = options.enumerator ?? fsFileEnumerator;
    this.mover = options.mover ?? noClobberMover;
    this.logger = options.logger ?? silentLogger;
    this.workers = Math.max(1, Math.floor(options.workers ?? 4));
    this.maxFilenameLength = options.maxFilenameLength ?? MAX_FILENAME_LENGTH;
    this.defaultTemplate = options.defaultTemplate ?? DEFAULT_TEMPLATE;
    this.exists = options.exists;
  }

  async run(request: RenameRequest, hooks: BatchHooks = {}): Promise<BatchOutcome> {
    const template = this.assertTemplate(request.template);
    const files = await this.resolveFiles(request);
    hooks.onDiscovered?.(files.length);

    const dryRun = request.dryRun ?? false;
    const status = emptyRenameStatus();
    status.total = files.length;
    const settled: Array<RenameResult | undefined> = new Array<RenameResult | undefined>(files.length);
    const moves: FileMove[] = [];
    const book = new ReservationBook({ exists: this.exists });
    const pool = new WorkerPool({ concurrency: this.workers });
    let completed = 0;

    const settle = (index: number, result: RenameResult): void => {
      settled[index] = result;
      this.tally(status, result);
      this.logResult(result, dryRun);
      completed += 1;
      this.notifyProgress(request, completed, path.basename(result.source));
    };

    for (const [index, source] of files.entries()) {
      if (this.cancelRequested(request)) {
        status.cancelled = true;
        break;
      }

      const planned = await this.plan(source, template, book);
      if (planned.kind === "settled") {
        settle(index, planned.result);
        continue;
      }
      if (this.cancelRequested(request)) {
        book.release(planned.destination);
        status.cancelled = true;
        break;
      }

      const { destination, metadata } = planned;
      await pool.submit(async () => {
        settle(index, await this.move(source, destination, metadata, dryRun, moves));
      });
    }

    await pool.drain();
    status.results = settled.filter((result): result is RenameResult => result !== undefined);
    this.logger.info(status.cancelled ? "batch cancelled" : "batch finished", {
      total: status.total,
      renamed: status.renamed,
      skipped: status.skipped,
      errors: status.errors,
      dryRun
    });
    return { status, moves };
  }

  /** Returns the template to use, or throws `ValidationError` before any file is touched. */
  assertTemplate(requested: string | undefined): string {
    const template = requested ?? this.defaultTemplate;
    const validation = validateTemplate(template);
    if (!validation.valid) {
      throw new ValidationError(validation.errors.join("; "), {
        invalidTokens: validation.invalidTokens,
        issues: validation.errors.map((message) => ({ path: "template", message }))
      });
    }
    return template;
  }

  private async resolveFiles(request: RenameRequest): Promise<string[]> {
    if (!request.selectedFiles) {
      return this.enumerator.list(request.path, request.recursive ?? false);
    }
    const root = path.resolve(request.path);
    const unique = new Set(
      request.selectedFiles.map((file) => path.resolve(root, file)).filter((file) => isAudioFile(file))
    );
    return Array.from(unique).sort(comparePaths);
  }

  private async plan(source: string, template: string, book: ReservationBook): Promise<PlannedFile> {
    try {
      const metadata = normalizeMetadata(await this.tagReader.read(source));
      const currentName = path.basename(source);
      const extension = splitExtension(currentName).extension.toLowerCase();
      const stem = sanitizeStem(expandTemplate(template, metadata), this.maxFilenameLength - extension.length);
      const desiredName = `${stem}${extension}`;

      const alreadyNamed: RenameResult = {
        source,
        destination: source,
        status: "skipped",
        message: "Already named",
        metadata
      };
      if (desiredName === currentName) {
        return { kind: "settled", result: alreadyNamed };
      }
      const destination = await book.reserve(path.join(path.dirname(source), desiredName), source);
      if (destination === source) {
        return { kind: "settled", result: alreadyNamed };
      }
      return { kind: "move", destination, metadata };
    } catch (error) {
      return { kind: "settled", result: failureResult(source, error) };
    }
  }

  private async move(
    source: string,
    destination: string,
    metadata: MetadataRecord,
    dryRun: boolean,
    moves: FileMove[]
  ): Promise<RenameResult> {
    if (dryRun) {
      return { source, destination, status: "renamed", message: "dry-run", metadata };
    }
    try {
      await this.mover.move(source, destination);
      moves.push({ source, destination });
      return { source, destination, status: "renamed", metadata };
    } catch (error) {
      return { ...failureResult(source, error), metadata };
    }
  }

  private tally(status: RenameStatus, result: RenameResult): void {
    if (result.status === "renamed") {
      status.renamed += 1;
    } else if (result.status === "skipped") {
      status.skipped += 1;
    } else {
      status.errors += 1;
    }
  }

  private logResult(result: RenameResult, dryRun: boolean): void {
    const from = path.basename(result.source);
    const to = result.destination ? path.basename(result.destination) : undefined;
    if (result.status === "renamed") {
      this.logger.info(dryRun ? "DRY" : "REN", { from, to });
    } else if (result.status === "skipped") {
      this.logger.info("SKIP", { from, reason: result.message });
    } else {
      this.logger.warn("ERR", { from, reason: result.message });
    }
  }

  private notifyProgress(request: RenameRequest, count: number, filename: string): void {
    try {
      request.onProgress?.(count, filename);
    } catch (error) {
      this.logger.warn("progress callback failed", {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private cancelRequested(request: RenameRequest): boolean {
    try {
      return request.isCancelled?.() ?? false;
    } catch (error) {
      this.logger.warn("cancel check failed", {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }
}

function failureResult(source: string, error: unknown): RenameResult {
  const classified = classifyFileError(error);
  return { source, status: classified.status, message: classified.message };
}
