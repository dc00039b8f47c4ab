import { NotFoundError, silentLogger } from "@deckname/core";
import type { Logger, OperationId, OperationStatus, RenameStatus, UndoResult, UndoSessionId } from "@deckname/core";
import { validateTemplate } from "@deckname/naming";
import type { TemplateValidation } from "@deckname/naming";
import { RenameExecutor } from "./executor";
import type { RenameRequest } from "./executor";
import type { FileEnumerator } from "./file-enumerator";
import { noClobberMover } from "./file-mover";
import type { FileMover } from "./file-mover";
import { OperationManager } from "./operation-manager";
import type { OperationEventSink } from "./operation-manager";
import type { ExistsProbe } from "./reservation-book";
import { MusicMetadataTagReader } from "./tag-reader";
import type { TagReader } from "./tag-reader";
import { DEFAULT_UNDO_TTL_MS, UndoManager, attachUndoTicket } from "./undo-manager";

export interface RenamerServiceOptions {
  tagReader?: TagReader;
  enumerator?: FileEnumerator;
  mover?: FileMover;
  exists?: ExistsProbe;
  logger?: Logger;
  workers?: number;
  maxFilenameLength?: number;
  defaultTemplate?: string;
  undoTtlMs?: number;
  now?: () => number;
  eventSink?: OperationEventSink;
}

export class RenamerService {
  readonly executor: RenameExecutor;
  readonly operations: OperationManager;
  readonly undoManager: UndoManager;
  private readonly undoTtlMs: number;

  constructor(options: RenamerServiceOptions = {}) {
    const logger = options.logger ?? silentLogger;
    const mover = options.mover ?? noClobberMover;
    this.undoTtlMs = options.undoTtlMs ?? DEFAULT_UNDO_TTL_MS;
    this.executor = new RenameExecutor({
      tagReader: options.tagReader ?? new MusicMetadataTagReader(),
      enumerator: options.enumerator,
      mover,
      exists: options.exists,
      logger,
      workers: options.workers,
      maxFilenameLength: options.maxFilenameLength,
      defaultTemplate: options.defaultTemplate
    });
    this.undoManager = new UndoManager({ ttlMs: this.undoTtlMs, now: options.now, mover, logger });
    this.operations = new OperationManager({
      executor: this.executor,
      undo: this.undoManager,
      eventSink: options.eventSink,
      logger,
      now: options.now
    });
  }

  async preview(request: RenameRequest): Promise<RenameStatus> {
    const outcome = await this.executor.run({ ...request, dryRun: true });
    return outcome.status;
  }

  async execute(request: RenameRequest): Promise<RenameStatus> {
    const outcome = await this.executor.run(request);
    this.undoManager.pruneExpired(this.undoTtlMs);
    return attachUndoTicket(this.undoManager, outcome);
  }

  startAsync(request: RenameRequest): OperationId {
    this.executor.assertTemplate(request.template);
    this.undoManager.pruneExpired(this.undoTtlMs);
    return this.operations.start(request);
  }

  poll(operationId: OperationId): OperationStatus {
    const status = this.operations.getStatus(operationId);
    if (!status) {
      throw new NotFoundError(`Operation not found: ${operationId}`);
    }
    return status;
  }

  listOperations(): OperationStatus[] {
    return this.operations.list();
  }

  cancel(operationId: OperationId): boolean {
    return this.operations.cancel(operationId);
  }

  clear(operationId: OperationId): boolean {
    return this.operations.clear(operationId);
  }

  undo(sessionId: UndoSessionId): Promise<UndoResult> {
    return this.undoManager.undo(sessionId);
  }

  validateTemplate(template: string): TemplateValidation {
    return validateTemplate(template);
  }

  runUntilIdle(): Promise<void> {
    return this.operations.runUntilIdle();
  }
}
