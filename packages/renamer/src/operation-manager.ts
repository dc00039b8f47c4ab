import { createEvent, newOperationId, silentLogger } from "@deckname/core";
import type { DomainEvent, Logger, OperationId, OperationStatus } from "@deckname/core";
import type { RenameExecutor, RenameRequest } from "./executor";
import { OperationStore } from "./operation-store";
import { attachUndoTicket } from "./undo-manager";
import type { UndoManager } from "./undo-manager";

export interface OperationEventSink {
  append(event: DomainEvent): void;
}

export interface OperationManagerOptions {
  executor: RenameExecutor;
  undo?: UndoManager;
  store?: OperationStore;
  eventSink?: OperationEventSink;
  logger?: Logger;
  now?: () => number;
}

/**
 * Runs rename batches in the background and tracks them as pollable
 * operations. Every state change goes through an event applied to the
 * operation store, and is mirrored to the optional event sink.
 */
export class OperationManager {
  private readonly executor: RenameExecutor;
  private readonly undo?: UndoManager;
  private readonly store: OperationStore;
  private readonly eventSink?: OperationEventSink;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly inflight = new Set<Promise<void>>();

  constructor(options: OperationManagerOptions) {
    this.executor = options.executor;
    this.undo = options.undo;
    this.store = options.store ?? new OperationStore();
    this.eventSink = options.eventSink;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => Date.now());
  }

  start(request: RenameRequest): OperationId {
    const operationId = newOperationId();
    this.publish(operationId, createEvent("OPERATION_STARTED", { operationId }, this.meta(operationId)));
    this.logger.info("operation started", { operationId, path: request.path, dryRun: request.dryRun ?? false });

    const promise = new Promise<void>((resolve) => setImmediate(resolve)).then(() =>
      this.runBatch(operationId, request)
    );
    this.inflight.add(promise);
    void promise.finally(() => {
      this.inflight.delete(promise);
    });
    return operationId;
  }

  getStatus(operationId: OperationId): OperationStatus | undefined {
    return this.store.get(operationId);
  }

  list(): OperationStatus[] {
    return this.store.list();
  }

  cancel(operationId: OperationId): boolean {
    const operation = this.store.get(operationId);
    if (!operation || operation.status !== "running") {
      return false;
    }
    if (!operation.cancelRequested) {
      this.publish(operationId, createEvent("OPERATION_CANCEL_REQUESTED", { operationId }, this.meta(operationId)));
      this.logger.info("operation cancel requested", { operationId });
    }
    return true;
  }

  clear(operationId: OperationId): boolean {
    if (!this.store.has(operationId)) {
      return false;
    }
    this.publish(operationId, createEvent("OPERATION_CLEARED", { operationId }, this.meta(operationId)));
    return true;
  }

  async runUntilIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.race(this.inflight);
    }
  }

  private async runBatch(operationId: OperationId, request: RenameRequest): Promise<void> {
    let total = 0;
    try {
      const outcome = await this.executor.run(
        {
          ...request,
          // a cleared operation stops like a cancelled one
          isCancelled: () =>
            !this.store.has(operationId) ||
            this.store.isCancelRequested(operationId) ||
            (request.isCancelled?.() ?? false),
          onProgress: (count, filename) => {
            this.publish(
              operationId,
              createEvent(
                "OPERATION_PROGRESS",
                { operationId, progress: count, total, currentFile: filename },
                this.meta(operationId)
              )
            );
            request.onProgress?.(count, filename);
          }
        },
        {
          onDiscovered: (discovered) => {
            total = discovered;
            this.publish(
              operationId,
              createEvent(
                "OPERATION_PROGRESS",
                { operationId, progress: 0, total, currentFile: "" },
                this.meta(operationId)
              )
            );
          }
        }
      );

      const results = this.undo ? attachUndoTicket(this.undo, outcome) : outcome.status;
      if (results.cancelled) {
        this.publish(operationId, createEvent("OPERATION_CANCELLED", { operationId, results }, this.meta(operationId)));
        this.logger.info("operation cancelled", { operationId, renamed: results.renamed, total: results.total });
      } else {
        this.publish(operationId, createEvent("OPERATION_COMPLETED", { operationId, results }, this.meta(operationId)));
        this.logger.info("operation completed", { operationId, renamed: results.renamed, total: results.total });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.publish(operationId, createEvent("OPERATION_FAILED", { operationId, error: message }, this.meta(operationId)));
      this.logger.error("operation failed", { operationId, error: message });
    }
  }

  private meta(operationId: OperationId): { operationId: OperationId; createdAt: number } {
    return { operationId, createdAt: this.now() };
  }

  private publish(operationId: OperationId, event: DomainEvent): void {
    this.store.applyEvent(event);
    if (!this.eventSink) {
      return;
    }
    try {
      this.eventSink.append(event);
    } catch (error) {
      this.logger.warn("operation event sink failed", {
        operationId,
        type: event.type,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
