import type { DomainEvent, OperationId, OperationStatus, RenameStatus, TimestampMs } from "@deckname/core";

/**
 * Event-applied table of batch operations. Only `running` entries take
 * transitions; events for terminal or cleared operations are ignored
 * and reported as not applied.
 */
export class OperationStore {
  private readonly operations = new Map<OperationId, OperationStatus>();

  applyEvent(event: DomainEvent): boolean {
    switch (event.type) {
      case "OPERATION_STARTED":
        return this.applyStarted(event.payload.operationId, event.createdAt);
      case "OPERATION_PROGRESS": {
        const operation = this.findRunning(event.payload.operationId);
        if (!operation) {
          return false;
        }
        operation.total = Math.max(operation.total, event.payload.total);
        operation.progress = Math.min(Math.max(operation.progress, event.payload.progress), operation.total);
        operation.currentFile = event.payload.currentFile;
        return true;
      }
      case "OPERATION_CANCEL_REQUESTED": {
        const operation = this.findRunning(event.payload.operationId);
        if (!operation) {
          return false;
        }
        operation.cancelRequested = true;
        return true;
      }
      case "OPERATION_COMPLETED":
        return this.finish(event.payload.operationId, "completed", event.createdAt, event.payload.results);
      case "OPERATION_CANCELLED":
        return this.finish(event.payload.operationId, "cancelled", event.createdAt, event.payload.results);
      case "OPERATION_FAILED": {
        const applied = this.finish(event.payload.operationId, "error", event.createdAt);
        const operation = this.operations.get(event.payload.operationId);
        if (applied && operation) {
          operation.error = event.payload.error;
        }
        return applied;
      }
      case "OPERATION_CLEARED":
        return this.operations.delete(event.payload.operationId);
      default:
        return false;
    }
  }

  has(operationId: OperationId): boolean {
    return this.operations.has(operationId);
  }

  isCancelRequested(operationId: OperationId): boolean {
    return this.operations.get(operationId)?.cancelRequested ?? false;
  }

  get(operationId: OperationId): OperationStatus | undefined {
    const operation = this.operations.get(operationId);
    return operation ? snapshotOperation(operation) : undefined;
  }

  list(): OperationStatus[] {
    return Array.from(this.operations.values())
      .sort((a, b) => a.startTime - b.startTime)
      .map(snapshotOperation);
  }

  private applyStarted(operationId: OperationId, createdAt: TimestampMs): boolean {
    if (this.operations.has(operationId)) {
      return false;
    }
    this.operations.set(operationId, {
      operationId,
      status: "running",
      progress: 0,
      total: 0,
      currentFile: "",
      startTime: createdAt,
      cancelRequested: false
    });
    return true;
  }

  private finish(
    operationId: OperationId,
    status: "completed" | "cancelled" | "error",
    endTime: TimestampMs,
    results?: RenameStatus
  ): boolean {
    const operation = this.findRunning(operationId);
    if (!operation) {
      return false;
    }
    operation.status = status;
    operation.endTime = endTime;
    if (results) {
      operation.results = results;
      operation.total = Math.max(operation.total, results.total);
      operation.progress = Math.min(Math.max(operation.progress, results.results.length), operation.total);
    }
    return true;
  }

  private findRunning(operationId: OperationId): OperationStatus | undefined {
    const operation = this.operations.get(operationId);
    return operation?.status === "running" ? operation : undefined;
  }
}

function snapshotOperation(operation: OperationStatus): OperationStatus {
  return {
    ...operation,
    results: operation.results
      ? {
          ...operation.results,
          results: operation.results.results.map((result) => ({ ...result }))
        }
      : undefined
  };
}
