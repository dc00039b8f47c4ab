import { newEventId } from "./ids";
import type { EventId, OperationId } from "./ids";
import { assertNonEmptyString } from "./invariants";
import type { RenameStatus, TimestampMs } from "./model";

export type EventType =
  | "OPERATION_STARTED"
  | "OPERATION_PROGRESS"
  | "OPERATION_CANCEL_REQUESTED"
  | "OPERATION_COMPLETED"
  | "OPERATION_CANCELLED"
  | "OPERATION_FAILED"
  | "OPERATION_CLEARED";

export type EventPayloads = {
  OPERATION_STARTED: { operationId: OperationId };
  OPERATION_PROGRESS: {
    operationId: OperationId;
    progress: number;
    total: number;
    currentFile: string;
  };
  OPERATION_CANCEL_REQUESTED: { operationId: OperationId };
  OPERATION_COMPLETED: { operationId: OperationId; results: RenameStatus };
  OPERATION_CANCELLED: { operationId: OperationId; results?: RenameStatus };
  OPERATION_FAILED: { operationId: OperationId; error: string };
  OPERATION_CLEARED: { operationId: OperationId };
};

export interface EventEnvelope<T extends EventType> {
  eventId: EventId;
  type: T;
  createdAt: TimestampMs;
  operationId?: OperationId;
  payload: EventPayloads[T];
}

export type DomainEvent = {
  [K in EventType]: EventEnvelope<K>;
}[EventType];

export interface EventMeta {
  eventId?: EventId;
  createdAt?: TimestampMs;
  operationId?: OperationId;
}

export function createEvent<T extends EventType>(
  type: T,
  payload: EventPayloads[T],
  meta: EventMeta = {}
): EventEnvelope<T> {
  if (payload === undefined || payload === null) {
    throw new Error("Event payload is required");
  }

  const eventId = meta.eventId ?? newEventId();
  const createdAt = meta.createdAt ?? Date.now();

  assertNonEmptyString(type, "Event type");

  return {
    eventId,
    type,
    createdAt,
    operationId: meta.operationId,
    payload
  };
}
