import { randomUUID } from "node:crypto";
import { assertNonEmptyString } from "./invariants";

export type Branded<T, B extends string> = T & { readonly __brand: B };

export type EventId = Branded<string, "EventId">;
export type OperationId = Branded<string, "OperationId">;
export type UndoSessionId = Branded<string, "UndoSessionId">;

export function brandId<B extends string>(value: string, label: B): Branded<string, B> {
  assertNonEmptyString(value, label);
  return value as Branded<string, B>;
}

function newBranded<B extends string>(label: B, prefix: string): Branded<string, B> {
  return brandId(`${prefix}_${randomUUID()}`, label);
}

export const newEventId = (): EventId => newBranded("EventId", "evt");
export const newOperationId = (): OperationId => newBranded("OperationId", "op");
export const newUndoSessionId = (): UndoSessionId => newBranded("UndoSessionId", "undo");

export const asOperationId = (value: string): OperationId => brandId(value, "OperationId");
export const asUndoSessionId = (value: string): UndoSessionId => brandId(value, "UndoSessionId");
