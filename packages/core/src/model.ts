import type { OperationId, UndoSessionId } from "./ids";

export type TimestampMs = number;

export const METADATA_FIELDS = [
  "artist",
  "title",
  "album",
  "year",
  "label",
  "bpm",
  "key",
  "camelot",
  "mix",
  "track"
] as const;

export type MetadataField = (typeof METADATA_FIELDS)[number];

export type MetadataRecord = Readonly<Partial<Record<MetadataField, string>>>;

export type RawTags = Readonly<Record<string, string | undefined>>;

export type RenameResultStatus = "renamed" | "skipped" | "error";

export interface RenameResult {
  source: string;
  destination?: string;
  status: RenameResultStatus;
  message?: string;
  /** Normalized tags the destination name was built from. */
  metadata?: MetadataRecord;
}

export interface UndoTicket {
  sessionId: UndoSessionId;
  expiresAt: TimestampMs;
}

export interface RenameStatus {
  total: number;
  renamed: number;
  skipped: number;
  errors: number;
  cancelled: boolean;
  results: RenameResult[];
  undo?: UndoTicket;
}

export interface FileMove {
  source: string;
  destination: string;
}

export type OperationState = "running" | "completed" | "cancelled" | "error";

export interface OperationStatus {
  operationId: OperationId;
  status: OperationState;
  progress: number;
  total: number;
  currentFile: string;
  startTime: TimestampMs;
  endTime?: TimestampMs;
  results?: RenameStatus;
  error?: string;
  cancelRequested: boolean;
}

export interface UndoSession {
  sessionId: UndoSessionId;
  createdAt: TimestampMs;
  expiresAt: TimestampMs;
  moves: FileMove[];
  consumed: boolean;
}

export type UndoFileStatus = "restored" | "error";

export interface UndoFileResult {
  source: string;
  destination: string;
  status: UndoFileStatus;
  message?: string;
}

export interface UndoResult {
  sessionId: UndoSessionId;
  restored: number;
  failed: number;
  results: UndoFileResult[];
}

export function emptyRenameStatus(): RenameStatus {
  return { total: 0, renamed: 0, skipped: 0, errors: 0, cancelled: false, results: [] };
}
