import type { RenameResultStatus } from "./model";

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];
  readonly invalidTokens: string[];

  constructor(message: string, options: { issues?: ValidationIssue[]; invalidTokens?: string[] } = {}) {
    super(message);
    this.name = "ValidationError";
    this.issues = options.issues ?? [];
    this.invalidTokens = options.invalidTokens ?? [];
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ExpiredError extends Error {
  readonly expiredAt: number;

  constructor(message: string, expiredAt: number) {
    super(message);
    this.name = "ExpiredError";
    this.expiredAt = expiredAt;
  }
}

export type PerFileErrorCode =
  | "permission_denied"
  | "source_missing"
  | "destination_occupied"
  | "cross_device"
  | "unreadable_metadata"
  | "unknown";

export class PerFileError extends Error {
  readonly code: PerFileErrorCode;
  readonly filePath: string;

  constructor(code: PerFileErrorCode, filePath: string, message: string) {
    super(message);
    this.name = "PerFileError";
    this.code = code;
    this.filePath = filePath;
  }
}

export interface FileErrorClassification {
  status: Exclude<RenameResultStatus, "renamed">;
  code: PerFileErrorCode;
  message: string;
}

const SKIPPED_CODES = new Set<PerFileErrorCode>(["source_missing", "unreadable_metadata"]);

export function classifyFileError(error: unknown): FileErrorClassification {
  const code = error instanceof PerFileError ? error.code : codeFromErrno(errnoOf(error));
  const detail = error instanceof Error ? error.message : String(error);
  return {
    status: SKIPPED_CODES.has(code) ? "skipped" : "error",
    code,
    message: error instanceof PerFileError ? detail : `${describeCode(code)}: ${detail}`
  };
}

export function errnoOf(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function codeFromErrno(errno: string | undefined): PerFileErrorCode {
  switch (errno) {
    case "EACCES":
    case "EPERM":
      return "permission_denied";
    case "ENOENT":
      return "source_missing";
    case "EEXIST":
    case "ENOTEMPTY":
      return "destination_occupied";
    case "EXDEV":
      return "cross_device";
    default:
      return "unknown";
  }
}

function describeCode(code: PerFileErrorCode): string {
  switch (code) {
    case "permission_denied":
      return "Permission denied";
    case "source_missing":
      return "File vanished";
    case "destination_occupied":
      return "Destination already exists";
    case "cross_device":
      return "Cross-volume move refused";
    case "unreadable_metadata":
      return "Unreadable metadata";
    default:
      return "Unexpected error";
  }
}
