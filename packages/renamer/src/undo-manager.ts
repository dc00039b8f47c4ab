import {
  ExpiredError,
  NotFoundError,
  classifyFileError,
  newUndoSessionId,
  silentLogger
} from "@deckname/core";
import type {
  FileMove,
  Logger,
  RenameStatus,
  TimestampMs,
  UndoFileResult,
  UndoResult,
  UndoSession,
  UndoSessionId
} from "@deckname/core";
import type { BatchOutcome } from "./executor";
import { noClobberMover } from "./file-mover";
import type { FileMover } from "./file-mover";

export const DEFAULT_UNDO_TTL_MS = 600_000;

export interface UndoManagerOptions {
  ttlMs?: number;
  now?: () => number;
  mover?: FileMover;
  logger?: Logger;
}

export class UndoManager {
  private readonly sessions = new Map<UndoSessionId, UndoSession>();
  /** Expiry times of pruned sessions, so late undo calls still see `ExpiredError`. */
  private readonly expired = new Map<UndoSessionId, TimestampMs>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly mover: FileMover;
  private readonly logger: Logger;

  constructor(options: UndoManagerOptions = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_UNDO_TTL_MS);
    this.now = options.now ?? (() => Date.now());
    this.mover = options.mover ?? noClobberMover;
    this.logger = options.logger ?? silentLogger;
  }

  record(moves: readonly FileMove[]): UndoSession | undefined {
    if (moves.length === 0) {
      return undefined;
    }
    const createdAt = this.now();
    const session: UndoSession = {
      sessionId: newUndoSessionId(),
      createdAt,
      expiresAt: createdAt + this.ttlMs,
      moves: moves.map((move) => ({ ...move })),
      consumed: false
    };
    this.sessions.set(session.sessionId, session);
    this.logger.info("undo session opened", { sessionId: session.sessionId, moves: moves.length });
    return copySession(session);
  }

  get(sessionId: UndoSessionId): UndoSession | undefined {
    const session = this.sessions.get(sessionId);
    return session ? copySession(session) : undefined;
  }

  /**
   * Drops consumed sessions and those expired for longer than `graceMs`.
   * Dropped expired sessions leave only their expiry time behind.
   */
  pruneExpired(graceMs = 0): number {
    const cutoff = this.now() - Math.max(0, graceMs);
    let removed = 0;
    for (const [sessionId, session] of this.sessions) {
      if (session.consumed) {
        this.sessions.delete(sessionId);
        removed += 1;
      } else if (session.expiresAt < cutoff) {
        this.sessions.delete(sessionId);
        this.expired.set(sessionId, session.expiresAt);
        removed += 1;
      }
    }
    return removed;
  }

  async undo(sessionId: UndoSessionId): Promise<UndoResult> {
    const expiredAt = this.expired.get(sessionId);
    if (expiredAt !== undefined) {
      throw new ExpiredError(`Undo session expired: ${sessionId}`, expiredAt);
    }
    const session = this.sessions.get(sessionId);
    if (!session || session.consumed) {
      throw new NotFoundError(`Undo session not found: ${sessionId}`);
    }
    if (this.now() > session.expiresAt) {
      throw new ExpiredError(`Undo session expired: ${sessionId}`, session.expiresAt);
    }
    session.consumed = true;

    const results: UndoFileResult[] = [];
    for (const move of [...session.moves].reverse()) {
      try {
        await this.mover.move(move.destination, move.source);
        results.push({ source: move.source, destination: move.destination, status: "restored" });
      } catch (error) {
        const classified = classifyFileError(error);
        const message =
          classified.code === "destination_occupied"
            ? `Original path already exists: ${move.source}`
            : classified.message;
        results.push({ source: move.source, destination: move.destination, status: "error", message });
      }
    }

    const restored = results.filter((result) => result.status === "restored").length;
    const failed = results.length - restored;
    this.logger.info("undo session applied", { sessionId, restored, failed });
    return { sessionId, restored, failed, results };
  }
}

/** Opens an undo session for the batch's moves and stamps its ticket on the status. */
export function attachUndoTicket(undo: UndoManager, outcome: BatchOutcome): RenameStatus {
  const session = undo.record(outcome.moves);
  if (!session) {
    return outcome.status;
  }
  return { ...outcome.status, undo: { sessionId: session.sessionId, expiresAt: session.expiresAt } };
}

function copySession(session: UndoSession): UndoSession {
  return { ...session, moves: session.moves.map((move) => ({ ...move })) };
}
