/**
 * Checkpoint Store.
 *
 * Checkpoints are append-only. Each session's checkpoints are kept in the
 * order they were taken, which is also ascending sequence order.
 *
 * Implementations:
 * - InMemoryCheckpointStore: tests and ephemeral peers
 * - FileCheckpointStore: one JSON Lines file per session:
 *     <baseDir>/<sessionId>.jsonl
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { isCheckpoint } from "@concord/types";
import type { Checkpoint } from "@concord/types";

export interface CheckpointStore {
  /**
   * Append a checkpoint.
   *
   * @throws Error if its sequence is lower than the session's latest checkpoint
   */
  append(checkpoint: Checkpoint): void;

  /** All checkpoints for a session, oldest first */
  list(sessionId: string): Checkpoint[];

  latest(sessionId: string): Checkpoint | undefined;

  atSequence(sessionId: string, sequence: number): Checkpoint | undefined;
}

function assertOrdered(previous: Checkpoint | undefined, next: Checkpoint): void {
  if (previous !== undefined && next.sequence < previous.sequence) {
    throw new Error(
      `Checkpoint for session '${next.sessionId}' at sequence ${next.sequence} ` +
        `precedes latest checkpoint at sequence ${previous.sequence}`,
    );
  }
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly _checkpoints = new Map<string, Checkpoint[]>();

  append(checkpoint: Checkpoint): void {
    let list = this._checkpoints.get(checkpoint.sessionId);
    if (list === undefined) {
      list = [];
      this._checkpoints.set(checkpoint.sessionId, list);
    }
    assertOrdered(list[list.length - 1], checkpoint);
    list.push(checkpoint);
  }

  list(sessionId: string): Checkpoint[] {
    return [...(this._checkpoints.get(sessionId) ?? [])];
  }

  latest(sessionId: string): Checkpoint | undefined {
    const list = this._checkpoints.get(sessionId);
    return list?.[list.length - 1];
  }

  atSequence(sessionId: string, sequence: number): Checkpoint | undefined {
    return this._checkpoints.get(sessionId)?.find((c) => c.sequence === sequence);
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

export class FileCheckpointStore implements CheckpointStore {
  private readonly _baseDir: string;

  constructor(baseDir: string) {
    this._baseDir = baseDir;
    mkdirSync(this._baseDir, { recursive: true });
  }

  append(checkpoint: Checkpoint): void {
    assertOrdered(this.latest(checkpoint.sessionId), checkpoint);
    appendFileSync(this._sessionPath(checkpoint.sessionId), `${JSON.stringify(checkpoint)}\n`, "utf-8");
  }

  list(sessionId: string): Checkpoint[] {
    const filePath = this._sessionPath(sessionId);
    if (!existsSync(filePath)) {
      return [];
    }

    const checkpoints: Checkpoint[] = [];
    for (const line of readFileSync(filePath, "utf-8").split("\n")) {
      if (line.trim() === "") continue;
      const parsed: unknown = JSON.parse(line);
      if (!isCheckpoint(parsed)) {
        throw new Error(`Corrupt checkpoint record in ${filePath}`);
      }
      checkpoints.push(parsed);
    }
    return checkpoints;
  }

  latest(sessionId: string): Checkpoint | undefined {
    const list = this.list(sessionId);
    return list[list.length - 1];
  }

  atSequence(sessionId: string, sequence: number): Checkpoint | undefined {
    return this.list(sessionId).find((c) => c.sequence === sequence);
  }

  /** Get the base directory for this store */
  get baseDir(): string {
    return this._baseDir;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _sessionPath(sessionId: string): string {
    // Sanitize session ID for filesystem use
    const safe = sessionId.replace(/[^a-zA-Z0-9_.-]/g, "_");
    return join(this._baseDir, `${safe}.jsonl`);
  }
}
