/**
 * Session Types
 *
 * A session is a collaborative, strictly ordered sequence of moves.
 *
 * Rules:
 * - `sequence` is the next expected move number, starting at 0
 * - A move is appended only if its sequence equals `sequence`
 * - Gaps and duplicates are rejected, never buffered
 * - Checkpoints are append-only digests of the state blob
 */

import type { JsonObject, JsonValue } from "./json.js";

export type SessionStatus = "active" | "ended";

export interface Move {
  readonly originator: string;
  readonly payload: JsonValue;
  readonly sequence: number;
  /** Epoch seconds */
  readonly timestamp: number;
}

export interface Checkpoint {
  readonly sessionId: string;
  /** Session sequence counter when the checkpoint was taken */
  readonly sequence: number;
  /** Hex SHA-256 of the RFC 8785 canonical state */
  readonly stateDigest: string;
  readonly moveCount: number;
  /** Epoch seconds */
  readonly timestamp: number;
}

export interface Session {
  readonly id: string;
  readonly creator: string;
  /** Selects the state-update rule ("turn_based", ...) */
  readonly type: string;
  readonly state: JsonObject;
  readonly moves: readonly Move[];
  /** Next expected move sequence */
  readonly sequence: number;
  readonly participants: ReadonlySet<string>;
  readonly status: SessionStatus;
  /** Epoch seconds */
  readonly createdAt: number;
  /** Epoch seconds */
  readonly lastCheckpointAt: number;
  /** moves.length at the last checkpoint */
  readonly lastCheckpointMoveCount: number;
  readonly checkpoints: readonly Checkpoint[];
}
