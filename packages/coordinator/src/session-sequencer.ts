/**
 * Session Sequencer: strictly ordered move logs with periodic checkpoints.
 *
 * Rules:
 * - A move is accepted only at the session's next expected sequence;
 *   gaps and duplicates are dropped, never buffered
 * - Accepted moves run through the session type's state rule
 * - After each accepted move a checkpoint is taken once enough moves or
 *   enough time have passed since the last one
 * - Checkpoint failures are logged and never undo the move
 */

import { randomUUID } from "node:crypto";
import { SESSION_CHANNEL } from "@concord/router";
import type { MessageRouter } from "@concord/router";
import { isJsonObject } from "@concord/types";
import type {
  Checkpoint,
  Envelope,
  JsonObject,
  JsonValue,
  Move,
  Session,
  SessionStatus,
} from "@concord/types";
import { BaseCoordinator } from "./base-coordinator.js";
import type { CoordinatorOptions } from "./base-coordinator.js";
import { InMemoryCheckpointStore } from "./checkpoint-store.js";
import type { CheckpointStore } from "./checkpoint-store.js";
import { computeStateDigest } from "./digest.js";
import { CoordinationError } from "./errors.js";
import { InMemorySessionStore } from "./session-store.js";
import type { SessionStore } from "./session-store.js";
import { StateRuleRegistry } from "./state-rules.js";
import type { StateRule } from "./state-rules.js";

export const DEFAULT_CHECKPOINT_MOVE_INTERVAL = 10;
export const DEFAULT_CHECKPOINT_INTERVAL_SECONDS = 300;

export type CheckpointComparison = "match" | "mismatch" | "unknown";

export interface SessionSequencerOptions extends CoordinatorOptions {
  readonly store?: SessionStore;
  readonly checkpointStore?: CheckpointStore;
  /** Custom rules by session type; override built-ins of the same name */
  readonly stateRules?: Readonly<Record<string, StateRule>>;
  readonly checkpointMoveInterval?: number;
  readonly checkpointIntervalSeconds?: number;
  /** When set, checkpoint digests are anchored to this address */
  readonly checkpointTarget?: string;
}

export class SessionSequencer extends BaseCoordinator {
  private readonly store: SessionStore;
  private readonly checkpoints: CheckpointStore;
  private readonly rules: StateRuleRegistry;
  private readonly moveInterval: number;
  private readonly intervalSeconds: number;
  private readonly checkpointTarget: string | undefined;

  constructor(options: SessionSequencerOptions) {
    super(options);
    this.store = options.store ?? new InMemorySessionStore();
    this.checkpoints = options.checkpointStore ?? new InMemoryCheckpointStore();
    this.rules = new StateRuleRegistry(options.stateRules);
    this.moveInterval = options.checkpointMoveInterval ?? DEFAULT_CHECKPOINT_MOVE_INTERVAL;
    this.intervalSeconds = options.checkpointIntervalSeconds ?? DEFAULT_CHECKPOINT_INTERVAL_SECONDS;
    this.checkpointTarget = options.checkpointTarget;
  }

  register(router: MessageRouter): void {
    router.registerHandler(SESSION_CHANNEL, "session", (msg) => this.onSessionAnnounced(msg));
    router.registerHandler(SESSION_CHANNEL, "move", (msg) => this.onMoveReceived(msg));
    router.registerHandler(SESSION_CHANNEL, "checkpoint", (msg) =>
      this.onCheckpointReceived(msg),
    );
  }

  // ─── Operations ─────────────────────────────────────────────────────

  /**
   * @throws CoordinationError INVALID_ARGUMENT on an empty type or non-object state
   */
  createSession(type: string, initialState: JsonObject = {}): Promise<string> {
    if (type.length === 0) {
      throw new CoordinationError("INVALID_ARGUMENT", "session type must not be empty");
    }
    if (!isJsonObject(initialState)) {
      throw new CoordinationError("INVALID_ARGUMENT", "initialState must be a JSON object");
    }
    return this.inbox.enqueue(() => this._createSession(type, initialState));
  }

  /**
   * Append a local move at the next sequence.
   *
   * @returns false when the session is unknown or not active
   */
  makeMove(sessionId: string, payload: JsonValue): Promise<boolean> {
    return this.inbox.enqueue(() => this._makeMove(sessionId, payload));
  }

  /**
   * @returns false when the session is unknown, inactive or the move is out of order
   */
  onMoveReceived(message: Envelope<"move">): Promise<boolean> {
    return this.inbox.enqueue(() => this._onMove(message));
  }

  /**
   * Register a session announced by a peer. Known ids are left untouched.
   *
   * @returns true when the session was new
   */
  onSessionAnnounced(message: Envelope<"session">): Promise<boolean> {
    return this.inbox.enqueue(() => this._onSession(message));
  }

  /**
   * Compare a peer's checkpoint with ours at the same sequence.
   */
  onCheckpointReceived(message: Envelope<"checkpoint">): Promise<CheckpointComparison> {
    return this.inbox.enqueue(() => this._onCheckpoint(message));
  }

  /**
   * @returns false when the session is unknown or already ended
   */
  endSession(sessionId: string): Promise<boolean> {
    return this.inbox.enqueue(() => this._endSession(sessionId));
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getSession(sessionId: string): Session | undefined {
    return this.store.get(sessionId);
  }

  listSessions(status?: SessionStatus): Session[] {
    return this.store.list(status);
  }

  listCheckpoints(sessionId: string): Checkpoint[] {
    return this.checkpoints.list(sessionId);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _createSession(type: string, initialState: JsonObject): Promise<string> {
    const now = this.now();
    const session: Session = {
      id: randomUUID(),
      creator: this.peerId,
      type,
      state: initialState,
      moves: [],
      sequence: 0,
      participants: new Set([this.peerId]),
      status: "active",
      createdAt: now,
      lastCheckpointAt: now,
      lastCheckpointMoveCount: 0,
      checkpoints: [],
    };
    this.store.put(session);
    if (!this.rules.has(type)) {
      this.logger.warn({ sessionId: session.id, type }, "No state rule for session type");
    }
    this.logger.info({ sessionId: session.id, type }, "Session created");

    await this.broadcast(SESSION_CHANNEL, "session", {
      sessionId: session.id,
      sessionType: type,
      initialState,
      participants: [this.peerId],
    });
    return session.id;
  }

  private _onSession(message: Envelope<"session">): boolean {
    const { payload } = message;
    if (this.store.get(payload.sessionId) !== undefined) {
      this.logger.debug({ sessionId: payload.sessionId }, "Session already known");
      return false;
    }

    const participants = new Set(payload.participants ?? []);
    participants.add(message.senderId);
    this.store.put({
      id: payload.sessionId,
      creator: message.senderId,
      type: payload.sessionType,
      state: payload.initialState,
      moves: [],
      sequence: 0,
      participants,
      status: "active",
      createdAt: message.timestamp,
      lastCheckpointAt: message.timestamp,
      lastCheckpointMoveCount: 0,
      checkpoints: [],
    });
    this.logger.info(
      { sessionId: payload.sessionId, from: message.senderId, type: payload.sessionType },
      "Session announced",
    );
    return true;
  }

  private async _makeMove(sessionId: string, payload: JsonValue): Promise<boolean> {
    const session = this.store.get(sessionId);
    if (session === undefined || session.status !== "active") {
      this.logger.warn({ sessionId, status: session?.status }, "Move on unavailable session");
      return false;
    }

    const move: Move = {
      originator: this.peerId,
      payload,
      sequence: session.sequence,
      timestamp: this.now(),
    };
    const updated = this.accept(session, move);

    await this.broadcast(SESSION_CHANNEL, "move", {
      sessionId,
      moveSequence: move.sequence,
      movePayload: payload,
      stateDigest: computeStateDigest(updated.state),
    });
    await this.maybeCheckpoint(sessionId);
    return true;
  }

  private async _onMove(message: Envelope<"move">): Promise<boolean> {
    const { sessionId, moveSequence, movePayload, stateDigest } = message.payload;
    const session = this.store.get(sessionId);
    if (session === undefined || session.status !== "active") {
      this.logger.warn(
        { sessionId, from: message.senderId, status: session?.status },
        "Move for unavailable session dropped",
      );
      return false;
    }
    if (moveSequence !== session.sequence) {
      this.logger.warn(
        { sessionId, from: message.senderId, expected: session.sequence, received: moveSequence },
        "Out-of-order move dropped",
      );
      return false;
    }

    const updated = this.accept(session, {
      originator: message.senderId,
      payload: movePayload,
      sequence: moveSequence,
      timestamp: message.timestamp,
    });

    if (stateDigest !== undefined) {
      const local = computeStateDigest(updated.state);
      if (local !== stateDigest) {
        this.logger.warn(
          { sessionId, sequence: moveSequence, from: message.senderId, local, remote: stateDigest },
          "Session state diverged from peer",
        );
      }
    }

    await this.maybeCheckpoint(sessionId);
    return true;
  }

  /**
   * Append, advance the sequence, apply the state rule. The move stands
   * even if the rule throws.
   */
  private accept(session: Session, move: Move): Session {
    let state = session.state;
    try {
      state = this.rules.apply(session.type, session.state, move);
    } catch (err) {
      this.logger.error(
        { sessionId: session.id, sequence: move.sequence, err },
        "State rule failed; state unchanged",
      );
    }

    const participants = new Set(session.participants);
    participants.add(move.originator);
    const updated: Session = {
      ...session,
      state,
      moves: [...session.moves, move],
      sequence: session.sequence + 1,
      participants,
    };
    this.store.put(updated);
    this.logger.debug(
      { sessionId: session.id, sequence: move.sequence, originator: move.originator },
      "Move accepted",
    );
    return updated;
  }

  private async maybeCheckpoint(sessionId: string): Promise<void> {
    const session = this.store.get(sessionId);
    if (session === undefined) {
      return;
    }

    const now = this.now();
    const movesSince = session.moves.length - session.lastCheckpointMoveCount;
    const secondsSince = now - session.lastCheckpointAt;
    if (movesSince < this.moveInterval && secondsSince < this.intervalSeconds) {
      return;
    }

    const checkpoint: Checkpoint = {
      sessionId,
      sequence: session.sequence,
      stateDigest: computeStateDigest(session.state),
      moveCount: session.moves.length,
      timestamp: now,
    };
    try {
      this.checkpoints.append(checkpoint);
    } catch (err) {
      this.logger.error({ sessionId, err }, "Checkpoint failed");
      return;
    }

    this.store.put({
      ...session,
      checkpoints: [...session.checkpoints, checkpoint],
      lastCheckpointAt: now,
      lastCheckpointMoveCount: session.moves.length,
    });
    this.logger.info(
      { sessionId, sequence: checkpoint.sequence, stateDigest: checkpoint.stateDigest },
      "Checkpoint taken",
    );

    await this.broadcast(SESSION_CHANNEL, "checkpoint", {
      sessionId,
      sequence: checkpoint.sequence,
      stateDigest: checkpoint.stateDigest,
      moveCount: checkpoint.moveCount,
    });
    await this.anchor(checkpoint);
  }

  private async anchor(checkpoint: Checkpoint): Promise<void> {
    if (this.checkpointTarget === undefined) {
      return;
    }
    const callData = `0x${checkpoint.stateDigest}`;
    try {
      const outcome = await this.submitAndConfirm(
        this.checkpointTarget,
        "0",
        callData,
        this.defaultCostLimit,
        (txHash) => {
          this.logger.info(
            { sessionId: checkpoint.sessionId, sequence: checkpoint.sequence, txHash },
            "Checkpoint anchor submitted",
          );
        },
      );
      if (!outcome.succeeded) {
        this.logger.warn(
          { sessionId: checkpoint.sessionId, txHash: outcome.txHash, details: outcome.details },
          "Checkpoint anchor not confirmed",
        );
      }
    } catch (err) {
      this.logger.warn({ sessionId: checkpoint.sessionId, err }, "Checkpoint anchoring failed");
    }
  }

  private _onCheckpoint(message: Envelope<"checkpoint">): CheckpointComparison {
    const { sessionId, sequence, stateDigest } = message.payload;
    const local = this.checkpoints.atSequence(sessionId, sequence);
    if (local === undefined) {
      this.logger.debug({ sessionId, sequence, from: message.senderId }, "No local checkpoint to compare");
      return "unknown";
    }
    if (local.stateDigest !== stateDigest) {
      this.logger.warn(
        { sessionId, sequence, from: message.senderId, local: local.stateDigest, remote: stateDigest },
        "Checkpoint digest mismatch",
      );
      return "mismatch";
    }
    return "match";
  }

  private _endSession(sessionId: string): boolean {
    const session = this.store.get(sessionId);
    if (session === undefined || session.status !== "active") {
      return false;
    }
    this.store.put({ ...session, status: "ended" });
    this.logger.info({ sessionId, moves: session.moves.length }, "Session ended");
    return true;
  }
}
