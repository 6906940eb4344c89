/**
 * Intent Coordinator: conflict resolution for competing intents.
 *
 * Lifecycle of an intent:
 *
 *   pending → coordinating → executed | executed_by_peer | failed
 *                  ↓
 *               pending   (round rejected)
 *
 * Rules:
 * - Conflict detection runs whenever a remote intent arrives
 * - Two or more pending intents on one resource open a round
 * - While a round on a resource is in `voting`, no other round is opened
 *   for it; intents arriving meanwhile wait for the decision
 * - Candidates of an executed round are settled and never contend again
 * - The best-ranked candidate is proposed; peers approve by announcing
 *   the round themselves, and only when it is the best contender they know
 * - Once quorum is reached a strict majority decides
 * - Only the originator submits to the ledger, at most once; everyone else
 *   records `executed_by_peer`
 * - Ledger failures mark the intent `failed`; nothing is retried
 */

import { randomUUID } from "node:crypto";
import { INTENT_CHANNEL } from "@concord/router";
import type { MessageRouter } from "@concord/router";
import { isActionDescriptor } from "@concord/types";
import type {
  ActionDescriptor,
  CoordinationMessagePayload,
  CoordinationRound,
  Envelope,
  Intent,
  IntentStatus,
} from "@concord/types";
import { BaseCoordinator } from "./base-coordinator.js";
import type { CoordinatorOptions } from "./base-coordinator.js";
import { computeQuorum, deriveRoundId, hasMajorityApproval, rankCandidates } from "./conflict.js";
import { CoordinationError } from "./errors.js";
import { InMemoryIntentStore } from "./intent-store.js";
import type { IntentStore } from "./intent-store.js";

/**
 * Local say on a proposed intent, consulted only when the proposal agrees
 * with this peer's view of the contenders. Defaults to approving.
 */
export type ApprovalPolicy = (
  proposed: Intent | undefined,
  round: CoordinationRound,
) => boolean;

const TERMINAL_STATUSES: ReadonlySet<IntentStatus> = new Set([
  "executed",
  "executed_by_peer",
  "failed",
]);

export function isTerminalIntentStatus(status: IntentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface IntentCoordinatorOptions extends CoordinatorOptions {
  readonly store?: IntentStore;
  readonly approvalPolicy?: ApprovalPolicy;
}

export class IntentCoordinator extends BaseCoordinator {
  private readonly store: IntentStore;
  private readonly approvalPolicy: ApprovalPolicy;
  /** Rounds this peer has broadcast. Each is announced at most once. */
  private readonly announced = new Set<string>();

  constructor(options: IntentCoordinatorOptions) {
    super(options);
    this.store = options.store ?? new InMemoryIntentStore();
    this.approvalPolicy = options.approvalPolicy ?? (() => true);
  }

  register(router: MessageRouter): void {
    router.registerHandler(INTENT_CHANNEL, "intent", (msg) => this.onIntentReceived(msg));
    router.registerHandler(INTENT_CHANNEL, "coordination", (msg) =>
      this.onCoordinationReceived(msg),
    );
  }

  // ─── Operations ─────────────────────────────────────────────────────

  /**
   * Declare a local intent and share it with peers.
   *
   * @throws CoordinationError INVALID_ARGUMENT on a malformed request
   */
  createIntent(resourceKey: string, action: ActionDescriptor, priority: number): Promise<string> {
    if (resourceKey.length === 0) {
      throw new CoordinationError("INVALID_ARGUMENT", "resourceKey must not be empty");
    }
    if (!isActionDescriptor(action)) {
      throw new CoordinationError(
        "INVALID_ARGUMENT",
        "action must have a description, hex callData and a decimal wei value",
      );
    }
    if (!Number.isInteger(priority)) {
      throw new CoordinationError("INVALID_ARGUMENT", `priority must be an integer, got ${priority}`);
    }
    return this.inbox.enqueue(() => this._createIntent(resourceKey, action, priority));
  }

  onIntentReceived(message: Envelope<"intent">): Promise<void> {
    return this.inbox.enqueue(() => this._onIntent(message));
  }

  onCoordinationReceived(message: Envelope<"coordination">): Promise<void> {
    return this.inbox.enqueue(() =>
      this._processCoordination(message.senderId, message.payload),
    );
  }

  /**
   * Carry out a decided intent. Resolves with the updated intent, or
   * undefined when the id is unknown. An intent already executed or failed
   * is returned as is, without a second submission.
   */
  executeIntent(intentId: string): Promise<Intent | undefined> {
    return this.inbox.enqueue(() => this._executeIntent(intentId));
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getIntent(intentId: string): Intent | undefined {
    return this.store.getIntent(intentId);
  }

  listIntents(status?: IntentStatus): Intent[] {
    return this.store.listIntents(status);
  }

  getRound(roundId: string): CoordinationRound | undefined {
    return this.store.getRound(roundId);
  }

  listRounds(): CoordinationRound[] {
    return this.store.listRounds();
  }

  /**
   * True when the intent is a round candidate, or another open intent
   * targets the same resource. Such an intent is decided by a round.
   */
  isContested(intentId: string): boolean {
    const intent = this.store.getIntent(intentId);
    if (intent === undefined) {
      return false;
    }
    const rounds = this.store.roundsForResource(intent.resourceKey);
    if (rounds.some((r) => r.candidates.includes(intentId))) {
      return true;
    }
    return this.contenders(intent.resourceKey, rounds).some((i) => i.id !== intentId);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _createIntent(
    resourceKey: string,
    action: ActionDescriptor,
    priority: number,
  ): Promise<string> {
    const costEstimate = await this.estimateCost(resourceKey, action.callData);
    const intent: Intent = {
      id: randomUUID(),
      originator: this.peerId,
      resourceKey,
      action,
      costEstimate,
      priority,
      createdAt: this.now(),
      status: "pending",
    };
    this.store.putIntent(intent);
    this.logger.info(
      { intentId: intent.id, resourceKey, priority, costEstimate },
      "Intent created",
    );

    await this.broadcast(INTENT_CHANNEL, "intent", {
      intentId: intent.id,
      targetResource: resourceKey,
      actionDescriptor: action,
      costEstimate,
      priority,
    });
    return intent.id;
  }

  private async _onIntent(message: Envelope<"intent">): Promise<void> {
    const { payload } = message;
    if (this.store.getIntent(payload.intentId) === undefined) {
      this.store.putIntent({
        id: payload.intentId,
        originator: message.senderId,
        resourceKey: payload.targetResource,
        action: payload.actionDescriptor,
        costEstimate: payload.costEstimate,
        priority: payload.priority,
        createdAt: message.timestamp,
        status: "pending",
      });
      this.logger.info(
        { intentId: payload.intentId, from: message.senderId, resourceKey: payload.targetResource },
        "Intent received",
      );
    } else {
      this.logger.debug({ intentId: payload.intentId }, "Intent already known");
    }

    await this.detectConflicts(payload.targetResource);
  }

  private async detectConflicts(resourceKey: string): Promise<void> {
    const rounds = this.store.roundsForResource(resourceKey);
    const open = rounds.find((r) => r.status === "voting");
    if (open !== undefined) {
      this.logger.debug({ roundId: open.id, resourceKey }, "Round in progress; holding intents");
      return;
    }

    const pending = this.contenders(resourceKey, rounds).filter((i) => i.status === "pending");
    if (pending.length < 2) {
      return;
    }

    const ranked = rankCandidates(pending);
    const candidateIds = ranked.map((i) => i.id);
    const roundId = deriveRoundId(resourceKey, candidateIds);
    if (this.store.getRound(roundId) !== undefined) {
      return;
    }

    const [winner] = ranked;
    if (winner === undefined) {
      return;
    }

    this.store.putRound({
      id: roundId,
      resourceKey,
      candidates: candidateIds,
      proposedIntentId: winner.id,
      votes: new Map(),
      status: "voting",
      openedAt: this.now(),
    });
    this.setStatus(winner.id, "coordinating");
    this.logger.info(
      { roundId, resourceKey, proposedIntentId: winner.id, candidates: candidateIds.length },
      "Coordination round opened",
    );

    const payload: CoordinationMessagePayload = {
      roundId,
      proposedIntentId: winner.id,
      targetResource: resourceKey,
      candidateIds,
    };
    this.announced.add(roundId);
    await this.broadcast(INTENT_CHANNEL, "coordination", payload);
    await this._processCoordination(this.peerId, payload);
  }

  private async _processCoordination(
    senderId: string,
    payload: CoordinationMessagePayload,
  ): Promise<void> {
    let round = this.store.getRound(payload.roundId);

    if (round === undefined) {
      round = {
        id: payload.roundId,
        resourceKey: payload.targetResource,
        candidates: payload.candidateIds,
        proposedIntentId: payload.proposedIntentId,
        votes: new Map(),
        status: "voting",
        openedAt: this.now(),
      };
      this.store.putRound(round);
      const proposed = this.store.getIntent(payload.proposedIntentId);
      if (proposed?.status === "pending") {
        this.setStatus(proposed.id, "coordinating");
      }
      this.logger.info(
        { roundId: round.id, from: senderId, proposedIntentId: round.proposedIntentId },
        "Joined coordination round",
      );
    }

    if (round.status !== "voting") {
      this.logger.debug({ roundId: round.id, status: round.status }, "Round already decided");
      return;
    }

    const approve =
      this.agreesWithLocalView(round) &&
      this.approvalPolicy(this.store.getIntent(round.proposedIntentId), round);
    const votes = new Map(round.votes);
    votes.set(senderId, true);
    votes.set(this.peerId, approve);
    round = { ...round, votes };
    this.store.putRound(round);

    if (approve && !this.announced.has(round.id)) {
      this.announced.add(round.id);
      await this.broadcast(INTENT_CHANNEL, "coordination", {
        roundId: round.id,
        proposedIntentId: round.proposedIntentId,
        targetResource: round.resourceKey,
        candidateIds: round.candidates,
      });
    }

    const quorum = computeQuorum(this.totalKnownPeers());
    if (votes.size < quorum) {
      this.logger.debug({ roundId: round.id, votes: votes.size, quorum }, "Awaiting quorum");
      return;
    }

    if (hasMajorityApproval(votes)) {
      this.store.putRound({ ...round, status: "executed" });
      this.logger.info({ roundId: round.id, votes: votes.size }, "Round approved");
      await this._executeIntent(round.proposedIntentId);
      await this.detectConflicts(round.resourceKey);
    } else {
      this.store.putRound({ ...round, status: "rejected" });
      const proposed = this.store.getIntent(round.proposedIntentId);
      if (proposed?.status === "coordinating") {
        this.setStatus(proposed.id, "pending");
      }
      this.logger.info({ roundId: round.id, votes: votes.size }, "Round rejected");
      await this.detectConflicts(round.resourceKey);
    }
  }

  /**
   * Open intents on `resourceKey` that may still win: pending or
   * coordinating, and not a candidate of an executed round.
   */
  private contenders(resourceKey: string, rounds: readonly CoordinationRound[]): Intent[] {
    const settled = new Set(
      rounds.filter((r) => r.status === "executed").flatMap((r) => r.candidates),
    );
    return this.store
      .intentsForResource(resourceKey)
      .filter(
        (i) => (i.status === "pending" || i.status === "coordinating") && !settled.has(i.id),
      );
  }

  /**
   * A proposal agrees with this peer when no executed round on the resource
   * chose a different intent, and no contender known here outranks it.
   * An intent not yet received here cannot be ranked and is accepted.
   */
  private agreesWithLocalView(round: CoordinationRound): boolean {
    const rounds = this.store.roundsForResource(round.resourceKey);
    if (rounds.some((r) => r.status === "executed" && r.proposedIntentId !== round.proposedIntentId)) {
      return false;
    }

    const proposed = this.store.getIntent(round.proposedIntentId);
    if (proposed === undefined) {
      return true;
    }
    if (proposed.status === "failed") {
      return false;
    }
    const others = this.contenders(round.resourceKey, rounds).filter((i) => i.id !== proposed.id);
    const [best] = rankCandidates([proposed, ...others]);
    return best?.id === proposed.id;
  }

  private async _executeIntent(intentId: string): Promise<Intent | undefined> {
    const intent = this.store.getIntent(intentId);
    if (intent === undefined) {
      this.logger.warn({ intentId }, "Cannot execute unknown intent");
      return undefined;
    }

    if (isTerminalIntentStatus(intent.status)) {
      this.logger.debug({ intentId, status: intent.status }, "Intent already settled");
      return intent;
    }

    if (intent.originator !== this.peerId) {
      this.logger.info({ intentId, originator: intent.originator }, "Intent executed by peer");
      return this.setStatus(intentId, "executed_by_peer");
    }

    try {
      const outcome = await this.submitAndConfirm(
        intent.resourceKey,
        intent.action.value,
        intent.action.callData,
        intent.costEstimate,
        (txHash) => {
          this.store.putIntent({ ...intent, status: "executed", txHash });
          this.logger.info({ intentId, txHash }, "Intent submitted");
        },
      );
      if (outcome.succeeded) {
        this.logger.info({ intentId, txHash: outcome.txHash }, "Intent confirmed");
        return this.setStatus(intentId, "executed");
      }
      this.logger.error(
        { intentId, txHash: outcome.txHash, details: outcome.details },
        "Intent transaction failed",
      );
      return this.setStatus(intentId, "failed");
    } catch (err) {
      this.logger.error({ intentId, err }, "Intent execution failed");
      return this.setStatus(intentId, "failed");
    }
  }

  private setStatus(intentId: string, status: IntentStatus): Intent | undefined {
    const intent = this.store.getIntent(intentId);
    if (intent === undefined) {
      return undefined;
    }
    const updated: Intent = { ...intent, status };
    this.store.putIntent(updated);
    return updated;
  }
}
