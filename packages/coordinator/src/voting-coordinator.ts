/**
 * Voting Coordinator: off-chain proposal voting with on-chain settlement.
 *
 * Proposal lifecycle:
 *
 *   active → finalizing → passed | rejected
 *
 * Rules:
 * - One vote slot per peer; a later vote from the same peer replaces it
 * - Finalization fires when the deadline has passed or every known peer
 *   has voted, whichever is first
 * - Deadlines are enforced lazily: every entry point first sweeps expired
 *   proposals
 * - After finalization the vote map is frozen
 * - A passed proposal is submitted to the ledger by its creator only, and
 *   only when a governance target is configured. Ledger failure never
 *   reverts the outcome.
 */

import { randomUUID } from "node:crypto";
import { VOTE_CHANNEL } from "@concord/router";
import type { MessageRouter } from "@concord/router";
import { isHexData, isJsonObject } from "@concord/types";
import type { Envelope, JsonObject, Proposal, ProposalStatus, Vote } from "@concord/types";
import { BaseCoordinator } from "./base-coordinator.js";
import type { CoordinatorOptions } from "./base-coordinator.js";
import { CoordinationError } from "./errors.js";
import { InMemoryProposalStore } from "./proposal-store.js";
import type { ProposalStore } from "./proposal-store.js";
import { tallyVotes } from "./tally.js";

export const DEFAULT_VOTING_DURATION_SECONDS = 300;

export interface VotingCoordinatorOptions extends CoordinatorOptions {
  readonly store?: ProposalStore;
  /** Address that passed proposals are submitted to. Unset: no submission. */
  readonly governanceTarget?: string;
  readonly defaultVotingDurationSeconds?: number;
}

export class VotingCoordinator extends BaseCoordinator {
  private readonly store: ProposalStore;
  private readonly governanceTarget: string | undefined;
  private readonly defaultVotingDurationSeconds: number;

  constructor(options: VotingCoordinatorOptions) {
    super(options);
    this.store = options.store ?? new InMemoryProposalStore();
    this.governanceTarget = options.governanceTarget;
    this.defaultVotingDurationSeconds =
      options.defaultVotingDurationSeconds ?? DEFAULT_VOTING_DURATION_SECONDS;
  }

  register(router: MessageRouter): void {
    router.registerHandler(VOTE_CHANNEL, "proposal", (msg) => this.onProposalReceived(msg));
    router.registerHandler(VOTE_CHANNEL, "vote", (msg) => this.onVoteReceived(msg));
  }

  // ─── Operations ─────────────────────────────────────────────────────

  /**
   * @throws CoordinationError INVALID_ARGUMENT on a non-object payload or a non-positive duration
   */
  createProposal(payload: JsonObject, votingDurationSeconds?: number): Promise<string> {
    const duration = votingDurationSeconds ?? this.defaultVotingDurationSeconds;
    if (!isJsonObject(payload)) {
      throw new CoordinationError("INVALID_ARGUMENT", "payload must be a JSON object");
    }
    if (!Number.isInteger(duration) || duration <= 0) {
      throw new CoordinationError(
        "INVALID_ARGUMENT",
        `votingDurationSeconds must be a positive integer, got ${duration}`,
      );
    }
    return this.inbox.enqueue(() => this._createProposal(payload, duration));
  }

  onProposalReceived(message: Envelope<"proposal">): Promise<void> {
    return this.inbox.enqueue(() => this._onProposal(message));
  }

  /**
   * Cast (or replace) the local vote.
   *
   * @returns false when the proposal is unknown, past its deadline or finalized
   * @throws CoordinationError INVALID_ARGUMENT on a negative or fractional weight
   */
  submitVote(proposalId: string, decision: boolean, weight = 1): Promise<boolean> {
    if (!Number.isInteger(weight) || weight < 0) {
      throw new CoordinationError(
        "INVALID_ARGUMENT",
        `weight must be a non-negative integer, got ${weight}`,
      );
    }
    return this.inbox.enqueue(() => this._submitVote(proposalId, decision, weight));
  }

  /**
   * @returns false when the proposal is unknown or already finalized
   */
  onVoteReceived(message: Envelope<"vote">): Promise<boolean> {
    return this.inbox.enqueue(() => this._onVote(message));
  }

  /**
   * Finalize every active proposal whose deadline has passed.
   *
   * @returns ids finalized by this sweep
   */
  finalizeExpired(): Promise<string[]> {
    return this.inbox.enqueue(() => this.sweep());
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getProposal(proposalId: string): Proposal | undefined {
    return this.store.get(proposalId);
  }

  listProposals(status?: ProposalStatus): Proposal[] {
    return this.store.list(status);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _createProposal(payload: JsonObject, duration: number): Promise<string> {
    await this.sweep();

    const createdAt = this.now();
    const proposal: Proposal = {
      id: randomUUID(),
      creator: this.peerId,
      payload,
      createdAt,
      votingEndsAt: createdAt + duration,
      votes: new Map(),
      status: "active",
    };
    this.store.put(proposal);
    this.logger.info(
      { proposalId: proposal.id, votingEndsAt: proposal.votingEndsAt },
      "Proposal created",
    );

    await this.broadcast(VOTE_CHANNEL, "proposal", {
      proposalId: proposal.id,
      creatorId: this.peerId,
      payload,
      votingDurationSeconds: duration,
    });
    return proposal.id;
  }

  private async _onProposal(message: Envelope<"proposal">): Promise<void> {
    await this.sweep();

    const { payload } = message;
    if (this.store.get(payload.proposalId) !== undefined) {
      this.logger.debug({ proposalId: payload.proposalId }, "Proposal already known");
      return;
    }

    this.store.put({
      id: payload.proposalId,
      creator: payload.creatorId,
      payload: payload.payload,
      createdAt: message.timestamp,
      votingEndsAt: message.timestamp + payload.votingDurationSeconds,
      votes: new Map(),
      status: "active",
    });
    this.logger.info(
      { proposalId: payload.proposalId, from: message.senderId },
      "Proposal received",
    );
  }

  private async _submitVote(proposalId: string, decision: boolean, weight: number): Promise<boolean> {
    await this.sweep();

    const proposal = this.store.get(proposalId);
    if (proposal === undefined) {
      this.logger.warn({ proposalId }, "Vote on unknown proposal");
      return false;
    }
    if (proposal.status !== "active" || this.now() > proposal.votingEndsAt) {
      this.logger.warn({ proposalId, status: proposal.status }, "Vote on closed proposal");
      return false;
    }

    const vote: Vote = { decision, weight, timestamp: this.now() };
    this.recordVote(proposal, this.peerId, vote);
    await this.broadcast(VOTE_CHANNEL, "vote", { proposalId, decision, weight });
    await this.checkFinalization(proposalId);
    return true;
  }

  private async _onVote(message: Envelope<"vote">): Promise<boolean> {
    await this.sweep();

    const { proposalId, decision, weight } = message.payload;
    const proposal = this.store.get(proposalId);
    if (proposal === undefined) {
      this.logger.warn({ proposalId, from: message.senderId }, "Vote for unknown proposal");
      return false;
    }
    if (proposal.status !== "active") {
      this.logger.debug(
        { proposalId, from: message.senderId, status: proposal.status },
        "Vote after finalization ignored",
      );
      return false;
    }

    this.recordVote(proposal, message.senderId, { decision, weight, timestamp: message.timestamp });
    await this.checkFinalization(proposalId);
    return true;
  }

  private recordVote(proposal: Proposal, voterId: string, vote: Vote): void {
    const votes = new Map(proposal.votes);
    if (votes.has(voterId)) {
      this.logger.debug({ proposalId: proposal.id, voterId }, "Vote replaced");
    }
    votes.set(voterId, vote);
    this.store.put({ ...proposal, votes });
  }

  private async sweep(): Promise<string[]> {
    const now = this.now();
    const finalized: string[] = [];
    for (const proposal of this.store.list("active")) {
      if (now > proposal.votingEndsAt) {
        await this.finalize(proposal.id);
        finalized.push(proposal.id);
      }
    }
    return finalized;
  }

  private async checkFinalization(proposalId: string): Promise<void> {
    const proposal = this.store.get(proposalId);
    if (proposal === undefined || proposal.status !== "active") {
      return;
    }
    if (this.now() > proposal.votingEndsAt || proposal.votes.size >= this.totalKnownPeers()) {
      await this.finalize(proposalId);
    }
  }

  private async finalize(proposalId: string): Promise<void> {
    const proposal = this.store.get(proposalId);
    if (proposal === undefined || proposal.status !== "active") {
      return;
    }

    this.store.put({ ...proposal, status: "finalizing" });
    const result = tallyVotes(proposal.votes, this.now());
    const decided: Proposal = {
      ...proposal,
      status: result.passed ? "passed" : "rejected",
      result,
    };
    this.store.put(decided);
    this.logger.info(
      {
        proposalId,
        passed: result.passed,
        yesWeight: result.yesWeight,
        noWeight: result.noWeight,
        voters: proposal.votes.size,
      },
      "Proposal finalized",
    );

    if (result.passed && proposal.creator === this.peerId) {
      await this.submitOnchain(decided);
    }
  }

  private async submitOnchain(proposal: Proposal): Promise<void> {
    if (this.governanceTarget === undefined) {
      this.logger.debug({ proposalId: proposal.id }, "No governance target; skipping submission");
      return;
    }
    const target = this.governanceTarget;
    const rawCallData = proposal.payload.callData;
    const callData = isHexData(rawCallData) ? rawCallData : "0x";
    const rawValue = proposal.payload.value;
    const value = typeof rawValue === "string" && /^\d+$/.test(rawValue) ? rawValue : "0";

    try {
      const costLimit = await this.estimateCost(target, callData);
      const outcome = await this.submitAndConfirm(target, value, callData, costLimit, (txHash) => {
        this.update(proposal.id, { onchainStatus: "submitted", txHash });
        this.logger.info({ proposalId: proposal.id, txHash }, "Proposal submitted");
      });
      this.update(proposal.id, { onchainStatus: outcome.succeeded ? "confirmed" : "failed" });
      if (outcome.succeeded) {
        this.logger.info({ proposalId: proposal.id, txHash: outcome.txHash }, "Proposal confirmed");
      } else {
        this.logger.error(
          { proposalId: proposal.id, txHash: outcome.txHash, details: outcome.details },
          "Proposal transaction failed",
        );
      }
    } catch (err) {
      this.update(proposal.id, { onchainStatus: "failed" });
      this.logger.error({ proposalId: proposal.id, err }, "Proposal submission failed");
    }
  }

  private update(proposalId: string, patch: Pick<Partial<Proposal>, "onchainStatus" | "txHash">): void {
    const current = this.store.get(proposalId);
    if (current !== undefined) {
      this.store.put({ ...current, ...patch });
    }
  }
}
