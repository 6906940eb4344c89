/**
 * Proposal & Vote Types
 *
 * Proposals move through a one-way state machine:
 *
 *   active → finalizing → passed | rejected
 *
 * Terminal states are final. One vote slot per peer identity; a later
 * vote from the same peer replaces the earlier one.
 */

import type { JsonObject } from "./json.js";

export type ProposalStatus = "active" | "finalizing" | "passed" | "rejected";

/**
 * Ledger submission status of a passed proposal (creator peer only).
 */
export type OnchainStatus = "submitted" | "confirmed" | "failed";

export interface Vote {
  /** true = yes */
  readonly decision: boolean;
  readonly weight: number;
  /** Epoch seconds at which this peer recorded the vote */
  readonly timestamp: number;
}

export interface TallyResult {
  readonly passed: boolean;
  readonly yesWeight: number;
  readonly noWeight: number;
  readonly totalWeight: number;
  /** Epoch seconds */
  readonly finalizedAt: number;
}

export interface Proposal {
  readonly id: string;
  readonly creator: string;
  readonly payload: JsonObject;

  /** Epoch seconds */
  readonly createdAt: number;

  /** Epoch seconds; votes after this instant are refused */
  readonly votingEndsAt: number;

  /** voterId → vote */
  readonly votes: ReadonlyMap<string, Vote>;

  readonly status: ProposalStatus;
  readonly result?: TallyResult;
  readonly onchainStatus?: OnchainStatus;
  readonly txHash?: string;
}
