/**
 * Intent Types
 *
 * An Intent is a declared desire to act on a shared resource
 * (a contract address, an NFT slot, a named lock). Intents that target
 * the same resource compete; a coordination round picks one winner
 * before anything reaches the ledger.
 *
 * Intents are:
 * - Owned by the Intent Coordinator of each peer
 * - Immutable except for `status` (and the execution tx hash)
 * - Ordered by (priority desc, createdAt asc, id asc) during resolution
 */

/**
 * Lifecycle states of an Intent.
 */
export type IntentStatus =
  | "pending"
  | "coordinating"
  | "executed"
  | "executed_by_peer"
  | "failed";

/**
 * What the intent wants the ledger to do once it wins.
 */
export interface ActionDescriptor {
  /** Human-readable call, e.g. "mint(42)" */
  readonly description: string;

  /** 0x-prefixed calldata; "0x" for a plain value transfer */
  readonly callData: string;

  /** Wei to send, as a decimal string */
  readonly value: string;
}

export interface Intent {
  /** Unique identifier for this intent */
  readonly id: string;

  /** Peer that declared the intent */
  readonly originator: string;

  /** Resource the intent competes for (conflict grouping key) */
  readonly resourceKey: string;

  readonly action: ActionDescriptor;

  /** Estimated ledger cost in gas units */
  readonly costEstimate: number;

  /** Higher wins */
  readonly priority: number;

  /** Epoch seconds */
  readonly createdAt: number;

  /** Current lifecycle state */
  readonly status: IntentStatus;

  /** Ledger transaction hash, once this peer submitted it */
  readonly txHash?: string;
}

/**
 * Lifecycle states of a coordination round.
 */
export type RoundStatus = "voting" | "executed" | "rejected";

/**
 * A coordination round resolves two or more conflicting intents
 * into one winner via priority ordering and a peer vote.
 */
export interface CoordinationRound {
  readonly id: string;
  readonly resourceKey: string;

  /** Candidate intent ids in resolution order (best first), at least two */
  readonly candidates: readonly string[];

  /** The candidate put to the vote */
  readonly proposedIntentId: string;

  /** peerId → approve */
  readonly votes: ReadonlyMap<string, boolean>;

  readonly status: RoundStatus;

  /** Epoch seconds */
  readonly openedAt: number;
}
