/**
 * @concord/coordinator: Peer coordination engine.
 *
 * - IntentCoordinator: conflict detection, priority ranking, quorum vote
 * - VotingCoordinator: proposals, weighted tallies, deadline sweeps
 * - SessionSequencer: ordered move logs, state rules, checkpoints
 * - CoordinatorPeer: router + coordinators wired to a transport
 */

// Coordinators
export { IntentCoordinator, isTerminalIntentStatus } from "./intent-coordinator.js";
export type { IntentCoordinatorOptions, ApprovalPolicy } from "./intent-coordinator.js";
export { VotingCoordinator, DEFAULT_VOTING_DURATION_SECONDS } from "./voting-coordinator.js";
export type { VotingCoordinatorOptions } from "./voting-coordinator.js";
export {
  SessionSequencer,
  DEFAULT_CHECKPOINT_MOVE_INTERVAL,
  DEFAULT_CHECKPOINT_INTERVAL_SECONDS,
} from "./session-sequencer.js";
export type { SessionSequencerOptions, CheckpointComparison } from "./session-sequencer.js";
export {
  BaseCoordinator,
  DEFAULT_COST_LIMIT,
  DEFAULT_LEDGER_TIMEOUT_MS,
  DEFAULT_CONFIRMATION_TIMEOUT_MS,
} from "./base-coordinator.js";
export type { CoordinatorOptions } from "./base-coordinator.js";

// Peer facade
export { CoordinatorPeer } from "./peer.js";
export type { CoordinatorPeerOptions } from "./peer.js";

// In-process transport
export { LoopbackNetwork, LoopbackTransport } from "./loopback.js";

// Rules
export {
  compareCandidates,
  rankCandidates,
  deriveRoundId,
  computeQuorum,
  hasMajorityApproval,
} from "./conflict.js";
export { tallyVotes } from "./tally.js";
export { StateRuleRegistry, turnBasedRule, BUILTIN_STATE_RULES } from "./state-rules.js";
export type { StateRule } from "./state-rules.js";
export { computeStateDigest, verifyCheckpoint } from "./digest.js";

// Stores
export { InMemoryIntentStore } from "./intent-store.js";
export type { IntentStore } from "./intent-store.js";
export { InMemoryProposalStore } from "./proposal-store.js";
export type { ProposalStore } from "./proposal-store.js";
export { InMemorySessionStore } from "./session-store.js";
export type { SessionStore } from "./session-store.js";
export { InMemoryCheckpointStore, FileCheckpointStore } from "./checkpoint-store.js";
export type { CheckpointStore } from "./checkpoint-store.js";

// Infrastructure
export { SerialInbox } from "./inbox.js";
export { withTimeout } from "./timeout.js";
export { systemClock, epochSeconds } from "./clock.js";
export type { Clock } from "./clock.js";
export { CoordinationError, TimeoutError } from "./errors.js";
export type { CoordinationErrorCode } from "./errors.js";
