/**
 * @concord/types: Shared domain types for Concord peers.
 *
 * These types are used across all Concord packages:
 * - Intents and coordination rounds
 * - Proposals, votes and tallies
 * - Sessions, moves and checkpoints
 * - Wire envelopes and per-kind payloads
 * - Transport and ledger boundaries
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Timestamps are integer epoch seconds
 */

// JSON
export type { JsonPrimitive, JsonValue, JsonObject } from "./json.js";

// Intent types
export type {
  Intent,
  IntentStatus,
  ActionDescriptor,
  CoordinationRound,
  RoundStatus,
} from "./intent.js";

// Voting types
export type {
  Proposal,
  ProposalStatus,
  OnchainStatus,
  Vote,
  TallyResult,
} from "./voting.js";

// Session types
export type {
  Session,
  SessionStatus,
  Move,
  Checkpoint,
} from "./session.js";

// Wire types
export type {
  Envelope,
  AnyEnvelope,
  MessageKind,
  MessagePayloads,
  IntentMessagePayload,
  CoordinationMessagePayload,
  ProposalMessagePayload,
  VoteMessagePayload,
  SessionMessagePayload,
  MoveMessagePayload,
  CheckpointMessagePayload,
} from "./message.js";

// Boundaries
export type { LedgerClient, TxHandle, ConfirmationResult } from "./ledger.js";
export type { Transport, TransportHandler } from "./transport.js";

// Runtime type guards
export {
  isJsonValue,
  isJsonObject,
  isHexData,
  isIntentStatus,
  isActionDescriptor,
  isProposalStatus,
  isCheckpoint,
} from "./guards.js";
