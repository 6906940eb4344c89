/**
 * Wire Message Types
 *
 * Every peer-to-peer message is an envelope:
 *
 *   { kind, senderId, timestamp, payload }
 *
 * `timestamp` is integer epoch seconds as stamped by the sender.
 * The set of kinds is closed; each kind has exactly one payload shape.
 */

import type { ActionDescriptor } from "./intent.js";
import type { JsonObject, JsonValue } from "./json.js";

// =============================================================================
// Payloads
// =============================================================================

export interface IntentMessagePayload {
  readonly intentId: string;
  readonly targetResource: string;
  readonly actionDescriptor: ActionDescriptor;
  readonly costEstimate: number;
  readonly priority: number;
}

export interface CoordinationMessagePayload {
  readonly roundId: string;
  readonly proposedIntentId: string;
  readonly targetResource: string;
  /** Ranked best first; always two or more, including the proposed intent */
  readonly candidateIds: readonly string[];
}

export interface ProposalMessagePayload {
  readonly proposalId: string;
  readonly creatorId: string;
  readonly payload: JsonObject;
  readonly votingDurationSeconds: number;
}

export interface VoteMessagePayload {
  readonly proposalId: string;
  readonly decision: boolean;
  readonly weight: number;
}

export interface SessionMessagePayload {
  readonly sessionId: string;
  readonly sessionType: string;
  readonly initialState: JsonObject;
  readonly participants?: readonly string[] | undefined;
}

export interface MoveMessagePayload {
  readonly sessionId: string;
  readonly moveSequence: number;
  readonly movePayload: JsonValue;
  readonly stateDigest?: string | undefined;
}

export interface CheckpointMessagePayload {
  readonly sessionId: string;
  readonly sequence: number;
  readonly stateDigest: string;
  readonly moveCount: number;
}

// =============================================================================
// Envelope
// =============================================================================

/**
 * Kind → payload. Adding a kind means adding an entry here and a schema
 * in the router; handlers are typed from this map.
 */
export interface MessagePayloads {
  readonly intent: IntentMessagePayload;
  readonly coordination: CoordinationMessagePayload;
  readonly proposal: ProposalMessagePayload;
  readonly vote: VoteMessagePayload;
  readonly session: SessionMessagePayload;
  readonly move: MoveMessagePayload;
  readonly checkpoint: CheckpointMessagePayload;
}

export type MessageKind = keyof MessagePayloads;

export interface Envelope<K extends MessageKind = MessageKind> {
  readonly kind: K;
  readonly senderId: string;
  /** Epoch seconds */
  readonly timestamp: number;
  readonly payload: MessagePayloads[K];
}

/**
 * Discriminated union of every envelope, for code that switches on `kind`.
 */
export type AnyEnvelope = {
  [K in MessageKind]: Envelope<K>;
}[MessageKind];
