/**
 * Runtime Type Guards
 *
 * Narrowing functions for Concord domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, persisted checkpoints).
 */

import type { ActionDescriptor, IntentStatus } from "./intent.js";
import type { Checkpoint } from "./session.js";
import type { JsonObject, JsonValue } from "./json.js";
import type { ProposalStatus } from "./voting.js";

const INTENT_STATUSES = new Set<string>([
  "pending",
  "coordinating",
  "executed",
  "executed_by_peer",
  "failed",
]);

const PROPOSAL_STATUSES = new Set<string>(["active", "finalizing", "passed", "rejected"]);

const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;
const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// JSON
// =============================================================================

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isJsonObject(value);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

/** 0x-prefixed, even-length hex. "0x" alone is valid (empty calldata). */
export function isHexData(value: unknown): value is string {
  return typeof value === "string" && HEX_PATTERN.test(value) && value.length % 2 === 0;
}

// =============================================================================
// Intent guards
// =============================================================================

export function isIntentStatus(value: unknown): value is IntentStatus {
  return typeof value === "string" && INTENT_STATUSES.has(value);
}

export function isActionDescriptor(value: unknown): value is ActionDescriptor {
  if (!isRecord(value)) return false;
  return (
    typeof value.description === "string" &&
    isHexData(value.callData) &&
    typeof value.value === "string" &&
    /^\d+$/.test(value.value)
  );
}

// =============================================================================
// Voting guards
// =============================================================================

export function isProposalStatus(value: unknown): value is ProposalStatus {
  return typeof value === "string" && PROPOSAL_STATUSES.has(value);
}

// =============================================================================
// Session guards
// =============================================================================

export function isCheckpoint(value: unknown): value is Checkpoint {
  if (!isRecord(value)) return false;
  return (
    typeof value.sessionId === "string" &&
    value.sessionId.length > 0 &&
    Number.isInteger(value.sequence) &&
    typeof value.stateDigest === "string" &&
    DIGEST_PATTERN.test(value.stateDigest) &&
    Number.isInteger(value.moveCount) &&
    typeof value.timestamp === "number"
  );
}
