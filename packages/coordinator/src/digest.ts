/**
 * State digests.
 *
 *   digest = sha256(canonicalize(state))   (RFC 8785 JCS, lowercase hex)
 *
 * Peers that applied the same moves to the same initial state produce the
 * same digest regardless of key insertion order.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Checkpoint, JsonValue } from "@concord/types";

export function computeStateDigest(state: JsonValue): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/**
 * Check that `state` is the state `checkpoint` was taken from.
 */
export function verifyCheckpoint(state: JsonValue, checkpoint: Checkpoint): boolean {
  if (checkpoint.stateDigest === "") {
    return false;
  }
  return computeStateDigest(state) === checkpoint.stateDigest;
}
