/**
 * Conflict resolution rules.
 *
 * Pure functions shared by every peer. Two peers holding the same set of
 * pending intents for a resource rank them identically and derive the
 * same round id.
 */

import { createHash } from "node:crypto";
import type { Intent } from "@concord/types";

/**
 * Order candidates best-first:
 *   priority descending → createdAt ascending → id ascending
 */
export function compareCandidates(a: Intent, b: Intent): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export function rankCandidates(intents: readonly Intent[]): Intent[] {
  return [...intents].sort(compareCandidates);
}

/**
 * Round id from the resource key and the ranked candidate ids.
 */
export function deriveRoundId(resourceKey: string, rankedIds: readonly string[]): string {
  const hash = createHash("sha256")
    .update([resourceKey, ...rankedIds].join("\n"))
    .digest("hex");
  return `round_${hash.slice(0, 16)}`;
}

/**
 * Votes needed before a decision: a strict majority of known peers,
 * counting ourselves.
 */
export function computeQuorum(totalKnownPeers: number): number {
  return Math.floor(totalKnownPeers / 2) + 1;
}

/**
 * Strict majority of the votes cast approve.
 */
export function hasMajorityApproval(votes: ReadonlyMap<string, boolean>): boolean {
  let approvals = 0;
  for (const approve of votes.values()) {
    if (approve) approvals++;
  }
  return approvals > votes.size / 2;
}
