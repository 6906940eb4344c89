import type { TallyResult, Vote } from "@concord/types";

/**
 * Weighted tally. Passes only when yes weight strictly exceeds no weight;
 * a tie rejects.
 */
export function tallyVotes(votes: ReadonlyMap<string, Vote>, finalizedAt: number): TallyResult {
  let yesWeight = 0;
  let noWeight = 0;
  for (const vote of votes.values()) {
    if (vote.decision) {
      yesWeight += vote.weight;
    } else {
      noWeight += vote.weight;
    }
  }
  return {
    passed: yesWeight > noWeight,
    yesWeight,
    noWeight,
    totalWeight: yesWeight + noWeight,
    finalizedAt,
  };
}
