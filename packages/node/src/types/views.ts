/**
 * JSON views of coordinator records.
 *
 * Maps and sets do not survive JSON.stringify; these flatten them into
 * plain objects and sorted arrays.
 */

import type { CoordinationRound, Proposal, Session, Vote } from "@concord/types";

export function roundView(round: CoordinationRound) {
  return { ...round, votes: Object.fromEntries(round.votes) };
}

export function proposalView(proposal: Proposal) {
  const votes: Record<string, Vote> = Object.fromEntries(proposal.votes);
  return { ...proposal, votes };
}

export function sessionView(session: Session) {
  return { ...session, participants: [...session.participants].sort() };
}
