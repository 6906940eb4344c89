import type { Proposal, ProposalStatus } from "@concord/types";

/**
 * Proposal store, owned by a single Voting Coordinator.
 */
export interface ProposalStore {
  get(id: string): Proposal | undefined;
  put(proposal: Proposal): void;
  /** Insertion order */
  list(status?: ProposalStatus): Proposal[];
}

export class InMemoryProposalStore implements ProposalStore {
  private readonly _proposals = new Map<string, Proposal>();

  get(id: string): Proposal | undefined {
    return this._proposals.get(id);
  }

  put(proposal: Proposal): void {
    this._proposals.set(proposal.id, proposal);
  }

  list(status?: ProposalStatus): Proposal[] {
    const all = [...this._proposals.values()];
    return status === undefined ? all : all.filter((p) => p.status === status);
  }
}
