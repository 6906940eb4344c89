/**
 * The three demo scenarios, run on a three-peer loopback cluster with one
 * simulated ledger per peer.
 *
 * Each scenario returns what it observed so the CLI can print it and the
 * tests can check it.
 */

import type { Logger } from "pino";
import { CoordinatorPeer, LoopbackNetwork, computeStateDigest } from "@concord/coordinator";
import type { Clock } from "@concord/coordinator";
import { SimulatedLedgerClient } from "@concord/ledger-client";
import type { Checkpoint, IntentStatus, JsonObject, ProposalStatus, TallyResult } from "@concord/types";

export const PEER_IDS = ["alice", "bob", "carol"] as const;
export type PeerName = (typeof PEER_IDS)[number];

export const NFT_CONTRACT = "0x00000000000000000000000000000000000000aa";
export const GOVERNOR = "0x00000000000000000000000000000000000000b0";
export const CHECKPOINT_REGISTRY = "0x00000000000000000000000000000000000000c0";

export interface Cluster {
  readonly network: LoopbackNetwork;
  readonly peers: Readonly<Record<PeerName, CoordinatorPeer>>;
  readonly ledgers: Readonly<Record<PeerName, SimulatedLedgerClient>>;
}

export interface ClusterOptions {
  readonly logger: Logger;
  readonly clock?: Clock;
}

export function createCluster(options: ClusterOptions): Cluster {
  const network = new LoopbackNetwork();
  const peers: Partial<Record<PeerName, CoordinatorPeer>> = {};
  const ledgers: Partial<Record<PeerName, SimulatedLedgerClient>> = {};

  for (const name of PEER_IDS) {
    const ledger = new SimulatedLedgerClient();
    const peer = new CoordinatorPeer({
      transport: network.join(name),
      ledger,
      logger: options.logger.child({ peer: name }),
      ...(options.clock !== undefined ? { clock: options.clock } : {}),
      voting: { governanceTarget: GOVERNOR },
      sessions: { checkpointTarget: CHECKPOINT_REGISTRY },
    });
    peer.start();
    peers[name] = peer;
    ledgers[name] = ledger;
  }

  return { network, peers: complete(peers), ledgers: complete(ledgers) };
}

function complete<T>(partial: Partial<Record<PeerName, T>>): Record<PeerName, T> {
  const { alice, bob, carol } = partial;
  if (alice === undefined || bob === undefined || carol === undefined) {
    throw new Error("cluster is missing a peer");
  }
  return { alice, bob, carol };
}

// =============================================================================
// 1. Competing NFT mints
// =============================================================================

export interface MintOutcome {
  readonly winnerId: string;
  readonly loserId: string;
  /** Status of the winning intent as each peer sees it */
  readonly winnerStatus: Readonly<Record<PeerName, IntentStatus | undefined>>;
  readonly txHash: string | undefined;
  /** Transactions each peer's ledger received */
  readonly submissions: Readonly<Record<PeerName, number>>;
}

/**
 * Alice (priority 5) and Bob (priority 3) both want to mint the same token.
 */
export async function runMintConflict(cluster: Cluster): Promise<MintOutcome> {
  const { peers, ledgers, network } = cluster;
  const action = { description: "mint(42)", callData: "0xa0712d68", value: "0" };

  const winnerId = await peers.alice.intents.createIntent(NFT_CONTRACT, action, 5);
  const loserId = await peers.bob.intents.createIntent(NFT_CONTRACT, action, 3);
  await network.settle();
  await Promise.all(PEER_IDS.map((name) => peers[name].drain()));

  return {
    winnerId,
    loserId,
    winnerStatus: {
      alice: peers.alice.intents.getIntent(winnerId)?.status,
      bob: peers.bob.intents.getIntent(winnerId)?.status,
      carol: peers.carol.intents.getIntent(winnerId)?.status,
    },
    txHash: peers.alice.intents.getIntent(winnerId)?.txHash,
    submissions: {
      alice: ledgers.alice.transactions().length,
      bob: ledgers.bob.transactions().length,
      carol: ledgers.carol.transactions().length,
    },
  };
}

// =============================================================================
// 2. DAO vote
// =============================================================================

export interface VoteOutcome {
  readonly proposalId: string;
  readonly status: Readonly<Record<PeerName, ProposalStatus | undefined>>;
  readonly result: TallyResult | undefined;
  readonly onchainStatus: string | undefined;
}

export const GRANT_PROPOSAL: JsonObject = {
  title: "Fund the community grants round",
  callData: "0x",
  value: "0",
};

/**
 * Alice proposes; Alice (10) and Bob (5) vote yes, Carol (8) votes no.
 */
export async function runDaoVote(cluster: Cluster): Promise<VoteOutcome> {
  const { peers, network } = cluster;

  const proposalId = await peers.alice.voting.createProposal(GRANT_PROPOSAL, 300);
  await network.settle();

  await peers.alice.voting.submitVote(proposalId, true, 10);
  await peers.bob.voting.submitVote(proposalId, true, 5);
  await peers.carol.voting.submitVote(proposalId, false, 8);
  await network.settle();
  await Promise.all(PEER_IDS.map((name) => peers[name].drain()));

  const proposal = peers.alice.voting.getProposal(proposalId);
  return {
    proposalId,
    status: {
      alice: proposal?.status,
      bob: peers.bob.voting.getProposal(proposalId)?.status,
      carol: peers.carol.voting.getProposal(proposalId)?.status,
    },
    result: proposal?.result,
    onchainStatus: proposal?.onchainStatus,
  };
}

// =============================================================================
// 3. Turn-based session
// =============================================================================

export interface SessionOutcome {
  readonly sessionId: string;
  readonly moves: number;
  /** State digest on each peer after the last move */
  readonly digests: Readonly<Record<PeerName, string | undefined>>;
  readonly checkpoints: readonly Checkpoint[];
  /** Checkpoint anchors on Alice's ledger */
  readonly anchored: number;
}

/**
 * Alice and Bob alternate `turns` moves; every peer replicates the log.
 */
export async function runSession(cluster: Cluster, turns = 12): Promise<SessionOutcome> {
  const { peers, ledgers, network } = cluster;

  const sessionId = await peers.alice.sessions.createSession("turn_based", { game: "tic-tac-toe" });
  await network.settle();

  for (let turn = 0; turn < turns; turn++) {
    const mover = turn % 2 === 0 ? peers.alice : peers.bob;
    await mover.sessions.makeMove(sessionId, { turn, cell: turn % 9 });
    await network.settle();
  }
  await Promise.all(PEER_IDS.map((name) => peers[name].drain()));

  const digestOf = (name: PeerName): string | undefined => {
    const session = peers[name].sessions.getSession(sessionId);
    return session === undefined ? undefined : computeStateDigest(session.state);
  };

  return {
    sessionId,
    moves: peers.alice.sessions.getSession(sessionId)?.moves.length ?? 0,
    digests: { alice: digestOf("alice"), bob: digestOf("bob"), carol: digestOf("carol") },
    checkpoints: peers.alice.sessions.listCheckpoints(sessionId),
    anchored: ledgers.alice
      .transactions()
      .filter((tx) => tx.target === CHECKPOINT_REGISTRY).length,
  };
}
