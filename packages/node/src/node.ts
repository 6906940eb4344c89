/**
 * Node assembly: config → ledger, transport, peer and HTTP app.
 *
 * Builds everything main.ts serves, without opening a socket.
 */

import type { Logger } from "pino";
import {
  CoordinatorPeer,
  FileCheckpointStore,
  InMemoryCheckpointStore,
} from "@concord/coordinator";
import { OpStackLedgerClient, SimulatedLedgerClient } from "@concord/ledger-client";
import type { LedgerClient } from "@concord/types";
import type { AppConfig } from "./config.js";
import { parsePeers } from "./config.js";
import { createApp } from "./app.js";
import type { AppInstance } from "./app.js";
import { HttpPeerTransport } from "./transport/http-transport.js";
import type { FetchFn } from "./transport/http-transport.js";

export interface NodeComponents extends AppInstance {
  readonly ledger: LedgerClient;
  /** Release ledger connections. */
  readonly close: () => void;
}

/**
 * The OP-stack client when an RPC URL is configured, the in-process
 * simulator otherwise.
 */
export function createLedgerClient(
  config: AppConfig,
  logger: Logger,
): { ledger: LedgerClient; close: () => void } {
  if (config.LEDGER_RPC_URL === undefined) {
    logger.warn("LEDGER_RPC_URL not set; using the simulated ledger");
    return { ledger: new SimulatedLedgerClient(), close: () => undefined };
  }

  const client = new OpStackLedgerClient({
    rpcUrl: config.LEDGER_RPC_URL,
    chainId: config.LEDGER_CHAIN_ID,
    privateKey: config.LEDGER_PRIVATE_KEY,
    maxGasPriceWei: config.MAX_GAS_PRICE_WEI,
    rpcTimeoutMs: config.LEDGER_TIMEOUT_MS,
  });
  client.connect();
  logger.info(
    { chainId: client.chainId, sender: client.address ?? null },
    "Ledger client connected",
  );
  if (client.address === undefined) {
    logger.warn("LEDGER_PRIVATE_KEY not set; ledger submissions will fail");
  }
  return { ledger: client, close: () => client.disconnect() };
}

export function buildNode(
  config: AppConfig,
  logger: Logger,
  fetchFn?: FetchFn,
): NodeComponents {
  const peers = parsePeers(config.PEERS);
  const { ledger, close } = createLedgerClient(config, logger);

  const transport = new HttpPeerTransport({
    peerId: config.PEER_ID,
    peers,
    logger: logger.child({ component: "transport" }),
    requestTimeoutMs: config.PEER_REQUEST_TIMEOUT_MS,
    ...(fetchFn !== undefined ? { fetchFn } : {}),
  });

  const peer = new CoordinatorPeer({
    transport,
    ledger,
    logger,
    defaultCostLimit: config.DEFAULT_GAS_LIMIT,
    ledgerTimeoutMs: config.LEDGER_TIMEOUT_MS,
    confirmationTimeoutMs: config.CONFIRMATION_TIMEOUT_MS,
    voting: {
      governanceTarget: config.GOVERNANCE_TARGET,
      defaultVotingDurationSeconds: config.DEFAULT_VOTING_DURATION_SECONDS,
    },
    sessions: {
      checkpointStore:
        config.CHECKPOINT_DIR !== undefined
          ? new FileCheckpointStore(config.CHECKPOINT_DIR)
          : new InMemoryCheckpointStore(),
      checkpointMoveInterval: config.CHECKPOINT_MOVE_INTERVAL,
      checkpointIntervalSeconds: config.CHECKPOINT_INTERVAL_SECONDS,
      checkpointTarget: config.CHECKPOINT_TARGET,
    },
  });
  peer.start();

  const instance = createApp({
    peer,
    transport,
    logger: logger.child({ component: "http" }),
  });

  return { ...instance, ledger, close };
}
