/**
 * CoordinatorPeer: one peer's coordination engine, wired end to end:
 *
 *   transport → router → coordinator inbox → coordinator → ledger
 *
 * The facade owns the router and the three coordinators. Each coordinator
 * keeps its own stores and inbox.
 */

import type { Logger } from "pino";
import { ALL_CHANNELS, MessageRouter } from "@concord/router";
import type { DispatchOutcome, MessageCodec } from "@concord/router";
import type { LedgerClient, Transport } from "@concord/types";
import type { Clock } from "./clock.js";
import { IntentCoordinator } from "./intent-coordinator.js";
import type { IntentCoordinatorOptions } from "./intent-coordinator.js";
import { SessionSequencer } from "./session-sequencer.js";
import type { SessionSequencerOptions } from "./session-sequencer.js";
import { VotingCoordinator } from "./voting-coordinator.js";
import type { VotingCoordinatorOptions } from "./voting-coordinator.js";

type Shared = "transport" | "ledger" | "logger" | "codec" | "clock";

export interface CoordinatorPeerOptions {
  readonly transport: Transport;
  readonly ledger: LedgerClient;
  readonly logger: Logger;
  readonly codec?: MessageCodec;
  readonly clock?: Clock;
  readonly defaultCostLimit?: number;
  readonly ledgerTimeoutMs?: number;
  readonly confirmationTimeoutMs?: number;

  readonly intents?: Omit<IntentCoordinatorOptions, Shared>;
  readonly voting?: Omit<VotingCoordinatorOptions, Shared>;
  readonly sessions?: Omit<SessionSequencerOptions, Shared>;
}

export class CoordinatorPeer {
  readonly router: MessageRouter;
  readonly intents: IntentCoordinator;
  readonly voting: VotingCoordinator;
  readonly sessions: SessionSequencer;

  private readonly transport: Transport;
  private readonly logger: Logger;
  private started = false;

  constructor(options: CoordinatorPeerOptions) {
    this.transport = options.transport;
    this.logger = options.logger;

    const shared = {
      transport: options.transport,
      ledger: options.ledger,
      codec: options.codec,
      clock: options.clock,
      defaultCostLimit: options.defaultCostLimit,
      ledgerTimeoutMs: options.ledgerTimeoutMs,
      confirmationTimeoutMs: options.confirmationTimeoutMs,
    };

    this.router = new MessageRouter({
      logger: options.logger.child({ component: "router" }),
      codec: options.codec,
    });
    this.intents = new IntentCoordinator({
      ...shared,
      ...options.intents,
      logger: options.logger.child({ component: "intents" }),
    });
    this.voting = new VotingCoordinator({
      ...shared,
      ...options.voting,
      logger: options.logger.child({ component: "voting" }),
    });
    this.sessions = new SessionSequencer({
      ...shared,
      ...options.sessions,
      logger: options.logger.child({ component: "sessions" }),
    });
  }

  get peerId(): string {
    return this.transport.peerId;
  }

  /**
   * Register handlers and start listening on every protocol channel.
   * Calling twice is a no-op.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.intents.register(this.router);
    this.voting.register(this.router);
    this.sessions.register(this.router);

    for (const channel of ALL_CHANNELS) {
      this.transport.onMessage(channel, (_senderId, data) => this.receive(channel, data));
    }
    this.logger.info({ peerId: this.peerId, channels: ALL_CHANNELS }, "Coordinator peer started");
  }

  /** Feed raw bytes received on `channel` through the router. */
  receive(channel: string, data: Uint8Array): Promise<DispatchOutcome> {
    return this.router.dispatch(channel, data);
  }

  /** Wait until every coordinator inbox is empty. */
  async drain(): Promise<void> {
    await Promise.all([this.intents.drain(), this.voting.drain(), this.sessions.drain()]);
  }
}
