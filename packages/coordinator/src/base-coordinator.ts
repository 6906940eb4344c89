/**
 * Shared plumbing for the three coordinators: identity, clock, serial
 * inbox, outbound encoding and bounded ledger calls.
 */

import type { Logger } from "pino";
import type { LedgerClient, MessageKind, MessagePayloads, Transport } from "@concord/types";
import { JsonMessageCodec, createEnvelope } from "@concord/router";
import type { MessageCodec } from "@concord/router";
import { epochSeconds, systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { SerialInbox } from "./inbox.js";
import { withTimeout } from "./timeout.js";

export const DEFAULT_COST_LIMIT = 300_000;
export const DEFAULT_LEDGER_TIMEOUT_MS = 30_000;
export const DEFAULT_CONFIRMATION_TIMEOUT_MS = 60_000;

export interface CoordinatorOptions {
  readonly transport: Transport;
  readonly ledger: LedgerClient;
  readonly logger: Logger;
  readonly codec?: MessageCodec;
  readonly clock?: Clock;

  /** Gas limit used when estimation fails (default 300 000) */
  readonly defaultCostLimit?: number;

  /** Bound on estimate and submit calls (default 30 s) */
  readonly ledgerTimeoutMs?: number;

  /** Bound on waiting for a receipt (default 60 s) */
  readonly confirmationTimeoutMs?: number;
}

export abstract class BaseCoordinator {
  protected readonly transport: Transport;
  protected readonly ledger: LedgerClient;
  protected readonly logger: Logger;
  protected readonly codec: MessageCodec;
  protected readonly clock: Clock;
  protected readonly inbox = new SerialInbox();
  protected readonly defaultCostLimit: number;
  protected readonly ledgerTimeoutMs: number;
  protected readonly confirmationTimeoutMs: number;

  protected constructor(options: CoordinatorOptions) {
    this.transport = options.transport;
    this.ledger = options.ledger;
    this.logger = options.logger;
    this.codec = options.codec ?? new JsonMessageCodec();
    this.clock = options.clock ?? systemClock;
    this.defaultCostLimit = options.defaultCostLimit ?? DEFAULT_COST_LIMIT;
    this.ledgerTimeoutMs = options.ledgerTimeoutMs ?? DEFAULT_LEDGER_TIMEOUT_MS;
    this.confirmationTimeoutMs =
      options.confirmationTimeoutMs ?? DEFAULT_CONFIRMATION_TIMEOUT_MS;
  }

  get peerId(): string {
    return this.transport.peerId;
  }

  /** Wait until every queued operation and message has been processed. */
  drain(): Promise<void> {
    return this.inbox.drain();
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  protected now(): number {
    return epochSeconds(this.clock);
  }

  /** Connected peers plus ourselves. */
  protected totalKnownPeers(): number {
    return this.transport.connectedPeers().size + 1;
  }

  /**
   * Encode and broadcast. Failures are logged and reported as 0 deliveries.
   */
  protected async broadcast<K extends MessageKind>(
    channel: string,
    kind: K,
    payload: MessagePayloads[K],
  ): Promise<number> {
    try {
      const data = this.codec.encode(createEnvelope(kind, this.peerId, payload, this.now()));
      const delivered = await this.transport.broadcast(channel, data);
      this.logger.debug({ channel, kind, delivered }, "Broadcast sent");
      return delivered;
    } catch (err) {
      this.logger.warn({ channel, kind, err }, "Broadcast failed");
      return 0;
    }
  }

  /**
   * Estimate cost, falling back to the default limit on failure or timeout.
   */
  protected async estimateCost(target: string, callData: string): Promise<number> {
    try {
      return await withTimeout(
        this.ledger.estimateCost(target, callData),
        this.ledgerTimeoutMs,
        "Cost estimation",
      );
    } catch (err) {
      this.logger.warn(
        { target, err, fallback: this.defaultCostLimit },
        "Cost estimation failed, using default limit",
      );
      return this.defaultCostLimit;
    }
  }

  /**
   * Submit and wait for the receipt, both bounded. Throws on submission
   * failure; a failed confirmation resolves with `succeeded: false`.
   */
  protected async submitAndConfirm(
    target: string,
    value: string,
    callData: string,
    costLimit: number,
    onSubmitted: (txHash: string) => void,
  ): Promise<{ readonly succeeded: boolean; readonly details: string; readonly txHash: string }> {
    const tx = await withTimeout(
      this.ledger.submit(target, value, callData, costLimit),
      this.ledgerTimeoutMs,
      "Ledger submission",
    );
    onSubmitted(tx.hash);

    try {
      const receipt = await withTimeout(
        this.ledger.awaitConfirmation(tx, this.confirmationTimeoutMs),
        this.confirmationTimeoutMs,
        "Ledger confirmation",
      );
      return { succeeded: receipt.succeeded, details: receipt.details, txHash: tx.hash };
    } catch (err) {
      const details = err instanceof Error ? err.message : String(err);
      return { succeeded: false, details, txHash: tx.hash };
    }
  }
}
