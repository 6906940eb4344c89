/**
 * Shared test fixtures: silent logger, manual clock, recording transport
 * and a mock ledger.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";
import { pino } from "pino";
import { EnvelopeHeaderSchema, createEnvelope } from "@concord/router";
import type {
  ConfirmationResult,
  Envelope,
  LedgerClient,
  MessageKind,
  MessagePayloads,
  Transport,
  TransportHandler,
  TxHandle,
} from "@concord/types";

export const silentLogger = pino({ level: "silent" });

export const START_MS = 1_700_000_000_000;
export const START_SECONDS = 1_700_000_000;

export class ManualClock {
  ms: number;

  constructor(ms = START_MS) {
    this.ms = ms;
  }

  readonly now = (): number => this.ms;

  advanceSeconds(seconds: number): void {
    this.ms += seconds * 1000;
  }
}

export interface SentMessage {
  readonly channel: string;
  readonly kind: string;
  readonly senderId: string;
  readonly timestamp: number;
  readonly payload: unknown;
}

/**
 * Transport that records what it broadcasts and reports a fixed peer set.
 */
export class RecordingTransport implements Transport {
  readonly peerId: string;
  readonly sent: SentMessage[] = [];
  peers: Set<string>;
  failBroadcast = false;
  private readonly handlers = new Map<string, TransportHandler>();

  constructor(peerId: string, peers: readonly string[] = []) {
    this.peerId = peerId;
    this.peers = new Set(peers);
  }

  async broadcast(channel: string, data: Uint8Array): Promise<number> {
    if (this.failBroadcast) {
      throw new Error("network down");
    }
    this.record(channel, data);
    return this.peers.size;
  }

  async sendTo(peerId: string, channel: string, data: Uint8Array): Promise<boolean> {
    this.record(channel, data);
    return this.peers.has(peerId);
  }

  onMessage(channel: string, handler: TransportHandler): void {
    this.handlers.set(channel, handler);
  }

  connectedPeers(): ReadonlySet<string> {
    return this.peers;
  }

  sentOfKind(kind: MessageKind): SentMessage[] {
    return this.sent.filter((m) => m.kind === kind);
  }

  private record(channel: string, data: Uint8Array): void {
    const { kind, senderId, timestamp, payload } = EnvelopeHeaderSchema.parse(
      JSON.parse(new TextDecoder().decode(data)),
    );
    this.sent.push({
      channel,
      kind,
      senderId,
      timestamp,
      payload,
    });
  }
}

type EstimateFn = (target: string, payload: string) => Promise<number>;
type SubmitFn = (target: string, value: string, payload: string, costLimit: number) => Promise<TxHandle>;
type ConfirmFn = (tx: TxHandle, timeoutMs: number) => Promise<ConfirmationResult>;

export interface MockLedger extends LedgerClient {
  readonly estimateCost: Mock<EstimateFn>;
  readonly submit: Mock<SubmitFn>;
  readonly awaitConfirmation: Mock<ConfirmFn>;
}

export function createMockLedger(): MockLedger {
  return {
    estimateCost: vi.fn<EstimateFn>().mockResolvedValue(50_000),
    submit: vi.fn<SubmitFn>().mockResolvedValue({ hash: "0xfeed" }),
    awaitConfirmation: vi
      .fn<ConfirmFn>()
      .mockResolvedValue({ succeeded: true, details: "confirmed in block 7", blockNumber: 7 }),
  };
}

export function envelope<K extends MessageKind>(
  kind: K,
  senderId: string,
  payload: MessagePayloads[K],
  timestamp = START_SECONDS,
): Envelope<K> {
  return createEnvelope(kind, senderId, payload, timestamp);
}
