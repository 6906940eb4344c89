/**
 * HTTP peer transport.
 *
 * Outbound: POST `<peerUrl>/p2p/<channel>` with the encoded message as the
 * body and the sender id in `X-Peer-Id`.
 *
 * Inbound: the p2p route hands bytes to `deliver()`, which starts the
 * channel handler and returns immediately. Handlers run behind each
 * coordinator's inbox, and a coordinator may itself be waiting on a
 * broadcast to the sender, so the HTTP reply must not wait for them.
 *
 * A peer counts as connected until a request to it fails, and again once
 * a request to it succeeds or a message from it arrives.
 */

import type { Logger } from "pino";
import type { Transport, TransportHandler } from "@concord/types";
import type { PeerEntry } from "../config.js";

export const PEER_ID_HEADER = "X-Peer-Id";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpPeerTransportOptions {
  readonly peerId: string;
  readonly peers: readonly PeerEntry[];
  readonly logger: Logger;
  /** Per-request timeout (default 5 s) */
  readonly requestTimeoutMs?: number;
  readonly fetchFn?: FetchFn;
}

export class HttpPeerTransport implements Transport {
  readonly peerId: string;
  private readonly peers = new Map<string, string>();
  private readonly unreachable = new Set<string>();
  private readonly handlers = new Map<string, TransportHandler>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpPeerTransportOptions) {
    this.peerId = options.peerId;
    this.logger = options.logger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
    this.fetchFn = options.fetchFn ?? fetch;
    for (const peer of options.peers) {
      if (peer.id !== this.peerId) {
        this.peers.set(peer.id, peer.url);
      }
    }
  }

  // ─── Transport ──────────────────────────────────────────────────────

  async broadcast(channel: string, data: Uint8Array): Promise<number> {
    const results = await Promise.all(
      [...this.peers.keys()].map((peerId) => this.sendTo(peerId, channel, data)),
    );
    return results.filter(Boolean).length;
  }

  async sendTo(peerId: string, channel: string, data: Uint8Array): Promise<boolean> {
    const url = this.peers.get(peerId);
    if (url === undefined) {
      return false;
    }

    try {
      const res = await this.fetchFn(`${url}/p2p/${encodeURIComponent(channel)}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          [PEER_ID_HEADER]: this.peerId,
        },
        body: data,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      if (!res.ok) {
        this.markUnreachable(peerId, `HTTP ${res.status}`);
        return false;
      }
      this.unreachable.delete(peerId);
      return true;
    } catch (err) {
      this.markUnreachable(peerId, err instanceof Error ? err.message : String(err));
      return false;
    }
  }

  onMessage(channel: string, handler: TransportHandler): void {
    this.handlers.set(channel, handler);
  }

  connectedPeers(): ReadonlySet<string> {
    const connected = new Set<string>();
    for (const peerId of this.peers.keys()) {
      if (!this.unreachable.has(peerId)) {
        connected.add(peerId);
      }
    }
    return connected;
  }

  /** Every configured peer other than this one, reachable or not. */
  knownPeers(): readonly string[] {
    return [...this.peers.keys()];
  }

  // ─── Inbound ────────────────────────────────────────────────────────

  hasHandler(channel: string): boolean {
    return this.handlers.has(channel);
  }

  /**
   * Start handling an inbound message.
   *
   * @returns false when nothing listens on `channel`
   */
  deliver(senderId: string, channel: string, data: Uint8Array): boolean {
    const handler = this.handlers.get(channel);
    if (handler === undefined) {
      return false;
    }
    if (this.peers.has(senderId)) {
      this.unreachable.delete(senderId);
    }

    const task = Promise.resolve()
      .then(() => handler(senderId, data))
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error({ err, senderId, channel }, "Inbound handler failed");
        },
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
    return true;
  }

  /** Wait for every inbound handler started so far, including ones started while waiting. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private markUnreachable(peerId: string, reason: string): void {
    if (!this.unreachable.has(peerId)) {
      this.logger.warn({ peerId, reason }, "Peer unreachable");
    }
    this.unreachable.add(peerId);
  }
}
