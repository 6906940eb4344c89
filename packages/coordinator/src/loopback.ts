/**
 * LoopbackNetwork: in-process transport for tests, demos and
 * single-process clusters.
 *
 * Delivery is asynchronous: `broadcast` returns once messages are queued,
 * and handlers run on a later microtask in send order. `settle()` waits
 * until no delivery is in flight, including deliveries triggered by
 * other deliveries.
 */

import type { Transport, TransportHandler } from "@concord/types";

export class LoopbackNetwork {
  private readonly transports = new Map<string, LoopbackTransport>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly severed = new Set<string>();
  private readonly _deliveryErrors: unknown[] = [];

  /** Attach a peer. Re-joining an id returns the existing transport. */
  join(peerId: string): LoopbackTransport {
    const existing = this.transports.get(peerId);
    if (existing !== undefined) {
      return existing;
    }
    const transport = new LoopbackTransport(peerId, this);
    this.transports.set(peerId, transport);
    return transport;
  }

  leave(peerId: string): void {
    this.transports.delete(peerId);
  }

  /** Cut the link between two peers in both directions. */
  disconnect(a: string, b: string): void {
    this.severed.add(linkKey(a, b));
  }

  reconnect(a: string, b: string): void {
    this.severed.delete(linkKey(a, b));
  }

  /** Peers reachable from `peerId`. */
  neighbours(peerId: string): Set<string> {
    const result = new Set<string>();
    for (const id of this.transports.keys()) {
      if (id !== peerId && !this.severed.has(linkKey(peerId, id))) {
        result.add(id);
      }
    }
    return result;
  }

  /** Errors thrown by handlers during delivery. */
  get deliveryErrors(): readonly unknown[] {
    return this._deliveryErrors;
  }

  /** @internal */
  deliver(from: string, to: string, channel: string, data: Uint8Array): boolean {
    const target = this.transports.get(to);
    if (target === undefined || from === to || this.severed.has(linkKey(from, to))) {
      return false;
    }
    const handler = target.handlerFor(channel);
    if (handler === undefined) {
      return true;
    }

    const copy = data.slice();
    const delivery = Promise.resolve()
      .then(() => handler(from, copy))
      .then(
        () => undefined,
        (err: unknown) => {
          this._deliveryErrors.push(err);
        },
      );
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
    return true;
  }

  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}

export class LoopbackTransport implements Transport {
  readonly peerId: string;
  private readonly network: LoopbackNetwork;
  private readonly handlers = new Map<string, TransportHandler>();

  constructor(peerId: string, network: LoopbackNetwork) {
    this.peerId = peerId;
    this.network = network;
  }

  async broadcast(channel: string, data: Uint8Array): Promise<number> {
    let delivered = 0;
    for (const peer of this.network.neighbours(this.peerId)) {
      if (this.network.deliver(this.peerId, peer, channel, data)) {
        delivered++;
      }
    }
    return delivered;
  }

  async sendTo(peerId: string, channel: string, data: Uint8Array): Promise<boolean> {
    return this.network.deliver(this.peerId, peerId, channel, data);
  }

  onMessage(channel: string, handler: TransportHandler): void {
    this.handlers.set(channel, handler);
  }

  connectedPeers(): ReadonlySet<string> {
    return this.network.neighbours(this.peerId);
  }

  /** @internal */
  handlerFor(channel: string): TransportHandler | undefined {
    return this.handlers.get(channel);
  }
}

function linkKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}
