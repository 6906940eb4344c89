/**
 * Transport Boundary
 *
 * The peer layer delivers opaque byte payloads on named channels.
 * Peer identities are plain strings; nothing here is authenticated.
 */

/**
 * Receives one inbound message. A returned promise is awaited by
 * transports that track delivery.
 */
export type TransportHandler = (senderId: string, data: Uint8Array) => unknown;

export interface Transport {
  /** This peer's identity */
  readonly peerId: string;

  /** Send to every connected peer. Resolves to the number of peers that accepted it. */
  broadcast(channel: string, data: Uint8Array): Promise<number>;

  /** Send to a single peer. Resolves to false when the peer is unknown or unreachable. */
  sendTo(peerId: string, channel: string, data: Uint8Array): Promise<boolean>;

  /** One handler per channel; a later registration replaces the earlier one. */
  onMessage(channel: string, handler: TransportHandler): void;

  connectedPeers(): ReadonlySet<string>;
}
