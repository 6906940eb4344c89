/**
 * Message Router
 *
 * Routes decoded envelopes to handlers keyed by (channel, kind).
 *
 * Design:
 * - Dispatch never throws. Malformed input, unknown kinds and handler
 *   failures are logged and reported as an outcome.
 * - A handler registered for kind K receives an Envelope<K> whose payload
 *   has already passed the K schema.
 * - One handler per (channel, kind); re-registering replaces it.
 */

import type { Logger } from "pino";
import type { Envelope, MessageKind, MessagePayloads } from "@concord/types";
import { JsonMessageCodec, type MessageCodec } from "./codec.js";
import { EnvelopeHeaderSchema, PAYLOAD_SCHEMAS, isMessageKind } from "./schemas.js";
import type { EnvelopeHeader } from "./schemas.js";

// =============================================================================
// Types
// =============================================================================

export type MessageHandler<K extends MessageKind> = (
  message: Envelope<K>,
) => unknown;

export type DispatchOutcome =
  | { readonly status: "dispatched"; readonly kind: MessageKind }
  | { readonly status: "rejected"; readonly reason: string }
  | { readonly status: "unhandled"; readonly kind: string }
  | { readonly status: "failed"; readonly kind: MessageKind; readonly error: string };

export interface MessageRouterOptions {
  readonly logger: Logger;
  /** Defaults to JsonMessageCodec */
  readonly codec?: MessageCodec;
}

type Route = (channel: string, header: EnvelopeHeader) => Promise<DispatchOutcome>;

// =============================================================================
// Router
// =============================================================================

export class MessageRouter {
  private readonly routes = new Map<string, Map<string, Route>>();
  private readonly codec: MessageCodec;
  private readonly logger: Logger;

  constructor(options: MessageRouterOptions) {
    this.codec = options.codec ?? new JsonMessageCodec();
    this.logger = options.logger;
  }

  registerHandler<K extends MessageKind>(
    channel: string,
    kind: K,
    handler: MessageHandler<K>,
  ): void {
    const schema = PAYLOAD_SCHEMAS[kind];

    const route: Route = async (ch, header) => {
      const parsed = schema.safeParse(header.payload);
      if (!parsed.success) {
        const reason = parsed.error.issues
          .map((i) => `${i.path.join(".") || "payload"}: ${i.message}`)
          .join("; ");
        this.logger.warn(
          { channel: ch, kind, senderId: header.senderId, reason },
          "Rejected message with invalid payload",
        );
        return { status: "rejected", reason };
      }

      const message: Envelope<K> = {
        kind,
        senderId: header.senderId,
        timestamp: header.timestamp,
        payload: parsed.data,
      };

      try {
        await handler(message);
        return { status: "dispatched", kind };
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        this.logger.error(
          { channel: ch, kind, senderId: header.senderId, err },
          "Message handler failed",
        );
        return { status: "failed", kind, error };
      }
    };

    let byKind = this.routes.get(channel);
    if (byKind === undefined) {
      byKind = new Map();
      this.routes.set(channel, byKind);
    }
    byKind.set(kind, route);
  }

  hasHandler(channel: string, kind: string): boolean {
    return this.routes.get(channel)?.has(kind) ?? false;
  }

  /** Channels with at least one registered handler. */
  channels(): string[] {
    return [...this.routes.keys()];
  }

  /**
   * Decode, validate and dispatch raw bytes received on `channel`.
   */
  async dispatch(channel: string, data: Uint8Array): Promise<DispatchOutcome> {
    let decoded: unknown;
    try {
      decoded = this.codec.decode(data);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn({ channel, reason }, "Dropped undecodable message");
      return { status: "rejected", reason };
    }
    return this.dispatchDecoded(channel, decoded);
  }

  /**
   * Validate and dispatch an already-decoded message.
   */
  async dispatchDecoded(channel: string, decoded: unknown): Promise<DispatchOutcome> {
    const header = EnvelopeHeaderSchema.safeParse(decoded);
    if (!header.success) {
      const reason = header.error.issues
        .map((i) => `${i.path.join(".") || "envelope"}: ${i.message}`)
        .join("; ");
      this.logger.warn({ channel, reason }, "Dropped malformed envelope");
      return { status: "rejected", reason };
    }

    const { kind } = header.data;
    const route = this.routes.get(channel)?.get(kind);
    if (route === undefined) {
      this.logger.warn(
        { channel, kind, senderId: header.data.senderId, knownKind: isMessageKind(kind) },
        "No handler for message",
      );
      return { status: "unhandled", kind };
    }

    return route(channel, header.data);
  }

  /**
   * Build and encode an outbound envelope.
   */
  encode<K extends MessageKind>(
    kind: K,
    senderId: string,
    payload: MessagePayloads[K],
    timestamp: number,
  ): Uint8Array {
    return this.codec.encode(createEnvelope(kind, senderId, payload, timestamp));
  }
}

export function createEnvelope<K extends MessageKind>(
  kind: K,
  senderId: string,
  payload: MessagePayloads[K],
  timestamp: number,
): Envelope<K> {
  return { kind, senderId, timestamp: Math.floor(timestamp), payload };
}
