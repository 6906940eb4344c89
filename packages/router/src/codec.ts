/**
 * Wire codec: bytes ↔ structured message.
 *
 * The codec only deals with the byte layer. Shape validation happens in
 * the router against the zod schemas.
 */

import type { Envelope } from "@concord/types";

export type RouterErrorCode = "DECODE_FAILED" | "ENCODE_FAILED";

export class RouterError extends Error {
  public readonly code: RouterErrorCode;

  constructor(code: RouterErrorCode, message: string) {
    super(message);
    this.name = "RouterError";
    this.code = code;
  }
}

export interface MessageCodec {
  encode(message: Envelope): Uint8Array;

  /** @throws RouterError when the bytes are not a message at all */
  decode(data: Uint8Array): unknown;
}

/**
 * UTF-8 JSON codec.
 */
export class JsonMessageCodec implements MessageCodec {
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  encode(message: Envelope): Uint8Array {
    try {
      return this.encoder.encode(JSON.stringify(message));
    } catch (err) {
      throw new RouterError(
        "ENCODE_FAILED",
        `Cannot encode ${message.kind} message: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  decode(data: Uint8Array): unknown {
    let text: string;
    try {
      text = this.decoder.decode(data);
    } catch {
      throw new RouterError("DECODE_FAILED", "Message is not valid UTF-8");
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new RouterError("DECODE_FAILED", "Message is not valid JSON");
    }
  }
}
