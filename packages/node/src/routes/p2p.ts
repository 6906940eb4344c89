/**
 * Inbound peer transport endpoint.
 *
 * POST /p2p/:channel takes the raw encoded message, sender in X-Peer-Id.
 *
 * Replies 202 as soon as the message is handed to the transport; the
 * router reports decode failures and unknown kinds through the log.
 */

import { Hono } from "hono";
import { isKnownChannel } from "@concord/router";
import type { AppEnv } from "../types/api-contract.js";
import { apiError } from "../types/error.js";
import { PEER_ID_HEADER } from "../transport/http-transport.js";
import type { HttpPeerTransport } from "../transport/http-transport.js";

export function createP2pRoutes(transport: HttpPeerTransport): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:channel", async (c) => {
    const channel = c.req.param("channel");
    if (!isKnownChannel(channel)) {
      return apiError(c, "UNKNOWN_CHANNEL", `Unknown channel '${channel}'`);
    }

    const senderId = c.req.header(PEER_ID_HEADER);
    if (senderId === undefined || senderId === "") {
      return apiError(c, "VALIDATION_ERROR", `Missing ${PEER_ID_HEADER} header`);
    }

    const data = new Uint8Array(await c.req.arrayBuffer());
    if (!transport.deliver(senderId, channel, data)) {
      return apiError(c, "NOT_READY", "Peer is not listening yet");
    }

    return c.json({ accepted: true }, 202);
  });

  return routes;
}
