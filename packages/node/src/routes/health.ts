/**
 * Health check routes.
 *
 * GET    /health  Liveness check (always 200 if server is running)
 * GET    /ready   Readiness check (listening on every channel, reachable peers)
 */

import { Hono } from "hono";
import { ALL_CHANNELS } from "@concord/router";
import type { AppEnv } from "../types/api-contract.js";
import type { HttpPeerTransport } from "../transport/http-transport.js";

export function createHealthRoutes(transport: HttpPeerTransport): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const peer = c.get("peer");
    const ready = ALL_CHANNELS.every((channel) => transport.hasHandler(channel));

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        peerId: peer.peerId,
        connectedPeers: [...transport.connectedPeers()].sort(),
        knownPeers: transport.knownPeers().length,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
