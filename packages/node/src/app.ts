/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one peer.
 * Separated from main.ts so tests build the app without an HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { CoordinatorPeer } from "@concord/coordinator";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestContext } from "./middleware/request-context.js";
import { requestLogger } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createP2pRoutes } from "./routes/p2p.js";
import { createIntentRoutes } from "./routes/intents.js";
import { createProposalRoutes } from "./routes/proposals.js";
import { createSessionRoutes } from "./routes/sessions.js";
import type { HttpPeerTransport } from "./transport/http-transport.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly peer: CoordinatorPeer;
  readonly transport: HttpPeerTransport;
  readonly logger: Logger;
  /** Log one entry per request (default true) */
  readonly logRequests?: boolean;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly peer: CoordinatorPeer;
  readonly transport: HttpPeerTransport;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const { peer, transport } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestContext(peer));

  if (options.logRequests ?? true) {
    app.use("*", requestLogger(options.logger));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(transport));
  app.route("/p2p", createP2pRoutes(transport));
  app.route("/api/v1", createIntentRoutes());
  app.route("/api/v1/proposals", createProposalRoutes());
  app.route("/api/v1/sessions", createSessionRoutes());

  return { app, peer, transport };
}
