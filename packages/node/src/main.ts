/**
 * @concord/node: Entry point.
 *
 * Loads config, starts the HTTP server and the vote deadline sweep,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { loadConfig } from "./config.js";
import { buildNode } from "./node.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  }).child({ peerId: config.PEER_ID });

  const node = buildNode(config, logger);

  const server = serve({
    fetch: node.app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, peers: node.transport.knownPeers() },
    "Concord node started",
  );

  const sweep = setInterval(() => {
    node.peer.voting
      .finalizeExpired()
      .then((finalized) => {
        if (finalized.length > 0) {
          logger.info({ finalized }, "Finalized expired proposals");
        }
      })
      .catch((err: unknown) => {
        logger.error({ err }, "Vote deadline sweep failed");
      });
  }, config.VOTE_SWEEP_INTERVAL_MS);

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    clearInterval(sweep);
    server.close();
    await node.transport.settle();
    await node.peer.drain();
    node.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
