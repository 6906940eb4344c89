/**
 * Request logging middleware.
 *
 * One structured entry per request. Server errors log at error, client
 * errors at warn. Peer traffic on /p2p logs at debug, tagged with the
 * sending peer.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { PEER_ID_HEADER } from "../transport/http-transport.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly fromPeer?: string;
}

export function requestLogger(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const fromPeer = c.req.header(PEER_ID_HEADER);
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(fromPeer !== undefined ? { fromPeer } : {}),
    };
    const msg = `${entry.method} ${entry.path} ${entry.status}`;

    if (entry.status >= 500) {
      logger.error(entry, msg);
    } else if (entry.status >= 400) {
      logger.warn(entry, msg);
    } else if (fromPeer !== undefined) {
      logger.debug(entry, msg);
    } else {
      logger.info(entry, msg);
    }
  };
}
