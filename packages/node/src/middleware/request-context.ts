/**
 * Request context middleware.
 *
 * Binds the served peer and a request id to every request. An incoming
 * X-Request-Id is kept; otherwise a UUID is generated. Both ids are echoed
 * on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { CoordinatorPeer } from "@concord/coordinator";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";
export const SERVED_BY_HEADER = "X-Served-By";

export function requestContext(peer: CoordinatorPeer): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) || randomUUID();
    c.set("requestId", requestId);
    c.set("peer", peer);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
    c.header(SERVED_BY_HEADER, peer.peerId);
  };
}
