/**
 * Hono environment shared by every route.
 */

import type { CoordinatorPeer } from "@concord/coordinator";

export interface AppEnv {
  Variables: {
    /** Set by requestContext; echoed as X-Request-Id */
    requestId: string;
    peer: CoordinatorPeer;
  };
}
