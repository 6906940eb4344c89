/**
 * Session routes.
 *
 * POST   /api/v1/sessions                  Create a session
 * GET    /api/v1/sessions                  List sessions (cursor pagination)
 * GET    /api/v1/sessions/:id              Get a single session
 * POST   /api/v1/sessions/:id/moves        Append a local move
 * POST   /api/v1/sessions/:id/end          End the session on this peer
 * GET    /api/v1/sessions/:id/checkpoints  Checkpoints taken so far
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { Session } from "@concord/types";
import type { AppEnv } from "../types/api-contract.js";
import { CreateSessionSchema, ListSessionsQuerySchema, MakeMoveSchema } from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { apiError } from "../types/error.js";
import { pageByCreation } from "../types/pagination.js";
import { sessionView } from "../types/views.js";

function notFound(c: Context, id: string): Response {
  return apiError(c, "NOT_FOUND", `Session '${id}' not found`);
}

function notActive(c: Context, session: Session): Response {
  return apiError(c, "CONFLICT", `Session '${session.id}' is ${session.status}`);
}

export function createSessionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateSessionSchema), async (c) => {
    const peer = c.get("peer");
    const body = c.get("validatedBody");

    const sessionId = await peer.sessions.createSession(body.type, body.initialState);
    const session = peer.sessions.getSession(sessionId);

    return c.json({ data: session === undefined ? undefined : sessionView(session) }, 201);
  });

  routes.get("/", (c) => {
    const queryResult = ListSessionsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return apiError(c, "VALIDATION_ERROR", "Invalid query parameters", {
        issues: formatZodErrors(queryResult.error),
      });
    }

    const query = queryResult.data;
    const page = pageByCreation(c.get("peer").sessions.listSessions(query.status), {
      cursor: query.cursor,
      limit: query.limit,
    });

    return c.json({ data: page.data.map(sessionView), pagination: page.pagination });
  });

  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const session = c.get("peer").sessions.getSession(id);

    if (session === undefined) {
      return notFound(c, id);
    }
    return c.json({ data: sessionView(session) });
  });

  routes.post("/:id/moves", validateBody(MakeMoveSchema), async (c) => {
    const peer = c.get("peer");
    const id = c.req.param("id");
    const body = c.get("validatedBody");

    const accepted = await peer.sessions.makeMove(id, body.payload);
    const session = peer.sessions.getSession(id);

    if (session === undefined) {
      return notFound(c, id);
    }
    if (!accepted) {
      return notActive(c, session);
    }
    return c.json({ data: sessionView(session) });
  });

  routes.post("/:id/end", async (c) => {
    const peer = c.get("peer");
    const id = c.req.param("id");

    const ended = await peer.sessions.endSession(id);
    const session = peer.sessions.getSession(id);

    if (session === undefined) {
      return notFound(c, id);
    }
    if (!ended) {
      return notActive(c, session);
    }
    return c.json({ data: sessionView(session) });
  });

  routes.get("/:id/checkpoints", (c) => {
    const peer = c.get("peer");
    const id = c.req.param("id");

    if (peer.sessions.getSession(id) === undefined) {
      return notFound(c, id);
    }
    return c.json({ data: peer.sessions.listCheckpoints(id) });
  });

  return routes;
}
