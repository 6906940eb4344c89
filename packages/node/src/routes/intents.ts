/**
 * Intent and coordination round routes.
 *
 * POST   /api/v1/intents              Declare an intent and share it with peers
 * GET    /api/v1/intents              List intents (cursor pagination)
 * GET    /api/v1/intents/:id          Get a single intent
 * POST   /api/v1/intents/:id/execute  Execute an uncontested pending intent
 * GET    /api/v1/rounds               List coordination rounds
 * GET    /api/v1/rounds/:id           Get a single round
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateIntentSchema, ListIntentsQuerySchema } from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { apiError } from "../types/error.js";
import { pageByCreation } from "../types/pagination.js";
import { roundView } from "../types/views.js";

export function createIntentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/intents (declare)
  routes.post("/intents", validateBody(CreateIntentSchema), async (c) => {
    const peer = c.get("peer");
    const body = c.get("validatedBody");

    const intentId = await peer.intents.createIntent(body.resourceKey, body.action, body.priority);

    return c.json({ data: peer.intents.getIntent(intentId) }, 201);
  });

  // GET /api/v1/intents (list)
  routes.get("/intents", (c) => {
    const queryResult = ListIntentsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return apiError(c, "VALIDATION_ERROR", "Invalid query parameters", {
        issues: formatZodErrors(queryResult.error),
      });
    }

    const query = queryResult.data;
    const intents = c.get("peer").intents.listIntents(query.status);

    return c.json(pageByCreation(intents, { cursor: query.cursor, limit: query.limit }));
  });

  // GET /api/v1/intents/:id
  routes.get("/intents/:id", (c) => {
    const id = c.req.param("id");
    const intent = c.get("peer").intents.getIntent(id);

    if (intent === undefined) {
      return apiError(c, "NOT_FOUND", `Intent '${id}' not found`);
    }
    return c.json({ data: intent });
  });

  // POST /api/v1/intents/:id/execute
  // Only an uncontested pending intent; rounds decide the rest.
  routes.post("/intents/:id/execute", async (c) => {
    const id = c.req.param("id");
    const intents = c.get("peer").intents;
    const current = intents.getIntent(id);

    if (current === undefined) {
      return apiError(c, "NOT_FOUND", `Intent '${id}' not found`);
    }
    if (current.status !== "pending") {
      return apiError(c, "CONFLICT", `Intent '${id}' is ${current.status}`, {
        status: current.status,
      });
    }
    if (intents.isContested(id)) {
      return apiError(
        c,
        "CONFLICT",
        `Intent '${id}' competes for ${current.resourceKey}; a coordination round decides it`,
        { status: current.status },
      );
    }

    const intent = await intents.executeIntent(id);
    if (intent === undefined) {
      return apiError(c, "NOT_FOUND", `Intent '${id}' not found`);
    }
    return c.json({ data: intent });
  });

  // GET /api/v1/rounds
  routes.get("/rounds", (c) => {
    const rounds = c.get("peer").intents.listRounds();
    return c.json({ data: rounds.map(roundView) });
  });

  // GET /api/v1/rounds/:id
  routes.get("/rounds/:id", (c) => {
    const id = c.req.param("id");
    const round = c.get("peer").intents.getRound(id);

    if (round === undefined) {
      return apiError(c, "NOT_FOUND", `Round '${id}' not found`);
    }
    return c.json({ data: roundView(round) });
  });

  return routes;
}
