/**
 * Proposal and vote routes.
 *
 * POST   /api/v1/proposals            Create a proposal
 * GET    /api/v1/proposals            List proposals (cursor pagination)
 * GET    /api/v1/proposals/:id        Get a single proposal
 * POST   /api/v1/proposals/:id/votes  Cast or replace this peer's vote
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CastVoteSchema, CreateProposalSchema, ListProposalsQuerySchema } from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { apiError } from "../types/error.js";
import { pageByCreation } from "../types/pagination.js";
import { proposalView } from "../types/views.js";

export function createProposalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateProposalSchema), async (c) => {
    const peer = c.get("peer");
    const body = c.get("validatedBody");

    const proposalId = await peer.voting.createProposal(body.payload, body.votingDurationSeconds);
    const proposal = peer.voting.getProposal(proposalId);

    return c.json({ data: proposal === undefined ? undefined : proposalView(proposal) }, 201);
  });

  routes.get("/", (c) => {
    const queryResult = ListProposalsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return apiError(c, "VALIDATION_ERROR", "Invalid query parameters", {
        issues: formatZodErrors(queryResult.error),
      });
    }

    const query = queryResult.data;
    const page = pageByCreation(c.get("peer").voting.listProposals(query.status), {
      cursor: query.cursor,
      limit: query.limit,
    });

    return c.json({ data: page.data.map(proposalView), pagination: page.pagination });
  });

  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const proposal = c.get("peer").voting.getProposal(id);

    if (proposal === undefined) {
      return apiError(c, "NOT_FOUND", `Proposal '${id}' not found`);
    }
    return c.json({ data: proposalView(proposal) });
  });

  routes.post("/:id/votes", validateBody(CastVoteSchema), async (c) => {
    const peer = c.get("peer");
    const id = c.req.param("id");
    const body = c.get("validatedBody");

    if (peer.voting.getProposal(id) === undefined) {
      return apiError(c, "NOT_FOUND", `Proposal '${id}' not found`);
    }

    const accepted = await peer.voting.submitVote(id, body.decision, body.weight);
    const proposal = peer.voting.getProposal(id);

    if (!accepted || proposal === undefined) {
      return apiError(c, "CONFLICT", `Proposal '${id}' is not accepting votes`, {
        status: proposal?.status,
      });
    }
    return c.json({ data: proposalView(proposal) });
  });

  return routes;
}
