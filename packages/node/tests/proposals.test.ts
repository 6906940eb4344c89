/**
 * Tests for proposal and vote routes.
 */

import { describe, it, expect } from "vitest";
import { START_SECONDS, TWO_PEERS, createTestNode, createdId, jsonRequest } from "./setup.js";
import type { TestNode } from "./setup.js";

function propose(node: TestNode, body: unknown = { payload: { title: "raise quorum" }, votingDurationSeconds: 60 }) {
  return node.app.request(jsonRequest("/api/v1/proposals", "POST", body));
}

function vote(node: TestNode, id: string, body: unknown = { decision: true }) {
  return node.app.request(jsonRequest(`/api/v1/proposals/${id}/votes`, "POST", body));
}

describe("POST /api/v1/proposals", () => {
  it("creates an active proposal", async () => {
    const node = createTestNode({ peers: TWO_PEERS });
    const res = await propose(node);

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      data: {
        creator: "node-a",
        payload: { title: "raise quorum" },
        createdAt: START_SECONDS,
        votingEndsAt: START_SECONDS + 60,
        votes: {},
        status: "active",
      },
    });
  });

  it("uses the default voting duration", async () => {
    const node = createTestNode();
    const res = await propose(node, { payload: {} });

    expect(await res.json()).toMatchObject({ data: { votingEndsAt: START_SECONDS + 300 } });
  });

  it("rejects a non-object payload", async () => {
    const node = createTestNode();
    const res = await propose(node, { payload: [1, 2] });

    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/proposals/:id/votes", () => {
  it("records this peer's vote", async () => {
    const node = createTestNode({ peers: TWO_PEERS });
    const id = await createdId(await propose(node));

    const res = await vote(node, id);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        status: "active",
        votes: { "node-a": { decision: true, weight: 1, timestamp: START_SECONDS } },
      },
    });
  });

  it("replaces an earlier vote", async () => {
    const node = createTestNode({ peers: TWO_PEERS });
    const id = await createdId(await propose(node));

    await vote(node, id, { decision: true });
    const res = await vote(node, id, { decision: false, weight: 4 });

    expect(await res.json()).toMatchObject({
      data: { votes: { "node-a": { decision: false, weight: 4 } } },
    });
  });

  it("finalizes once every known peer has voted", async () => {
    const node = createTestNode();
    const id = await createdId(await propose(node));

    const res = await vote(node, id);

    expect(await res.json()).toMatchObject({
      data: {
        status: "passed",
        result: { passed: true, yesWeight: 1, noWeight: 0, totalWeight: 1, finalizedAt: START_SECONDS },
      },
    });
  });

  it("returns 409 after the deadline", async () => {
    const node = createTestNode({ peers: TWO_PEERS });
    const id = await createdId(await propose(node));
    node.clock.ms += 61_000;

    const res = await vote(node, id);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: "CONFLICT",
        message: `Proposal '${id}' is not accepting votes`,
        details: { status: "rejected" },
      },
    });
  });

  it("returns 404 for an unknown proposal", async () => {
    const node = createTestNode();
    const res = await vote(node, "nope");

    expect(res.status).toBe(404);
  });

  it("rejects a negative weight", async () => {
    const node = createTestNode();
    const id = await createdId(await propose(node));

    const res = await vote(node, id, { decision: true, weight: -1 });
    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/proposals", () => {
  it("lists proposals by status", async () => {
    const node = createTestNode({ peers: TWO_PEERS });
    const id = await createdId(await propose(node));

    const active = await node.app.request("/api/v1/proposals?status=active");
    expect(await active.json()).toMatchObject({
      data: [{ id }],
      pagination: { nextCursor: null, hasMore: false },
    });

    const passed = await node.app.request("/api/v1/proposals?status=passed");
    expect(await passed.json()).toMatchObject({ data: [] });
  });

  it("returns 404 for an unknown id", async () => {
    const node = createTestNode();
    const res = await node.app.request("/api/v1/proposals/nope");

    expect(res.status).toBe(404);
  });
});
