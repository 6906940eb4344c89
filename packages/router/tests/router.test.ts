import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import type { Envelope } from "@concord/types";
import { MessageRouter } from "../src/router.js";
import { INTENT_CHANNEL, VOTE_CHANNEL } from "../src/channels.js";

const logger = pino({ level: "silent" });

function bytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

const intentEnvelope = {
  kind: "intent",
  senderId: "peer-b",
  timestamp: 1_700_000_000,
  payload: {
    intentId: "i-1",
    targetResource: "0x00000000000000000000000000000000000000aa",
    actionDescriptor: { description: "mint(42)", callData: "0xa0712d68", value: "0" },
    costEstimate: 21_000,
    priority: 5,
  },
};

describe("MessageRouter", () => {
  it("dispatches a valid message to the handler for its channel and kind", async () => {
    const router = new MessageRouter({ logger });
    const received: Envelope<"intent">[] = [];
    router.registerHandler(INTENT_CHANNEL, "intent", (msg) => {
      received.push(msg);
    });

    const outcome = await router.dispatch(INTENT_CHANNEL, bytes(intentEnvelope));

    expect(outcome).toEqual({ status: "dispatched", kind: "intent" });
    expect(received).toHaveLength(1);
    expect(received[0]?.payload.priority).toBe(5);
    expect(received[0]?.senderId).toBe("peer-b");
  });

  it("rejects bytes that are not JSON", async () => {
    const router = new MessageRouter({ logger });
    const handler = vi.fn();
    router.registerHandler(INTENT_CHANNEL, "intent", handler);

    const outcome = await router.dispatch(INTENT_CHANNEL, new TextEncoder().encode("garbage"));

    expect(outcome).toEqual({ status: "rejected", reason: "Message is not valid JSON" });
    expect(handler).not.toHaveBeenCalled();
  });

  it("rejects an envelope missing senderId", async () => {
    const router = new MessageRouter({ logger });
    const handler = vi.fn();
    router.registerHandler(INTENT_CHANNEL, "intent", handler);

    const { senderId: _omit, ...rest } = intentEnvelope;
    const outcome = await router.dispatch(INTENT_CHANNEL, bytes(rest));

    expect(outcome.status).toBe("rejected");
    expect(handler).not.toHaveBeenCalled();
  });

  it("rejects a non-integer timestamp", async () => {
    const router = new MessageRouter({ logger });
    router.registerHandler(INTENT_CHANNEL, "intent", vi.fn());

    const outcome = await router.dispatch(
      INTENT_CHANNEL,
      bytes({ ...intentEnvelope, timestamp: "yesterday" }),
    );

    expect(outcome.status).toBe("rejected");
  });

  it("rejects a payload missing a required field for its kind", async () => {
    const router = new MessageRouter({ logger });
    const handler = vi.fn();
    router.registerHandler(INTENT_CHANNEL, "intent", handler);

    const { priority: _omit, ...payload } = intentEnvelope.payload;
    const outcome = await router.dispatch(INTENT_CHANNEL, bytes({ ...intentEnvelope, payload }));

    expect(outcome.status).toBe("rejected");
    if (outcome.status === "rejected") {
      expect(outcome.reason).toContain("priority");
    }
    expect(handler).not.toHaveBeenCalled();
  });

  it("rejects a coordination message naming fewer than two candidates", async () => {
    const router = new MessageRouter({ logger });
    const handler = vi.fn();
    router.registerHandler(INTENT_CHANNEL, "coordination", handler);

    const outcome = await router.dispatch(
      INTENT_CHANNEL,
      bytes({
        kind: "coordination",
        senderId: "peer-b",
        timestamp: 1_700_000_000,
        payload: {
          roundId: "round_1",
          proposedIntentId: "i-1",
          targetResource: "0x00000000000000000000000000000000000000aa",
          candidateIds: ["i-1"],
        },
      }),
    );

    expect(outcome.status).toBe("rejected");
    if (outcome.status === "rejected") {
      expect(outcome.reason).toContain("candidateIds");
    }
    expect(handler).not.toHaveBeenCalled();
  });

  it("rejects a coordination message proposing a non-candidate", async () => {
    const router = new MessageRouter({ logger });
    const handler = vi.fn();
    router.registerHandler(INTENT_CHANNEL, "coordination", handler);

    const outcome = await router.dispatch(
      INTENT_CHANNEL,
      bytes({
        kind: "coordination",
        senderId: "peer-b",
        timestamp: 1_700_000_000,
        payload: {
          roundId: "round_1",
          proposedIntentId: "i-9",
          targetResource: "0x00000000000000000000000000000000000000aa",
          candidateIds: ["i-1", "i-2"],
        },
      }),
    );

    expect(outcome).toEqual({
      status: "rejected",
      reason: "proposedIntentId: proposedIntentId must be one of candidateIds",
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it("reports unhandled when no handler is registered for the kind", async () => {
    const router = new MessageRouter({ logger });
    router.registerHandler(INTENT_CHANNEL, "intent", vi.fn());

    const outcome = await router.dispatch(
      INTENT_CHANNEL,
      bytes({ ...intentEnvelope, kind: "teleport" }),
    );

    expect(outcome).toEqual({ status: "unhandled", kind: "teleport" });
  });

  it("keys handlers by channel as well as kind", async () => {
    const router = new MessageRouter({ logger });
    const handler = vi.fn();
    router.registerHandler(INTENT_CHANNEL, "intent", handler);

    const outcome = await router.dispatch(VOTE_CHANNEL, bytes(intentEnvelope));

    expect(outcome).toEqual({ status: "unhandled", kind: "intent" });
    expect(handler).not.toHaveBeenCalled();
  });

  it("catches handler exceptions and reports them", async () => {
    const router = new MessageRouter({ logger });
    router.registerHandler(INTENT_CHANNEL, "intent", () => {
      throw new Error("boom");
    });

    const outcome = await router.dispatch(INTENT_CHANNEL, bytes(intentEnvelope));

    expect(outcome).toEqual({ status: "failed", kind: "intent", error: "boom" });
  });

  it("catches async handler rejections", async () => {
    const router = new MessageRouter({ logger });
    router.registerHandler(VOTE_CHANNEL, "vote", async () => {
      throw new Error("later");
    });

    const outcome = await router.dispatch(
      VOTE_CHANNEL,
      bytes({
        kind: "vote",
        senderId: "peer-c",
        timestamp: 1,
        payload: { proposalId: "p", decision: true, weight: 1 },
      }),
    );

    expect(outcome).toEqual({ status: "failed", kind: "vote", error: "later" });
  });

  it("replaces a handler registered twice for the same key", async () => {
    const router = new MessageRouter({ logger });
    const first = vi.fn();
    const second = vi.fn();
    router.registerHandler(INTENT_CHANNEL, "intent", first);
    router.registerHandler(INTENT_CHANNEL, "intent", second);

    await router.dispatch(INTENT_CHANNEL, bytes(intentEnvelope));

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("encodes outbound envelopes that it can dispatch", async () => {
    const router = new MessageRouter({ logger });
    const handler = vi.fn();
    router.registerHandler(VOTE_CHANNEL, "vote", handler);

    const data = router.encode("vote", "peer-a", { proposalId: "p1", decision: true, weight: 2 }, 10);
    const outcome = await router.dispatch(VOTE_CHANNEL, data);

    expect(outcome).toEqual({ status: "dispatched", kind: "vote" });
    expect(handler).toHaveBeenCalledWith({
      kind: "vote",
      senderId: "peer-a",
      timestamp: 10,
      payload: { proposalId: "p1", decision: true, weight: 2 },
    });
  });
});
