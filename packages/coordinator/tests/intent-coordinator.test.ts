import { describe, it, expect } from "vitest";
import { INTENT_CHANNEL } from "@concord/router";
import type { ConfirmationResult } from "@concord/types";
import { IntentCoordinator } from "../src/intent-coordinator.js";
import type { IntentCoordinatorOptions } from "../src/intent-coordinator.js";
import { deriveRoundId } from "../src/conflict.js";
import { CoordinationError } from "../src/errors.js";
import {
  ManualClock,
  RecordingTransport,
  START_SECONDS,
  createMockLedger,
  envelope,
  silentLogger,
} from "./helpers.js";

const NFT = "0x00000000000000000000000000000000000000aa";
const MINT = { description: "mint(42)", callData: "0xa0712d68", value: "0" };

function setup(peers: readonly string[] = [], overrides: Partial<IntentCoordinatorOptions> = {}) {
  const clock = new ManualClock();
  const transport = new RecordingTransport("peer-a", peers);
  const ledger = createMockLedger();
  const coordinator = new IntentCoordinator({
    transport,
    ledger,
    logger: silentLogger,
    clock: clock.now,
    ...overrides,
  });
  return { clock, transport, ledger, coordinator };
}

function remoteIntent(intentId: string, senderId: string, priority: number, timestamp: number) {
  return envelope(
    "intent",
    senderId,
    {
      intentId,
      targetResource: NFT,
      actionDescriptor: MINT,
      costEstimate: 21_000,
      priority,
    },
    timestamp,
  );
}

function coordination(
  senderId: string,
  roundId: string,
  proposedIntentId: string,
  candidateIds: readonly string[] = [proposedIntentId, "i-unseen"],
) {
  return envelope("coordination", senderId, {
    roundId,
    proposedIntentId,
    targetResource: NFT,
    candidateIds,
  });
}

describe("IntentCoordinator", () => {
  // ─── createIntent ───────────────────────────────────────────────────

  describe("createIntent", () => {
    it("stores a pending intent with the estimated cost", async () => {
      const { coordinator, ledger } = setup();

      const id = await coordinator.createIntent(NFT, MINT, 5);

      expect(coordinator.getIntent(id)).toEqual({
        id,
        originator: "peer-a",
        resourceKey: NFT,
        action: MINT,
        costEstimate: 50_000,
        priority: 5,
        createdAt: START_SECONDS,
        status: "pending",
      });
      expect(ledger.estimateCost).toHaveBeenCalledWith(NFT, "0xa0712d68");
    });

    it("broadcasts the intent on the intent channel", async () => {
      const { coordinator, transport } = setup(["peer-b"]);

      const id = await coordinator.createIntent(NFT, MINT, 5);

      expect(transport.sent).toEqual([
        {
          channel: INTENT_CHANNEL,
          kind: "intent",
          senderId: "peer-a",
          timestamp: START_SECONDS,
          payload: {
            intentId: id,
            targetResource: NFT,
            actionDescriptor: MINT,
            costEstimate: 50_000,
            priority: 5,
          },
        },
      ]);
    });

    it("falls back to the default cost limit when estimation fails", async () => {
      const { coordinator, ledger } = setup();
      ledger.estimateCost.mockRejectedValueOnce(new Error("rpc down"));

      const id = await coordinator.createIntent(NFT, MINT, 5);

      expect(coordinator.getIntent(id)?.costEstimate).toBe(300_000);
    });

    it("falls back when estimation times out", async () => {
      const { coordinator, ledger } = setup([], { ledgerTimeoutMs: 5, defaultCostLimit: 123_456 });
      ledger.estimateCost.mockReturnValueOnce(new Promise<number>(() => {}));

      const id = await coordinator.createIntent(NFT, MINT, 5);

      expect(coordinator.getIntent(id)?.costEstimate).toBe(123_456);
    });

    it("keeps the intent when the broadcast fails", async () => {
      const { coordinator, transport } = setup(["peer-b"]);
      transport.failBroadcast = true;

      const id = await coordinator.createIntent(NFT, MINT, 5);

      expect(coordinator.getIntent(id)?.status).toBe("pending");
    });

    it("rejects malformed requests", () => {
      const { coordinator } = setup();
      expect(() => coordinator.createIntent("", MINT, 5)).toThrow(CoordinationError);
      expect(() =>
        coordinator.createIntent(NFT, { ...MINT, callData: "mint" }, 5),
      ).toThrow(CoordinationError);
      expect(() => coordinator.createIntent(NFT, MINT, 1.5)).toThrow(
        "priority must be an integer, got 1.5",
      );
    });
  });

  // ─── onIntentReceived ───────────────────────────────────────────────

  describe("onIntentReceived", () => {
    it("records a single remote intent without opening a round", async () => {
      const { coordinator, transport } = setup(["peer-b"]);

      await coordinator.onIntentReceived(remoteIntent("i-1", "peer-b", 5, START_SECONDS - 3));

      expect(coordinator.listIntents()).toHaveLength(1);
      expect(coordinator.getIntent("i-1")).toMatchObject({
        originator: "peer-b",
        createdAt: START_SECONDS - 3,
        status: "pending",
      });
      expect(coordinator.listRounds()).toEqual([]);
      expect(transport.sent).toEqual([]);
    });

    it("does not overwrite a known intent", async () => {
      const { coordinator } = setup(["peer-b", "peer-c"]);

      await coordinator.onIntentReceived(remoteIntent("i-1", "peer-b", 5, START_SECONDS));
      await coordinator.onIntentReceived(remoteIntent("i-1", "peer-c", 9, START_SECONDS));

      expect(coordinator.getIntent("i-1")).toMatchObject({ originator: "peer-b", priority: 5 });
    });

    it("opens a round proposing the best-ranked candidate", async () => {
      const { coordinator, transport } = setup(["peer-b", "peer-c", "peer-d"]);

      await coordinator.onIntentReceived(remoteIntent("i-late", "peer-b", 5, START_SECONDS + 10));
      await coordinator.onIntentReceived(remoteIntent("i-early", "peer-c", 5, START_SECONDS + 5));

      const roundId = deriveRoundId(NFT, ["i-early", "i-late"]);
      const round = coordinator.getRound(roundId);
      expect(round).toMatchObject({
        resourceKey: NFT,
        candidates: ["i-early", "i-late"],
        proposedIntentId: "i-early",
        status: "voting",
        openedAt: START_SECONDS,
      });
      expect([...(round?.votes ?? new Map<string, boolean>())]).toEqual([["peer-a", true]]);
      expect(coordinator.getIntent("i-early")?.status).toBe("coordinating");
      expect(coordinator.getIntent("i-late")?.status).toBe("pending");

      expect(transport.sentOfKind("coordination")).toEqual([
        {
          channel: INTENT_CHANNEL,
          kind: "coordination",
          senderId: "peer-a",
          timestamp: START_SECONDS,
          payload: {
            roundId,
            proposedIntentId: "i-early",
            targetResource: NFT,
            candidateIds: ["i-early", "i-late"],
          },
        },
      ]);
    });
  });

  describe("conflict detection", () => {
    it("holds a newcomer while a round on its resource is voting", async () => {
      const { coordinator, transport } = setup(["peer-b", "peer-c", "peer-d"]);
      await coordinator.onIntentReceived(remoteIntent("i-late", "peer-b", 5, START_SECONDS + 10));
      await coordinator.onIntentReceived(remoteIntent("i-early", "peer-c", 5, START_SECONDS + 5));
      const roundId = deriveRoundId(NFT, ["i-early", "i-late"]);

      await coordinator.onIntentReceived(remoteIntent("i-third", "peer-d", 1, START_SECONDS));

      expect(coordinator.listRounds().map((r) => r.id)).toEqual([roundId]);
      expect(coordinator.getIntent("i-third")?.status).toBe("pending");
      expect(transport.sentOfKind("coordination")).toHaveLength(1);
    });

    it("does not reopen the candidates of an executed round", async () => {
      const { coordinator, transport } = setup(["peer-b", "peer-c", "peer-d"]);
      await coordinator.onIntentReceived(remoteIntent("i-late", "peer-b", 5, START_SECONDS + 10));
      await coordinator.onIntentReceived(remoteIntent("i-early", "peer-c", 5, START_SECONDS + 5));
      await coordinator.onIntentReceived(remoteIntent("i-third", "peer-d", 1, START_SECONDS));
      const roundId = deriveRoundId(NFT, ["i-early", "i-late"]);

      await coordinator.onCoordinationReceived(coordination("peer-b", roundId, "i-early"));
      await coordinator.onCoordinationReceived(coordination("peer-c", roundId, "i-early"));

      expect(coordinator.getRound(roundId)?.status).toBe("executed");
      expect(coordinator.listRounds()).toHaveLength(1);
      expect(coordinator.getIntent("i-late")?.status).toBe("pending");
      expect(coordinator.isContested("i-late")).toBe(true);
      expect(transport.sentOfKind("coordination")).toHaveLength(1);
    });

    it("opens a fresh round for newcomers once the held round is rejected", async () => {
      const { coordinator } = setup(["peer-b"], {
        approvalPolicy: (proposed) => proposed?.id !== "i-early",
      });
      await coordinator.onIntentReceived(remoteIntent("i-late", "peer-b", 5, START_SECONDS + 10));
      await coordinator.onIntentReceived(remoteIntent("i-early", "peer-c", 5, START_SECONDS + 5));
      await coordinator.onIntentReceived(remoteIntent("i-third", "peer-d", 1, START_SECONDS));
      const first = deriveRoundId(NFT, ["i-early", "i-late"]);

      await coordinator.onCoordinationReceived(coordination("peer-b", first, "i-early"));

      const second = deriveRoundId(NFT, ["i-early", "i-late", "i-third"]);
      expect(coordinator.getRound(first)?.status).toBe("rejected");
      expect(coordinator.getRound(second)).toMatchObject({
        candidates: ["i-early", "i-late", "i-third"],
        proposedIntentId: "i-early",
        status: "voting",
      });
    });
  });

  // ─── onCoordinationReceived ─────────────────────────────────────────

  describe("onCoordinationReceived", () => {
    it("waits for quorum, then marks a peer's winning intent executed_by_peer", async () => {
      const { coordinator, ledger } = setup(["peer-b", "peer-c", "peer-d"]);
      await coordinator.onIntentReceived(remoteIntent("i-late", "peer-b", 5, START_SECONDS + 10));
      await coordinator.onIntentReceived(remoteIntent("i-early", "peer-c", 5, START_SECONDS + 5));
      const roundId = deriveRoundId(NFT, ["i-early", "i-late"]);

      await coordinator.onCoordinationReceived(coordination("peer-b", roundId, "i-early"));
      expect(coordinator.getRound(roundId)?.status).toBe("voting");

      await coordinator.onCoordinationReceived(coordination("peer-c", roundId, "i-early"));
      expect(coordinator.getRound(roundId)?.status).toBe("executed");
      expect(coordinator.getIntent("i-early")?.status).toBe("executed_by_peer");
      expect(coordinator.getIntent("i-late")?.status).toBe("pending");
      expect(ledger.submit).not.toHaveBeenCalled();
    });

    it("joins an unknown round, echoes it once and counts the sender", async () => {
      const { coordinator, transport } = setup(["peer-b", "peer-c", "peer-d"]);
      await coordinator.onIntentReceived(remoteIntent("i-9", "peer-b", 5, START_SECONDS));

      await coordinator.onCoordinationReceived(
        envelope("coordination", "peer-b", {
          roundId: "round_x",
          proposedIntentId: "i-9",
          targetResource: NFT,
          candidateIds: ["i-9", "i-8"],
        }),
      );

      const round = coordinator.getRound("round_x");
      expect(round?.candidates).toEqual(["i-9", "i-8"]);
      expect(round?.votes.size).toBe(2);
      expect(coordinator.getIntent("i-9")?.status).toBe("coordinating");
      expect(transport.sentOfKind("coordination").map((m) => m.payload)).toEqual([
        {
          roundId: "round_x",
          proposedIntentId: "i-9",
          targetResource: NFT,
          candidateIds: ["i-9", "i-8"],
        },
      ]);

      await coordinator.onCoordinationReceived(coordination("peer-c", "round_x", "i-9"));

      expect(coordinator.getRound("round_x")?.status).toBe("executed");
      expect(coordinator.getIntent("i-9")?.status).toBe("executed_by_peer");
      expect(transport.sentOfKind("coordination")).toHaveLength(1);
    });

    it("executes a local winner immediately when this peer is alone", async () => {
      const { coordinator, ledger } = setup();
      const localId = await coordinator.createIntent(NFT, MINT, 5);

      await coordinator.onIntentReceived(remoteIntent("i-b", "peer-b", 3, START_SECONDS));

      expect(ledger.submit).toHaveBeenCalledWith(NFT, "0", "0xa0712d68", 50_000);
      expect(ledger.awaitConfirmation).toHaveBeenCalledWith({ hash: "0xfeed" }, 60_000);
      expect(coordinator.getIntent(localId)).toMatchObject({ status: "executed", txHash: "0xfeed" });
      expect(coordinator.getIntent("i-b")?.status).toBe("pending");
      expect(coordinator.listRounds().map((r) => r.status)).toEqual(["executed"]);
    });

    it("rejects the round when the local vote disapproves and returns the intent to pending", async () => {
      const { coordinator, transport } = setup([], { approvalPolicy: () => false });
      await coordinator.onIntentReceived(remoteIntent("i-1", "peer-b", 5, START_SECONDS));
      await coordinator.onIntentReceived(remoteIntent("i-2", "peer-c", 3, START_SECONDS));
      const roundId = deriveRoundId(NFT, ["i-1", "i-2"]);

      expect(coordinator.getRound(roundId)?.status).toBe("rejected");
      expect(coordinator.getIntent("i-1")?.status).toBe("pending");

      await coordinator.onCoordinationReceived(coordination("peer-b", roundId, "i-1"));

      const round = coordinator.getRound(roundId);
      expect(round?.status).toBe("rejected");
      expect([...(round?.votes ?? new Map<string, boolean>())]).toEqual([["peer-a", false]]);
      expect(transport.sentOfKind("coordination")).toHaveLength(1);
    });

    it("withholds approval from a round proposing an outranked intent", async () => {
      const { coordinator, transport } = setup(["peer-b", "peer-c", "peer-d"]);
      await coordinator.onIntentReceived(remoteIntent("i-1", "peer-b", 5, START_SECONDS));
      await coordinator.onIntentReceived(remoteIntent("i-2", "peer-c", 3, START_SECONDS));

      await coordinator.onCoordinationReceived(
        coordination("peer-c", "round_y", "i-2", ["i-2", "i-1"]),
      );

      const round = coordinator.getRound("round_y");
      expect([...(round?.votes ?? new Map<string, boolean>())]).toEqual([
        ["peer-c", true],
        ["peer-a", false],
      ]);
      expect(transport.sentOfKind("coordination").map((m) => m.payload)).toEqual([
        {
          roundId: deriveRoundId(NFT, ["i-1", "i-2"]),
          proposedIntentId: "i-1",
          targetResource: NFT,
          candidateIds: ["i-1", "i-2"],
        },
      ]);
    });

    it("rejects a round choosing another intent after the resource was settled", async () => {
      const { coordinator, ledger } = setup();
      const localId = await coordinator.createIntent(NFT, MINT, 5);
      await coordinator.onIntentReceived(remoteIntent("i-b", "peer-b", 3, START_SECONDS));

      await coordinator.onCoordinationReceived(
        coordination("peer-b", "round_z", "i-b", ["i-b", "i-c"]),
      );

      expect(coordinator.getRound("round_z")?.status).toBe("rejected");
      expect(coordinator.getIntent("i-b")?.status).toBe("pending");
      expect(coordinator.getIntent(localId)?.status).toBe("executed");
      expect(ledger.submit).toHaveBeenCalledTimes(1);
    });
  });

  // ─── executeIntent ──────────────────────────────────────────────────

  describe("executeIntent", () => {
    it("marks the intent failed when the transaction reverts", async () => {
      const { coordinator, ledger } = setup();
      ledger.awaitConfirmation.mockResolvedValueOnce({ succeeded: false, details: "reverted" });
      const id = await coordinator.createIntent(NFT, MINT, 5);

      const result = await coordinator.executeIntent(id);

      expect(result).toMatchObject({ status: "failed", txHash: "0xfeed" });
    });

    it("marks the intent failed without retrying when submission throws", async () => {
      const { coordinator, ledger } = setup();
      ledger.submit.mockRejectedValueOnce(new Error("nonce too low"));
      const id = await coordinator.createIntent(NFT, MINT, 5);

      const result = await coordinator.executeIntent(id);

      expect(result?.status).toBe("failed");
      expect(ledger.submit).toHaveBeenCalledTimes(1);
    });

    it("marks the intent failed when confirmation times out", async () => {
      const { coordinator, ledger } = setup([], { confirmationTimeoutMs: 5 });
      ledger.awaitConfirmation.mockReturnValueOnce(new Promise<ConfirmationResult>(() => {}));
      const id = await coordinator.createIntent(NFT, MINT, 5);

      const result = await coordinator.executeIntent(id);

      expect(result).toMatchObject({ status: "failed", txHash: "0xfeed" });
    });

    it("records executed_by_peer for a remote intent", async () => {
      const { coordinator, ledger } = setup(["peer-b"]);
      await coordinator.onIntentReceived(remoteIntent("i-1", "peer-b", 5, START_SECONDS));

      const result = await coordinator.executeIntent("i-1");

      expect(result?.status).toBe("executed_by_peer");
      expect(ledger.submit).not.toHaveBeenCalled();
    });

    it("resolves undefined for an unknown intent", async () => {
      const { coordinator } = setup();
      expect(await coordinator.executeIntent("missing")).toBeUndefined();
    });

    it("does not submit an executed intent again", async () => {
      const { coordinator, ledger } = setup();
      const id = await coordinator.createIntent(NFT, MINT, 5);
      await coordinator.executeIntent(id);

      const again = await coordinator.executeIntent(id);

      expect(again).toMatchObject({ status: "executed", txHash: "0xfeed" });
      expect(ledger.submit).toHaveBeenCalledTimes(1);
    });

    it("does not retry a failed intent", async () => {
      const { coordinator, ledger } = setup();
      ledger.submit.mockRejectedValueOnce(new Error("nonce too low"));
      const id = await coordinator.createIntent(NFT, MINT, 5);
      await coordinator.executeIntent(id);

      const again = await coordinator.executeIntent(id);

      expect(again?.status).toBe("failed");
      expect(ledger.submit).toHaveBeenCalledTimes(1);
    });
  });
});
