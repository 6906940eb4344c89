/**
 * Tests for configuration loading and peer table parsing.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parsePeers } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.PEER_ID).toMatch(/^peer-[0-9a-f]{8}$/);
    expect(config.PORT).toBe(7400);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.PEERS).toBe("");
    expect(config.LEDGER_RPC_URL).toBeUndefined();
    expect(config.LEDGER_CHAIN_ID).toBe(10);
    expect(config.MAX_GAS_PRICE_WEI).toBe(20_000_000_000n);
    expect(config.DEFAULT_GAS_LIMIT).toBe(300_000);
    expect(config.CONFIRMATION_TIMEOUT_MS).toBe(60_000);
    expect(config.CHECKPOINT_MOVE_INTERVAL).toBe(10);
    expect(config.CHECKPOINT_INTERVAL_SECONDS).toBe(300);
    expect(config.DEFAULT_VOTING_DURATION_SECONDS).toBe(300);
    expect(config.VOTE_SWEEP_INTERVAL_MS).toBe(5000);
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({
      PEER_ID: "node-a",
      PORT: "8080",
      LEDGER_CHAIN_ID: "11155420",
      MAX_GAS_PRICE_WEI: "1000",
      CHECKPOINT_MOVE_INTERVAL: "5",
    });

    expect(config.PEER_ID).toBe("node-a");
    expect(config.PORT).toBe(8080);
    expect(config.LEDGER_CHAIN_ID).toBe(11_155_420);
    expect(config.MAX_GAS_PRICE_WEI).toBe(1000n);
    expect(config.CHECKPOINT_MOVE_INTERVAL).toBe(5);
  });

  it("rejects an invalid log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("rejects a malformed private key", () => {
    expect(() => loadConfig({ LEDGER_PRIVATE_KEY: "0x1234" })).toThrow(/32 bytes/);
  });

  it("rejects a zero move interval", () => {
    expect(() => loadConfig({ CHECKPOINT_MOVE_INTERVAL: "0" })).toThrow();
  });
});

describe("parsePeers", () => {
  it("returns nothing for an empty table", () => {
    expect(parsePeers("")).toEqual([]);
    expect(parsePeers("   ")).toEqual([]);
  });

  it("parses id=url pairs and strips trailing slashes", () => {
    expect(parsePeers("node-b=http://b.test:7400/, node-c=https://c.test")).toEqual([
      { id: "node-b", url: "http://b.test:7400" },
      { id: "node-c", url: "https://c.test" },
    ]);
  });

  it("rejects an entry without a separator", () => {
    expect(() => parsePeers("node-b")).toThrow(
      'Invalid PEERS entry: "node-b". Expected format: peerId=url',
    );
  });

  it("rejects an entry with an empty id", () => {
    expect(() => parsePeers("=http://b.test")).toThrow(/Invalid PEERS entry/);
  });

  it("rejects an invalid URL", () => {
    expect(() => parsePeers("node-b=not a url")).toThrow(
      'Invalid URL "not a url" for peer "node-b" in PEERS',
    );
  });

  it("rejects duplicate ids", () => {
    expect(() => parsePeers("node-b=http://b.test,node-b=http://b2.test")).toThrow(
      'Duplicate peer id "node-b" in PEERS',
    );
  });
});
