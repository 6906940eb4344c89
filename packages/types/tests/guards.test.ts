/**
 * Runtime type guard tests for @concord/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isJsonValue,
  isJsonObject,
  isHexData,
  isIntentStatus,
  isActionDescriptor,
  isProposalStatus,
  isCheckpoint,
} from "../src/guards.js";

// =============================================================================
// JSON guards
// =============================================================================

describe("isJsonValue", () => {
  it("accepts primitives and null", () => {
    expect(isJsonValue("a")).toBe(true);
    expect(isJsonValue(1.5)).toBe(true);
    expect(isJsonValue(false)).toBe(true);
    expect(isJsonValue(null)).toBe(true);
  });

  it("accepts nested arrays and objects", () => {
    expect(isJsonValue({ a: [1, { b: "c" }], d: null })).toBe(true);
  });

  it("rejects non-finite numbers", () => {
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it("rejects undefined, functions and bigints", () => {
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue(() => 1)).toBe(false);
    expect(isJsonValue(10n)).toBe(false);
  });

  it("rejects objects holding non-JSON values", () => {
    expect(isJsonValue({ a: undefined })).toBe(false);
    expect(isJsonValue([1, 2n])).toBe(false);
  });
});

describe("isJsonObject", () => {
  it("accepts a plain object", () => {
    expect(isJsonObject({ turnCount: 0 })).toBe(true);
  });

  it("rejects arrays and null", () => {
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});

describe("isHexData", () => {
  it("accepts empty calldata", () => {
    expect(isHexData("0x")).toBe(true);
  });

  it("accepts even-length hex", () => {
    expect(isHexData("0xa0712d68")).toBe(true);
  });

  it("rejects odd-length hex", () => {
    expect(isHexData("0xabc")).toBe(false);
  });

  it("rejects missing prefix and non-hex digits", () => {
    expect(isHexData("a0712d68")).toBe(false);
    expect(isHexData("0xzz")).toBe(false);
  });
});

// =============================================================================
// Intent guards
// =============================================================================

describe("isIntentStatus", () => {
  it("accepts every lifecycle state", () => {
    for (const s of ["pending", "coordinating", "executed", "executed_by_peer", "failed"]) {
      expect(isIntentStatus(s)).toBe(true);
    }
  });

  it("rejects unknown strings and non-strings", () => {
    expect(isIntentStatus("approved")).toBe(false);
    expect(isIntentStatus(1)).toBe(false);
  });
});

describe("isActionDescriptor", () => {
  it("accepts a well-formed descriptor", () => {
    expect(
      isActionDescriptor({ description: "mint(42)", callData: "0xa0712d68", value: "0" }),
    ).toBe(true);
  });

  it("rejects a decimal value with a fraction", () => {
    expect(
      isActionDescriptor({ description: "mint(42)", callData: "0x", value: "1.5" }),
    ).toBe(false);
  });

  it("rejects non-hex calldata", () => {
    expect(
      isActionDescriptor({ description: "mint(42)", callData: "mint", value: "0" }),
    ).toBe(false);
  });

  it("rejects a missing description", () => {
    expect(isActionDescriptor({ callData: "0x", value: "0" })).toBe(false);
  });
});

// =============================================================================
// Voting guards
// =============================================================================

describe("isProposalStatus", () => {
  it("accepts the four proposal states", () => {
    for (const s of ["active", "finalizing", "passed", "rejected"]) {
      expect(isProposalStatus(s)).toBe(true);
    }
  });

  it("rejects other values", () => {
    expect(isProposalStatus("executed")).toBe(false);
    expect(isProposalStatus(undefined)).toBe(false);
  });
});

// =============================================================================
// Session guards
// =============================================================================

describe("isCheckpoint", () => {
  const valid = {
    sessionId: "session-1",
    sequence: 10,
    stateDigest: "a".repeat(64),
    moveCount: 10,
    timestamp: 1_700_000_000,
  };

  it("accepts a valid checkpoint", () => {
    expect(isCheckpoint(valid)).toBe(true);
  });

  it("rejects an uppercase or short digest", () => {
    expect(isCheckpoint({ ...valid, stateDigest: "A".repeat(64) })).toBe(false);
    expect(isCheckpoint({ ...valid, stateDigest: "abc" })).toBe(false);
  });

  it("rejects a fractional sequence", () => {
    expect(isCheckpoint({ ...valid, sequence: 1.5 })).toBe(false);
  });

  it("rejects an empty session id", () => {
    expect(isCheckpoint({ ...valid, sessionId: "" })).toBe(false);
  });
});
