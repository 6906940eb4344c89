/**
 * In-process ledger that mines every submitted transaction into its own
 * block. Used by the demo and by tests that want a real LedgerClient
 * without a node.
 *
 * Failures can be scripted per submission with failNext().
 */

import { createHash } from "node:crypto";
import type { ConfirmationResult, LedgerClient, TxHandle } from "@concord/types";
import { LedgerClientError } from "./errors.js";

export type SimulatedFailure = "reject" | "revert" | "timeout";

export type SimulatedTxStatus = "pending" | "confirmed" | "reverted";

export interface SimulatedTransaction {
  readonly hash: string;
  readonly target: string;
  readonly value: string;
  readonly payload: string;
  readonly costLimit: number;
  status: SimulatedTxStatus;
  blockNumber?: number;
}

const BASE_GAS = 21_000;
const ZERO_BYTE_GAS = 4;
const NONZERO_BYTE_GAS = 16;

/**
 * Intrinsic gas for a call: base cost plus per-byte calldata cost.
 */
export function intrinsicGas(payload: string): number {
  const hex = payload.startsWith("0x") ? payload.slice(2) : payload;
  let gas = BASE_GAS;
  for (let i = 0; i + 1 < hex.length; i += 2) {
    gas += hex.slice(i, i + 2) === "00" ? ZERO_BYTE_GAS : NONZERO_BYTE_GAS;
  }
  return gas;
}

export class SimulatedLedgerClient implements LedgerClient {
  private readonly _transactions = new Map<string, SimulatedTransaction>();
  private readonly _scripted: SimulatedFailure[] = [];
  private readonly _outcomes = new Map<string, SimulatedFailure>();
  private _nonce = 0;
  private _blockNumber = 0;

  /** Make the next submission fail in the given way. Calls queue up. */
  failNext(failure: SimulatedFailure): void {
    this._scripted.push(failure);
  }

  get blockNumber(): number {
    return this._blockNumber;
  }

  transactions(): readonly SimulatedTransaction[] {
    return [...this._transactions.values()];
  }

  async estimateCost(_target: string, payload: string): Promise<number> {
    return intrinsicGas(payload);
  }

  async submit(target: string, value: string, payload: string, costLimit: number): Promise<TxHandle> {
    const failure = this._scripted.shift();
    if (failure === "reject") {
      throw new LedgerClientError("SUBMISSION_FAILED", `Transaction to ${target} rejected by simulated node`);
    }
    if (!/^0x([0-9a-fA-F]{2})*$/.test(payload)) {
      throw new LedgerClientError("INVALID_CALLDATA", `Calldata must be even-length 0x hex, got '${payload}'`);
    }

    const nonce = this._nonce++;
    const hash =
      "0x" +
      createHash("sha256").update(`${nonce}\n${target}\n${value}\n${payload}`).digest("hex");

    this._transactions.set(hash, { hash, target, value, payload, costLimit, status: "pending" });
    if (failure !== undefined) {
      this._outcomes.set(hash, failure);
    } else if (costLimit < intrinsicGas(payload)) {
      this._outcomes.set(hash, "revert");
    }
    return { hash };
  }

  async awaitConfirmation(tx: TxHandle, timeoutMs: number): Promise<ConfirmationResult> {
    const record = this._transactions.get(tx.hash);
    if (record === undefined) {
      return { succeeded: false, details: `unknown transaction ${tx.hash}` };
    }

    const outcome = this._outcomes.get(tx.hash);
    if (outcome === "timeout") {
      throw new LedgerClientError("TIMEOUT", `No receipt for ${tx.hash} within ${timeoutMs}ms`);
    }

    if (record.blockNumber === undefined) {
      record.blockNumber = ++this._blockNumber;
      record.status = outcome === "revert" ? "reverted" : "confirmed";
    }

    return record.status === "confirmed"
      ? { succeeded: true, details: `confirmed in block ${record.blockNumber}`, blockNumber: record.blockNumber }
      : { succeeded: false, details: `reverted in block ${record.blockNumber}`, blockNumber: record.blockNumber };
  }
}
