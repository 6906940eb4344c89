/**
 * Ledger Client Boundary
 *
 * Coordinators never talk to a chain directly. They see this interface,
 * implemented by an RPC-backed client in production and an in-process
 * simulator in tests and demos.
 *
 * All three calls may reject; callers bound them with a timeout and treat
 * a rejection or timeout as a failed outcome.
 */

export interface TxHandle {
  /** 0x-prefixed transaction hash */
  readonly hash: string;
}

export interface ConfirmationResult {
  readonly succeeded: boolean;
  /** Free-form status text ("confirmed in block 12", "reverted", ...) */
  readonly details: string;
  readonly blockNumber?: number;
}

export interface LedgerClient {
  /** Estimated cost in gas units for calling `target` with `payload` calldata. */
  estimateCost(target: string, payload: string): Promise<number>;

  /**
   * Submit a transaction.
   *
   * @param value - Wei as a decimal string
   * @param payload - 0x-prefixed calldata
   * @param costLimit - Gas limit
   */
  submit(target: string, value: string, payload: string, costLimit: number): Promise<TxHandle>;

  awaitConfirmation(tx: TxHandle, timeoutMs: number): Promise<ConfirmationResult>;
}
