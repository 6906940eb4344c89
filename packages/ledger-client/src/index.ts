/**
 * @concord/ledger-client
 *
 * LedgerClient implementations: an OP-stack client over viem and an
 * in-process simulator.
 */

export { LedgerClientError } from "./errors.js";
export type { LedgerClientErrorCode } from "./errors.js";

export {
  OpStackLedgerClient,
  SUPPORTED_CHAINS,
  DEFAULT_MAX_GAS_PRICE_WEI,
  capGasPrice,
} from "./op-stack-client.js";
export type { OpStackLedgerConfig } from "./op-stack-client.js";

export { SimulatedLedgerClient, intrinsicGas } from "./simulated-client.js";
export type {
  SimulatedFailure,
  SimulatedTransaction,
  SimulatedTxStatus,
} from "./simulated-client.js";
