/**
 * OP-stack Ledger Client: submits coordinated outcomes to an EVM L2.
 *
 * Uses viem for all chain interactions. Defaults to OP Mainnet
 * (chain id 10); any chain in SUPPORTED_CHAINS works.
 *
 * Capabilities:
 * - Gas estimation for a call
 * - Legacy-priced transaction submission, gas price capped at a ceiling
 * - Receipt wait with timeout
 *
 * Non-capabilities:
 * - No nonce management beyond what the RPC node provides
 * - No fee bumping or resubmission
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  isAddress,
  isHex,
  parseGwei,
  WaitForTransactionReceiptTimeoutError,
  type Chain,
  type HttpTransport,
  type PrivateKeyAccount,
  type PublicClient,
  type WalletClient,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { base, baseSepolia, optimism, optimismSepolia } from "viem/chains";
import type { ConfirmationResult, LedgerClient, TxHandle } from "@concord/types";
import { LedgerClientError } from "./errors.js";

// =============================================================================
// Chain ID to viem Chain mapping
// =============================================================================

export const SUPPORTED_CHAINS: Readonly<Record<number, Chain>> = {
  10: optimism,
  11155420: optimismSepolia,
  8453: base,
  84532: baseSepolia,
};

export const DEFAULT_MAX_GAS_PRICE_WEI = parseGwei("20");

export interface OpStackLedgerConfig {
  readonly rpcUrl: string;

  /** EIP-155 chain id (default 10, OP Mainnet) */
  readonly chainId?: number;

  /** 0x-prefixed signing key. Without one the client can estimate but not submit. */
  readonly privateKey?: string;

  /** Gas price ceiling in wei (default 20 gwei) */
  readonly maxGasPriceWei?: bigint;

  /** Per-request RPC timeout (default 30 s) */
  readonly rpcTimeoutMs?: number;
}

// =============================================================================
// Client
// =============================================================================

export class OpStackLedgerClient implements LedgerClient {
  readonly chainId: number;
  private readonly config: OpStackLedgerConfig;
  private readonly chain: Chain;
  private readonly account: PrivateKeyAccount | undefined;
  private readonly maxGasPriceWei: bigint;
  private publicClient: PublicClient<HttpTransport, Chain> | null = null;
  private walletClient: WalletClient<HttpTransport, Chain, PrivateKeyAccount> | null = null;

  constructor(config: OpStackLedgerConfig) {
    this.chainId = config.chainId ?? 10;
    const chain = SUPPORTED_CHAINS[this.chainId];
    if (chain === undefined) {
      throw new LedgerClientError(
        "UNSUPPORTED_CHAIN",
        `Unsupported chain ${this.chainId}. Supported: ${Object.keys(SUPPORTED_CHAINS).join(", ")}`,
      );
    }
    this.chain = chain;
    this.config = config;
    this.maxGasPriceWei = config.maxGasPriceWei ?? DEFAULT_MAX_GAS_PRICE_WEI;

    if (config.privateKey !== undefined) {
      if (!isHex(config.privateKey) || config.privateKey.length !== 66) {
        throw new LedgerClientError("NO_ACCOUNT", "privateKey must be 32 bytes of 0x-prefixed hex");
      }
      this.account = privateKeyToAccount(config.privateKey);
    }
  }

  /** Address transactions are sent from, if a key is configured. */
  get address(): string | undefined {
    return this.account?.address;
  }

  get isConnected(): boolean {
    return this.publicClient !== null;
  }

  connect(): void {
    const transport = http(this.config.rpcUrl, {
      timeout: this.config.rpcTimeoutMs ?? 30_000,
    });
    this.publicClient = createPublicClient({ chain: this.chain, transport });
    if (this.account !== undefined) {
      this.walletClient = createWalletClient({
        account: this.account,
        chain: this.chain,
        transport,
      });
    }
  }

  disconnect(): void {
    this.publicClient = null;
    this.walletClient = null;
  }

  // ─── LedgerClient ───────────────────────────────────────────────────

  async estimateCost(target: string, payload: string): Promise<number> {
    const client = this.requireClient();
    const to = requireAddress(target);
    const data = requireCalldata(payload);
    const gas = await client.estimateGas({
      to,
      data,
      ...(this.account !== undefined ? { account: this.account.address } : {}),
    });
    return Number(gas);
  }

  async submit(target: string, value: string, payload: string, costLimit: number): Promise<TxHandle> {
    const client = this.requireClient();
    const wallet = this.requireWallet();
    const to = requireAddress(target);
    const data = requireCalldata(payload);
    if (!/^\d+$/.test(value)) {
      throw new LedgerClientError("INVALID_VALUE", `value must be a decimal wei amount, got '${value}'`);
    }

    const gasPrice = capGasPrice(await client.getGasPrice(), this.maxGasPriceWei);
    try {
      const hash = await wallet.sendTransaction({
        to,
        data,
        value: BigInt(value),
        gas: BigInt(costLimit),
        gasPrice,
      });
      return { hash };
    } catch (err) {
      throw new LedgerClientError(
        "SUBMISSION_FAILED",
        `Transaction to ${to} rejected: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async awaitConfirmation(tx: TxHandle, timeoutMs: number): Promise<ConfirmationResult> {
    const client = this.requireClient();
    if (!isHex(tx.hash)) {
      throw new LedgerClientError("INVALID_CALLDATA", `Not a transaction hash: '${tx.hash}'`);
    }

    try {
      const receipt = await client.waitForTransactionReceipt({ hash: tx.hash, timeout: timeoutMs });
      const blockNumber = Number(receipt.blockNumber);
      return receipt.status === "success"
        ? { succeeded: true, details: `confirmed in block ${blockNumber}`, blockNumber }
        : { succeeded: false, details: `reverted in block ${blockNumber}`, blockNumber };
    } catch (err) {
      if (err instanceof WaitForTransactionReceiptTimeoutError) {
        throw new LedgerClientError("TIMEOUT", `No receipt for ${tx.hash} within ${timeoutMs}ms`);
      }
      throw err;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private requireClient(): PublicClient<HttpTransport, Chain> {
    if (this.publicClient === null) {
      throw new LedgerClientError("NOT_CONNECTED", "Ledger client is not connected. Call connect() first.");
    }
    return this.publicClient;
  }

  private requireWallet(): WalletClient<HttpTransport, Chain, PrivateKeyAccount> {
    if (this.walletClient === null) {
      throw new LedgerClientError("NO_ACCOUNT", "No signing key configured; cannot submit transactions");
    }
    return this.walletClient;
  }
}

export function capGasPrice(current: bigint, ceiling: bigint): bigint {
  return current > ceiling ? ceiling : current;
}

function requireAddress(value: string): `0x${string}` {
  if (!isAddress(value)) {
    throw new LedgerClientError("INVALID_ADDRESS", `Not an address: '${value}'`);
  }
  return value;
}

function requireCalldata(value: string): `0x${string}` {
  if (!isHex(value) || value.length % 2 !== 0) {
    throw new LedgerClientError("INVALID_CALLDATA", `Calldata must be even-length 0x hex, got '${value}'`);
  }
  return value;
}
