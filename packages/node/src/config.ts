/**
 * @concord/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const positiveInt = z.coerce.number().int().min(1);

export const ConfigSchema = z.object({
  PEER_ID: z
    .string()
    .min(1)
    .default(() => `peer-${randomUUID().slice(0, 8)}`),
  PORT: z.coerce.number().int().min(1).max(65535).default(7400),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Peer table: "peerA=http://host-a:7400,peerB=http://host-b:7400"
  PEERS: z.string().default(""),
  PEER_REQUEST_TIMEOUT_MS: positiveInt.default(5000),

  // Ledger. Without an RPC URL the node runs on the simulated ledger.
  LEDGER_RPC_URL: z.string().url().optional(),
  LEDGER_CHAIN_ID: positiveInt.default(10),
  LEDGER_PRIVATE_KEY: z
    .string()
    .regex(/^0x[0-9a-fA-F]{64}$/, "must be 32 bytes of 0x-prefixed hex")
    .optional(),
  MAX_GAS_PRICE_WEI: z
    .string()
    .regex(/^\d+$/, "must be a decimal wei amount")
    .default("20000000000")
    .transform((v) => BigInt(v)),
  DEFAULT_GAS_LIMIT: positiveInt.default(300_000),
  LEDGER_TIMEOUT_MS: positiveInt.default(30_000),
  CONFIRMATION_TIMEOUT_MS: positiveInt.default(60_000),

  // Sessions
  CHECKPOINT_MOVE_INTERVAL: positiveInt.default(10),
  CHECKPOINT_INTERVAL_SECONDS: positiveInt.default(300),
  CHECKPOINT_DIR: z.string().min(1).optional(),
  CHECKPOINT_TARGET: z.string().min(1).optional(),

  // Voting
  GOVERNANCE_TARGET: z.string().min(1).optional(),
  DEFAULT_VOTING_DURATION_SECONDS: positiveInt.default(300),
  VOTE_SWEEP_INTERVAL_MS: positiveInt.default(5000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Peer Table Parsing
// =============================================================================

export interface PeerEntry {
  readonly id: string;
  /** Base URL without trailing slash */
  readonly url: string;
}

const UrlSchema = z.string().url();

/**
 * Parse the PEERS env var into peer entries.
 *
 * Format: "peerA=http://host-a:7400,peerB=http://host-b:7400"
 */
export function parsePeers(raw: string): readonly PeerEntry[] {
  if (raw.trim() === "") {
    return [];
  }

  const peers: PeerEntry[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf("=");
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new Error(
        `Invalid PEERS entry: "${trimmed}". Expected format: peerId=url`,
      );
    }

    const id = trimmed.slice(0, separator);
    const url = trimmed.slice(separator + 1).replace(/\/+$/, "");

    if (!UrlSchema.safeParse(url).success) {
      throw new Error(`Invalid URL "${url}" for peer "${id}" in PEERS`);
    }
    if (seen.has(id)) {
      throw new Error(`Duplicate peer id "${id}" in PEERS`);
    }

    seen.add(id);
    peers.push({ id, url });
  }

  return peers;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
