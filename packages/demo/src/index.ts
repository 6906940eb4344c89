/**
 * @concord/demo: Terminal walkthrough.
 *
 * Three peers (alice, bob, carol) on an in-process network, each with its
 * own simulated ledger:
 *
 *   competing mints -> DAO vote -> turn-based session with checkpoints
 *
 * Set LOG_LEVEL=debug to see the coordinators' own logs.
 */

import chalk from "chalk";
import { pino } from "pino";
import {
  PEER_IDS,
  createCluster,
  runDaoVote,
  runMintConflict,
  runSession,
} from "./scenarios.js";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      CONCORD DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("         Peer coordination before the ledger              ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 20 ? `${hash.slice(0, 10)}…${hash.slice(-8)}` : hash;
  info(label, chalk.magenta(short));
}

// =============================================================================
// Walkthrough
// =============================================================================

const TOTAL_STEPS = 3;

async function main(): Promise<void> {
  banner();

  const logger = pino({ level: process.env["LOG_LEVEL"] ?? "silent" });
  const cluster = createCluster({ logger });
  info("peers", PEER_IDS.join(", "));
  await sleep(DELAY_MS);

  // ─── Step 1: Competing mints ────────────────────────────────────────
  stepHeader(1, TOTAL_STEPS, "Competing NFT mints");
  const mint = await runMintConflict(cluster);
  info("alice intent", `${mint.winnerId.slice(0, 8)} (priority 5)`);
  info("bob intent", `${mint.loserId.slice(0, 8)} (priority 3)`);
  for (const name of PEER_IDS) {
    info(`${name} sees`, mint.winnerStatus[name] ?? "nothing");
  }
  if (mint.txHash !== undefined) {
    hashLine("mint tx", mint.txHash);
  }
  const totalSubmissions = PEER_IDS.reduce((sum, name) => sum + mint.submissions[name], 0);
  if (totalSubmissions === 1) {
    ok("One winner, one transaction: the losing mint never reached the ledger");
  } else {
    warn(`Expected one submission, saw ${totalSubmissions}`);
  }
  await sleep(DELAY_MS);

  // ─── Step 2: DAO vote ───────────────────────────────────────────────
  stepHeader(2, TOTAL_STEPS, "DAO vote");
  const vote = await runDaoVote(cluster);
  info("votes", "alice yes×10, bob yes×5, carol no×8");
  if (vote.result !== undefined) {
    info("tally", `yes ${vote.result.yesWeight} / no ${vote.result.noWeight}`);
  }
  for (const name of PEER_IDS) {
    info(`${name} sees`, vote.status[name] ?? "nothing");
  }
  info("on-chain", vote.onchainStatus ?? "not submitted");
  if (vote.result?.passed === true) {
    ok("Every peer reached the same result; the creator executed it");
  } else {
    warn("Proposal did not pass");
  }
  await sleep(DELAY_MS);

  // ─── Step 3: Turn-based session ─────────────────────────────────────
  stepHeader(3, TOTAL_STEPS, "Turn-based session");
  const session = await runSession(cluster);
  info("moves", String(session.moves));
  for (const name of PEER_IDS) {
    hashLine(`${name} state`, session.digests[name] ?? "missing");
  }
  for (const checkpoint of session.checkpoints) {
    hashLine(`checkpoint @${checkpoint.sequence}`, checkpoint.stateDigest);
  }
  info("anchored", `${session.anchored} checkpoint(s) on alice's ledger`);

  const digests = new Set(PEER_IDS.map((name) => session.digests[name]));
  if (digests.size === 1) {
    ok(chalk.green.bold("IN SYNC") + ": all replicas hold the same state");
  } else {
    warn("Replicas diverged");
  }

  console.log();
}

main().catch((err: unknown) => {
  console.error(chalk.red("Demo failed:"), err);
  process.exit(1);
});
