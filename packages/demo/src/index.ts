#!/usr/bin/env node
/**
 * @lpvault/demo — Interactive CLI walkthrough.
 *
 * Plays the vault's trust model in your terminal against the simulated
 * chain. Uses the real domain packages directly.
 */

import chalk from "chalk";
import pino from "pino";
import { loadConfig } from "./config.js";
import { runWalkthrough } from "./walkthrough.js";
import type { Reporter } from "./walkthrough.js";

// =============================================================================
// Terminal reporter
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      LPVAULT DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("       Non-custodial concentrated-liquidity vault         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function terminalReporter(delayMs: number, total: number): Reporter {
  let step = 0;
  return {
    async step(title) {
      step++;
      await sleep(delayMs);
      const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
      const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
      console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
    },
    ok(message) {
      console.log(chalk.green("    ✓ ") + chalk.white(message));
    },
    info(label, value) {
      console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
    },
    rejected(message) {
      console.log(chalk.red("    ✗ ") + chalk.yellow(message));
    },
  };
}

const TOTAL_STEPS = 7;

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.LOG_PRETTY ? { transport: { target: "pino-pretty" } } : {}),
  });

  banner();
  const result = await runWalkthrough({
    protocolFeeBps: config.PROTOCOL_FEE_BPS,
    logger,
    reporter: terminalReporter(config.DEMO_DELAY_MS, TOTAL_STEPS),
  });

  console.log();
  console.log(chalk.cyan.bold("  Summary"));
  console.log(chalk.gray(`    Owner received    ${result.ownerBalance.amount0} / ${result.ownerBalance.amount1}`));
  console.log(chalk.gray(`    Protocol earned   ${result.feeRecipientBalance.amount0} / ${result.feeRecipientBalance.amount1}`));
  console.log(chalk.gray(`    Rejections        ${result.rejections.join(", ")}`));
  console.log();

  if (!result.integrityValid) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red("Demo failed:"), err);
  process.exit(1);
});
