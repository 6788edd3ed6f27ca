/**
 * @lpvault/ledger — Performance fee arithmetic.
 *
 * fee = floor(income * feeBps / 10000), per token, in bigint.
 * The fee can never exceed its base and is never charged on principal:
 * callers pass swap income only.
 */

import type { TokenAmounts } from "@lpvault/types";
import { assertNonNegative } from "./amount-math.js";
import { LedgerError } from "./types.js";
import type { FeeSettlement } from "./types.js";

/** Basis points in 100%. */
export const BPS_DENOMINATOR = 10_000n;

/** Highest protocol performance fee a factory may configure (20%). */
export const MAX_PROTOCOL_FEE_BPS = 2_000;

export function assertValidFeeBps(feeBps: number): void {
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_PROTOCOL_FEE_BPS) {
    throw new LedgerError(
      "INVALID_FEE_BPS",
      `Fee must be an integer between 0 and ${MAX_PROTOCOL_FEE_BPS} bps, got ${feeBps}`,
    );
  }
}

/**
 * The protocol's cut of a single income amount, rounded down.
 */
export function performanceFee(income: bigint, feeBps: number): bigint {
  assertNonNegative(income, "income");
  assertValidFeeBps(feeBps);
  return (income * BigInt(feeBps)) / BPS_DENOMINATOR;
}

/**
 * Split a pair of income amounts into the protocol fee and the vault's net.
 */
export function applyPerformanceFee(
  income: TokenAmounts,
  feeBps: number,
): FeeSettlement {
  const fee = {
    amount0: performanceFee(income.amount0, feeBps),
    amount1: performanceFee(income.amount1, feeBps),
  };
  return {
    feeBps,
    income,
    fee,
    net: {
      amount0: income.amount0 - fee.amount0,
      amount1: income.amount1 - fee.amount1,
    },
  };
}
