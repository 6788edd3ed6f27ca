/**
 * @lpvault/ledger — Deterministic token amount arithmetic.
 *
 * All arithmetic uses bigint. Human-readable decimal strings are
 * converted to/from raw units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Raw amounts are never negative
 */

import type { TokenAmounts } from "@lpvault/types";
import { LedgerError } from "./types.js";

// ─── Decimal conversion ──────────────────────────────────────────────────

/**
 * Parse a human-readable decimal string into raw units.
 *
 * "100.5" with decimals=6 → 100500000n
 * "1" with decimals=18 → 1000000000000000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Render raw units as a decimal string with exactly `decimals` places.
 *
 * 100500000n with decimals=6 → "100.500000"
 */
export function formatAmount(raw: bigint, decimals: number): string {
  assertNonNegative(raw, "amount");
  if (decimals === 0) {
    return raw.toString();
  }

  const str = raw.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

// ─── Pair arithmetic ─────────────────────────────────────────────────────

export function assertNonNegative(value: bigint, label: string): void {
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must not be negative, got ${value}`);
  }
}

export function addAmounts(a: TokenAmounts, b: TokenAmounts): TokenAmounts {
  return { amount0: a.amount0 + b.amount0, amount1: a.amount1 + b.amount1 };
}

/**
 * Per-token subtraction floored at zero.
 */
export function subtractSaturating(a: TokenAmounts, b: TokenAmounts): TokenAmounts {
  return {
    amount0: a.amount0 > b.amount0 ? a.amount0 - b.amount0 : 0n,
    amount1: a.amount1 > b.amount1 ? a.amount1 - b.amount1 : 0n,
  };
}

/**
 * Per-token minimum.
 */
export function minAmounts(a: TokenAmounts, b: TokenAmounts): TokenAmounts {
  return {
    amount0: a.amount0 < b.amount0 ? a.amount0 : b.amount0,
    amount1: a.amount1 < b.amount1 ? a.amount1 : b.amount1,
  };
}

export function isZeroAmounts(amounts: TokenAmounts): boolean {
  return amounts.amount0 === 0n && amounts.amount1 === 0n;
}

// ─── Serialization ───────────────────────────────────────────────────────

/**
 * Parse a base-10 integer string (as found in snapshots and payloads).
 */
export function parseUint(value: string, label: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a base-10 integer string, got "${value}"`);
  }
  return BigInt(value);
}
