/**
 * @lpvault/ledger — Types for the fee/principal ledger.
 *
 * Rules:
 * - All amounts are bigint raw units, never negative
 * - Swap income and principal are tracked in separate buckets
 * - Fail-closed: invalid input throws, never silently clamps
 */

import type { TokenAmounts } from "@lpvault/types";

// ─── Settlement ──────────────────────────────────────────────────────────

/**
 * How a collect result divides between swap income and principal.
 */
export interface CollectedSplit {
  readonly income: TokenAmounts;
  readonly principal: TokenAmounts;
}

/**
 * The outcome of applying the performance fee to drained income.
 */
export interface FeeSettlement {
  readonly feeBps: number;
  /** The fee base: income collected while the position was active */
  readonly income: TokenAmounts;
  /** The protocol's cut */
  readonly fee: TokenAmounts;
  /** What stays with the vault */
  readonly net: TokenAmounts;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

/**
 * JSON-safe ledger state. Amounts are base-10 integer strings.
 */
export interface LedgerSnapshot {
  readonly accruedFee0: string;
  readonly accruedFee1: string;
  readonly owedPrincipal0: string;
  readonly owedPrincipal1: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_FEE_BPS"
  | "UNSETTLED_FEES";

/**
 * Structured error from the ledger.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
