/**
 * @lpvault/ledger — Fee/principal ledger.
 *
 * Tracks two buckets per token for a single position:
 *
 * 1. Accrued fees: swap income collected while liquidity was still
 *    active and not yet charged the performance fee. Nonzero only
 *    between a collect-while-active step and the fee step that drains it.
 * 2. Owed principal: principal released by a partial decrease that the
 *    engine still holds as owed. A later collect returns it mixed with
 *    income, so it is carved out before anything is accrued.
 *
 * Rules:
 * - Accrued fees are zero at the start and end of every top-level operation
 * - Principal never enters the accrued bucket
 */

import type { TokenAmounts } from "@lpvault/types";
import { ZERO_AMOUNTS } from "@lpvault/types";
import {
  addAmounts,
  assertNonNegative,
  isZeroAmounts,
  minAmounts,
  parseUint,
} from "./amount-math.js";
import { applyPerformanceFee } from "./fee-math.js";
import { LedgerError } from "./types.js";
import type { CollectedSplit, FeeSettlement, LedgerSnapshot } from "./types.js";

export class FeeLedger {
  private _accrued: TokenAmounts = ZERO_AMOUNTS;
  private _owedPrincipal: TokenAmounts = ZERO_AMOUNTS;

  // ─── Queries ──────────────────────────────────────────────────────────

  get accrued(): TokenAmounts {
    return this._accrued;
  }

  get owedPrincipal(): TokenAmounts {
    return this._owedPrincipal;
  }

  get settled(): boolean {
    return isZeroAmounts(this._accrued);
  }

  // ─── Principal ────────────────────────────────────────────────────────

  /**
   * Record principal a partial decrease moved into the engine's owed balance.
   */
  recordPrincipalOwed(amounts: TokenAmounts): void {
    assertAmounts(amounts);
    this._owedPrincipal = addAmounts(this._owedPrincipal, amounts);
  }

  /**
   * Divide a collect result into recorded principal and swap income.
   * The principal portion is consumed from the owed bucket.
   */
  splitCollected(collected: TokenAmounts): CollectedSplit {
    assertAmounts(collected);
    const principal = minAmounts(collected, this._owedPrincipal);
    this._owedPrincipal = {
      amount0: this._owedPrincipal.amount0 - principal.amount0,
      amount1: this._owedPrincipal.amount1 - principal.amount1,
    };
    return {
      principal,
      income: {
        amount0: collected.amount0 - principal.amount0,
        amount1: collected.amount1 - principal.amount1,
      },
    };
  }

  /**
   * Forget owed principal once the engine has paid out everything it owed.
   */
  clearPrincipalOwed(): void {
    this._owedPrincipal = ZERO_AMOUNTS;
  }

  // ─── Income ───────────────────────────────────────────────────────────

  accrue(income: TokenAmounts): void {
    assertAmounts(income);
    this._accrued = addAmounts(this._accrued, income);
  }

  /**
   * Empty the accrued bucket and compute the fee owed on it.
   */
  settle(feeBps: number): FeeSettlement {
    const settlement = applyPerformanceFee(this._accrued, feeBps);
    this._accrued = ZERO_AMOUNTS;
    return settlement;
  }

  assertSettled(context: string): void {
    if (!this.settled) {
      throw new LedgerError(
        "UNSETTLED_FEES",
        `${context}: accrued fees ${this._accrued.amount0}/${this._accrued.amount1} were never settled`,
      );
    }
  }

  // ─── Snapshot ─────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      accruedFee0: this._accrued.amount0.toString(),
      accruedFee1: this._accrued.amount1.toString(),
      owedPrincipal0: this._owedPrincipal.amount0.toString(),
      owedPrincipal1: this._owedPrincipal.amount1.toString(),
    };
  }

  restore(snapshot: LedgerSnapshot): void {
    this._accrued = {
      amount0: parseUint(snapshot.accruedFee0, "accruedFee0"),
      amount1: parseUint(snapshot.accruedFee1, "accruedFee1"),
    };
    this._owedPrincipal = {
      amount0: parseUint(snapshot.owedPrincipal0, "owedPrincipal0"),
      amount1: parseUint(snapshot.owedPrincipal1, "owedPrincipal1"),
    };
  }
}

function assertAmounts(amounts: TokenAmounts): void {
  assertNonNegative(amounts.amount0, "amount0");
  assertNonNegative(amounts.amount1, "amount1");
}
