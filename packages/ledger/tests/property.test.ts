/**
 * Property-Based Tests for @lpvault/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. The fee equals floor(income * bps / 10000) and never exceeds its base
 * 2. fee + net always reconstructs the income
 * 3. Splitting a collect never manufactures or loses value
 * 4. Recorded principal never reaches the fee base
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { FeeLedger } from "../src/fee-ledger.js";
import { MAX_PROTOCOL_FEE_BPS, applyPerformanceFee, performanceFee } from "../src/fee-math.js";

const arbAmount = fc.bigInt({ min: 0n, max: (1n << 128n) - 1n });
const arbBps = fc.integer({ min: 0, max: MAX_PROTOCOL_FEE_BPS });
const arbPair = fc.record({ amount0: arbAmount, amount1: arbAmount });

describe("fee math properties", () => {
  it("fee is the floored share and bounded by its base", () => {
    fc.assert(
      fc.property(arbAmount, arbBps, (income, bps) => {
        const fee = performanceFee(income, bps);
        expect(fee).toBe((income * BigInt(bps)) / 10_000n);
        expect(fee <= income).toBe(true);
        expect(fee >= 0n).toBe(true);
      }),
    );
  });

  it("fee + net reconstructs income", () => {
    fc.assert(
      fc.property(arbPair, arbBps, (income, bps) => {
        const { fee, net } = applyPerformanceFee(income, bps);
        expect(fee.amount0 + net.amount0).toBe(income.amount0);
        expect(fee.amount1 + net.amount1).toBe(income.amount1);
      }),
    );
  });
});

describe("ledger properties", () => {
  it("split conserves the collected amount", () => {
    fc.assert(
      fc.property(arbPair, arbPair, (owed, collected) => {
        const ledger = new FeeLedger();
        ledger.recordPrincipalOwed(owed);

        const { income, principal } = ledger.splitCollected(collected);

        expect(income.amount0 + principal.amount0).toBe(collected.amount0);
        expect(income.amount1 + principal.amount1).toBe(collected.amount1);
        expect(principal.amount0 + ledger.owedPrincipal.amount0).toBe(owed.amount0);
        expect(principal.amount1 + ledger.owedPrincipal.amount1).toBe(owed.amount1);
      }),
    );
  });

  it("recorded principal is never charged", () => {
    fc.assert(
      fc.property(arbPair, arbPair, arbBps, (principal, income, bps) => {
        const ledger = new FeeLedger();
        ledger.recordPrincipalOwed(principal);

        const split = ledger.splitCollected({
          amount0: principal.amount0 + income.amount0,
          amount1: principal.amount1 + income.amount1,
        });
        ledger.accrue(split.income);
        const settlement = ledger.settle(bps);

        expect(settlement.income).toEqual(income);
        expect(settlement.fee.amount0).toBe(performanceFee(income.amount0, bps));
        expect(settlement.fee.amount1).toBe(performanceFee(income.amount1, bps));
        expect(ledger.settled).toBe(true);
      }),
    );
  });
});
