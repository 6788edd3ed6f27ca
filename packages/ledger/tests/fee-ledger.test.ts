/**
 * Tests for FeeLedger — income/principal separation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FeeLedger } from "../src/fee-ledger.js";
import { LedgerError } from "../src/types.js";

describe("FeeLedger", () => {
  let ledger: FeeLedger;

  beforeEach(() => {
    ledger = new FeeLedger();
  });

  it("starts settled with nothing owed", () => {
    expect(ledger.settled).toBe(true);
    expect(ledger.accrued).toEqual({ amount0: 0n, amount1: 0n });
    expect(ledger.owedPrincipal).toEqual({ amount0: 0n, amount1: 0n });
  });

  describe("income", () => {
    it("accumulates accrued income", () => {
      ledger.accrue({ amount0: 10n, amount1: 0n });
      ledger.accrue({ amount0: 5n, amount1: 7n });

      expect(ledger.accrued).toEqual({ amount0: 15n, amount1: 7n });
      expect(ledger.settled).toBe(false);
    });

    it("settle drains the bucket and computes the fee", () => {
      ledger.accrue({ amount0: 1_000n, amount1: 2_000n });

      const settlement = ledger.settle(1_000);

      expect(settlement.fee).toEqual({ amount0: 100n, amount1: 200n });
      expect(settlement.net).toEqual({ amount0: 900n, amount1: 1_800n });
      expect(ledger.settled).toBe(true);
    });

    it("assertSettled throws while income is pending", () => {
      ledger.accrue({ amount0: 1n, amount1: 0n });

      expect(() => ledger.assertSettled("withdrawAll")).toThrow(
        "withdrawAll: accrued fees 1/0 were never settled",
      );
    });

    it("rejects negative income", () => {
      expect(() => ledger.accrue({ amount0: -1n, amount1: 0n })).toThrow(LedgerError);
    });
  });

  describe("principal", () => {
    it("treats a collect as income when nothing is owed", () => {
      const split = ledger.splitCollected({ amount0: 40n, amount1: 60n });

      expect(split.income).toEqual({ amount0: 40n, amount1: 60n });
      expect(split.principal).toEqual({ amount0: 0n, amount1: 0n });
    });

    it("carves recorded principal out of a collect", () => {
      ledger.recordPrincipalOwed({ amount0: 500n, amount1: 300n });

      const split = ledger.splitCollected({ amount0: 520n, amount1: 310n });

      expect(split.principal).toEqual({ amount0: 500n, amount1: 300n });
      expect(split.income).toEqual({ amount0: 20n, amount1: 10n });
      expect(ledger.owedPrincipal).toEqual({ amount0: 0n, amount1: 0n });
    });

    it("keeps the remainder owed after a partial collect", () => {
      ledger.recordPrincipalOwed({ amount0: 500n, amount1: 300n });

      const split = ledger.splitCollected({ amount0: 200n, amount1: 300n });

      expect(split.income).toEqual({ amount0: 0n, amount1: 0n });
      expect(ledger.owedPrincipal).toEqual({ amount0: 300n, amount1: 0n });
    });

    it("clears owed principal", () => {
      ledger.recordPrincipalOwed({ amount0: 1n, amount1: 1n });
      ledger.clearPrincipalOwed();
      expect(ledger.owedPrincipal).toEqual({ amount0: 0n, amount1: 0n });
    });
  });

  describe("snapshot", () => {
    it("restores what it snapshots", () => {
      ledger.recordPrincipalOwed({ amount0: 7n, amount1: 8n });
      ledger.accrue({ amount0: 1n, amount1: 2n });

      const snapshot = ledger.snapshot();
      const restored = new FeeLedger();
      restored.restore(snapshot);

      expect(snapshot).toEqual({
        accruedFee0: "1",
        accruedFee1: "2",
        owedPrincipal0: "7",
        owedPrincipal1: "8",
      });
      expect(restored.accrued).toEqual({ amount0: 1n, amount1: 2n });
      expect(restored.owedPrincipal).toEqual({ amount0: 7n, amount1: 8n });
    });
  });
});
