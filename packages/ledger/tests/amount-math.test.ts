/**
 * Tests for token amount arithmetic.
 */

import { describe, it, expect } from "vitest";
import {
  parseAmount,
  formatAmount,
  addAmounts,
  subtractSaturating,
  minAmounts,
  isZeroAmounts,
  parseUint,
} from "../src/amount-math.js";
import { LedgerError } from "../src/types.js";

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.5", 6)).toBe(100_500_000n);
  });

  it("parses with zero decimals", () => {
    expect(parseAmount("42", 0)).toBe(42n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  1.25 ", 2)).toBe(125n);
  });

  it("rejects more decimal places than the token allows", () => {
    expect(() => parseAmount("1.1234567", 6)).toThrow(
      'Amount "1.1234567" has 7 decimal places, but the token allows 6',
    );
  });

  it("rejects negative and malformed input", () => {
    expect(() => parseAmount("-1", 6)).toThrow(LedgerError);
    expect(() => parseAmount("1e6", 6)).toThrow(LedgerError);
    expect(() => parseAmount("", 6)).toThrow(LedgerError);
  });
});

describe("formatAmount", () => {
  it("formats with exact decimal places", () => {
    expect(formatAmount(100_500_000n, 6)).toBe("100.500000");
  });

  it("pads values smaller than one unit", () => {
    expect(formatAmount(5n, 6)).toBe("0.000005");
  });

  it("formats zero decimals as an integer", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });

  it("rejects negative amounts", () => {
    expect(() => formatAmount(-1n, 6)).toThrow("amount must not be negative");
  });
});

describe("pair arithmetic", () => {
  it("adds per token", () => {
    expect(addAmounts({ amount0: 1n, amount1: 2n }, { amount0: 10n, amount1: 20n })).toEqual({
      amount0: 11n,
      amount1: 22n,
    });
  });

  it("subtracts with a floor at zero", () => {
    expect(
      subtractSaturating({ amount0: 5n, amount1: 5n }, { amount0: 3n, amount1: 9n }),
    ).toEqual({ amount0: 2n, amount1: 0n });
  });

  it("takes the per-token minimum", () => {
    expect(minAmounts({ amount0: 5n, amount1: 1n }, { amount0: 3n, amount1: 9n })).toEqual({
      amount0: 3n,
      amount1: 1n,
    });
  });

  it("detects the zero pair", () => {
    expect(isZeroAmounts({ amount0: 0n, amount1: 0n })).toBe(true);
    expect(isZeroAmounts({ amount0: 0n, amount1: 1n })).toBe(false);
  });
});

describe("parseUint", () => {
  it("parses base-10 integers beyond 2^53", () => {
    expect(parseUint("340282366920938463463374607431768211455", "x")).toBe(
      (1n << 128n) - 1n,
    );
  });

  it("names the field on failure", () => {
    expect(() => parseUint("12.5", "accruedFee0")).toThrow(
      'accruedFee0 must be a base-10 integer string, got "12.5"',
    );
  });
});
