/**
 * Tests for SimulatedChain — balances, journaling, native transfers, pools.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { zeroAddress } from "viem";
import type { Address } from "@lpvault/types";
import { SimulatedChain } from "../src/chain.js";
import { SimulatorError } from "../src/errors.js";

const TOKEN_A: Address = "0xa000000000000000000000000000000000000001";
const TOKEN_B: Address = "0xb000000000000000000000000000000000000002";
const ALICE: Address = "0x1000000000000000000000000000000000000001";
const BOB: Address = "0x2000000000000000000000000000000000000002";

describe("SimulatedChain", () => {
  let chain: SimulatedChain;

  beforeEach(() => {
    chain = new SimulatedChain({ startTime: 1_000n });
  });

  describe("tokens", () => {
    it("moves balances on transfer", async () => {
      chain.mintTokens(TOKEN_A, ALICE, 100n);

      await chain.connect(ALICE).tokens.transfer(TOKEN_A, BOB, 40n);

      expect(chain.balanceOf(TOKEN_A, ALICE)).toBe(60n);
      expect(chain.balanceOf(TOKEN_A, BOB)).toBe(40n);
    });

    it("treats addresses case-insensitively", () => {
      chain.mintTokens(TOKEN_A, ALICE, 5n);

      expect(chain.balanceOf("0xA000000000000000000000000000000000000001", ALICE)).toBe(5n);
    });

    it("rejects a transfer beyond the balance", async () => {
      chain.mintTokens(TOKEN_A, ALICE, 10n);

      await expect(
        chain.connect(ALICE).tokens.transfer(TOKEN_A, BOB, 11n),
      ).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
      expect(chain.balanceOf(TOKEN_A, ALICE)).toBe(10n);
    });

    it("spends allowance on transferFrom", async () => {
      chain.mintTokens(TOKEN_A, ALICE, 100n);
      await chain.connect(ALICE).tokens.approve(TOKEN_A, BOB, 70n);

      await chain.connect(BOB).tokens.transferFrom(TOKEN_A, ALICE, BOB, 50n);

      expect(chain.allowance(TOKEN_A, ALICE, BOB)).toBe(20n);
      expect(chain.balanceOf(TOKEN_A, BOB)).toBe(50n);
    });

    it("rejects transferFrom beyond the allowance", async () => {
      chain.mintTokens(TOKEN_A, ALICE, 100n);
      await chain.connect(ALICE).tokens.approve(TOKEN_A, BOB, 10n);

      await expect(
        chain.connect(BOB).tokens.transferFrom(TOKEN_A, ALICE, BOB, 11n),
      ).rejects.toMatchObject({ code: "INSUFFICIENT_ALLOWANCE" });
    });

    it("calls the receipt hook after the balance lands", async () => {
      chain.mintTokens(TOKEN_A, ALICE, 10n);
      const seen: bigint[] = [];
      chain.onTokenReceived(BOB, async (transfer) => {
        seen.push(chain.balanceOf(transfer.token, BOB));
      });

      await chain.connect(ALICE).tokens.transfer(TOKEN_A, BOB, 3n);

      expect(seen).toEqual([3n]);
    });
  });

  describe("transact", () => {
    it("keeps changes when the callback resolves", async () => {
      await chain.transact(async () => {
        chain.mintTokens(TOKEN_A, ALICE, 10n);
      });

      expect(chain.balanceOf(TOKEN_A, ALICE)).toBe(10n);
    });

    it("undoes every change when the callback throws", async () => {
      chain.mintTokens(TOKEN_A, ALICE, 10n);

      await expect(
        chain.transact(async () => {
          await chain.connect(ALICE).tokens.transfer(TOKEN_A, BOB, 10n);
          chain.fundNative(BOB, 5n);
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");

      expect(chain.balanceOf(TOKEN_A, ALICE)).toBe(10n);
      expect(chain.balanceOf(TOKEN_A, BOB)).toBe(0n);
      expect(chain.nativeBalance(BOB)).toBe(0n);
    });

    it("rolls back only the inner scope of a nested transaction", async () => {
      await chain.transact(async () => {
        chain.mintTokens(TOKEN_A, ALICE, 1n);
        await chain
          .transact(async () => {
            chain.mintTokens(TOKEN_A, ALICE, 100n);
            throw new Error("inner");
          })
          .catch((err: unknown) => {
            expect(err).toBeInstanceOf(Error);
          });
      });

      expect(chain.balanceOf(TOKEN_A, ALICE)).toBe(1n);
    });

    it("reverts a transfer whose receipt hook throws", async () => {
      chain.mintTokens(TOKEN_A, ALICE, 10n);
      chain.onTokenReceived(BOB, async () => {
        throw new Error("refused");
      });

      await expect(
        chain.transact(() => chain.connect(ALICE).tokens.transfer(TOKEN_A, BOB, 4n)),
      ).rejects.toThrow("refused");

      expect(chain.balanceOf(TOKEN_A, BOB)).toBe(0n);
    });
  });

  describe("native currency", () => {
    it("delivers to a plain account", async () => {
      chain.fundNative(ALICE, 10n);

      const sent = await chain.connect(ALICE).native.sendNative(BOB, 4n);

      expect(sent).toBe(true);
      expect(chain.nativeBalance(BOB)).toBe(4n);
    });

    it("notifies a registered receiver", async () => {
      chain.fundNative(ALICE, 10n);
      const receiveNative = vi.fn(async () => undefined);
      chain.registerNativeReceiver(BOB, { receiveNative });

      await chain.sendNative(ALICE, BOB, 7n);

      expect(receiveNative).toHaveBeenCalledWith(ALICE, 7n);
    });

    it("returns false and restores balances when the receiver refuses", async () => {
      chain.fundNative(ALICE, 10n);
      chain.registerNativeReceiver(BOB, {
        receiveNative: async () => {
          throw new Error("no thanks");
        },
      });

      const sent = await chain.sendNative(ALICE, BOB, 7n);

      expect(sent).toBe(false);
      expect(chain.nativeBalance(ALICE)).toBe(10n);
      expect(chain.nativeBalance(BOB)).toBe(0n);
    });

    it("payNative throws when the receiver refuses", async () => {
      chain.fundNative(ALICE, 10n);
      chain.registerNativeReceiver(BOB, {
        receiveNative: async () => {
          throw new Error("no thanks");
        },
      });

      await expect(chain.payNative(ALICE, BOB, 1n)).rejects.toMatchObject({
        code: "NATIVE_TRANSFER_FAILED",
      });
    });
  });

  describe("pools", () => {
    it("finds a pool by either token order", async () => {
      const pool = chain.createPool(TOKEN_A, TOKEN_B, 3000);

      expect(await chain.getPool(TOKEN_A, TOKEN_B, 3000)).toBe(pool);
      expect(await chain.getPool(TOKEN_B, TOKEN_A, 3000)).toBe(pool);
      expect(await chain.describe(pool)).toEqual({ token0: TOKEN_A, token1: TOKEN_B, fee: 3000 });
    });

    it("returns the existing pool for a repeated key", () => {
      expect(chain.createPool(TOKEN_A, TOKEN_B, 500)).toBe(chain.createPool(TOKEN_A, TOKEN_B, 500));
    });

    it("reports the zero address for an unknown key", async () => {
      chain.createPool(TOKEN_A, TOKEN_B, 3000);

      expect(await chain.getPool(TOKEN_A, TOKEN_B, 500)).toBe(zeroAddress);
    });

    it("refuses to describe an unknown pool", async () => {
      await expect(chain.describe(ALICE)).rejects.toBeInstanceOf(SimulatorError);
    });
  });

  describe("clock", () => {
    it("starts at the configured time and advances", () => {
      expect(chain.now()).toBe(1_000n);

      chain.advanceTime(30n);

      expect(chain.now()).toBe(1_030n);
    });
  });
});
