/**
 * Native-Asset Receipt Guard
 *
 * Native currency is only ever expected from two places: the
 * wrapped-native contract paying out an unwrap, and the swap engine
 * refunding an unused input. Refunds are wrapped straight back.
 *
 * Not under the reentrancy lock: unwrap payouts arrive while
 * withdrawAll holds it.
 */

import { isPoolToken, sameAddress } from "./addresses.js";
import { VaultError } from "./errors.js";
import type { ReceiptOutcome, VaultContext } from "./types.js";
import type { Address } from "@lpvault/types";

export class NativeReceiptGuard {
  constructor(private readonly ctx: VaultContext) {}

  async receive(sender: Address, amount: bigint): Promise<ReceiptOutcome> {
    const { wrappedNative, swap } = this.ctx.chain;

    if (sameAddress(sender, wrappedNative.address)) {
      return "held";
    }

    if (sameAddress(sender, swap.address)) {
      if (!isPoolToken(this.ctx.pool, wrappedNative.address)) {
        throw new VaultError(
          "INVALID_REFERENCE",
          "Swap refund received but neither pool token is the wrapped-native asset",
          { operation: "receiveNative" },
        );
      }
      await wrappedNative.deposit(amount);
      return "rewrapped";
    }

    throw new VaultError("UNAUTHORIZED", `Native payment from ${sender} rejected`, {
      operation: "receiveNative",
    });
  }
}
