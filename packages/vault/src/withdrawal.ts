/**
 * Withdrawal Orchestrator
 *
 * The only path by which capital leaves the vault, and it is owner-only:
 * close the active position (if any), then sweep both pool tokens to the
 * owner. When the owner prefers native currency, a wrapped-native balance
 * is unwrapped and paid out as native currency instead.
 */

import { isPoolToken, sameAddress } from "./addresses.js";
import { VaultError } from "./errors.js";
import type { PositionLifecycle } from "./position-lifecycle.js";
import type { SweepOutcome, VaultContext, WithdrawalReport } from "./types.js";
import type { Address } from "@lpvault/types";

export class WithdrawalOrchestrator {
  constructor(
    private readonly ctx: VaultContext,
    private readonly lifecycle: PositionLifecycle,
  ) {}

  async withdrawAll(): Promise<WithdrawalReport> {
    const teardown = await this.lifecycle.closeIfActive("withdrawAll");
    const sweeps = [
      await this.sweep(this.ctx.pool.token0),
      await this.sweep(this.ctx.pool.token1),
    ];
    return { teardown, sweeps };
  }

  /**
   * Pull `amount` of a pool token from the owner into the vault.
   */
  async deposit(token: Address, amount: bigint): Promise<void> {
    if (!isPoolToken(this.ctx.pool, token)) {
      throw new VaultError("INVALID_REFERENCE", `deposit: ${token} is not a pool token`, {
        operation: "deposit",
      });
    }
    if (amount <= 0n) {
      throw new VaultError("INVALID_REFERENCE", "deposit: amount must be positive", {
        operation: "deposit",
      });
    }

    await this.ctx.chain.tokens.transferFrom(token, this.ctx.owner, this.ctx.address, amount);
    this.ctx.emit("deposited", {
      token,
      from: this.ctx.owner,
      amount: amount.toString(),
    });
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private async sweep(token: Address): Promise<SweepOutcome> {
    const { chain, owner, address } = this.ctx;
    const balance = await chain.tokens.balanceOf(token, address);
    if (balance === 0n) {
      return { token, kind: "skipped" };
    }

    if (this.ctx.settings.unwrapNative && sameAddress(token, chain.wrappedNative.address)) {
      await chain.wrappedNative.withdraw(balance);
      const sent = await chain.native.sendNative(owner, balance);
      if (!sent) {
        throw new VaultError(
          "TRANSFER_FAILURE",
          `withdrawAll: native transfer of ${balance} to ${owner} failed`,
          { operation: "withdrawAll" },
        );
      }
      this.ctx.emit("native.withdrawn", { to: owner, amount: balance.toString() });
      return { token, kind: "native", amount: balance };
    }

    await chain.tokens.transfer(token, owner, balance);
    this.ctx.emit("withdrawn", { token, to: owner, amount: balance.toString() });
    return { token, kind: "token", amount: balance };
  }
}
