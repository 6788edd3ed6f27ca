/**
 * Teardown Sequence
 *
 * Exits a position in a fixed order so the performance fee only ever
 * sees swap income:
 *
 *   1. collect-while-active: fees credited to live liquidity
 *   2. apply-performance-fee: charge the fee on step 1's income
 *   3. decrease-all-liquidity: pull every unit of principal
 *   4. collect-after-teardown: receive that principal, untaxed
 *
 * Steps 1 and 3 are skipped when the position holds no liquidity.
 * Step 3 passes zero minimum outputs.
 */

import { zeroAddress } from "viem";
import { LedgerError, addAmounts, assertValidFeeBps, isZeroAmounts } from "@lpvault/ledger";
import type { FeeSettlement } from "@lpvault/ledger";
import { MAX_COLLECT_AMOUNT, ZERO_AMOUNTS } from "@lpvault/types";
import type { PositionId, ProtocolFees, TokenAmounts } from "@lpvault/types";
import { sameAddress } from "./addresses.js";
import { VaultError, callEngine } from "./errors.js";
import type { TeardownReport, TeardownStep, VaultContext } from "./types.js";

export class TeardownSequence {
  constructor(private readonly ctx: VaultContext) {}

  /**
   * Steps 1–4. The position is left empty but not burned.
   */
  async run(positionId: PositionId, operation: string): Promise<TeardownReport> {
    const steps: TeardownStep[] = [];

    const harvested = await this.harvest(positionId, operation, steps);

    const { liquidity } = await this.ctx.chain.liquidity.positions(positionId);
    if (liquidity > 0n) {
      await this.decreaseAllLiquidity(positionId, liquidity, operation);
      steps.push("decrease-all-liquidity");
    }

    const released = await this.collectAfterTeardown(positionId);
    steps.push("collect-after-teardown");

    return {
      positionId,
      steps,
      settlement: harvested.settlement,
      principal: addAmounts(harvested.principal, released),
    };
  }

  /**
   * Steps 1–2 only. Liquidity is not touched.
   */
  async collectFees(positionId: PositionId, operation: string): Promise<FeeSettlement> {
    const { settlement } = await this.harvest(positionId, operation, []);
    return settlement;
  }

  // ─── Steps ────────────────────────────────────────────────────────────

  private async harvest(
    positionId: PositionId,
    operation: string,
    steps: TeardownStep[],
  ): Promise<{ settlement: FeeSettlement; principal: TokenAmounts }> {
    let principal = ZERO_AMOUNTS;

    const { liquidity } = await this.ctx.chain.liquidity.positions(positionId);
    if (liquidity > 0n) {
      principal = await this.collectWhileActive(positionId);
      steps.push("collect-while-active");
    }

    const settlement = await this.applyPerformanceFee(positionId, operation);
    steps.push("apply-performance-fee");

    return { settlement, principal };
  }

  private async collectWhileActive(positionId: PositionId): Promise<TokenAmounts> {
    const collected = await this.ctx.chain.liquidity.collect({
      tokenId: positionId,
      recipient: this.ctx.address,
      amount0Max: MAX_COLLECT_AMOUNT,
      amount1Max: MAX_COLLECT_AMOUNT,
    });
    const { income, principal } = this.ctx.ledger.splitCollected(collected);
    this.ctx.ledger.accrue(income);
    return principal;
  }

  private async applyPerformanceFee(
    positionId: PositionId,
    operation: string,
  ): Promise<FeeSettlement> {
    const fees = await this.ctx.feeSource.protocolFees();
    assertProtocolFees(fees, operation);

    const settlement = this.ctx.ledger.settle(fees.feeBps);
    const { tokens } = this.ctx.chain;
    if (settlement.fee.amount0 > 0n) {
      await tokens.transfer(this.ctx.pool.token0, fees.recipient, settlement.fee.amount0);
    }
    if (settlement.fee.amount1 > 0n) {
      await tokens.transfer(this.ctx.pool.token1, fees.recipient, settlement.fee.amount1);
    }

    if (!isZeroAmounts(settlement.income)) {
      this.ctx.emit("fee.taken", {
        positionId: positionId.toString(),
        recipient: fees.recipient,
        feeBps: settlement.feeBps,
        income0: settlement.income.amount0.toString(),
        income1: settlement.income.amount1.toString(),
        fee0: settlement.fee.amount0.toString(),
        fee1: settlement.fee.amount1.toString(),
      });
    }
    return settlement;
  }

  private async decreaseAllLiquidity(
    positionId: PositionId,
    liquidity: bigint,
    operation: string,
  ): Promise<void> {
    await callEngine(operation, () =>
      this.ctx.chain.liquidity.decreaseLiquidity({
        tokenId: positionId,
        liquidity,
        amount0Min: 0n,
        amount1Min: 0n,
        deadline: this.ctx.chain.clock.now(),
      }),
    );
  }

  private async collectAfterTeardown(positionId: PositionId): Promise<TokenAmounts> {
    const released = await this.ctx.chain.liquidity.collect({
      tokenId: positionId,
      recipient: this.ctx.address,
      amount0Max: MAX_COLLECT_AMOUNT,
      amount1Max: MAX_COLLECT_AMOUNT,
    });
    this.ctx.ledger.clearPrincipalOwed();
    return released;
  }
}

function assertProtocolFees(fees: ProtocolFees, operation: string): void {
  try {
    assertValidFeeBps(fees.feeBps);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new VaultError("CONFIGURATION_ERROR", `Protocol fee rejected: ${err.message}`, {
        operation,
        cause: err,
      });
    }
    throw err;
  }
  if (sameAddress(fees.recipient, zeroAddress)) {
    throw new VaultError("CONFIGURATION_ERROR", "Protocol fee recipient is the zero address", {
      operation,
    });
  }
}
