/**
 * Position Lifecycle Controller
 *
 * The vault holds at most one position:
 *
 *   empty ──mint──▶ active(id) ──burn | closePosition──▶ empty
 *
 * increase, decrease and collectFees keep it active. Every operation
 * naming a position id must name the vault's own. All validation runs
 * before the first external call.
 */

import { NO_POSITION } from "@lpvault/types";
import type { PositionId, TokenAmounts } from "@lpvault/types";
import type { FeeSettlement } from "@lpvault/ledger";
import { assertRecipient, sameAddress } from "./addresses.js";
import { grantExactAllowance, revokeAllowance } from "./allowance.js";
import { VaultError, callEngine } from "./errors.js";
import type { TeardownSequence } from "./teardown.js";
import type {
  DecreaseLiquidityParams,
  IncreaseLiquidityParams,
  MintOutcome,
  MintParams,
  PositionState,
  PositionStatus,
  TeardownReport,
  VaultContext,
} from "./types.js";

// =============================================================================
// Transitions
// =============================================================================

export type LifecycleOperation =
  | "mint"
  | "increaseLiquidity"
  | "decreaseLiquidity"
  | "collectFees"
  | "burn"
  | "closePosition";

interface Transition {
  readonly from: PositionStatus;
  readonly to: PositionStatus;
}

export const LIFECYCLE_TRANSITIONS: Readonly<Record<LifecycleOperation, Transition>> = {
  mint: { from: "empty", to: "active" },
  increaseLiquidity: { from: "active", to: "active" },
  decreaseLiquidity: { from: "active", to: "active" },
  collectFees: { from: "active", to: "active" },
  burn: { from: "active", to: "empty" },
  closePosition: { from: "active", to: "empty" },
};

export function isLifecycleAllowed(
  status: PositionStatus,
  operation: LifecycleOperation,
): boolean {
  return LIFECYCLE_TRANSITIONS[operation].from === status;
}

// =============================================================================
// Controller
// =============================================================================

export class PositionLifecycle {
  private _state: PositionState = { status: "empty" };

  constructor(
    private readonly ctx: VaultContext,
    private readonly teardown: TeardownSequence,
  ) {}

  get state(): PositionState {
    return this._state;
  }

  get positionId(): PositionId {
    return this._state.status === "active" ? this._state.positionId : NO_POSITION;
  }

  /** Used by rollback and snapshot restore. */
  restore(positionId: PositionId): void {
    this._state =
      positionId === NO_POSITION ? { status: "empty" } : { status: "active", positionId };
  }

  // ─── Operations ───────────────────────────────────────────────────────

  async mint(params: MintParams): Promise<MintOutcome> {
    this.assertStatus("mint");
    const { pool, address, chain } = this.ctx;

    if (
      !sameAddress(params.token0, pool.token0) ||
      !sameAddress(params.token1, pool.token1) ||
      params.fee !== pool.fee
    ) {
      throw new VaultError(
        "INVALID_REFERENCE",
        `mint: ${params.token0}/${params.token1}/${params.fee} is not the vault's pool`,
        { operation: "mint" },
      );
    }
    assertRecipient(params.recipient, address, "mint");
    if (params.amount0Min === 0n || params.amount1Min === 0n) {
      throw new VaultError("SLIPPAGE_VIOLATION", "mint: both minimum amounts must be nonzero", {
        operation: "mint",
      });
    }

    const spender = chain.liquidity.address;
    await grantExactAllowance(chain.tokens, pool.token0, spender, params.amount0Desired);
    await grantExactAllowance(chain.tokens, pool.token1, spender, params.amount1Desired);

    const result = await callEngine("mint", () =>
      chain.liquidity.mint({
        token0: pool.token0,
        token1: pool.token1,
        fee: pool.fee,
        tickLower: params.tickLower,
        tickUpper: params.tickUpper,
        amount0Desired: params.amount0Desired,
        amount1Desired: params.amount1Desired,
        amount0Min: params.amount0Min,
        amount1Min: params.amount1Min,
        recipient: address,
        deadline: params.deadline,
      }),
    );

    await revokeAllowance(chain.tokens, pool.token0, spender);
    await revokeAllowance(chain.tokens, pool.token1, spender);

    if (result.tokenId === NO_POSITION) {
      throw new VaultError("INVALID_REFERENCE", "mint: engine returned position id 0", {
        operation: "mint",
      });
    }
    this._state = { status: "active", positionId: result.tokenId };

    this.ctx.emit("position.opened", {
      positionId: result.tokenId.toString(),
      tickLower: params.tickLower,
      tickUpper: params.tickUpper,
      liquidity: result.liquidity.toString(),
      amount0: result.amount0.toString(),
      amount1: result.amount1.toString(),
    });

    return {
      positionId: result.tokenId,
      liquidity: result.liquidity,
      amount0: result.amount0,
      amount1: result.amount1,
    };
  }

  async increaseLiquidity(params: IncreaseLiquidityParams): Promise<MintOutcome> {
    const positionId = this.assertOwnPosition("increaseLiquidity", params.tokenId);
    const { pool, chain } = this.ctx;

    const spender = chain.liquidity.address;
    await grantExactAllowance(chain.tokens, pool.token0, spender, params.amount0Desired);
    await grantExactAllowance(chain.tokens, pool.token1, spender, params.amount1Desired);

    const result = await callEngine("increaseLiquidity", () =>
      chain.liquidity.increaseLiquidity({
        tokenId: positionId,
        amount0Desired: params.amount0Desired,
        amount1Desired: params.amount1Desired,
        amount0Min: params.amount0Min,
        amount1Min: params.amount1Min,
        deadline: params.deadline,
      }),
    );

    await revokeAllowance(chain.tokens, pool.token0, spender);
    await revokeAllowance(chain.tokens, pool.token1, spender);

    this.ctx.emit("liquidity.increased", {
      positionId: positionId.toString(),
      liquidity: result.liquidity.toString(),
      amount0: result.amount0.toString(),
      amount1: result.amount1.toString(),
    });

    return { positionId, ...result };
  }

  /**
   * Remove part of the liquidity. The released principal stays owed by
   * the engine until the next collect, and the ledger records it so that
   * collect does not count it as income.
   */
  async decreaseLiquidity(params: DecreaseLiquidityParams): Promise<TokenAmounts> {
    const positionId = this.assertOwnPosition("decreaseLiquidity", params.tokenId);

    const released = await callEngine("decreaseLiquidity", () =>
      this.ctx.chain.liquidity.decreaseLiquidity({
        tokenId: positionId,
        liquidity: params.liquidity,
        amount0Min: params.amount0Min,
        amount1Min: params.amount1Min,
        deadline: params.deadline,
      }),
    );
    this.ctx.ledger.recordPrincipalOwed(released);

    this.ctx.emit("liquidity.decreased", {
      positionId: positionId.toString(),
      liquidity: params.liquidity.toString(),
      amount0: released.amount0.toString(),
      amount1: released.amount1.toString(),
    });

    return released;
  }

  async collectFees(): Promise<FeeSettlement> {
    const positionId = this.assertActive("collectFees");
    return this.teardown.collectFees(positionId, "collectFees");
  }

  async burn(tokenId: PositionId): Promise<void> {
    const positionId = this.assertOwnPosition("burn", tokenId);
    await this.ctx.chain.liquidity.burn(positionId);
    this.markEmpty(positionId);
  }

  async closePosition(): Promise<TeardownReport> {
    const positionId = this.assertActive("closePosition");
    return this.closeActive(positionId, "closePosition");
  }

  /**
   * Tear down and burn the active position, if there is one.
   */
  async closeIfActive(operation: string): Promise<TeardownReport | undefined> {
    if (this._state.status === "empty") return undefined;
    return this.closeActive(this._state.positionId, operation);
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private async closeActive(positionId: PositionId, operation: string): Promise<TeardownReport> {
    const report = await this.teardown.run(positionId, operation);
    await this.ctx.chain.liquidity.burn(positionId);
    this.markEmpty(positionId);

    this.ctx.emit("position.closed", {
      positionId: positionId.toString(),
      principal0: report.principal.amount0.toString(),
      principal1: report.principal.amount1.toString(),
    });
    return report;
  }

  private markEmpty(positionId: PositionId): void {
    this._state = { status: "empty" };
    this.ctx.ledger.clearPrincipalOwed();
    this.ctx.emit("position.burned", { positionId: positionId.toString() });
  }

  private assertStatus(operation: LifecycleOperation): void {
    if (!isLifecycleAllowed(this._state.status, operation)) {
      throw new VaultError(
        "INVALID_STATE",
        `${operation} is not allowed while the vault is ${this._state.status}`,
        { operation },
      );
    }
  }

  private assertActive(operation: LifecycleOperation): PositionId {
    this.assertStatus(operation);
    return this.positionId;
  }

  private assertOwnPosition(operation: LifecycleOperation, tokenId: PositionId): PositionId {
    const positionId = this.assertActive(operation);
    if (tokenId !== positionId) {
      throw new VaultError(
        "INVALID_REFERENCE",
        `${operation}: position ${tokenId} is not the vault's position ${positionId}`,
        { operation },
      );
    }
    return positionId;
  }
}
