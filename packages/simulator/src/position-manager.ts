/**
 * Simulated Position Manager
 *
 * A concentrated-liquidity position engine reduced to what a vault
 * consumes: a flat 1:1 price (liquidity is amount0 + amount1), a
 * configurable fill ratio for slippage tests, proportional principal
 * withdrawal, and fee income injected by tests through `accrueFees`.
 *
 * Released principal and fees are credited to `tokensOwed` and only
 * leave the engine on `collect`.
 */

import { zeroAddress } from "viem";
import { SlippageRejection } from "@lpvault/types";
import type {
  Address,
  CollectRequest,
  DecreaseLiquidityRequest,
  IncreaseLiquidityRequest,
  IncreaseLiquidityResult,
  LiquidityEngine,
  MintRequest,
  MintResult,
  PositionId,
  PositionSnapshot,
  TokenAmounts,
} from "@lpvault/types";
import type { SimulatedChain } from "./chain.js";
import { SimulatorError } from "./errors.js";
import type { SimulatedPosition } from "./state.js";

const BPS = 10_000n;

export class SimulatedPositionManager {
  private fillBps = BPS;

  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
  ) {}

  /**
   * Fraction of the desired amounts a mint or increase actually uses,
   * in basis points. 10000 fills completely.
   */
  setFillRatio(bps: bigint): void {
    if (bps < 0n || bps > BPS) {
      throw new SimulatorError("INVALID_REQUEST", `Fill ratio ${bps} outside [0, ${BPS}]`);
    }
    this.fillBps = bps;
  }

  /** An engine client acting as `caller`. */
  bind(caller: Address): LiquidityEngine {
    return {
      address: this.address,
      mint: (request) => this.mint(caller, request),
      increaseLiquidity: (request) => this.increaseLiquidity(caller, request),
      decreaseLiquidity: (request) => this.decreaseLiquidity(caller, request),
      collect: (request) => this.collect(caller, request),
      burn: (tokenId) => this.burn(caller, tokenId),
      positions: async (tokenId) => this.positions(tokenId),
    };
  }

  // ─── Engine calls ─────────────────────────────────────────────────────

  async mint(caller: Address, request: MintRequest): Promise<MintResult> {
    this.checkDeadline(request.deadline);
    if (request.tickLower >= request.tickUpper) {
      throw new SimulatorError("INVALID_REQUEST", "tickLower must be below tickUpper");
    }
    const pool = await this.chain.getPool(request.token0, request.token1, request.fee);
    if (pool === zeroAddress) {
      throw new SimulatorError(
        "UNKNOWN_POOL",
        `No pool for ${request.token0}/${request.token1}/${request.fee}`,
      );
    }

    const used = this.fill(request);
    await this.pull(caller, request.token0, request.token1, used);

    const tokenId = this.chain.state.nextPositionId;
    this.chain.state.nextPositionId += 1n;
    const liquidity = used.amount0 + used.amount1;
    this.chain.state.positions.set(tokenId, {
      owner: request.recipient,
      token0: request.token0,
      token1: request.token1,
      fee: request.fee,
      tickLower: request.tickLower,
      tickUpper: request.tickUpper,
      liquidity,
      principal0: used.amount0,
      principal1: used.amount1,
      tokensOwed0: 0n,
      tokensOwed1: 0n,
    });

    return { tokenId, liquidity, ...used };
  }

  async increaseLiquidity(
    caller: Address,
    request: IncreaseLiquidityRequest,
  ): Promise<IncreaseLiquidityResult> {
    this.checkDeadline(request.deadline);
    const position = this.owned(caller, request.tokenId);

    const used = this.fill(request);
    await this.pull(caller, position.token0, position.token1, used);

    const liquidity = used.amount0 + used.amount1;
    position.liquidity += liquidity;
    position.principal0 += used.amount0;
    position.principal1 += used.amount1;
    return { liquidity, ...used };
  }

  async decreaseLiquidity(
    caller: Address,
    request: DecreaseLiquidityRequest,
  ): Promise<TokenAmounts> {
    this.checkDeadline(request.deadline);
    const position = this.owned(caller, request.tokenId);
    if (request.liquidity <= 0n || request.liquidity > position.liquidity) {
      throw new SimulatorError(
        "INVALID_REQUEST",
        `Cannot remove ${request.liquidity} of ${position.liquidity} liquidity`,
      );
    }

    const amount0 = (position.principal0 * request.liquidity) / position.liquidity;
    const amount1 = (position.principal1 * request.liquidity) / position.liquidity;
    if (amount0 < request.amount0Min || amount1 < request.amount1Min) {
      throw new SlippageRejection("Price slippage check", request.amount0Min, amount0);
    }

    position.liquidity -= request.liquidity;
    position.principal0 -= amount0;
    position.principal1 -= amount1;
    position.tokensOwed0 += amount0;
    position.tokensOwed1 += amount1;
    return { amount0, amount1 };
  }

  async collect(caller: Address, request: CollectRequest): Promise<TokenAmounts> {
    const position = this.owned(caller, request.tokenId);
    if (request.amount0Max === 0n && request.amount1Max === 0n) {
      throw new SimulatorError("INVALID_REQUEST", "Collect maximums are both zero");
    }

    const amount0 = min(position.tokensOwed0, request.amount0Max);
    const amount1 = min(position.tokensOwed1, request.amount1Max);
    position.tokensOwed0 -= amount0;
    position.tokensOwed1 -= amount1;

    if (amount0 > 0n) {
      await this.chain.transfer(position.token0, this.address, request.recipient, amount0);
    }
    if (amount1 > 0n) {
      await this.chain.transfer(position.token1, this.address, request.recipient, amount1);
    }
    return { amount0, amount1 };
  }

  async burn(caller: Address, tokenId: PositionId): Promise<void> {
    const position = this.owned(caller, tokenId);
    if (position.liquidity !== 0n || position.tokensOwed0 !== 0n || position.tokensOwed1 !== 0n) {
      throw new SimulatorError("INVALID_REQUEST", `Position ${tokenId} is not cleared`);
    }
    this.chain.state.positions.delete(tokenId);
  }

  positions(tokenId: PositionId): PositionSnapshot {
    const position = this.chain.position(tokenId);
    return {
      token0: position.token0,
      token1: position.token1,
      fee: position.fee,
      tickLower: position.tickLower,
      tickUpper: position.tickUpper,
      liquidity: position.liquidity,
      tokensOwed0: position.tokensOwed0,
      tokensOwed1: position.tokensOwed1,
    };
  }

  // ─── Test controls ────────────────────────────────────────────────────

  /**
   * Credit swap income to a live position. The engine is funded with
   * the tokens so a later collect can pay them out.
   */
  accrueFees(tokenId: PositionId, amount0: bigint, amount1: bigint): void {
    const position = this.chain.position(tokenId);
    if (position.liquidity === 0n) {
      throw new SimulatorError("INVALID_REQUEST", `Position ${tokenId} has no liquidity to earn fees`);
    }
    this.chain.mintTokens(position.token0, this.address, amount0);
    this.chain.mintTokens(position.token1, this.address, amount1);
    position.tokensOwed0 += amount0;
    position.tokensOwed1 += amount1;
  }

  /** Principal still backing the position's liquidity. */
  principalOf(tokenId: PositionId): TokenAmounts {
    const position = this.chain.position(tokenId);
    return { amount0: position.principal0, amount1: position.principal1 };
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private owned(caller: Address, tokenId: PositionId): SimulatedPosition {
    const position = this.chain.position(tokenId);
    if (position.owner.toLowerCase() !== caller.toLowerCase()) {
      throw new SimulatorError("NOT_OWNER", `${caller} does not own position ${tokenId}`);
    }
    return position;
  }

  private fill(request: {
    readonly amount0Desired: bigint;
    readonly amount1Desired: bigint;
    readonly amount0Min: bigint;
    readonly amount1Min: bigint;
  }): TokenAmounts {
    const amount0 = (request.amount0Desired * this.fillBps) / BPS;
    const amount1 = (request.amount1Desired * this.fillBps) / BPS;
    if (amount0 < request.amount0Min) {
      throw new SlippageRejection("Price slippage check", request.amount0Min, amount0);
    }
    if (amount1 < request.amount1Min) {
      throw new SlippageRejection("Price slippage check", request.amount1Min, amount1);
    }
    return { amount0, amount1 };
  }

  private async pull(
    caller: Address,
    token0: Address,
    token1: Address,
    amounts: TokenAmounts,
  ): Promise<void> {
    if (amounts.amount0 > 0n) {
      await this.chain.transferFrom(this.address, token0, caller, this.address, amounts.amount0);
    }
    if (amounts.amount1 > 0n) {
      await this.chain.transferFrom(this.address, token1, caller, this.address, amounts.amount1);
    }
  }

  private checkDeadline(deadline: bigint): void {
    if (deadline < this.chain.now()) {
      throw new SimulatorError("DEADLINE_EXPIRED", "Transaction too old");
    }
  }
}

function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
