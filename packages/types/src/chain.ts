/**
 * Chain Types
 *
 * Primitives shared by the vault, the factory and the simulated chain.
 *
 * Rules:
 * - Addresses are viem `Address` values, checksummed at system boundaries
 * - Token amounts and position ids are bigint (raw integer units)
 * - A position id of 0n means "no position"
 */

import type { Address } from "viem";

export type { Address };

/**
 * A concentrated-liquidity position id issued by the liquidity engine.
 */
export type PositionId = bigint;

/** The sentinel position id used while no position is held. */
export const NO_POSITION: PositionId = 0n;

/**
 * The identity of a pool: its ordered token pair and fee tier.
 */
export interface PoolKey {
  readonly token0: Address;
  readonly token1: Address;

  /** Fee tier in hundredths of a basis point (500 = 0.05%) */
  readonly fee: number;
}

/**
 * A pool a vault is bound to for its whole lifetime.
 */
export interface BoundPool extends PoolKey {
  readonly address: Address;
}

/**
 * A pair of raw token amounts, ordered as token0 / token1.
 */
export interface TokenAmounts {
  readonly amount0: bigint;
  readonly amount1: bigint;
}

/** Both amounts zero. */
export const ZERO_AMOUNTS: TokenAmounts = { amount0: 0n, amount1: 0n };

/** The largest amount a collect call may request (uint128 max). */
export const MAX_COLLECT_AMOUNT = (1n << 128n) - 1n;
