/**
 * Journaled chain state.
 *
 * Everything a transaction can change lives in one plain object so a
 * structured clone is a complete checkpoint. Maps are keyed by
 * lowercased addresses joined with ":".
 */

import type { Address, PositionId } from "@lpvault/types";

export interface SimulatedPosition {
  readonly owner: Address;
  readonly token0: Address;
  readonly token1: Address;
  readonly fee: number;
  readonly tickLower: number;
  readonly tickUpper: number;
  liquidity: bigint;
  /** Principal backing the remaining liquidity */
  principal0: bigint;
  principal1: bigint;
  tokensOwed0: bigint;
  tokensOwed1: bigint;
}

export interface ChainState {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
  native: Map<string, bigint>;
  positions: Map<PositionId, SimulatedPosition>;
  nextPositionId: PositionId;
  timestamp: bigint;
}

export function emptyState(timestamp: bigint): ChainState {
  return {
    balances: new Map(),
    allowances: new Map(),
    native: new Map(),
    positions: new Map(),
    nextPositionId: 1n,
    timestamp,
  };
}

export function stateKey(...parts: readonly string[]): string {
  return parts.map((part) => part.toLowerCase()).join(":");
}
