/**
 * @lpvault/vault — Types
 *
 * Operation parameters, reports and the shared context the vault's
 * components run against.
 */

import type { EventPayloads, EventType } from "@lpvault/event-store";
import type { FeeLedger, FeeSettlement } from "@lpvault/ledger";
import type {
  Address,
  BoundPool,
  ChainConnections,
  FeeConfigSource,
  PositionId,
  TokenAmounts,
} from "@lpvault/types";
import type { Logger } from "pino";

// =============================================================================
// Operations
// =============================================================================

export type VaultOperation =
  | "mint"
  | "increaseLiquidity"
  | "decreaseLiquidity"
  | "burn"
  | "collectFees"
  | "closePosition"
  | "rebalance"
  | "withdrawAll"
  | "deposit"
  | "setManager"
  | "setUnwrapNative";

/**
 * delegated: owner, or the current manager while the registry approves it.
 * capital: owner only.
 */
export type OperationClass = "delegated" | "capital";

// =============================================================================
// Position state
// =============================================================================

export type PositionStatus = "empty" | "active";

export type PositionState =
  | { readonly status: "empty" }
  | { readonly status: "active"; readonly positionId: PositionId };

// =============================================================================
// Parameters
// =============================================================================

export interface MintParams {
  readonly token0: Address;
  readonly token1: Address;
  readonly fee: number;
  readonly tickLower: number;
  readonly tickUpper: number;
  readonly amount0Desired: bigint;
  readonly amount1Desired: bigint;
  readonly amount0Min: bigint;
  readonly amount1Min: bigint;
  readonly recipient: Address;
  readonly deadline: bigint;
}

export interface IncreaseLiquidityParams {
  readonly tokenId: PositionId;
  readonly amount0Desired: bigint;
  readonly amount1Desired: bigint;
  readonly amount0Min: bigint;
  readonly amount1Min: bigint;
  readonly deadline: bigint;
}

export interface DecreaseLiquidityParams {
  readonly tokenId: PositionId;
  readonly liquidity: bigint;
  readonly amount0Min: bigint;
  readonly amount1Min: bigint;
  readonly deadline: bigint;
}

export interface RebalanceParams {
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly fee: number;
  readonly recipient: Address;
  readonly amountIn: bigint;
  readonly amountOutMinimum: bigint;
  readonly sqrtPriceLimitX96: bigint;
}

// =============================================================================
// Results
// =============================================================================

export interface MintOutcome extends TokenAmounts {
  readonly positionId: PositionId;
  readonly liquidity: bigint;
}

export type TeardownStep =
  | "collect-while-active"
  | "apply-performance-fee"
  | "decrease-all-liquidity"
  | "collect-after-teardown";

export interface TeardownReport {
  readonly positionId: PositionId;
  /** Steps that ran, in execution order */
  readonly steps: readonly TeardownStep[];
  readonly settlement: FeeSettlement;
  /** Principal received: owed principal carved out of step 1 plus step 4 */
  readonly principal: TokenAmounts;
}

export type SweepOutcome =
  | { readonly token: Address; readonly kind: "skipped" }
  | { readonly token: Address; readonly kind: "token"; readonly amount: bigint }
  | { readonly token: Address; readonly kind: "native"; readonly amount: bigint };

export interface WithdrawalReport {
  readonly teardown: TeardownReport | undefined;
  readonly sweeps: readonly SweepOutcome[];
}

export type ReceiptOutcome = "held" | "rewrapped";

// =============================================================================
// Shared context
// =============================================================================

/**
 * Owner-mutable settings.
 */
export interface VaultSettings {
  manager: Address;
  unwrapNative: boolean;
}

/**
 * What a vault component sees of the vault that owns it.
 */
export interface VaultContext {
  readonly address: Address;
  readonly owner: Address;
  readonly pool: BoundPool;
  readonly chain: ChainConnections;
  readonly feeSource: FeeConfigSource;
  readonly ledger: FeeLedger;
  readonly settings: VaultSettings;
  readonly logger: Logger;
  /** Buffer a notification in the running operation's outbox */
  emit<T extends EventType>(type: T, payload: EventPayloads[T]): void;
}
