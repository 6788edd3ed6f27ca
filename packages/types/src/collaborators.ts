/**
 * Collaborator Interfaces
 *
 * Everything a vault consumes from the outside world. Each client is
 * bound to a caller identity: a vault's clients act as the vault
 * (the vault is the sender of every transfer, approval and engine call).
 *
 * Rules:
 * - Registry approval and protocol fees are read-through: implementations
 *   must answer from live state, never from a snapshot
 * - An engine rejecting an unmet minimum output throws SlippageRejection
 * - Any other thrown error aborts the calling operation
 */

import type {
  Address,
  PoolKey,
  PositionId,
  TokenAmounts,
} from "./chain.js";

// =============================================================================
// Liquidity engine
// =============================================================================

export interface MintRequest extends PoolKey {
  readonly tickLower: number;
  readonly tickUpper: number;
  readonly amount0Desired: bigint;
  readonly amount1Desired: bigint;
  readonly amount0Min: bigint;
  readonly amount1Min: bigint;
  readonly recipient: Address;
  /** Unix seconds */
  readonly deadline: bigint;
}

export interface MintResult extends TokenAmounts {
  readonly tokenId: PositionId;
  readonly liquidity: bigint;
}

export interface IncreaseLiquidityRequest {
  readonly tokenId: PositionId;
  readonly amount0Desired: bigint;
  readonly amount1Desired: bigint;
  readonly amount0Min: bigint;
  readonly amount1Min: bigint;
  readonly deadline: bigint;
}

export interface IncreaseLiquidityResult extends TokenAmounts {
  readonly liquidity: bigint;
}

export interface DecreaseLiquidityRequest {
  readonly tokenId: PositionId;
  readonly liquidity: bigint;
  readonly amount0Min: bigint;
  readonly amount1Min: bigint;
  readonly deadline: bigint;
}

export interface CollectRequest {
  readonly tokenId: PositionId;
  readonly recipient: Address;
  readonly amount0Max: bigint;
  readonly amount1Max: bigint;
}

/**
 * What the engine reports about a position.
 * `tokensOwed` only reflects amounts already credited to the position.
 */
export interface PositionSnapshot extends PoolKey {
  readonly tickLower: number;
  readonly tickUpper: number;
  readonly liquidity: bigint;
  readonly tokensOwed0: bigint;
  readonly tokensOwed1: bigint;
}

export interface LiquidityEngine {
  readonly address: Address;
  mint(request: MintRequest): Promise<MintResult>;
  increaseLiquidity(request: IncreaseLiquidityRequest): Promise<IncreaseLiquidityResult>;
  decreaseLiquidity(request: DecreaseLiquidityRequest): Promise<TokenAmounts>;
  collect(request: CollectRequest): Promise<TokenAmounts>;
  burn(tokenId: PositionId): Promise<void>;
  positions(tokenId: PositionId): Promise<PositionSnapshot>;
}

// =============================================================================
// Swap engine
// =============================================================================

export interface ExactInputSingleRequest {
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly fee: number;
  readonly recipient: Address;
  readonly amountIn: bigint;
  readonly amountOutMinimum: bigint;
  /** 0n means no price limit */
  readonly sqrtPriceLimitX96: bigint;
}

export interface SwapEngine {
  readonly address: Address;
  /** Returns the amount of tokenOut delivered to the recipient. */
  exactInputSingle(request: ExactInputSingleRequest): Promise<bigint>;
}

// =============================================================================
// Tokens and native currency
// =============================================================================

export interface TokenClient {
  balanceOf(token: Address, account: Address): Promise<bigint>;
  allowance(token: Address, owner: Address, spender: Address): Promise<bigint>;
  transfer(token: Address, to: Address, amount: bigint): Promise<void>;
  transferFrom(token: Address, from: Address, to: Address, amount: bigint): Promise<void>;
  approve(token: Address, spender: Address, amount: bigint): Promise<void>;
}

export interface NativeTransfer {
  nativeBalance(account: Address): Promise<bigint>;
  /**
   * Low-level value transfer. Resolves false when the recipient refuses
   * the payment; the sender keeps the amount in that case.
   */
  sendNative(to: Address, amount: bigint): Promise<boolean>;
}

export interface WrappedNative {
  readonly address: Address;
  /** Wraps `amount` of the caller's native balance. */
  deposit(amount: bigint): Promise<void>;
  /** Unwraps `amount` and pays native currency to the caller. */
  withdraw(amount: bigint): Promise<void>;
}

// =============================================================================
// Live configuration sources
// =============================================================================

export interface ManagerRegistryReader {
  isApproved(identity: Address): Promise<boolean>;
}

export interface ProtocolFees {
  /** Performance fee in basis points of swap income */
  readonly feeBps: number;
  readonly recipient: Address;
}

export interface FeeConfigSource {
  protocolFees(): Promise<ProtocolFees>;
}

// =============================================================================
// Execution environment
// =============================================================================

export interface Clock {
  /** Current time in unix seconds */
  now(): bigint;
}

/**
 * All-or-nothing scope for external effects. If `fn` throws, every
 * external state change it caused is rolled back before the error
 * propagates.
 */
export interface TransactionBoundary {
  transact<T>(fn: () => Promise<T>): Promise<T>;
}

/** Receives unsolicited native-currency payments. */
export interface NativeReceiver {
  receiveNative(sender: Address, amount: bigint): Promise<void>;
}

export interface PoolDirectory {
  describe(pool: Address): Promise<PoolKey>;
  /** Returns zeroAddress when no pool exists for the key. */
  getPool(token0: Address, token1: Address, fee: number): Promise<Address>;
}

/**
 * The clients available to one identity on a chain.
 */
export interface ChainConnections {
  readonly tokens: TokenClient;
  readonly native: NativeTransfer;
  readonly liquidity: LiquidityEngine;
  readonly swap: SwapEngine;
  readonly wrappedNative: WrappedNative;
  readonly clock: Clock;
  readonly boundary: TransactionBoundary;
}

export interface ChainConnector {
  connect(identity: Address): ChainConnections;
  registerNativeReceiver(address: Address, receiver: NativeReceiver): void;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown by an engine when an operation would deliver less than the
 * caller's minimum output.
 */
export class SlippageRejection extends Error {
  constructor(
    message: string,
    public readonly expected?: bigint,
    public readonly actual?: bigint,
  ) {
    super(message);
    this.name = "SlippageRejection";
  }
}
