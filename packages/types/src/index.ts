/**
 * @lpvault/types — Shared domain types for the vault stack.
 *
 * Used across all packages:
 * - Chain primitives (addresses, pools, token amounts)
 * - Collaborator interfaces the vault consumes
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Chain types
export type {
  Address,
  PositionId,
  PoolKey,
  BoundPool,
  TokenAmounts,
} from "./chain.js";
export { NO_POSITION, ZERO_AMOUNTS, MAX_COLLECT_AMOUNT } from "./chain.js";

// Collaborators
export type {
  MintRequest,
  MintResult,
  IncreaseLiquidityRequest,
  IncreaseLiquidityResult,
  DecreaseLiquidityRequest,
  CollectRequest,
  PositionSnapshot,
  LiquidityEngine,
  ExactInputSingleRequest,
  SwapEngine,
  TokenClient,
  NativeTransfer,
  WrappedNative,
  ManagerRegistryReader,
  ProtocolFees,
  FeeConfigSource,
  Clock,
  TransactionBoundary,
  NativeReceiver,
  PoolDirectory,
  ChainConnections,
  ChainConnector,
} from "./collaborators.js";
export { SlippageRejection } from "./collaborators.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isPoolKey,
  isTokenAmounts,
  isUintString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
