/**
 * @lpvault/vault — Non-custodial concentrated-liquidity vault.
 *
 * One owner, one optional manager, at most one position.
 */

// Vault
export { Vault } from "./vault.js";
export type { VaultDependencies } from "./vault.js";

// Components
export { AuthorizationGate, OPERATION_CLASS } from "./authorization.js";
export type { Authority, GrantedAuthority } from "./authorization.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export {
  PositionLifecycle,
  LIFECYCLE_TRANSITIONS,
  isLifecycleAllowed,
} from "./position-lifecycle.js";
export type { LifecycleOperation } from "./position-lifecycle.js";
export { TeardownSequence } from "./teardown.js";
export { WithdrawalOrchestrator } from "./withdrawal.js";
export { RebalanceGate } from "./rebalance.js";
export { NativeReceiptGuard } from "./native-receipt.js";

// Configuration
export {
  AddressSchema,
  NonZeroAddressSchema,
  BoundPoolSchema,
  VaultConfigSchema,
  VaultSnapshotSchema,
  parseConfig,
} from "./config.js";
export type { VaultConfig, VaultConfigInput, VaultSnapshot } from "./config.js";

// Errors
export { VaultError, isVaultError, callEngine } from "./errors.js";
export type { VaultErrorCode, VaultErrorOptions } from "./errors.js";

// Helpers
export { sameAddress, isPoolToken, isPoolPair } from "./addresses.js";

// Types
export type {
  VaultOperation,
  OperationClass,
  PositionStatus,
  PositionState,
  MintParams,
  IncreaseLiquidityParams,
  DecreaseLiquidityParams,
  RebalanceParams,
  MintOutcome,
  TeardownStep,
  TeardownReport,
  SweepOutcome,
  WithdrawalReport,
  ReceiptOutcome,
  VaultSettings,
  VaultContext,
} from "./types.js";
