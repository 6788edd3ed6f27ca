/**
 * @lpvault/ledger — Fee/principal accounting for a single position.
 *
 * - FeeLedger: separates swap income from principal across a teardown
 * - Fee math: floor(income * feeBps / 10000), bigint only
 * - Amount math: decimal parsing/formatting and pair arithmetic
 */

export { FeeLedger } from "./fee-ledger.js";

export {
  BPS_DENOMINATOR,
  MAX_PROTOCOL_FEE_BPS,
  assertValidFeeBps,
  performanceFee,
  applyPerformanceFee,
} from "./fee-math.js";

export {
  parseAmount,
  formatAmount,
  assertNonNegative,
  addAmounts,
  subtractSaturating,
  minAmounts,
  isZeroAmounts,
  parseUint,
} from "./amount-math.js";

export { LedgerError } from "./types.js";
export type {
  LedgerErrorCode,
  CollectedSplit,
  FeeSettlement,
  LedgerSnapshot,
} from "./types.js";
