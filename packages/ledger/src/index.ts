/**
 * @txreplay/ledger — Transaction replay engine.
 *
 * Applies an ordered log of deposits, withdrawals, disputes,
 * resolutions and chargebacks to per-client accounts:
 * - Records are applied strictly in arrival order
 * - Disputes, resolutions and chargebacks resolve their amount and
 *   kind through the transaction history
 * - Rejected operations are outcomes, not errors
 * - All monetary arithmetic uses bigint (no floating point)
 * - Zero runtime dependencies beyond @txreplay/types
 */

// Core engine
export { Ledger } from "./ledger.js";

// Account state machine
export { ClientAccount } from "./account.js";

// Transaction history
export { TransactionHistory } from "./history.js";

// Balance invariant
export { checkBalances } from "./balance-check.js";

// Replay counters
export { ReplayTally } from "./summary.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  parseAmount,
  formatAmount,
  normalizeAmount,
  sumAmounts,
  compareAmounts,
} from "./money-math.js";

// Types
export type {
  RejectionReason,
  OperationResult,
  AppliedOutcome,
  RejectedOutcome,
  ApplyOutcome,
  KindCounts,
  ReplaySummary,
  LedgerOptions,
  BalanceViolation,
  BalanceReport,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
