/**
 * @txreplay/types — Shared domain types for the txreplay packages.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  ClientId,
  TxId,
  TransactionKind,
  FundsKind,
  ReferenceKind,
  TransactionRecord,
  ResolvedTransaction,
  AccountSnapshot,
} from "./financial.js";

// Runtime type guards
export {
  MAX_CLIENT_ID,
  MAX_TX_ID,
  TRANSACTION_KINDS,
  isClientId,
  isTxId,
  isTransactionKind,
  isFundsKind,
  isReferenceKind,
  isDecimalString,
  isTransactionRecord,
  isResolvedTransaction,
  isAccountSnapshot,
} from "./guards.js";
