/**
 * Runtime Type Guards
 *
 * Narrowing functions for txreplay domain types.
 * These enable safe runtime validation at system boundaries
 * (parsed files, deserialized data, test fixtures).
 */

import type {
  AccountSnapshot,
  FundsKind,
  ReferenceKind,
  ResolvedTransaction,
  TransactionKind,
  TransactionRecord,
} from "./financial.js";

// =============================================================================
// Identifiers
// =============================================================================

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffff_ffff;

export function isClientId(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTxId(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TX_ID
  );
}

// =============================================================================
// Transaction kinds
// =============================================================================

export const TRANSACTION_KINDS = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
] as const satisfies readonly TransactionKind[];

const KINDS = new Set<string>(TRANSACTION_KINDS);
const FUNDS_KINDS = new Set<string>(["deposit", "withdrawal"]);

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isFundsKind(value: unknown): value is FundsKind {
  return typeof value === "string" && FUNDS_KINDS.has(value);
}

export function isReferenceKind(value: unknown): value is ReferenceKind {
  return isTransactionKind(value) && !FUNDS_KINDS.has(value);
}

// =============================================================================
// Records
// =============================================================================

const DECIMAL = /^-?\d+(\.\d+)?$/;

export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL.test(value);
}

export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTransactionKind(v.kind) &&
    isClientId(v.client) &&
    isTxId(v.tx) &&
    (v.amount === undefined || isDecimalString(v.amount))
  );
}

export function isResolvedTransaction(value: unknown): value is ResolvedTransaction {
  return isTransactionRecord(value) && typeof value.amount === "string";
}

export function isAccountSnapshot(value: unknown): value is AccountSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isClientId(v.client) &&
    isDecimalString(v.available) &&
    isDecimalString(v.held) &&
    isDecimalString(v.total) &&
    typeof v.locked === "boolean"
  );
}
