/**
 * @txreplay/ledger — Internal types for the replay engine.
 *
 * These extend the shared @txreplay/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Rejected operations are outcomes, never exceptions
 * - Malformed input (a missing or unparseable amount) throws
 */

import type {
  ClientId,
  ResolvedTransaction,
  TransactionKind,
  TransactionRecord,
} from "@txreplay/types";

// ─── Operation Results ───────────────────────────────────────────────────

/**
 * Why an account operation did not take effect.
 *
 * - ACCOUNT_LOCKED: the account was frozen by a chargeback
 * - CLIENT_MISMATCH: the acting record belongs to another client
 * - INSUFFICIENT_FUNDS: a withdrawal exceeds the available balance
 * - INVALID_REFERENCE_KIND: the referenced record is of the wrong kind
 *   (e.g. resolving something that is not under dispute)
 * - MISSING_REFERENCE: no record was ever applied under the referenced tx
 */
export type RejectionReason =
  | "ACCOUNT_LOCKED"
  | "CLIENT_MISMATCH"
  | "INSUFFICIENT_FUNDS"
  | "INVALID_REFERENCE_KIND"
  | "MISSING_REFERENCE";

/**
 * Result of a single account operation.
 * A failed operation leaves the account untouched.
 */
export type OperationResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: RejectionReason };

// ─── Apply Outcomes ──────────────────────────────────────────────────────

/**
 * The record took effect and was stored in the history.
 */
export interface AppliedOutcome {
  readonly status: "applied";
  readonly record: TransactionRecord;
  /** The entry written to the history, with its amount resolved. */
  readonly stored: ResolvedTransaction;
  /** Whether this record opened the client's account. */
  readonly opened: boolean;
}

/**
 * The record was ignored. Nothing was stored.
 */
export interface RejectedOutcome {
  readonly status: "rejected";
  readonly record: TransactionRecord;
  readonly reason: RejectionReason;
  /** An empty account may still have been opened for the client. */
  readonly opened: boolean;
}

export type ApplyOutcome = AppliedOutcome | RejectedOutcome;

// ─── Replay Summary ──────────────────────────────────────────────────────

export interface KindCounts {
  readonly applied: number;
  readonly rejected: number;
}

/**
 * Counters for one replay run.
 */
export interface ReplaySummary {
  readonly processed: number;
  readonly applied: number;
  readonly rejected: number;
  readonly openedAccounts: number;
  readonly byKind: Readonly<Record<TransactionKind, KindCounts>>;
  readonly byReason: Readonly<Record<RejectionReason, number>>;
}

// ─── Ledger Options ──────────────────────────────────────────────────────

export interface LedgerOptions {
  /** Called after every apply, in arrival order. */
  readonly onOutcome?: ((outcome: ApplyOutcome) => void) | undefined;
}

// ─── Balance Check ───────────────────────────────────────────────────────

/**
 * An account whose running total drifted from available + held.
 */
export interface BalanceViolation {
  readonly client: ClientId;
  readonly available: string;
  readonly held: string;
  readonly total: string;
  /** available + held, formatted. */
  readonly expectedTotal: string;
}

export interface BalanceReport {
  readonly checked: number;
  readonly balanced: boolean;
  readonly violations: readonly BalanceViolation[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for malformed input reaching the ledger. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "MISSING_AMOUNT";

/**
 * Structured error from the ledger engine.
 * Thrown only for input that could never be applied;
 * rejected operations are reported through ApplyOutcome.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
