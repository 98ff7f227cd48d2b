/**
 * Financial Types
 *
 * Core primitives for replaying a client transaction log.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Records are immutable once parsed
 * - Account state leaves the ledger only as a readonly snapshot
 */

/**
 * Unsigned 16-bit client identifier.
 */
export type ClientId = number;

/**
 * Unsigned 32-bit transaction identifier.
 * Unique among deposits and withdrawals; dispute-family records
 * reuse the id of the record they reference.
 */
export type TxId = number;

/**
 * The five kinds of record a transaction log may carry.
 */
export type TransactionKind =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/** Kinds that move funds and carry their own amount. */
export type FundsKind = Extract<TransactionKind, "deposit" | "withdrawal">;

/** Kinds that act on a previously applied record, looked up by tx. */
export type ReferenceKind = Extract<TransactionKind, "dispute" | "resolve" | "chargeback">;

/**
 * A record as read from the transaction log.
 */
export interface TransactionRecord {
  readonly kind: TransactionKind;

  readonly client: ClientId;

  readonly tx: TxId;

  /**
   * Signed decimal string (e.g. "10.5", "-3").
   * Present for deposits and withdrawals; dispute-family records
   * have none of their own.
   */
  readonly amount?: string | undefined;
}

/**
 * A record whose amount is known.
 *
 * This is what the transaction history stores and what account
 * operations act on. For dispute-family records the amount is the
 * one of the record they reference.
 */
export interface ResolvedTransaction {
  readonly kind: TransactionKind;
  readonly client: ClientId;
  readonly tx: TxId;
  readonly amount: string;
}

/**
 * Final (or current) state of a single client account.
 * Amounts are formatted with four fractional digits.
 */
export interface AccountSnapshot {
  readonly client: ClientId;

  /** Funds usable for withdrawal. May go negative after a dispute. */
  readonly available: string;

  /** Funds frozen while a dispute is open. */
  readonly held: string;

  /** Running total, kept alongside available and held. */
  readonly total: string;

  /** True once a chargeback has occurred. */
  readonly locked: boolean;
}
