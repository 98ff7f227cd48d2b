/**
 * @txreplay/ledger — Client account state machine.
 *
 * Holds the mutable balances of one client. Every operation checks its
 * preconditions first and either applies the full effect or nothing.
 *
 * Rules:
 * - Balances are scaled bigints (see money-math)
 * - total is a running value, never recomputed from available + held
 * - Once locked, deposits and withdrawals are refused
 * - Dispute-family operations act on the amount of the referenced record
 */

import type {
  AccountSnapshot,
  ClientId,
  ResolvedTransaction,
  TransactionRecord,
} from "@txreplay/types";
import { formatAmount, parseAmount } from "./money-math.js";
import type { OperationResult, RejectionReason } from "./types.js";
import { LedgerError } from "./types.js";

const OK: OperationResult = { ok: true };

function reject(reason: RejectionReason): OperationResult {
  return { ok: false, reason };
}

export class ClientAccount {
  readonly client: ClientId;
  private _available: bigint;
  private _held = 0n;
  private _total: bigint;
  private _locked = false;

  private constructor(client: ClientId, opening: bigint) {
    this.client = client;
    this._available = opening;
    this._total = opening;
  }

  /**
   * Open an account for the client of a first-seen record.
   * Only a deposit funds the new account; anything else opens it empty.
   */
  static open(record: TransactionRecord): ClientAccount {
    if (record.kind !== "deposit") {
      return new ClientAccount(record.client, 0n);
    }
    if (record.amount === undefined) {
      throw new LedgerError(
        "MISSING_AMOUNT",
        `Deposit tx ${String(record.tx)} for client ${String(record.client)} has no amount`,
      );
    }
    return new ClientAccount(record.client, parseAmount(record.amount));
  }

  // ─── Operations ──────────────────────────────────────────────────────

  deposit(record: ResolvedTransaction): OperationResult {
    if (this._locked) return reject("ACCOUNT_LOCKED");
    if (record.client !== this.client) return reject("CLIENT_MISMATCH");

    const amount = parseAmount(record.amount);
    this._available += amount;
    this._total += amount;
    return OK;
  }

  /**
   * Insufficient funds is a rejection, never a partial withdrawal.
   */
  withdrawal(record: ResolvedTransaction): OperationResult {
    if (this._locked) return reject("ACCOUNT_LOCKED");
    if (record.client !== this.client) return reject("CLIENT_MISMATCH");

    const amount = parseAmount(record.amount);
    if (this._available < amount) return reject("INSUFFICIENT_FUNDS");

    this._available -= amount;
    this._total -= amount;
    return OK;
  }

  /**
   * Hold the amount of a referenced deposit or withdrawal.
   *
   * A withdrawal may be disputed even on a locked account;
   * a deposit only while the account is open.
   */
  dispute(referenced: ResolvedTransaction): OperationResult {
    if (referenced.client !== this.client) return reject("CLIENT_MISMATCH");

    switch (referenced.kind) {
      case "withdrawal":
        break;
      case "deposit":
        if (this._locked) return reject("ACCOUNT_LOCKED");
        break;
      default:
        return reject("INVALID_REFERENCE_KIND");
    }

    const amount = parseAmount(referenced.amount);
    this._held += amount;
    this._available -= amount;
    return OK;
  }

  /**
   * Release a held amount back to available. The referenced entry
   * must be the dispute that placed the hold.
   */
  resolve(referenced: ResolvedTransaction): OperationResult {
    if (referenced.kind !== "dispute") return reject("INVALID_REFERENCE_KIND");
    if (this._locked) return reject("ACCOUNT_LOCKED");
    if (referenced.client !== this.client) return reject("CLIENT_MISMATCH");

    const amount = parseAmount(referenced.amount);
    this._held -= amount;
    this._available += amount;
    return OK;
  }

  /**
   * Withdraw a held amount for good and lock the account.
   * The lock is not a precondition.
   */
  chargeback(referenced: ResolvedTransaction): OperationResult {
    if (referenced.kind !== "dispute") return reject("INVALID_REFERENCE_KIND");
    if (referenced.client !== this.client) return reject("CLIENT_MISMATCH");

    const amount = parseAmount(referenced.amount);
    this._locked = true;
    this._total -= amount;
    this._held -= amount;
    return OK;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get available(): bigint {
    return this._available;
  }

  get held(): bigint {
    return this._held;
  }

  get total(): bigint {
    return this._total;
  }

  get locked(): boolean {
    return this._locked;
  }

  snapshot(): AccountSnapshot {
    return {
      client: this.client,
      available: formatAmount(this._available),
      held: formatAmount(this._held),
      total: formatAmount(this._total),
      locked: this._locked,
    };
  }
}
