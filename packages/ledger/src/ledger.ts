/**
 * @txreplay/ledger — Core Ledger class.
 *
 * Replays a transaction log in arrival order against per-client
 * account state, consulting the transaction history to resolve
 * disputes, resolutions and chargebacks.
 *
 * API surface:
 * - apply() — Apply one record and report the outcome
 * - replay() — Apply every record of a finite sequence
 * - replayStream() — Apply every record of an async source
 * - getAccount() / getAccounts() / toMap() — Read account state
 * - lookup() — Read the history entry stored under a tx id
 * - checkBalances() — Verify total == available + held
 *
 * Rejected operations are never thrown. They come back as outcomes
 * and leave both the account and the history untouched.
 */

import type {
  AccountSnapshot,
  ClientId,
  ResolvedTransaction,
  TransactionKind,
  TransactionRecord,
  TxId,
} from "@txreplay/types";
import { isFundsKind } from "@txreplay/types";
import { ClientAccount } from "./account.js";
import { checkBalances } from "./balance-check.js";
import { TransactionHistory } from "./history.js";
import { normalizeAmount } from "./money-math.js";
import { ReplayTally } from "./summary.js";
import type {
  ApplyOutcome,
  BalanceReport,
  LedgerOptions,
  OperationResult,
  ReplaySummary,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * In-memory replay ledger.
 *
 * Owns every ClientAccount and the TransactionHistory for the lifetime
 * of one processing run. Nothing is shared between instances.
 */
export class Ledger {
  private readonly _accounts: Map<ClientId, ClientAccount> = new Map();
  private readonly _history: TransactionHistory = new TransactionHistory();
  private readonly _onOutcome: ((outcome: ApplyOutcome) => void) | undefined;

  constructor(options?: LedgerOptions) {
    this._onOutcome = options?.onOutcome;
  }

  // ─── Apply ───────────────────────────────────────────────────────────

  /**
   * Apply a single record.
   *
   * 1. Deposits and withdrawals act with their own amount; disputes,
   *    resolutions and chargebacks act with the history entry stored
   *    under their tx id
   * 2. A client's first record opens its account; the opening is the
   *    whole effect and counts as success
   * 3. Otherwise the matching account operation runs against the
   *    acting record
   * 4. On success, the record is stored with the acting amount
   *
   * Throws LedgerError if a deposit or withdrawal has no valid amount.
   */
  apply(record: TransactionRecord): ApplyOutcome {
    const outcome = this._apply(record);
    this._onOutcome?.(outcome);
    return outcome;
  }

  private _apply(record: TransactionRecord): ApplyOutcome {
    const acting = this._resolve(record);

    let account = this._accounts.get(record.client);
    const opened = account === undefined;
    if (account === undefined) {
      account = ClientAccount.open(record);
      this._accounts.set(record.client, account);
    }

    if (acting === undefined) {
      return { status: "rejected", record, reason: "MISSING_REFERENCE", opened };
    }

    // Opening the account is the whole effect of a client's first
    // record, whatever its kind.
    const result: OperationResult = opened ? { ok: true } : dispatch(account, record.kind, acting);

    if (!result.ok) {
      return { status: "rejected", record, reason: result.reason, opened };
    }

    const stored: ResolvedTransaction = {
      kind: record.kind,
      client: record.client,
      tx: record.tx,
      amount: acting.amount,
    };
    this._history.record(stored);

    return { status: "applied", record, stored, opened };
  }

  /**
   * Find the record an incoming record acts with.
   * Returns undefined when a dispute-family record references a tx
   * that has no history entry.
   */
  private _resolve(record: TransactionRecord): ResolvedTransaction | undefined {
    if (!isFundsKind(record.kind)) {
      return this._history.get(record.tx);
    }

    if (record.amount === undefined) {
      throw new LedgerError(
        "MISSING_AMOUNT",
        `${record.kind} tx ${String(record.tx)} for client ${String(record.client)} has no amount`,
      );
    }

    return {
      kind: record.kind,
      client: record.client,
      tx: record.tx,
      amount: normalizeAmount(record.amount),
    };
  }

  // ─── Replay ──────────────────────────────────────────────────────────

  /**
   * Apply every record of a finite sequence, in order.
   */
  replay(records: Iterable<TransactionRecord>): ReplaySummary {
    const tally = new ReplayTally();
    for (const record of records) {
      tally.add(this.apply(record));
    }
    return tally.summary();
  }

  /**
   * Apply every record of an async source, in order.
   * Each record is applied to completion before the next is read.
   * An error raised by the source rejects the returned promise.
   */
  async replayStream(records: AsyncIterable<TransactionRecord>): Promise<ReplaySummary> {
    const tally = new ReplayTally();
    for await (const record of records) {
      tally.add(this.apply(record));
    }
    return tally.summary();
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Get the current state of a client's account.
   */
  getAccount(client: ClientId): AccountSnapshot | undefined {
    return this._accounts.get(client)?.snapshot();
  }

  /**
   * Get every account, in the order clients were first seen.
   */
  getAccounts(): readonly AccountSnapshot[] {
    return [...this._accounts.values()].map((a) => a.snapshot());
  }

  /**
   * Get every account keyed by client id.
   */
  toMap(): ReadonlyMap<ClientId, AccountSnapshot> {
    const map = new Map<ClientId, AccountSnapshot>();
    for (const [client, account] of this._accounts) {
      map.set(client, account.snapshot());
    }
    return map;
  }

  /**
   * Get the history entry stored under a tx id.
   */
  lookup(tx: TxId): ResolvedTransaction | undefined {
    return this._history.get(tx);
  }

  /**
   * Verify that every account's total equals available + held.
   */
  checkBalances(): BalanceReport {
    return checkBalances(this.getAccounts());
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  get historySize(): number {
    return this._history.size;
  }
}

/**
 * Route a record kind to its account operation.
 */
function dispatch(
  account: ClientAccount,
  kind: TransactionKind,
  acting: ResolvedTransaction,
): OperationResult {
  switch (kind) {
    case "deposit":
      return account.deposit(acting);
    case "withdrawal":
      return account.withdrawal(acting);
    case "dispute":
      return account.dispute(acting);
    case "resolve":
      return account.resolve(acting);
    case "chargeback":
      return account.chargeback(acting);
  }
}
