/**
 * @txreplay/ledger — Transaction history.
 *
 * Maps a tx id to the entry last applied under it. Dispute-family
 * records look up the record they reference here, which yields both
 * its amount and its kind.
 *
 * Only successfully applied records are written. A later success
 * under the same tx id replaces the earlier entry, which is how a
 * deposit becomes "under dispute" and then "resolved".
 */

import type { ResolvedTransaction, TxId } from "@txreplay/types";

export class TransactionHistory {
  private readonly _entries: Map<TxId, ResolvedTransaction> = new Map();

  /**
   * Store an entry under its tx id, replacing any previous one.
   */
  record(entry: ResolvedTransaction): void {
    this._entries.set(entry.tx, { ...entry });
  }

  /**
   * Get the entry stored under a tx id.
   * Returns undefined if nothing was applied under it.
   */
  get(tx: TxId): ResolvedTransaction | undefined {
    return this._entries.get(tx);
  }

  has(tx: TxId): boolean {
    return this._entries.has(tx);
  }

  get size(): number {
    return this._entries.size;
  }
}
