/**
 * @txreplay/ledger — Replay counters.
 */

import type { TransactionKind } from "@txreplay/types";
import type {
  ApplyOutcome,
  KindCounts,
  RejectionReason,
  ReplaySummary,
} from "./types.js";

interface MutableKindCounts {
  applied: number;
  rejected: number;
}

/**
 * Accumulates apply outcomes into a ReplaySummary.
 */
export class ReplayTally {
  private _processed = 0;
  private _applied = 0;
  private _rejected = 0;
  private _opened = 0;
  private readonly _byKind = new Map<TransactionKind, MutableKindCounts>();
  private readonly _byReason = new Map<RejectionReason, number>();

  add(outcome: ApplyOutcome): void {
    this._processed++;
    if (outcome.opened) {
      this._opened++;
    }

    let counts = this._byKind.get(outcome.record.kind);
    if (counts === undefined) {
      counts = { applied: 0, rejected: 0 };
      this._byKind.set(outcome.record.kind, counts);
    }

    if (outcome.status === "applied") {
      this._applied++;
      counts.applied++;
    } else {
      this._rejected++;
      counts.rejected++;
      this._byReason.set(outcome.reason, (this._byReason.get(outcome.reason) ?? 0) + 1);
    }
  }

  summary(): ReplaySummary {
    return {
      processed: this._processed,
      applied: this._applied,
      rejected: this._rejected,
      openedAccounts: this._opened,
      byKind: {
        deposit: this._kindCounts("deposit"),
        withdrawal: this._kindCounts("withdrawal"),
        dispute: this._kindCounts("dispute"),
        resolve: this._kindCounts("resolve"),
        chargeback: this._kindCounts("chargeback"),
      },
      byReason: {
        ACCOUNT_LOCKED: this._reasonCount("ACCOUNT_LOCKED"),
        CLIENT_MISMATCH: this._reasonCount("CLIENT_MISMATCH"),
        INSUFFICIENT_FUNDS: this._reasonCount("INSUFFICIENT_FUNDS"),
        INVALID_REFERENCE_KIND: this._reasonCount("INVALID_REFERENCE_KIND"),
        MISSING_REFERENCE: this._reasonCount("MISSING_REFERENCE"),
      },
    };
  }

  private _kindCounts(kind: TransactionKind): KindCounts {
    const counts = this._byKind.get(kind);
    return { applied: counts?.applied ?? 0, rejected: counts?.rejected ?? 0 };
  }

  private _reasonCount(reason: RejectionReason): number {
    return this._byReason.get(reason) ?? 0;
  }
}
