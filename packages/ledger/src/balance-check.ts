/**
 * @txreplay/ledger — Balance invariant check.
 *
 * Pure function over account snapshots. For every account the running
 * total must equal available + held. Accounts only ever mutated through
 * ClientAccount operations always pass; a violation means state was
 * built some other way.
 */

import type { AccountSnapshot } from "@txreplay/types";
import { compareAmounts, sumAmounts } from "./money-math.js";
import type { BalanceReport, BalanceViolation } from "./types.js";

/**
 * Check total == available + held for each account.
 */
export function checkBalances(accounts: Iterable<AccountSnapshot>): BalanceReport {
  const violations: BalanceViolation[] = [];
  let checked = 0;

  for (const account of accounts) {
    checked++;
    const expectedTotal = sumAmounts(account.available, account.held);

    if (compareAmounts(account.total, expectedTotal) !== 0) {
      violations.push({
        client: account.client,
        available: account.available,
        held: account.held,
        total: account.total,
        expectedTotal,
      });
    }
  }

  return {
    checked,
    balanced: violations.length === 0,
    violations,
  };
}
