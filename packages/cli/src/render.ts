/**
 * @txreplay/cli — Account report.
 *
 *   client, available, held, total, locked
 *   1,1.5000,0.0000,1.5000,false
 */

import type { AccountSnapshot } from "@txreplay/types";

export const REPORT_HEADER = "client, available, held, total, locked";

export function renderAccount(account: AccountSnapshot): string {
  return [
    String(account.client),
    account.available,
    account.held,
    account.total,
    String(account.locked),
  ].join(",");
}

/**
 * Header line plus one line per account, newline-terminated.
 */
export function renderReport(accounts: readonly AccountSnapshot[]): string {
  const lines = [REPORT_HEADER, ...accounts.map(renderAccount)];
  return `${lines.join("\n")}\n`;
}
