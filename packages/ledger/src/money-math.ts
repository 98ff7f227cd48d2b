/**
 * @txreplay/ledger — Fixed-precision monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Every amount carries exactly AMOUNT_DECIMALS fractional digits
 * - Amounts must be valid decimal strings
 */

import { LedgerError } from "./types.js";

/** Fractional digits kept for every balance. */
export const AMOUNT_DECIMALS = 4;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.5" → 1005000n
 * "100" → 1000000n
 * "-0.25" → -2500n
 */
export function parseAmount(amount: string, decimals: number = AMOUNT_DECIMALS): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but at most ${String(decimals)} are kept`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1005000n → "100.5000"
 * -2500n → "-0.2500"
 * 0n → "0.0000"
 */
export function formatAmount(scaled: bigint, decimals: number = AMOUNT_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Rewrite an amount in canonical form ("1.5" → "1.5000").
 */
export function normalizeAmount(amount: string): string {
  return formatAmount(parseAmount(amount));
}

/**
 * Sum decimal strings without leaving fixed precision.
 */
export function sumAmounts(...amounts: readonly string[]): string {
  let total = 0n;
  for (const amount of amounts) {
    total += parseAmount(amount);
  }
  return formatAmount(total);
}

/**
 * Compare two decimal strings. Returns -1, 0, or 1.
 */
export function compareAmounts(a: string, b: string): -1 | 0 | 1 {
  const va = parseAmount(a);
  const vb = parseAmount(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}
