/**
 * Tests for the CSV row schema.
 */

import { describe, it, expect } from "vitest";
import { TRANSACTION_KINDS } from "@txreplay/types";
import { TransactionRowSchema, formatIssues } from "../src/schema.js";

function parseRow(row: Record<string, string>) {
  return TransactionRowSchema.safeParse(row);
}

function issues(row: Record<string, string>): string {
  const result = parseRow(row);
  if (result.success) {
    throw new Error("expected the row to be rejected");
  }
  return formatIssues(result.error);
}

// =============================================================================
// Valid rows
// =============================================================================

describe("TransactionRowSchema — valid rows", () => {
  it.each(TRANSACTION_KINDS)("accepts the %s kind", (kind) => {
    const result = parseRow({ type: kind.toUpperCase(), client: "1", tx: "1", amount: "1" });
    expect(result.success && result.data).toEqual({ kind, client: 1, tx: 1, amount: "1" });
  });

  it("parses a deposit", () => {
    const result = parseRow({ type: "deposit", client: "1", tx: "1", amount: "1.0" });
    expect(result.success && result.data).toEqual({ kind: "deposit", client: 1, tx: 1, amount: "1.0" });
  });

  it("parses a dispute with an empty amount as having none", () => {
    const result = parseRow({ type: "dispute", client: "2", tx: "5", amount: "" });
    expect(result.success && result.data).toEqual({ kind: "dispute", client: 2, tx: 5 });
  });

  it("parses a dispute with no amount column", () => {
    const result = parseRow({ type: "resolve", client: "2", tx: "5" });
    expect(result.success && result.data).toEqual({ kind: "resolve", client: 2, tx: 5 });
  });

  it("keeps an amount carried by a dispute-family row", () => {
    const result = parseRow({ type: "chargeback", client: "2", tx: "5", amount: "3" });
    expect(result.success && result.data).toEqual({ kind: "chargeback", client: 2, tx: 5, amount: "3" });
  });

  it("accepts the type in any case", () => {
    const result = parseRow({ type: "Withdrawal", client: "1", tx: "2", amount: "0.5" });
    expect(result.success && result.data).toMatchObject({ kind: "withdrawal" });
  });

  it("accepts the edges of the id ranges", () => {
    const result = parseRow({ type: "deposit", client: "65535", tx: "4294967295", amount: "1" });
    expect(result.success && result.data).toMatchObject({ client: 65535, tx: 4294967295 });
  });

  it("accepts a negative amount", () => {
    const result = parseRow({ type: "deposit", client: "1", tx: "1", amount: "-2.5" });
    expect(result.success && result.data).toMatchObject({ amount: "-2.5" });
  });
});

// =============================================================================
// Invalid rows
// =============================================================================

describe("TransactionRowSchema — invalid rows", () => {
  it("rejects an unknown type", () => {
    expect(issues({ type: "refund", client: "1", tx: "1", amount: "1" })).toMatch(/^type: /);
  });

  it("rejects a non-numeric client", () => {
    expect(issues({ type: "deposit", client: "abc", tx: "1", amount: "1" })).toBe(
      "client: client must be an unsigned integer",
    );
  });

  it("rejects a client beyond 16 bits", () => {
    expect(issues({ type: "deposit", client: "65536", tx: "1", amount: "1" })).toBe(
      "client: client must be at most 65535",
    );
  });

  it("rejects a negative tx", () => {
    expect(issues({ type: "deposit", client: "1", tx: "-1", amount: "1" })).toBe(
      "tx: tx must be an unsigned integer",
    );
  });

  it("rejects a non-numeric amount", () => {
    expect(issues({ type: "deposit", client: "1", tx: "1", amount: "ten" })).toBe(
      "amount: amount must be a decimal with at most 4 fractional digits",
    );
  });

  it("rejects an amount with more than four decimals", () => {
    expect(issues({ type: "deposit", client: "1", tx: "1", amount: "1.00001" })).toBe(
      "amount: amount must be a decimal with at most 4 fractional digits",
    );
  });

  it("requires an amount for deposits and withdrawals", () => {
    expect(issues({ type: "deposit", client: "1", tx: "1", amount: "" })).toBe(
      "amount: deposit requires an amount",
    );
    expect(issues({ type: "withdrawal", client: "1", tx: "1" })).toBe(
      "amount: withdrawal requires an amount",
    );
  });

  it("rejects a missing tx", () => {
    expect(issues({ type: "dispute", client: "1" })).toBe("tx: Required");
  });
});
