/**
 * Runtime type guard tests for @txreplay/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  MAX_CLIENT_ID,
  MAX_TX_ID,
  isClientId,
  isTxId,
  isTransactionKind,
  isFundsKind,
  isReferenceKind,
  isDecimalString,
  isTransactionRecord,
  isResolvedTransaction,
  isAccountSnapshot,
} from "../src/guards.js";

// =============================================================================
// Identifiers
// =============================================================================

describe("isClientId", () => {
  it("accepts the full unsigned 16-bit range", () => {
    expect(isClientId(0)).toBe(true);
    expect(isClientId(MAX_CLIENT_ID)).toBe(true);
  });

  it("rejects out-of-range and non-integer values", () => {
    expect(isClientId(-1)).toBe(false);
    expect(isClientId(MAX_CLIENT_ID + 1)).toBe(false);
    expect(isClientId(1.5)).toBe(false);
    expect(isClientId("1")).toBe(false);
  });
});

describe("isTxId", () => {
  it("accepts the full unsigned 32-bit range", () => {
    expect(isTxId(0)).toBe(true);
    expect(isTxId(4294967295)).toBe(true);
  });

  it("rejects values past the 32-bit range", () => {
    expect(isTxId(MAX_TX_ID + 1)).toBe(false);
    expect(isTxId(-1)).toBe(false);
  });
});

// =============================================================================
// Kinds
// =============================================================================

describe("isTransactionKind", () => {
  it("accepts every kind", () => {
    for (const kind of ["deposit", "withdrawal", "dispute", "resolve", "chargeback"]) {
      expect(isTransactionKind(kind)).toBe(true);
    }
  });

  it("is case-sensitive", () => {
    expect(isTransactionKind("Deposit")).toBe(false);
  });

  it("rejects unknown kinds", () => {
    expect(isTransactionKind("refund")).toBe(false);
    expect(isTransactionKind(undefined)).toBe(false);
  });
});

describe("isFundsKind / isReferenceKind", () => {
  it("splits the kinds into two disjoint groups", () => {
    expect(isFundsKind("deposit")).toBe(true);
    expect(isFundsKind("withdrawal")).toBe(true);
    expect(isFundsKind("dispute")).toBe(false);

    expect(isReferenceKind("dispute")).toBe(true);
    expect(isReferenceKind("resolve")).toBe(true);
    expect(isReferenceKind("chargeback")).toBe(true);
    expect(isReferenceKind("deposit")).toBe(false);
    expect(isReferenceKind("unknown")).toBe(false);
  });
});

// =============================================================================
// Records
// =============================================================================

describe("isDecimalString", () => {
  it("accepts signed and unsigned decimals", () => {
    expect(isDecimalString("10")).toBe(true);
    expect(isDecimalString("10.5")).toBe(true);
    expect(isDecimalString("-0.0001")).toBe(true);
  });

  it("rejects malformed amounts", () => {
    expect(isDecimalString("")).toBe(false);
    expect(isDecimalString("1.")).toBe(false);
    expect(isDecimalString(".5")).toBe(false);
    expect(isDecimalString("+1")).toBe(false);
    expect(isDecimalString("1e3")).toBe(false);
    expect(isDecimalString(1)).toBe(false);
  });
});

describe("isTransactionRecord", () => {
  it("accepts a deposit with an amount", () => {
    expect(isTransactionRecord({ kind: "deposit", client: 1, tx: 1, amount: "1.0" })).toBe(true);
  });

  it("accepts a dispute without an amount", () => {
    expect(isTransactionRecord({ kind: "dispute", client: 1, tx: 1 })).toBe(true);
  });

  it("rejects null and non-objects", () => {
    expect(isTransactionRecord(null)).toBe(false);
    expect(isTransactionRecord("deposit")).toBe(false);
  });

  it("rejects a numeric amount", () => {
    expect(isTransactionRecord({ kind: "deposit", client: 1, tx: 1, amount: 1 })).toBe(false);
  });

  it("rejects an unknown kind", () => {
    expect(isTransactionRecord({ kind: "refund", client: 1, tx: 1 })).toBe(false);
  });
});

describe("isResolvedTransaction", () => {
  it("requires an amount", () => {
    expect(isResolvedTransaction({ kind: "dispute", client: 1, tx: 1, amount: "2" })).toBe(true);
    expect(isResolvedTransaction({ kind: "dispute", client: 1, tx: 1 })).toBe(false);
  });
});

describe("isAccountSnapshot", () => {
  it("accepts a formatted snapshot", () => {
    expect(
      isAccountSnapshot({
        client: 1,
        available: "1.5000",
        held: "0.0000",
        total: "1.5000",
        locked: false,
      }),
    ).toBe(true);
  });

  it("rejects a string locked flag", () => {
    expect(
      isAccountSnapshot({
        client: 1,
        available: "1.5000",
        held: "0.0000",
        total: "1.5000",
        locked: "false",
      }),
    ).toBe(false);
  });
});
