/**
 * @txreplay/ingest — Row schema.
 *
 * Validates one CSV row (header name → trimmed field) and turns it
 * into a TransactionRecord using Zod.
 */

import { z } from "zod";
import type { TransactionRecord } from "@txreplay/types";
import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS } from "@txreplay/types";

// =============================================================================
// Columns
// =============================================================================

/** Header names every log must carry. */
export const REQUIRED_COLUMNS = ["type", "client", "tx", "amount"] as const;

const AMOUNT = /^-?\d+(\.\d{1,4})?$/;

function unsigned(label: string, max: number) {
  return z
    .string()
    .regex(/^\d+$/, `${label} must be an unsigned integer`)
    .transform(Number)
    .pipe(z.number().int().max(max, `${label} must be at most ${String(max)}`));
}

// =============================================================================
// Schema
// =============================================================================

export const TransactionRowSchema = z
  .object({
    type: z
      .string()
      .transform((v) => v.toLowerCase())
      .pipe(z.enum(TRANSACTION_KINDS)),
    client: unsigned("client", MAX_CLIENT_ID),
    tx: unsigned("tx", MAX_TX_ID),
    amount: z
      .string()
      .optional()
      .transform((v) => (v === undefined || v === "" ? undefined : v))
      .pipe(
        z
          .string()
          .regex(AMOUNT, "amount must be a decimal with at most 4 fractional digits")
          .optional(),
      ),
  })
  .superRefine((row, ctx) => {
    if ((row.type === "deposit" || row.type === "withdrawal") && row.amount === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["amount"],
        message: `${row.type} requires an amount`,
      });
    }
  })
  .transform((row): TransactionRecord =>
    row.amount === undefined
      ? { kind: row.type, client: row.client, tx: row.tx }
      : { kind: row.type, client: row.client, tx: row.tx, amount: row.amount },
  );

export type TransactionRow = z.input<typeof TransactionRowSchema>;

/**
 * Render Zod issues as "field: message; field: message".
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path === "" ? issue.message : `${path}: ${issue.message}`;
    })
    .join("; ");
}
