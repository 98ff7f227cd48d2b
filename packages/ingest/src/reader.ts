/**
 * @txreplay/ingest — Streaming CSV reader.
 *
 * Turns a delimited transaction log into TransactionRecords, one row
 * at a time, so the ledger can apply each record before the next one
 * is read.
 *
 * File format:
 *   type, client, tx, amount
 *   deposit, 1, 1, 1.0
 *   dispute, 1, 1,
 *
 * - Header names are matched case-insensitively, in any order
 * - Whitespace around fields is trimmed; a UTF-8 BOM is skipped
 * - Blank lines are skipped
 * - Short rows are allowed, so a dispute may omit the amount column
 */

import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { CsvError, parse } from "csv-parse";
import { z } from "zod";
import type { TransactionRecord } from "@txreplay/types";
import { REQUIRED_COLUMNS, TransactionRowSchema, formatIssues } from "./schema.js";
import { IngestError } from "./types.js";

/** A file path, or an already open stream of CSV text. */
export type TransactionSource = string | Readable;

/** What csv-parse emits per row with `info: true`. */
const ParsedChunkSchema = z.object({
  record: z.record(z.string()),
  info: z.object({ lines: z.number() }),
});

/**
 * Read transaction records from a CSV source.
 *
 * Throws IngestError on the first problem: an unreadable source,
 * malformed CSV, a missing header column or an invalid row. Records
 * yielded before the failure have already been handed out.
 */
export async function* readTransactions(
  source: TransactionSource,
): AsyncGenerator<TransactionRecord, void, undefined> {
  const label = typeof source === "string" ? source : "input stream";
  const input = typeof source === "string" ? createReadStream(source) : source;

  let missing: readonly string[] | undefined;
  const parser = parse({
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    info: true,
    columns: (header: string[]) => {
      const names = header.map((name) => name.toLowerCase());
      missing = REQUIRED_COLUMNS.filter((column) => !names.includes(column));
      return names;
    },
  });

  input.on("error", (err: Error) => parser.destroy(err));
  input.pipe(parser);

  try {
    for await (const chunk of parser) {
      assertColumns(missing);
      yield toRecord(chunk);
    }
    assertColumns(missing);
  } catch (err) {
    throw toIngestError(err, label);
  } finally {
    parser.destroy();
    if (typeof source === "string") {
      input.destroy();
    }
  }
}

/**
 * Read a whole CSV source into memory.
 */
export async function readAllTransactions(
  source: TransactionSource,
): Promise<readonly TransactionRecord[]> {
  const records: TransactionRecord[] = [];
  for await (const record of readTransactions(source)) {
    records.push(record);
  }
  return records;
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function assertColumns(missing: readonly string[] | undefined): void {
  if (missing !== undefined && missing.length > 0) {
    throw new IngestError(
      "MISSING_COLUMN",
      `Header is missing required column(s): ${missing.join(", ")}`,
      1,
    );
  }
}

function toRecord(chunk: unknown): TransactionRecord {
  const parsed = ParsedChunkSchema.safeParse(chunk);
  if (!parsed.success) {
    throw new IngestError("MALFORMED_CSV", `Unexpected parser output: ${formatIssues(parsed.error)}`);
  }

  const { record, info } = parsed.data;
  const row = TransactionRowSchema.safeParse(record);
  if (!row.success) {
    throw new IngestError(
      "INVALID_ROW",
      `Line ${String(info.lines)}: ${formatIssues(row.error)}`,
      info.lines,
    );
  }
  return row.data;
}

function toIngestError(err: unknown, label: string): unknown {
  if (err instanceof IngestError) {
    return err;
  }
  if (err instanceof CsvError) {
    return new IngestError("MALFORMED_CSV", `Malformed CSV in ${label}: ${err.message}`);
  }
  if (err instanceof Error && "syscall" in err) {
    return new IngestError("SOURCE_UNAVAILABLE", `Cannot read ${label}: ${err.message}`);
  }
  return err;
}
