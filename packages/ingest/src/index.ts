/**
 * @txreplay/ingest — Transaction log reader.
 *
 * Streams a CSV transaction log into validated TransactionRecords.
 * Every failure is an IngestError and ends the run.
 */

export { readTransactions, readAllTransactions } from "./reader.js";
export type { TransactionSource } from "./reader.js";

export { TransactionRowSchema, REQUIRED_COLUMNS, formatIssues } from "./schema.js";
export type { TransactionRow } from "./schema.js";

export { IngestError } from "./types.js";
export type { IngestErrorCode } from "./types.js";
