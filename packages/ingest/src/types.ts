/**
 * @txreplay/ingest — Error types for reading transaction logs.
 */

/**
 * Error codes for input that cannot be turned into records.
 *
 * - SOURCE_UNAVAILABLE: the file cannot be opened or read
 * - MISSING_COLUMN: the header row lacks a required column
 * - MALFORMED_CSV: the text is not valid delimited data
 * - INVALID_ROW: a row does not describe a well-formed record
 */
export type IngestErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "MISSING_COLUMN"
  | "MALFORMED_CSV"
  | "INVALID_ROW";

/**
 * Structured error from the reader. Always fatal for the run.
 */
export class IngestError extends Error {
  public readonly code: IngestErrorCode;
  /** 1-based line of the offending row, when known. */
  public readonly line: number | undefined;

  constructor(code: IngestErrorCode, message: string, line?: number) {
    super(message);
    this.name = "IngestError";
    this.code = code;
    this.line = line;
  }
}
