/**
 * @txreplay/cli — Command runner.
 *
 * Parses the command line, replays the named transaction log through a
 * fresh Ledger and writes the account report. Returns the process exit
 * code instead of exiting, so it can be driven from tests.
 *
 * Exit codes:
 * - 0: report written to stdout
 * - 1: bad arguments, bad configuration, unreadable or malformed input;
 *      a one-line diagnostic goes to stderr and stdout stays empty
 */

import { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import { Command, CommanderError } from "commander";
import type { DestinationStream } from "pino";
import { ZodError } from "zod";
import { formatIssues, readTransactions } from "@txreplay/ingest";
import { Ledger } from "@txreplay/ledger";
import type { ReplaySummary } from "@txreplay/ledger";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { renderReport } from "./render.js";

// =============================================================================
// Types
// =============================================================================

export interface RunIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Environment to read configuration from. Defaults to process.env. */
  readonly env?: Record<string, string | undefined> | undefined;
  /** Where log lines go. Defaults to stderr. */
  readonly logDestination?: DestinationStream | undefined;
  /** Colour the diagnostic line. */
  readonly color?: boolean | undefined;
}

// =============================================================================
// Runner
// =============================================================================

/**
 * Run the command line.
 *
 * @param argv - Full process argv (node binary and script first)
 */
export async function run(argv: readonly string[], io: RunIO): Promise<number> {
  const paint = new Chalk({ level: io.color === true ? 1 : 0 });
  let exitCode = 0;

  const program = new Command()
    .name("txreplay")
    .description("Replay a transaction log and print the final balance of every client")
    .argument("<file>", "CSV file with type, client, tx and amount columns")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(async (file: string) => {
      exitCode = await replayFile(file, io, paint);
    });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  return exitCode;
}

async function replayFile(
  file: string,
  io: RunIO,
  paint: ChalkInstance,
): Promise<number> {
  let logger: Logger | undefined;

  try {
    const config = loadConfig(io.env ?? process.env);
    const log = createLogger(config, io.logDestination);
    logger = log;

    const ledger = new Ledger({
      onOutcome: (outcome) => {
        if (outcome.status === "rejected") {
          const { client, tx, kind } = outcome.record;
          log.debug({ client, tx, kind, reason: outcome.reason }, "Record rejected");
        }
      },
    });

    log.info({ file }, "Replay started");
    const summary = await ledger.replayStream(readTransactions(file));

    const balances = ledger.checkBalances();
    if (!balances.balanced) {
      log.warn({ violations: balances.violations }, "Account totals drifted from available + held");
    }

    log.info(summaryFields(summary, ledger.accountCount), "Replay finished");
    io.stdout(renderReport(ledger.getAccounts()));
    return 0;
  } catch (err) {
    logger?.error({ err, file }, "Replay failed");
    io.stderr(`${paint.red(`error processing records: ${describeError(err)}`)}\n`);
    return 1;
  }
}

function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return `invalid configuration: ${formatIssues(err)}`;
  }
  return err instanceof Error ? err.message : String(err);
}

function summaryFields(summary: ReplaySummary, accounts: number): Record<string, unknown> {
  return {
    processed: summary.processed,
    applied: summary.applied,
    rejected: summary.rejected,
    accounts,
    byReason: summary.byReason,
  };
}
