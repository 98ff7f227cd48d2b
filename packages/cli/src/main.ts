#!/usr/bin/env node
/**
 * @txreplay/cli — Entry point.
 *
 *   txreplay transactions.csv > accounts.csv
 */

import { run } from "./run.js";

run(process.argv, {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  color: process.stderr.isTTY,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exit(1);
  });
