/**
 * @txreplay/cli — Structured logging.
 *
 * JSON lines via pino, written to stderr so that stdout carries
 * nothing but the account report.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger };

export function createLogger(
  config: AppConfig,
  destination: DestinationStream = pino.destination(2),
): Logger {
  return pino({ name: "txreplay", level: config.LOG_LEVEL }, destination);
}
