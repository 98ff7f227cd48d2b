/**
 * @txreplay/cli — Package public API.
 */

export { run } from "./run.js";
export type { RunIO } from "./run.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { renderReport, renderAccount, REPORT_HEADER } from "./render.js";
