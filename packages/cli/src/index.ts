/**
 * @splitledger/cli — Command-line runner.
 */

export { ConfigSchema, loadConfig, parseOpeningBalance } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { renderReport } from "./report.js";
export { readInput, runReconciliation } from "./run.js";
export type { RunResult } from "./run.js";
