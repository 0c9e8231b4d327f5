#!/usr/bin/env node
/**
 * @splitledger/cli — Entry point.
 *
 * Loads config, runs one reconciliation and prints the report.
 * Exit code 1 on any failure, including a ledger invariant violation.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { renderReport } from "./report.js";
import { runReconciliation } from "./run.js";

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config);

  try {
    const { policy, summary, outputs } = runReconciliation(config, logger);
    console.log();
    console.log(renderReport(summary, policy.parties, outputs));
    console.log();
  } catch (err) {
    logger.fatal({ err }, "Reconciliation failed");
    process.exitCode = 1;
  }
}

main();
