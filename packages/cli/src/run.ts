/**
 * One reconciliation run: read input, reconcile, write exports.
 *
 * Output files (in RECON_OUTPUT_DIR):
 *   audit-trail.csv, audit-trail.jsonl, review-queue.csv, data-quality.csv
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { Ledger } from "@splitledger/ledger";
import {
  ReconciliationEngine,
  auditTrailToCsv,
  auditTrailToJsonl,
  dataQualityToCsv,
  defaultPolicy,
  loadDecisions,
  loadPolicy,
  normalizeBatch,
  reviewQueueToCsv,
} from "@splitledger/reconciler";
import type { Policy, ReconciliationSummary, ReviewDecision } from "@splitledger/reconciler";
import type { AppConfig } from "./config.js";
import { parseOpeningBalance } from "./config.js";

export interface RunResult {
  readonly policy: Policy;
  readonly summary: ReconciliationSummary;
  readonly outputs: readonly string[];
}

const InputSchema = z.array(z.unknown());

/**
 * Read the input file: a JSON array of raw records.
 */
export function readInput(path: string): unknown[] {
  const result = InputSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
  if (!result.success) {
    throw new Error(`Input at ${path} is not a JSON array of records`);
  }
  return result.data;
}

export function runReconciliation(config: AppConfig, logger: Logger): RunResult {
  const policy = config.RECON_POLICY_PATH === undefined
    ? defaultPolicy()
    : loadPolicy(config.RECON_POLICY_PATH);
  const decisions: ReadonlyMap<string, ReviewDecision> = config.RECON_DECISIONS_PATH === undefined
    ? new Map()
    : loadDecisions(config.RECON_DECISIONS_PATH);

  const opening = parseOpeningBalance(
    config.RECON_OPENING_BALANCE,
    policy.parties,
    policy.currency,
    policy.decimals,
  );

  const ledger = new Ledger({
    parties: policy.parties,
    currency: policy.currency,
    decimals: policy.decimals,
    opening,
  });
  const engine = new ReconciliationEngine({ ledger, policy, logger, decisions });

  const raws = readInput(config.RECON_INPUT_PATH);
  logger.info(
    { input: config.RECON_INPUT_PATH, records: raws.length, decisions: decisions.size },
    "Reconciliation started",
  );

  engine.process(normalizeBatch(raws, {
    parties: policy.parties,
    currency: policy.currency,
    decimals: policy.decimals,
  }));

  mkdirSync(config.RECON_OUTPUT_DIR, { recursive: true });
  const files: ReadonlyArray<readonly [string, string]> = [
    ["audit-trail.csv", auditTrailToCsv(engine.auditTrail(), policy.parties)],
    ["audit-trail.jsonl", auditTrailToJsonl(engine.auditTrail())],
    ["review-queue.csv", reviewQueueToCsv(engine.reviewItems())],
    ["data-quality.csv", dataQualityToCsv(engine.dataQualityLog())],
  ];

  const outputs: string[] = [];
  for (const [name, content] of files) {
    const path = join(config.RECON_OUTPUT_DIR, name);
    writeFileSync(path, `${content}\n`, "utf8");
    outputs.push(path);
  }
  logger.info({ outputDir: config.RECON_OUTPUT_DIR, files: outputs.length }, "Exports written");

  return { policy, summary: engine.summary(), outputs };
}
