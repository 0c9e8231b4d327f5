/**
 * @splitledger/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { BalanceStatement, PartyPair } from "@splitledger/types";
import { PartyRegistry, parseCurrencyText, toMoney } from "@splitledger/ledger";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Input & output
  RECON_INPUT_PATH: z.string().min(1),
  RECON_OUTPUT_DIR: z.string().min(1).default("reconciliation-out"),

  // Policy & review
  RECON_POLICY_PATH: z.string().min(1).optional(),
  RECON_DECISIONS_PATH: z.string().min(1).optional(),

  // Starting position, "debtor:creditor:amount"
  RECON_OPENING_BALANCE: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Opening Balance Parsing
// =============================================================================

/**
 * Parse the RECON_OPENING_BALANCE env var into a balance statement.
 *
 * Format: "debtor:creditor:amount", e.g. "Ryan:Jordyn:120.00".
 * Empty means the parties start even.
 */
export function parseOpeningBalance(
  raw: string,
  parties: PartyPair,
  currency: string,
  decimals: number,
): BalanceStatement | undefined {
  if (raw.trim() === "") {
    return undefined;
  }

  const parts = raw.trim().split(":");
  const [debtorName, creditorName, amountText] = parts;
  if (parts.length !== 3 || debtorName === undefined || creditorName === undefined || amountText === undefined) {
    throw new Error(
      `Invalid RECON_OPENING_BALANCE: "${raw.trim()}". Expected format: debtor:creditor:amount`,
    );
  }

  const registry = new PartyRegistry(parties);
  const debtor = registry.resolve(debtorName);
  const creditor = registry.resolve(creditorName);
  if (debtor === undefined || creditor === undefined) {
    throw new Error(
      `Unknown party in RECON_OPENING_BALANCE. Must be: ${parties.join(" or ")}`,
    );
  }
  if (debtor === creditor) {
    throw new Error("Debtor and creditor cannot be the same party in RECON_OPENING_BALANCE");
  }

  const scaled = parseCurrencyText(amountText, decimals);
  if (scaled === null || scaled < 0n) {
    throw new Error(`Invalid amount "${amountText}" in RECON_OPENING_BALANCE`);
  }

  const amount = toMoney(scaled, currency, decimals);
  return scaled === 0n
    ? { status: "balanced", amount }
    : { status: "owes", debtor, creditor, amount };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
