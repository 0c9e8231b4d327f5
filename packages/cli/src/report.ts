/**
 * Terminal report of a reconciliation run.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { BalanceStatement, PartyPair } from "@splitledger/types";
import type { ReconciliationSummary } from "@splitledger/reconciler";

function describeBalance(balance: BalanceStatement): string {
  return balance.status === "balanced"
    ? `All square (${balance.amount.currency} ${balance.amount.amount})`
    : `${balance.debtor} owes ${balance.creditor} ${balance.amount.currency} ${balance.amount.amount}`;
}

/**
 * Render the summary as terminal lines. Pass a chalk instance with
 * `level: 0` for plain text.
 */
export function renderReport(
  summary: ReconciliationSummary,
  parties: PartyPair,
  outputs: readonly string[] = [],
  colors: ChalkInstance = chalk,
): string {
  const label = (text: string): string => colors.gray(`  ${text.padEnd(18)}`);
  const lines: string[] = [];

  lines.push(colors.cyan.bold(`  Reconciliation: ${parties.join(" & ")}`));
  lines.push(colors.gray(`  ${"─".repeat(48)}`));
  lines.push(label("Opening") + colors.white(describeBalance(summary.opening)));
  lines.push(label("Final balance") + colors.white.bold(describeBalance(summary.balance)));
  lines.push("");

  lines.push(label("Posted") + colors.white(String(summary.postedCount)));
  for (const [category, count] of Object.entries(summary.byCategory)) {
    if (count > 0) {
      lines.push(colors.gray(`    ${category.padEnd(16)}`) + colors.white(String(count)));
    }
  }
  lines.push(label("Resolved reviews") + colors.white(String(summary.resolvedCount)));

  const pending = `${String(summary.pendingCount)} (${summary.pendingTotal.currency} ${summary.pendingTotal.amount})`;
  lines.push(label("Pending review") + (summary.pendingCount > 0 ? colors.yellow(pending) : colors.white(pending)));
  lines.push(
    label("Skipped records")
      + (summary.skippedCount > 0 ? colors.yellow(String(summary.skippedCount)) : colors.white(String(summary.skippedCount))),
  );
  lines.push(
    label("Audit trail")
      + (summary.auditTrailValid ? colors.green("✓ chain verified") : colors.red("✗ chain broken")),
  );

  if (summary.pendingCount > 0) {
    lines.push("");
    lines.push(colors.yellow("  ! Pending items are not included in the final balance."));
  }

  if (outputs.length > 0) {
    lines.push("");
    for (const path of outputs) {
      lines.push(colors.gray("    → ") + colors.white(path));
    }
  }

  return lines.join("\n");
}
