/**
 * Tests for report.ts — rendered with colors off.
 */

import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import type { Money } from "@splitledger/types";
import type { ReconciliationSummary } from "@splitledger/reconciler";
import { renderReport } from "../src/report.js";

const plain = new Chalk({ level: 0 });

function usd(amount: string): Money {
  return { amount, currency: "USD", decimals: 2 };
}

const SUMMARY: ReconciliationSummary = {
  opening: { status: "balanced", amount: usd("0.00") },
  balance: { status: "owes", debtor: "Ryan", creditor: "Jordyn", amount: usd("353.00") },
  postedCount: 3,
  pendingCount: 1,
  pendingTotal: usd("80.00"),
  resolvedCount: 0,
  skippedCount: 2,
  byCategory: { rent: 1, settlement: 1, personal: 0, income: 0, "shared-expense": 1 },
  auditTrailValid: true,
};

describe("renderReport", () => {
  it("shows the opening and final balances", () => {
    const lines = renderReport(SUMMARY, ["Ryan", "Jordyn"], [], plain).split("\n");
    expect(lines[0]).toBe("  Reconciliation: Ryan & Jordyn");
    expect(lines).toContain("  Opening           All square (USD 0.00)");
    expect(lines).toContain("  Final balance     Ryan owes Jordyn USD 353.00");
  });

  it("lists posted categories with a non-zero count", () => {
    const lines = renderReport(SUMMARY, ["Ryan", "Jordyn"], [], plain).split("\n");
    expect(lines).toContain("  Posted            3");
    expect(lines).toContain("    rent            1");
    expect(lines).toContain("    shared-expense  1");
    expect(lines.some((l) => l.includes("income"))).toBe(false);
  });

  it("reports pending and skipped counts separately from the balance", () => {
    const lines = renderReport(SUMMARY, ["Ryan", "Jordyn"], [], plain).split("\n");
    expect(lines).toContain("  Pending review    1 (USD 80.00)");
    expect(lines).toContain("  Skipped records   2");
    expect(lines).toContain("  ! Pending items are not included in the final balance.");
  });

  it("reports the audit chain status", () => {
    const valid = renderReport(SUMMARY, ["Ryan", "Jordyn"], [], plain).split("\n");
    expect(valid).toContain("  Audit trail       ✓ chain verified");

    const broken = renderReport({ ...SUMMARY, auditTrailValid: false }, ["Ryan", "Jordyn"], [], plain).split("\n");
    expect(broken).toContain("  Audit trail       ✗ chain broken");
  });

  it("lists written files", () => {
    const lines = renderReport(SUMMARY, ["Ryan", "Jordyn"], ["out/audit-trail.csv"], plain).split("\n");
    expect(lines[lines.length - 1]).toBe("    → out/audit-trail.csv");
  });
});
