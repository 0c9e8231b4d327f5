/**
 * Property-Based Tests for @splitledger/reconciler
 *
 * For any batch of records:
 *
 * 1. Reconciling twice yields the same audit chain
 * 2. The final net equals the signed sum of audited cross-shares
 * 3. Every audited transaction's shares sum to its amount
 * 4. Input order does not change the final balance
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Ledger, computeNet, formatAmount, scaledOf } from "@splitledger/ledger";
import { normalizeBatch } from "../src/intake.js";
import type { RawRecord } from "../src/intake.js";
import { defaultPolicy } from "../src/policy.js";
import { ReconciliationEngine } from "../src/reconciler.js";

// =============================================================================
// Arbitraries
// =============================================================================

const policy = defaultPolicy();

const DESCRIPTIONS = [
  "Groceries",
  "Costco",
  "Rent",
  "Zelle from Ryan",
  "Venmo to Ryan",
  "Card autopay",
  "Payroll",
  "Dinner - discuss",
  "Dinner 70% Jordyn",
  "Target (10 + 5)",
  "Birthday gift from Jordyn",
] as const;

const arbRecord = fc.record({
  day: fc.integer({ min: 1, max: 28 }),
  payer: fc.constantFrom("Ryan", "Jordyn"),
  description: fc.constantFrom(...DESCRIPTIONS),
  cents: fc.integer({ min: 1, max: 600_000 }),
});

type ArbRecord = { day: number; payer: string; description: string; cents: number };

function toRaw(records: readonly ArbRecord[]): RawRecord[] {
  return records.map((r, i) => ({
    date: `2024-03-${String(r.day).padStart(2, "0")}`,
    payer: r.payer,
    description: r.description,
    amount: formatAmount(BigInt(r.cents), 2),
    source: `gen:${String(i)}`,
  }));
}

function run(raws: readonly RawRecord[]): { ledger: Ledger; engine: ReconciliationEngine } {
  const ledger = new Ledger({ parties: policy.parties, currency: "USD", decimals: 2 });
  const engine = new ReconciliationEngine({ ledger, policy });
  engine.process(normalizeBatch(raws, { parties: policy.parties, currency: "USD", decimals: 2 }));
  return { ledger, engine };
}

// =============================================================================
// Properties
// =============================================================================

describe("property: reconciliation is deterministic", () => {
  it("same input, same audit chain", () => {
    fc.assert(
      fc.property(fc.array(arbRecord, { maxLength: 25 }), (records) => {
        const raws = toRaw(records);
        const first = run(raws).engine;
        const second = run(raws).engine;
        expect(first.auditTrail().map((e) => e.hash)).toEqual(second.auditTrail().map((e) => e.hash));
        expect(first.verifyAuditTrail().valid).toBe(true);
      }),
      { numRuns: 50 },
    );
  });

  it("input order does not change the final balance", () => {
    fc.assert(
      fc.property(fc.array(arbRecord, { maxLength: 25 }), (records) => {
        const raws = toRaw(records);
        const forward = run(raws).engine.finalBalance().balance;
        const backward = run([...raws].reverse()).engine.finalBalance().balance;
        expect(backward).toEqual(forward);
      }),
      { numRuns: 50 },
    );
  });
});

describe("property: money is conserved", () => {
  it("final net equals the signed sum of cross-shares", () => {
    fc.assert(
      fc.property(fc.array(arbRecord, { maxLength: 25 }), (records) => {
        const { ledger, engine } = run(toRaw(records));

        let expectedRyan = 0n;
        for (const entry of engine.auditTrail()) {
          const tx = entry.transaction;
          // the payer of an expense, or the sender of a settlement, is owed more
          const gainer = tx.settlement?.from ?? tx.payer;
          const cross = scaledOf(entry.crossShare);
          expectedRyan += gainer === "Ryan" ? cross : -cross;
        }

        const state = ledger.state();
        expect(computeNet(state, "Ryan")).toBe(expectedRyan);
        expect(computeNet(state, "Ryan") + computeNet(state, "Jordyn")).toBe(0n);
      }),
      { numRuns: 50 },
    );
  });

  it("every audited transaction's shares sum to its amount", () => {
    fc.assert(
      fc.property(fc.array(arbRecord, { maxLength: 25 }), (records) => {
        const { engine } = run(toRaw(records));
        for (const entry of engine.auditTrail()) {
          const tx = entry.transaction;
          const total = Object.values(tx.shares).reduce((sum, share) => sum + scaledOf(share), 0n);
          expect(total).toBe(scaledOf(tx.amount));
        }
      }),
      { numRuns: 50 },
    );
  });
});
