/**
 * Audit trail tests
 *
 * Hash chaining, verification and tamper detection.
 */
import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { LedgerState, Money, Transaction } from "@splitledger/types";
import { AuditTrail, GENESIS_HASH, verifyAuditChain } from "../src/audit-trail.js";
import type { AuditAppend } from "../src/audit-trail.js";

function usd(amount: string): Money {
  return { amount, currency: "USD", decimals: 2 };
}

function state(ryanPays: string): LedgerState {
  return {
    currency: "USD",
    decimals: 2,
    receivable: { Ryan: "0.00", Jordyn: ryanPays },
    payable: { Ryan: ryanPays, Jordyn: "0.00" },
  };
}

function append(id: string, crossShare: string, ryanPays: string): AuditAppend {
  const transaction: Transaction = {
    id,
    sourceRef: `src:${id}`,
    sequence: 1,
    timestamp: "2024-03-01T00:00:00.000Z",
    payer: "Jordyn",
    description: "Groceries",
    amount: usd("100.00"),
    category: "shared-expense",
    confidence: 0.9,
    splitKind: "even-split",
    shares: { Ryan: usd(crossShare), Jordyn: usd("50.00") },
    notes: ["even 50/50 split"],
    review: { required: false, reasons: [] },
    origin: "classified",
  };
  return {
    transaction,
    postingId: id,
    crossShare: usd(crossShare),
    ledger: state(ryanPays),
    balance: { status: "owes", debtor: "Ryan", creditor: "Jordyn", amount: usd(ryanPays) },
  };
}

function buildTrail(): AuditTrail {
  const trail = new AuditTrail();
  trail.append(append("tx-000001", "50.00", "50.00"));
  trail.append(append("tx-000002", "50.00", "100.00"));
  return trail;
}

describe("AuditTrail", () => {
  it("starts empty at the genesis hash", () => {
    const trail = new AuditTrail();
    expect(trail.size).toBe(0);
    expect(trail.headHash).toBe(GENESIS_HASH);
    expect(trail.verify()).toEqual({ valid: true, lastVerifiedPosition: 0, firstBreak: null });
  });

  it("chains each entry to its predecessor", () => {
    const [first, second] = buildTrail().entries();
    expect(first?.position).toBe(1);
    expect(first?.previousHash).toBe("genesis");
    expect(second?.position).toBe(2);
    expect(second?.previousHash).toBe(first?.hash);
  });

  it("hashes canonical content plus the previous hash", () => {
    const [first] = buildTrail().entries();
    if (first === undefined) throw new Error("missing entry");

    const { hash, ...content } = first;
    const expected = createHash("sha256").update(canonicalize(content) + "genesis").digest("hex");
    expect(hash).toBe(expected);
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("produces the same chain for the same input", () => {
    expect(buildTrail().headHash).toBe(buildTrail().headHash);
  });

  it("verifies an untouched chain", () => {
    expect(buildTrail().verify()).toEqual({ valid: true, lastVerifiedPosition: 2, firstBreak: null });
  });

  it("detects an edited entry", () => {
    const entries = [...buildTrail().entries()];
    const first = entries[0];
    if (first === undefined) throw new Error("missing entry");
    entries[0] = { ...first, transaction: { ...first.transaction, description: "Groceries and wine" } };

    expect(verifyAuditChain(entries)).toEqual({
      valid: false,
      lastVerifiedPosition: 0,
      firstBreak: { position: 1, reason: "hash mismatch at position 1" },
    });
  });

  it("detects a broken link", () => {
    const entries = [...buildTrail().entries()];
    const second = entries[1];
    if (second === undefined) throw new Error("missing entry");
    entries[1] = { ...second, previousHash: GENESIS_HASH };

    expect(verifyAuditChain(entries)).toEqual({
      valid: false,
      lastVerifiedPosition: 1,
      firstBreak: { position: 2, reason: "previousHash mismatch at position 2" },
    });
  });

  it("detects reordering", () => {
    const entries = [...buildTrail().entries()].reverse();
    expect(verifyAuditChain(entries).firstBreak).toEqual({
      position: 1,
      reason: "expected position 1, found 2",
    });
  });

  it("returns a copy of the entries", () => {
    const trail = buildTrail();
    const copy = [...trail.entries()];
    copy.pop();
    expect(trail.size).toBe(2);
  });
});
