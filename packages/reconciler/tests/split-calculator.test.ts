/**
 * Split calculator tests
 *
 * Rent percentages, settlement direction, even splits with residue, and
 * each shared-expense override alone and in combination.
 */
import { describe, it, expect } from "vitest";
import type { Money } from "@splitledger/types";
import { LedgerError } from "@splitledger/ledger";
import { SplitCalculator } from "../src/split-calculator.js";
import { defaultPolicy } from "../src/policy.js";
import type { Policy } from "../src/policy.js";

const policy = defaultPolicy();
const calc = new SplitCalculator(policy);

function usd(amount: string): Money {
  return { amount, currency: "USD", decimals: 2 };
}

function shares(ryan: string, jordyn: string) {
  return { Ryan: usd(ryan), Jordyn: usd(jordyn) };
}

describe("SplitCalculator", () => {
  // ─── Rent ──────────────────────────────────────────────────────────

  describe("rent", () => {
    it("splits by the configured percentages", () => {
      const result = calc.split("rent", usd("2100.00"), "Jordyn", "Rent");
      expect(result.kind).toBe("rent-split");
      expect(result.shares).toEqual(shares("903.00", "1197.00"));
      expect(result.reviewReasons).toEqual([]);
      expect(result.notes).toEqual(["rent split Ryan 43% / Jordyn 57%"]);
    });

    it("flags rent paid by the other party", () => {
      const result = calc.split("rent", usd("2100.00"), "Ryan", "Rent");
      expect(result.shares).toEqual(shares("903.00", "1197.00"));
      expect(result.reviewReasons).toEqual([
        { code: "RENT_PAYER", message: "rent is expected to be paid by Jordyn, not Ryan" },
      ]);
    });

    it("flags an amount outside the monthly envelope", () => {
      const result = calc.split("rent", usd("2000.00"), "Jordyn", "Rent");
      expect(result.shares).toEqual(shares("860.00", "1140.00"));
      expect(result.reviewReasons).toEqual([
        { code: "RENT_ENVELOPE", message: "rent 2000.00 is 100.00 away from the 2100.00 envelope" },
      ]);
    });

    it("assigns a rounding residue to the payer", () => {
      const open: Policy = { ...policy, rent: { ...policy.rent, monthlyAmount: undefined } };
      const result = new SplitCalculator(open).split("rent", usd("2100.50"), "Jordyn", "Rent");
      // 903.215 and 1197.285 both round up, reconstructing 2100.51
      expect(result.shares).toEqual(shares("903.22", "1197.28"));
      expect(result.reviewReasons).toEqual([]);
      expect(result.notes).toEqual([
        "rent split Ryan 43% / Jordyn 57%",
        "rounding residue -0.01 assigned to Jordyn",
      ]);
    });

    it("flags percentages that cannot reconstruct the amount", () => {
      const skewed: Policy = { ...policy, rent: { ...policy.rent, percentages: { Ryan: "40", Jordyn: "50" } } };
      const result = new SplitCalculator(skewed).split("rent", usd("2100.00"), "Jordyn", "Rent");
      expect(result.shares).toEqual(shares("840.00", "1260.00"));
      expect(result.reviewReasons).toEqual([
        { code: "RENT_RECONSTRUCTION", message: "rent shares reconstruct 1890.00, not 2100.00" },
      ]);
    });
  });

  // ─── Settlement ────────────────────────────────────────────────────

  describe("settlement", () => {
    it("takes the sender from 'from <party>'", () => {
      const result = calc.split("settlement", usd("500.00"), "Jordyn", "Zelle payment from Ryan");
      expect(result.kind).toBe("settlement");
      expect(result.settlement).toEqual({ from: "Ryan", to: "Jordyn" });
      expect(result.shares).toEqual(shares("500.00", "0.00"));
      expect(result.notes).toEqual(["sent from Ryan"]);
      expect(result.reviewReasons).toEqual([]);
    });

    it("infers the sender from 'to <party>'", () => {
      const result = calc.split("settlement", usd("75.00"), "Jordyn", "Venmo to Jordyn");
      expect(result.settlement).toEqual({ from: "Ryan", to: "Jordyn" });
      expect(result.notes).toEqual(["sent to Jordyn, so sent by Ryan"]);
    });

    it("falls back to the payer as sender", () => {
      const result = calc.split("settlement", usd("75.00"), "Jordyn", "Zelle Ryan");
      expect(result.settlement).toEqual({ from: "Jordyn", to: "Ryan" });
      expect(result.notes).toEqual(["no direction named; sent by payer Jordyn"]);
    });

    it("flags a contradictory direction", () => {
      const result = calc.split("settlement", usd("75.00"), "Jordyn", "Zelle from Ryan to Ryan");
      expect(result.settlement).toEqual({ from: "Jordyn", to: "Ryan" });
      expect(result.reviewReasons).toEqual([
        { code: "SETTLEMENT_DIRECTION", message: 'contradictory transfer direction in "Zelle from Ryan to Ryan"' },
      ]);
    });
  });

  // ─── Personal & Income ─────────────────────────────────────────────

  describe("personal and income", () => {
    it("leaves personal spending with the payer", () => {
      const result = calc.split("personal", usd("40.00"), "Ryan", "Card autopay");
      expect(result.kind).toBe("personal");
      expect(result.shares).toEqual(shares("40.00", "0.00"));
      expect(result.notes).toEqual(["personal: Ryan keeps the full amount"]);
    });

    it("leaves income with the payer", () => {
      const result = calc.split("income", usd("1200.00"), "Jordyn", "Payroll");
      expect(result.kind).toBe("income");
      expect(result.shares).toEqual(shares("0.00", "1200.00"));
    });
  });

  // ─── Shared Expense ────────────────────────────────────────────────

  describe("shared expense", () => {
    it("splits evenly by default", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Groceries");
      expect(result.kind).toBe("even-split");
      expect(result.shares).toEqual(shares("50.00", "50.00"));
      expect(result.notes).toEqual(["even 50/50 split"]);
      expect(result.reviewReasons).toEqual([]);
    });

    it("rounds the other share half-up and gives the payer the rest", () => {
      const result = calc.split("shared-expense", usd("100.01"), "Ryan", "Groceries");
      expect(result.shares).toEqual(shares("50.00", "50.01"));
      expect(result.notes).toEqual(["even 50/50 split", "rounding residue -0.01 assigned to Ryan"]);
    });

    it("applies full reimbursement", () => {
      const result = calc.split("shared-expense", usd("80.00"), "Ryan", "Concert tickets, owe full");
      expect(result.kind).toBe("full-reimbursement");
      expect(result.shares).toEqual(shares("0.00", "80.00"));
      expect(result.notes).toEqual(['"owe full": Jordyn owes the full amount']);
    });

    it("applies a percentage naming the other party", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Dinner 70% Jordyn");
      expect(result.kind).toBe("percentage");
      expect(result.shares).toEqual(shares("30.00", "70.00"));
      expect(result.notes).toEqual(['"70% Jordyn": Jordyn takes 70%']);
    });

    it("applies a percentage naming the payer", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Dinner 70% Ryan");
      expect(result.shares).toEqual(shares("70.00", "30.00"));
    });

    it("flags a percentage above 100", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Dinner 150% Jordyn");
      expect(result.shares).toEqual(shares("50.00", "50.00"));
      expect(result.reviewReasons).toEqual([
        { code: "PERCENTAGE_RANGE", message: 'percentage in "150% Jordyn" is above 100' },
      ]);
    });

    it("ignores a percentage that names no party", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Dinner, 20% tip");
      expect(result.kind).toBe("even-split");
      expect(result.shares).toEqual(shares("50.00", "50.00"));
    });

    it("charges a gift to the giver named after 'from'", () => {
      const result = calc.split("shared-expense", usd("60.00"), "Ryan", "Birthday gift from Jordyn");
      expect(result.kind).toBe("gift");
      expect(result.shares).toEqual(shares("0.00", "60.00"));
      expect(result.notes).toEqual(['"birthday": gift from Jordyn, who bears the full cost']);
    });

    it("charges an unattributed gift to the payer", () => {
      const result = calc.split("shared-expense", usd("60.00"), "Ryan", "Birthday gift");
      expect(result.shares).toEqual(shares("60.00", "0.00"));
    });

    it("excludes a stated amount before splitting", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Target - remove $20 for my shampoo");
      expect(result.kind).toBe("exclusion");
      expect(result.shares).toEqual(shares("60.00", "40.00"));
      expect(result.notes).toEqual(["excluded 20.00 to payer, split 80.00 50/50"]);
    });

    it("flags an exclusion without an amount", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Costco, exclude my items");
      expect(result.shares).toEqual(shares("50.00", "50.00"));
      expect(result.reviewReasons).toEqual([
        { code: "EXCLUSION_AMOUNT", message: '"exclude" names no amount to exclude' },
      ]);
    });

    it("flags an exclusion larger than the amount", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Costco, remove $150");
      expect(result.reviewReasons).toEqual([
        { code: "EXCLUSION_AMOUNT", message: "excluded 150.00 is more than 100.00" },
      ]);
    });

    it("splits the result of an embedded expression", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Costco (45.50 + 20)");
      expect(result.kind).toBe("expression");
      expect(result.shares).toEqual(shares("67.25", "32.75"));
      expect(result.notes).toEqual(["(45.50 + 20) = 65.50 shared 50/50, rest to payer"]);
    });

    it("flags an expression larger than the amount", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Costco (80 + 40)");
      expect(result.reviewReasons).toEqual([
        { code: "UNRESOLVABLE_EXPRESSION", message: "(80 + 40) = 120.00 is outside 0..100.00" },
      ]);
    });

    it("flags an expression that is not a whole number of cents", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Costco (10 / 3)");
      expect(result.reviewReasons).toEqual([
        { code: "UNRESOLVABLE_EXPRESSION", message: "(10 / 3) is not a whole number of cents" },
      ]);
    });

    it("flags an expression that cannot be evaluated", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Costco (10 / 0)");
      expect(result.reviewReasons).toEqual([
        { code: "UNRESOLVABLE_EXPRESSION", message: "(10 / 0): Division by zero" },
      ]);
    });

    it("uses agreeing overrides", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Dinner 30% Jordyn (40 + 20)");
      expect(result.kind).toBe("percentage");
      expect(result.shares).toEqual(shares("70.00", "30.00"));
      expect(result.reviewReasons).toEqual([]);
      expect(result.notes).toEqual([
        '"30% Jordyn": Jordyn takes 30%',
        "(40 + 20) = 60.00 shared 50/50, rest to payer",
        "2 overrides agree",
      ]);
    });

    it("flags disagreeing overrides and splits provisionally", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Dinner 70% Jordyn, owe full");
      expect(result.kind).toBe("even-split");
      expect(result.shares).toEqual(shares("50.00", "50.00"));
      expect(result.reviewReasons).toEqual([
        { code: "OVERRIDE_CONFLICT", message: "overrides disagree: full-reimbursement, percentage" },
      ]);
    });

    it("flags a payment split across instruments", () => {
      const result = calc.split("shared-expense", usd("100.00"), "Ryan", "Groceries split $40 credit card");
      expect(result.reviewReasons).toEqual([
        { code: "SPLIT_PAYMENT", message: "paid with more than one instrument; shares need a human" },
      ]);
    });
  });

  it("rejects an unknown payer", () => {
    expect(() => calc.split("shared-expense", usd("10.00"), "Casey", "Groceries")).toThrow(LedgerError);
  });
});
