/**
 * Split Calculator — category + amount → per-party shares.
 *
 * Shares always sum exactly to the amount. Each share is rounded
 * half-up independently; the rounding residue (at most one unit of the
 * smallest denomination) is absorbed by the payer's own share.
 *
 * Anything the rules cannot settle deterministically comes back with
 * review reasons and provisional shares that must not be posted.
 */

import type {
  Category,
  Money,
  PartyId,
  ReviewReason,
  SettlementDirection,
  SplitKind,
} from "@splitledger/types";
import {
  PartyRegistry,
  applyPercentage,
  formatAmount,
  parseCurrencyText,
  parseRatio,
  roundHalfUp,
  scaledOf,
  toMoney,
} from "@splitledger/ledger";
import type { Ratio } from "@splitledger/ledger";
import { evaluateExpression, findExpressions } from "./expression.js";
import type { Policy } from "./policy.js";
import { ExpressionError, PolicyError } from "./types.js";
import type { SplitResult } from "./types.js";

/** One override's proposal for the non-payer's share. */
interface Candidate {
  readonly kind: SplitKind;
  readonly otherScaled: bigint;
  readonly note: string;
  readonly reasons: readonly ReviewReason[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class SplitCalculator {
  private readonly parties: PartyRegistry;
  private readonly percentagePattern: RegExp;
  private readonly exclusionAmountPattern: RegExp;
  private readonly splitPaymentPatterns: readonly RegExp[];

  constructor(private readonly policy: Policy) {
    this.parties = new PartyRegistry(policy.parties);
    this.percentagePattern = new RegExp(policy.overrides.percentagePattern, "gi");
    this.exclusionAmountPattern = new RegExp(policy.overrides.exclusionAmountPattern, "i");
    this.splitPaymentPatterns = policy.overrides.splitPaymentPatterns.map((p) => new RegExp(p, "i"));
  }

  split(category: Category, amount: Money, payer: PartyId, description: string): SplitResult {
    this.parties.assertKnown(payer);

    switch (category) {
      case "rent":
        return this.rent(amount, payer);
      case "settlement":
        return this.settlement(amount, payer, description);
      case "personal":
      case "income":
        return {
          kind: category,
          shares: this.shares(amount, payer, 0n),
          notes: [`${category}: ${payer} keeps the full amount`],
          reviewReasons: [],
        };
      case "shared-expense":
        return this.sharedExpense(amount, payer, description);
      default: {
        const unreachable: never = category;
        throw new Error(`Unhandled category: ${String(unreachable)}`);
      }
    }
  }

  // ─── Rent ────────────────────────────────────────────────────────────

  private rent(amount: Money, payer: PartyId): SplitResult {
    const terms = this.policy.rent;
    const other = this.parties.other(payer);
    const total = scaledOf(amount);
    const tolerance = this.scaled(terms.tolerance, amount);

    const rounded = new Map<PartyId, bigint>();
    for (const party of this.parties.pair) {
      const pct = terms.percentages[party];
      if (pct === undefined) {
        throw new PolicyError("INVALID_POLICY", `Rent percentages do not name "${party}"`);
      }
      rounded.set(party, scaledOf(applyPercentage(amount, pct)));
    }

    const otherShare = rounded.get(other) ?? 0n;
    const reasons: ReviewReason[] = [];
    const notes = [
      `rent split ${this.parties.pair.map((p) => `${p} ${terms.percentages[p] ?? "?"}%`).join(" / ")}`,
    ];

    if (terms.payer !== undefined && payer !== terms.payer) {
      reasons.push({ code: "RENT_PAYER", message: `rent is expected to be paid by ${terms.payer}, not ${payer}` });
    }

    if (terms.monthlyAmount !== undefined) {
      const envelope = this.scaled(terms.monthlyAmount, amount);
      const gap = total > envelope ? total - envelope : envelope - total;
      if (gap > tolerance) {
        reasons.push({
          code: "RENT_ENVELOPE",
          message: `rent ${amount.amount} is ${formatAmount(gap, amount.decimals)} away from the ${terms.monthlyAmount} envelope`,
        });
      }
    }

    let reconstructed = 0n;
    for (const value of rounded.values()) reconstructed += value;
    const residue = total - reconstructed;
    const drift = residue < 0n ? -residue : residue;

    if (drift > tolerance) {
      reasons.push({
        code: "RENT_RECONSTRUCTION",
        message: `rent shares reconstruct ${formatAmount(reconstructed, amount.decimals)}, not ${amount.amount}`,
      });
    } else if (residue !== 0n) {
      notes.push(`rounding residue ${formatAmount(residue, amount.decimals)} assigned to ${payer}`);
    }

    return {
      kind: "rent-split",
      shares: this.shares(amount, payer, otherShare),
      notes,
      reviewReasons: reasons,
    };
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  private settlement(amount: Money, payer: PartyId, description: string): SplitResult {
    const fromParties = this.namedAfter("from", description);
    const toParties = this.namedAfter("to", description);
    const reasons: ReviewReason[] = [];
    const notes: string[] = [];

    let sender: PartyId = payer;
    const [from] = fromParties;
    const [to] = toParties;

    if (fromParties.length > 1 || toParties.length > 1 || (from !== undefined && from === to)) {
      reasons.push({
        code: "SETTLEMENT_DIRECTION",
        message: `contradictory transfer direction in "${description}"`,
      });
      notes.push(`direction unclear; provisionally sent by payer ${payer}`);
    } else if (from !== undefined) {
      sender = from;
      notes.push(`sent from ${from}`);
    } else if (to !== undefined) {
      sender = this.parties.other(to);
      notes.push(`sent to ${to}, so sent by ${sender}`);
    } else {
      notes.push(`no direction named; sent by payer ${payer}`);
    }

    const receiver = this.parties.other(sender);
    const direction: SettlementDirection = { from: sender, to: receiver };

    return {
      kind: "settlement",
      shares: this.shares(amount, sender, 0n),
      notes,
      reviewReasons: reasons,
      settlement: direction,
    };
  }

  /**
   * Distinct parties named right after a preposition, in order of appearance.
   */
  private namedAfter(preposition: "from" | "to", description: string): PartyId[] {
    const found: PartyId[] = [];
    const pattern = new RegExp(`\\b${escapeRegExp(preposition)}\\s+([a-z]+)`, "gi");
    for (const match of description.matchAll(pattern)) {
      const party = this.parties.resolve(match[1] ?? "");
      if (party !== undefined && !found.includes(party)) {
        found.push(party);
      }
    }
    return found;
  }

  // ─── Shared Expense ──────────────────────────────────────────────────

  private sharedExpense(amount: Money, payer: PartyId, description: string): SplitResult {
    const other = this.parties.other(payer);
    const total = scaledOf(amount);
    const even = roundHalfUp(total, 2n);
    const text = description.toLowerCase();

    const candidates: Candidate[] = [
      ...this.fullReimbursement(text, total, other),
      ...this.percentages(description, amount, payer, even),
      ...this.gift(text, description, payer, total),
      ...this.exclusion(text, description, amount, even),
      ...this.expressions(description, amount, even),
    ];

    const reasons: ReviewReason[] = candidates.flatMap((c) => c.reasons);
    const notes = candidates.map((c) => c.note);

    if (this.splitPaymentPatterns.some((p) => p.test(description))) {
      reasons.push({ code: "SPLIT_PAYMENT", message: "paid with more than one instrument; shares need a human" });
    }

    let kind: SplitKind = "even-split";
    let otherShare = even;

    const [first] = candidates;
    if (first !== undefined) {
      const agree = candidates.every((c) => c.otherScaled === first.otherScaled);
      if (agree) {
        kind = first.kind;
        otherShare = first.otherScaled;
        if (candidates.length > 1) {
          notes.push(`${String(candidates.length)} overrides agree`);
        }
      } else {
        reasons.push({
          code: "OVERRIDE_CONFLICT",
          message: `overrides disagree: ${candidates.map((c) => c.kind).join(", ")}`,
        });
      }
    } else {
      notes.push("even 50/50 split");
    }

    const residue = total - 2n * otherShare;
    if (kind === "even-split" && residue !== 0n) {
      notes.push(`rounding residue ${formatAmount(residue, amount.decimals)} assigned to ${payer}`);
    }

    return {
      kind,
      shares: this.shares(amount, payer, otherShare),
      notes,
      reviewReasons: reasons,
    };
  }

  private fullReimbursement(text: string, total: bigint, other: PartyId): Candidate[] {
    const phrase = this.policy.overrides.fullReimbursement.find((p) => text.includes(p.toLowerCase()));
    if (phrase === undefined) {
      return [];
    }
    return [{ kind: "full-reimbursement", otherScaled: total, note: `"${phrase}": ${other} owes the full amount`, reasons: [] }];
  }

  private percentages(description: string, amount: Money, payer: PartyId, even: bigint): Candidate[] {
    const candidates: Candidate[] = [];

    for (const match of description.matchAll(this.percentagePattern)) {
      const party = this.parties.resolve(match[2] ?? "");
      if (party === undefined) {
        continue;
      }

      const pct = parseRatio(match[1] ?? "0");
      if (pct.numerator > 100n * pct.denominator) {
        candidates.push({
          kind: "percentage",
          otherScaled: even,
          note: `"${match[0]}" exceeds 100%`,
          reasons: [{ code: "PERCENTAGE_RANGE", message: `percentage in "${match[0]}" is above 100` }],
        });
        continue;
      }

      const otherPct: Ratio =
        party === payer
          ? { numerator: 100n * pct.denominator - pct.numerator, denominator: pct.denominator }
          : pct;
      candidates.push({
        kind: "percentage",
        otherScaled: scaledOf(applyPercentage(amount, otherPct)),
        note: `"${match[0]}": ${party} takes ${match[1] ?? "?"}%`,
        reasons: [],
      });
    }

    return candidates;
  }

  private gift(text: string, description: string, payer: PartyId, total: bigint): Candidate[] {
    const keyword = this.policy.overrides.gift.find((g) => text.includes(g.toLowerCase()));
    if (keyword === undefined) {
      return [];
    }

    const [from] = this.namedAfter("from", description);
    const giver = from ?? payer;
    return [{
      kind: "gift",
      otherScaled: giver === payer ? 0n : total,
      note: `"${keyword}": gift from ${giver}, who bears the full cost`,
      reasons: [],
    }];
  }

  private exclusion(text: string, description: string, amount: Money, even: bigint): Candidate[] {
    const keyword = this.policy.overrides.exclusionKeywords.find((k) => text.includes(k.toLowerCase()));
    if (keyword === undefined) {
      return [];
    }

    const total = scaledOf(amount);
    const captured = this.exclusionAmountPattern.exec(description)?.[1];
    const excluded = captured === undefined ? null : parseCurrencyText(captured, amount.decimals);

    if (excluded === null || excluded < 0n) {
      return [{
        kind: "exclusion",
        otherScaled: even,
        note: `"${keyword}" without an amount`,
        reasons: [{ code: "EXCLUSION_AMOUNT", message: `"${keyword}" names no amount to exclude` }],
      }];
    }

    if (excluded > total) {
      return [{
        kind: "exclusion",
        otherScaled: even,
        note: `excluded ${formatAmount(excluded, amount.decimals)} exceeds the amount`,
        reasons: [{
          code: "EXCLUSION_AMOUNT",
          message: `excluded ${formatAmount(excluded, amount.decimals)} is more than ${amount.amount}`,
        }],
      }];
    }

    const remainder = total - excluded;
    return [{
      kind: "exclusion",
      otherScaled: roundHalfUp(remainder, 2n),
      note: `excluded ${formatAmount(excluded, amount.decimals)} to payer, split ${formatAmount(remainder, amount.decimals)} 50/50`,
      reasons: [],
    }];
  }

  private expressions(description: string, amount: Money, even: bigint): Candidate[] {
    const total = scaledOf(amount);
    const unit = 10n ** BigInt(amount.decimals);

    return findExpressions(description).map((source): Candidate => {
      const unresolvable = (message: string): Candidate => ({
        kind: "expression",
        otherScaled: even,
        note: `(${source}) could not be used`,
        reasons: [{ code: "UNRESOLVABLE_EXPRESSION", message }],
      });

      let value: Ratio;
      try {
        value = evaluateExpression(source);
      } catch (err) {
        if (err instanceof ExpressionError) {
          return unresolvable(`(${source}): ${err.message}`);
        }
        throw err;
      }

      const cents = value.numerator * unit;
      if (cents % value.denominator !== 0n) {
        return unresolvable(`(${source}) is not a whole number of cents`);
      }

      const shared = cents / value.denominator;
      if (shared < 0n || shared > total) {
        return unresolvable(`(${source}) = ${formatAmount(shared, amount.decimals)} is outside 0..${amount.amount}`);
      }

      return {
        kind: "expression",
        otherScaled: roundHalfUp(shared, 2n),
        note: `(${source}) = ${formatAmount(shared, amount.decimals)} shared 50/50, rest to payer`,
        reasons: [],
      };
    });
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  /**
   * Shares in configured party order: the non-payer takes `otherScaled`,
   * the payer takes the rest.
   */
  private shares(amount: Money, payer: PartyId, otherScaled: bigint): Record<PartyId, Money> {
    const total = scaledOf(amount);
    const result: Record<PartyId, Money> = {};
    for (const party of this.parties.pair) {
      const scaled = party === payer ? total - otherScaled : otherScaled;
      result[party] = toMoney(scaled, amount.currency, amount.decimals);
    }
    return result;
  }

  private scaled(decimal: string, like: Money): bigint {
    return scaledOf({ amount: decimal, currency: like.currency, decimals: like.decimals });
  }
}
