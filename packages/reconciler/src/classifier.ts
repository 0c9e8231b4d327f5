/**
 * Classifier — description + payer → category with confidence.
 *
 * Rules are evaluated in the policy's category order; the first rule
 * with at least one matching pattern wins. Matching is case-insensitive
 * substring matching.
 *
 *   confidence = baseConfidence × min(1, matched / fullConfidenceMatches)
 *
 * A secondary pass collects review keywords. Any hit forces manual
 * review regardless of confidence.
 */

import type { PartyId, ReviewReason } from "@splitledger/types";
import type { CategoryRule, Policy } from "./policy.js";
import type { Classification } from "./types.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class Classifier {
  private readonly partyMatchers: readonly RegExp[];

  constructor(private readonly policy: Policy) {
    this.partyMatchers = policy.parties.map((p) => new RegExp(`\\b${escapeRegExp(p)}\\b`, "i"));
  }

  classify(description: string, payer: PartyId): Classification {
    const text = description.toLowerCase();
    const reviewKeywords = this.policy.reviewKeywords.filter((k) => text.includes(k.toLowerCase()));

    for (const category of this.policy.categoryOrder) {
      const rule: CategoryRule = this.policy.rules[category];
      const matched = rule.patterns.filter((p) => text.includes(p.toLowerCase()));
      if (matched.length === 0) {
        continue;
      }

      const confidence = rule.baseConfidence * Math.min(1, matched.length / rule.fullConfidenceMatches);
      const notes = [`matched ${category} pattern(s): ${matched.join(", ")}`];

      if (rule.requiresPartyMention && !this.mentionsParty(description)) {
        const fallback = rule.withoutPartyMention;
        if (fallback === undefined) {
          continue;
        }
        notes.push(`no party named; treated as ${fallback}`);
        return { category: fallback, confidence, matchedPatterns: matched, reviewKeywords, notes };
      }

      return { category, confidence, matchedPatterns: matched, reviewKeywords, notes };
    }

    return {
      category: "shared-expense",
      confidence: this.policy.defaultConfidence,
      matchedPatterns: [],
      reviewKeywords,
      notes: [`no rule matched; default shared expense paid by ${payer}`],
    };
  }

  /**
   * Review reasons raised by a classification alone.
   */
  reviewReasons(result: Classification): ReviewReason[] {
    const reasons: ReviewReason[] = [];

    if (result.confidence < this.policy.confidenceThreshold) {
      reasons.push({
        code: "LOW_CONFIDENCE",
        message: `confidence ${result.confidence.toFixed(2)} is below ${this.policy.confidenceThreshold.toFixed(2)}`,
      });
    }
    if (result.reviewKeywords.length > 0) {
      reasons.push({
        code: "REVIEW_KEYWORD",
        message: `needs human judgment: ${result.reviewKeywords.map((k) => `"${k}"`).join(", ")}`,
      });
    }

    return reasons;
  }

  private mentionsParty(description: string): boolean {
    return this.partyMatchers.some((m) => m.test(description));
  }
}
