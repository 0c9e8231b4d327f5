/**
 * Classifier tests
 *
 * Rule order, confidence scaling, the party-mention requirement for
 * settlements, and review keywords.
 */
import { describe, it, expect } from "vitest";
import { Classifier } from "../src/classifier.js";
import { defaultPolicy } from "../src/policy.js";
import type { Policy } from "../src/policy.js";

const policy = defaultPolicy();
const classifier = new Classifier(policy);

describe("Classifier", () => {
  describe("categories", () => {
    it("classifies rent at full rent confidence", () => {
      const result = classifier.classify("Rent - San Palmas", "Jordyn");
      expect(result.category).toBe("rent");
      expect(result.confidence).toBe(0.95);
      expect(result.matchedPatterns).toEqual(["rent", "san palmas"]);
      expect(classifier.reviewReasons(result)).toEqual([]);
    });

    it("classifies a transfer that names a party as a settlement", () => {
      const result = classifier.classify("Zelle to Jordyn", "Ryan");
      expect(result.category).toBe("settlement");
      expect(result.confidence).toBe(0.9);
      expect(result.notes).toEqual(["matched settlement pattern(s): zelle"]);
    });

    it("treats a transfer that names no party as personal", () => {
      const result = classifier.classify("Zelle transfer", "Ryan");
      expect(result.category).toBe("personal");
      expect(result.confidence).toBe(0.9);
      expect(result.notes).toEqual([
        "matched settlement pattern(s): zelle",
        "no party named; treated as personal",
      ]);
    });

    it("matches party names on word boundaries only", () => {
      const result = classifier.classify("Venmo Ryanair ticket", "Jordyn");
      expect(result.category).toBe("personal");
    });

    it("classifies income", () => {
      const result = classifier.classify("Payroll direct deposit", "Ryan");
      expect(result.category).toBe("income");
      expect(result.matchedPatterns).toEqual(["direct deposit", "payroll"]);
    });

    it("classifies a known merchant as a shared expense", () => {
      const result = classifier.classify("COSTCO WHOLESALE", "Ryan");
      expect(result.category).toBe("shared-expense");
      expect(result.confidence).toBe(0.9);
    });

    it("evaluates categories in policy order", () => {
      // "refund" (income) is checked before "costco" (shared expense)
      const result = classifier.classify("Costco refund", "Ryan");
      expect(result.category).toBe("income");
    });

    it("defaults to a shared expense when nothing matches", () => {
      const result = classifier.classify("Hardware store", "Ryan");
      expect(result).toEqual({
        category: "shared-expense",
        confidence: 0.85,
        matchedPatterns: [],
        reviewKeywords: [],
        notes: ["no rule matched; default shared expense paid by Ryan"],
      });
      expect(classifier.reviewReasons(result)).toEqual([]);
    });
  });

  describe("confidence", () => {
    it("scales confidence by the share of required matches", () => {
      const strict: Policy = {
        ...policy,
        rules: { ...policy.rules, rent: { ...policy.rules.rent, fullConfidenceMatches: 2 } },
      };
      const result = new Classifier(strict).classify("Rent March", "Jordyn");
      expect(result.confidence).toBeCloseTo(0.475, 10);
    });

    it("flags confidence below the threshold", () => {
      const cautious: Policy = { ...policy, defaultConfidence: 0.5 };
      const c = new Classifier(cautious);
      const result = c.classify("Hardware store", "Ryan");
      expect(c.reviewReasons(result)).toEqual([
        { code: "LOW_CONFIDENCE", message: "confidence 0.50 is below 0.80" },
      ]);
    });

    it("does not flag confidence exactly at the threshold", () => {
      const c = new Classifier({ ...policy, defaultConfidence: 0.8 });
      expect(c.reviewReasons(c.classify("Hardware store", "Ryan"))).toEqual([]);
    });
  });

  describe("review keywords", () => {
    it("forces review even at high confidence", () => {
      const result = classifier.classify("Costco - need to discuss", "Ryan");
      expect(result.category).toBe("shared-expense");
      expect(result.reviewKeywords).toEqual(["discuss"]);
      expect(classifier.reviewReasons(result)).toEqual([
        { code: "REVIEW_KEYWORD", message: 'needs human judgment: "discuss"' },
      ]);
    });

    it("lists every keyword found", () => {
      const result = classifier.classify("Lost receipt, unsure", "Ryan");
      expect(result.reviewKeywords).toEqual(["lost", "unsure"]);
    });
  });
});
