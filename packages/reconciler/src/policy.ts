/**
 * Reconciliation policy.
 *
 * Everything that is a business choice rather than arithmetic lives in
 * policy data: parties, thresholds, category rules, override phrases,
 * rent terms and review keywords. Policy JSON is validated with Zod;
 * regex strings must compile.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { CATEGORIES } from "@splitledger/types";
import { PolicyError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const DecimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal string");

function fractionDigits(value: string): number {
  return value.split(".")[1]?.length ?? 0;
}

export const CategorySchema = z.enum(CATEGORIES);

export const RuleSchema = z.object({
  patterns: z.array(z.string().min(1)).default([]),
  baseConfidence: z.number().min(0).max(1),
  fullConfidenceMatches: z.number().int().min(1).default(1),
  requiresPartyMention: z.boolean().default(false),
  withoutPartyMention: CategorySchema.optional(),
});

export const RentTermsSchema = z.object({
  payer: z.string().min(1).optional(),
  percentages: z.record(z.string(), DecimalString),
  monthlyAmount: DecimalString.optional(),
  tolerance: DecimalString.default("0.02"),
});

export const OverridesSchema = z.object({
  fullReimbursement: z.array(z.string().min(1)).default([]),
  gift: z.array(z.string().min(1)).default([]),
  exclusionKeywords: z.array(z.string().min(1)).default([]),
  exclusionAmountPattern: z.string().min(1),
  percentagePattern: z.string().min(1),
  splitPaymentPatterns: z.array(z.string().min(1)).default([]),
});

export const PolicySchema = z
  .object({
    parties: z.tuple([z.string().min(1), z.string().min(1)]),
    currency: z.string().min(1),
    decimals: z.number().int().min(0).max(18),
    confidenceThreshold: z.number().min(0).max(1).default(0.8),
    defaultConfidence: z.number().min(0).max(1),
    suspiciousAmount: DecimalString,
    categoryOrder: z.array(CategorySchema).min(1),
    rules: z.object({
      rent: RuleSchema,
      settlement: RuleSchema,
      personal: RuleSchema,
      income: RuleSchema,
      "shared-expense": RuleSchema,
    }),
    rent: RentTermsSchema,
    overrides: OverridesSchema,
    reviewKeywords: z.array(z.string().min(1)).default([]),
  })
  .superRefine((policy, ctx) => {
    const [a, b] = policy.parties;
    if (a === b) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["parties"], message: "parties must be distinct" });
    }

    if (new Set(policy.categoryOrder).size !== policy.categoryOrder.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["categoryOrder"], message: "categories must not repeat" });
    }

    if (policy.rent.payer !== undefined && policy.rent.payer !== a && policy.rent.payer !== b) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["rent", "payer"], message: `unknown party "${policy.rent.payer}"` });
    }

    // money thresholds are compared against amounts in the policy's currency
    const money: Array<[readonly (string | number)[], string | undefined]> = [
      [["suspiciousAmount"], policy.suspiciousAmount],
      [["rent", "monthlyAmount"], policy.rent.monthlyAmount],
      [["rent", "tolerance"], policy.rent.tolerance],
    ];
    for (const [path, value] of money) {
      if (value !== undefined && fractionDigits(value) > policy.decimals) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path],
          message: `"${value}" has more than ${String(policy.decimals)} decimal places`,
        });
      }
    }

    const keys = Object.keys(policy.rent.percentages).sort();
    if (keys.length !== 2 || !keys.includes(a) || !keys.includes(b)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["rent", "percentages"],
        message: "percentages must name exactly the two parties",
      });
    }
  });

export type Policy = z.infer<typeof PolicySchema>;
export type CategoryRule = z.infer<typeof RuleSchema>;

// =============================================================================
// Loading
// =============================================================================

export const DEFAULT_POLICY_PATH = fileURLToPath(new URL("../policy/default-policy.json", import.meta.url));

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function assertCompiles(source: string, where: string): void {
  try {
    new RegExp(source, "i");
  } catch (err) {
    throw new PolicyError(
      "INVALID_PATTERN",
      `${where}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Validate parsed JSON as a policy.
 *
 * @throws {PolicyError} INVALID_POLICY on schema failure, INVALID_PATTERN on a bad regex
 */
export function parsePolicy(input: unknown): Policy {
  const result = PolicySchema.safeParse(input);
  if (!result.success) {
    throw new PolicyError("INVALID_POLICY", `Invalid policy: ${formatIssues(result.error)}`);
  }

  const policy = result.data;
  assertCompiles(policy.overrides.exclusionAmountPattern, "overrides.exclusionAmountPattern");
  assertCompiles(policy.overrides.percentagePattern, "overrides.percentagePattern");
  policy.overrides.splitPaymentPatterns.forEach((source, i) => {
    assertCompiles(source, `overrides.splitPaymentPatterns.${String(i)}`);
  });

  return policy;
}

/**
 * Read and validate a policy JSON file.
 */
export function loadPolicy(path: string): Policy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new PolicyError(
      "INVALID_POLICY",
      `Cannot read policy at ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parsePolicy(raw);
}

/**
 * The bundled default policy.
 */
export function defaultPolicy(): Policy {
  return loadPolicy(DEFAULT_POLICY_PATH);
}
