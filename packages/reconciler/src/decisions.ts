/**
 * Recorded review decisions, keyed by source reference.
 *
 * Lets a reviewer's rulings from an earlier run be replayed so that the
 * same input and the same decisions always produce the same ledger.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { CategorySchema } from "./policy.js";
import type { ReviewDecision } from "./types.js";
import { ReviewError } from "./types.js";

const MoneySchema = z.object({
  amount: z.string().regex(/^-?\d+(\.\d+)?$/, "must be a decimal string"),
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(18),
});

export const ReviewDecisionSchema = z.object({
  category: CategorySchema,
  shares: z.record(z.string(), MoneySchema).optional(),
  notes: z.string().optional(),
  reviewer: z.string().min(1),
  decidedAt: z.string().min(1),
});

/** `{ "<sourceRef>": ReviewDecision, ... }` */
export const DecisionFileSchema = z.record(z.string().min(1), ReviewDecisionSchema);

/**
 * @throws {ReviewError} INVALID_DECISION when the input does not validate
 */
export function parseDecisions(input: unknown): Map<string, ReviewDecision> {
  const result = DecisionFileSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ReviewError("INVALID_DECISION", `Invalid decisions: ${detail}`);
  }
  return new Map(Object.entries(result.data));
}

export function loadDecisions(path: string): Map<string, ReviewDecision> {
  return parseDecisions(JSON.parse(readFileSync(path, "utf8")));
}
