/**
 * Transaction Types
 *
 * A transaction moves through one pipeline:
 * raw record → classification → split → ledger posting → audit entry,
 * with a side channel to manual review for anything that fails validation.
 *
 * Rules:
 * - Transactions are immutable once created
 * - Corrections are new transactions, never edits
 * - Every computed share carries a human-readable note trail
 */

import type { Money, PartyId } from "./financial.js";

// =============================================================================
// Categories
// =============================================================================

/**
 * Closed set of transaction categories, in default evaluation order.
 */
export const CATEGORIES = [
  "rent",
  "settlement",
  "personal",
  "income",
  "shared-expense",
] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * How a transaction's shares were derived.
 */
export type SplitKind =
  | "rent-split"
  | "even-split"
  | "percentage"
  | "full-reimbursement"
  | "gift"
  | "exclusion"
  | "expression"
  | "settlement"
  | "personal"
  | "income"
  | "manual";

/**
 * Where the category and shares of a transaction came from.
 */
export type TransactionOrigin = "classified" | "manual";

// =============================================================================
// Review Reasons
// =============================================================================

/**
 * Reasons a transaction cannot be auto-posted.
 *
 * Classification ambiguity:
 * - LOW_CONFIDENCE, REVIEW_KEYWORD, OVERRIDE_CONFLICT,
 *   UNRESOLVABLE_EXPRESSION, SPLIT_PAYMENT
 *
 * Validation failure:
 * - everything else
 */
export type ReviewReasonCode =
  | "LOW_CONFIDENCE"
  | "REVIEW_KEYWORD"
  | "OVERRIDE_CONFLICT"
  | "UNRESOLVABLE_EXPRESSION"
  | "SPLIT_PAYMENT"
  | "NON_POSITIVE_AMOUNT"
  | "UNKNOWN_PARTY"
  | "RENT_PAYER"
  | "RENT_ENVELOPE"
  | "RENT_RECONSTRUCTION"
  | "EXCLUSION_AMOUNT"
  | "PERCENTAGE_RANGE"
  | "SETTLEMENT_DIRECTION"
  | "SUSPICIOUS_AMOUNT"
  | "INVALID_SHARES";

export interface ReviewReason {
  readonly code: ReviewReasonCode;
  readonly message: string;
}

// =============================================================================
// Transaction
// =============================================================================

/**
 * A normalized record handed over by intake.
 * Amount is already currency-parsed; the payer is a known party.
 */
export interface TransactionRecord {
  /** Provenance: file/row identifier */
  readonly sourceRef: string;

  /** Ingestion order, used to break timestamp ties */
  readonly sequence: number;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  readonly payer: PartyId;
  readonly description: string;
  readonly amount: Money;
}

/**
 * Direction of a settlement transfer.
 */
export interface SettlementDirection {
  readonly from: PartyId;
  readonly to: PartyId;
}

/**
 * An enriched, immutable transaction.
 */
export interface Transaction extends TransactionRecord {
  readonly id: string;
  readonly category: Category;

  /** Classification confidence in [0, 1]; 1 for manual decisions */
  readonly confidence: number;

  readonly splitKind: SplitKind;

  /** Each party's share; shares always sum to `amount` */
  readonly shares: Readonly<Record<PartyId, Money>>;

  /** Reasoning trail, in the order the decisions were made */
  readonly notes: readonly string[];

  readonly review: {
    readonly required: boolean;
    readonly reasons: readonly ReviewReason[];
  };

  /** Present only when category is "settlement" */
  readonly settlement?: SettlementDirection | undefined;

  readonly origin: TransactionOrigin;
}
