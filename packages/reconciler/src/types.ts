/**
 * @splitledger/reconciler domain types.
 *
 * Types for the path a record takes through reconciliation:
 * - Intake results (normalized record or data-quality issue)
 * - Classification and split results
 * - Audit entries and manual review items
 * - Engine summaries
 */

import type {
  BalanceStatement,
  Category,
  LedgerState,
  Money,
  PartyId,
  ReviewReason,
  SettlementDirection,
  SplitKind,
  Transaction,
  TransactionRecord,
} from "@splitledger/types";

// =============================================================================
// Intake
// =============================================================================

export type DataQualityCode =
  | "MALFORMED_RECORD"
  | "MISSING_AMOUNT"
  | "INVALID_AMOUNT"
  | "INVALID_DATE"
  | "MISSING_PAYER"
  | "UNKNOWN_PAYER"
  | "DUPLICATE_TRANSACTION";

/** A record excluded from the ledger, kept for the data-quality log. */
export interface DataQualityIssue {
  readonly code: DataQualityCode;
  readonly sourceRef: string;
  readonly sequence: number;
  readonly message: string;
  readonly raw: unknown;
}

export type IntakeResult =
  | { readonly ok: true; readonly record: TransactionRecord }
  | { readonly ok: false; readonly issue: DataQualityIssue };

// =============================================================================
// Classification & Split
// =============================================================================

export interface Classification {
  readonly category: Category;
  readonly confidence: number;
  readonly matchedPatterns: readonly string[];
  readonly reviewKeywords: readonly string[];
  readonly notes: readonly string[];
}

export interface SplitResult {
  readonly kind: SplitKind;
  /** Each party's share; always sums to the amount */
  readonly shares: Readonly<Record<PartyId, Money>>;
  readonly notes: readonly string[];
  /** Non-empty when the split is provisional and must not be posted */
  readonly reviewReasons: readonly ReviewReason[];
  readonly settlement?: SettlementDirection | undefined;
}

// =============================================================================
// Audit Trail
// =============================================================================

/**
 * One posted (or knowingly unposted) transaction and the ledger state
 * immediately after it. Entries are hash-chained.
 */
export interface AuditEntry {
  /** 1-based position in the trail */
  readonly position: number;
  readonly transaction: Transaction;
  /** Ledger posting ID, or null when the transaction moves nothing between parties */
  readonly postingId: string | null;
  /** Amount moved between the parties by this transaction */
  readonly crossShare: Money;
  readonly ledger: LedgerState;
  readonly balance: BalanceStatement;
  readonly previousHash: string;
  readonly hash: string;
}

export interface AuditChainBreak {
  readonly position: number;
  readonly reason: string;
}

export interface AuditVerification {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly firstBreak: AuditChainBreak | null;
}

// =============================================================================
// Manual Review
// =============================================================================

export type ReviewStatus = "pending" | "resolved";

/**
 * A reviewer's ruling on a queued transaction.
 * Without explicit shares, the split calculator runs for the decided category.
 */
export interface ReviewDecision {
  readonly category: Category;
  readonly shares?: Readonly<Record<PartyId, Money>> | undefined;
  readonly notes?: string | undefined;
  readonly reviewer: string;
  readonly decidedAt: string;
}

export interface ManualReviewItem {
  readonly id: string;
  readonly transaction: Transaction;
  readonly reasons: readonly ReviewReason[];
  readonly status: ReviewStatus;
  /** Timestamp of the queued transaction */
  readonly queuedAt: string;
  readonly decision?: ReviewDecision | undefined;
}

// =============================================================================
// Engine Results
// =============================================================================

export interface FinalBalance {
  /** Balance over posted transactions only; pending items are excluded */
  readonly balance: BalanceStatement;
  readonly postedCount: number;
  readonly pendingCount: number;
  readonly pendingTotal: Money;
  readonly resolvedCount: number;
  readonly skippedCount: number;
}

export interface ReconciliationSummary extends FinalBalance {
  readonly opening: BalanceStatement;
  readonly byCategory: Readonly<Record<Category, number>>;
  readonly auditTrailValid: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type PolicyErrorCode = "INVALID_POLICY" | "INVALID_PATTERN";

/** Thrown when reconciliation policy data fails validation. */
export class PolicyError extends Error {
  public readonly code: PolicyErrorCode;

  constructor(code: PolicyErrorCode, message: string) {
    super(message);
    this.name = "PolicyError";
    this.code = code;
  }
}

export type ReviewErrorCode = "ITEM_NOT_FOUND" | "ALREADY_RESOLVED" | "INVALID_DECISION";

/**
 * Thrown by the review queue and by engine review resolution.
 * An INVALID_DECISION leaves the item pending.
 */
export class ReviewError extends Error {
  public readonly code: ReviewErrorCode;
  public readonly reasons: readonly ReviewReason[];

  constructor(code: ReviewErrorCode, message: string, reasons: readonly ReviewReason[] = []) {
    super(message);
    this.name = "ReviewError";
    this.code = code;
    this.reasons = reasons;
  }
}

export type ExpressionErrorCode =
  | "DISALLOWED_CHARACTER"
  | "PARSE_ERROR"
  | "DIVISION_BY_ZERO";

/** Internal to the split calculator; always converted to a review reason. */
export class ExpressionError extends Error {
  public readonly code: ExpressionErrorCode;

  constructor(code: ExpressionErrorCode, message: string) {
    super(message);
    this.name = "ExpressionError";
    this.code = code;
  }
}
