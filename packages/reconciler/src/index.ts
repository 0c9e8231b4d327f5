/**
 * @splitledger/reconciler — Shared-expense reconciliation engine.
 *
 * Turns raw transaction records into ledger postings between two parties:
 * - Intake: normalize, validate and dedupe raw records
 * - Classifier: description → category with confidence
 * - Split calculator: category → per-party shares
 * - Review queue: anything ambiguous waits for a human
 * - Audit trail: hash-chained record of every posting
 */

// Engine (top-level coordinator)
export { ReconciliationEngine, sortChronologically } from "./reconciler.js";
export type { EngineOptions } from "./reconciler.js";

// Policy
export {
  CategorySchema,
  RuleSchema,
  RentTermsSchema,
  OverridesSchema,
  PolicySchema,
  DEFAULT_POLICY_PATH,
  parsePolicy,
  loadPolicy,
  defaultPolicy,
} from "./policy.js";
export type { Policy, CategoryRule } from "./policy.js";

// Intake
export {
  RawRecordSchema,
  parseRecordDate,
  normalizeDescription,
  normalizeRecord,
  recordFingerprint,
  dedupeRecords,
  normalizeBatch,
} from "./intake.js";
export type { RawRecord, IntakeOptions } from "./intake.js";

// Classification & splitting
export { Classifier } from "./classifier.js";
export { SplitCalculator } from "./split-calculator.js";
export { evaluateExpression, findExpressions } from "./expression.js";

// Review
export { ReviewQueue } from "./review-queue.js";
export {
  ReviewDecisionSchema,
  DecisionFileSchema,
  parseDecisions,
  loadDecisions,
} from "./decisions.js";

// Audit trail
export {
  GENESIS_HASH,
  AuditTrail,
  computeEntryHash,
  verifyAuditChain,
} from "./audit-trail.js";
export type { AuditAppend } from "./audit-trail.js";

// Export
export {
  escapeCsv,
  auditTrailToCsv,
  reviewQueueToCsv,
  dataQualityToCsv,
  auditTrailToJsonl,
} from "./export.js";

// Types
export type {
  DataQualityCode,
  DataQualityIssue,
  IntakeResult,
  Classification,
  SplitResult,
  AuditEntry,
  AuditChainBreak,
  AuditVerification,
  ReviewStatus,
  ReviewDecision,
  ManualReviewItem,
  FinalBalance,
  ReconciliationSummary,
  PolicyErrorCode,
  ReviewErrorCode,
  ExpressionErrorCode,
} from "./types.js";

export { PolicyError, ReviewError, ExpressionError } from "./types.js";
