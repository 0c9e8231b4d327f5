/**
 * Reconciliation Engine — top-level coordinator.
 *
 * Runs every record through classify → split → validate, then either
 * posts it to the ledger and appends an audit entry, or parks it in the
 * manual review queue. Nothing ambiguous is ever posted.
 *
 * Usage:
 *   const engine = new ReconciliationEngine({ ledger, policy, logger });
 *   engine.process(normalizeBatch(rows, options));
 *   engine.resolveReview(itemId, decision);
 *   const final = engine.finalBalance();
 *
 * Single-threaded and synchronous. The ledger is the only mutable shared
 * state. A LedgerError propagates and aborts the run.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  BalanceStatement,
  Category,
  Money,
  PartyId,
  ReviewReason,
  SettlementDirection,
  SplitKind,
  Transaction,
  TransactionRecord,
} from "@splitledger/types";
import {
  LedgerError,
  PartyRegistry,
  addMoney,
  compareMoney,
  isNegative,
  isPositive,
  parseAmount,
  toMoney,
  validateMoney,
  zeroMoney,
} from "@splitledger/ledger";
import type { Ledger } from "@splitledger/ledger";
import { AuditTrail } from "./audit-trail.js";
import { Classifier } from "./classifier.js";
import type { Policy } from "./policy.js";
import { ReviewQueue } from "./review-queue.js";
import { SplitCalculator } from "./split-calculator.js";
import type {
  AuditEntry,
  AuditVerification,
  DataQualityIssue,
  FinalBalance,
  IntakeResult,
  ManualReviewItem,
  ReconciliationSummary,
  ReviewDecision,
} from "./types.js";
import { PolicyError, ReviewError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface EngineOptions {
  readonly ledger: Ledger;
  readonly policy: Policy;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
  /** Pre-recorded review decisions, keyed by source reference */
  readonly decisions?: ReadonlyMap<string, ReviewDecision> | undefined;
}

/**
 * Order records by timestamp, breaking ties by ingestion sequence.
 */
export function sortChronologically(records: readonly TransactionRecord[]): TransactionRecord[] {
  return [...records].sort(
    (a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp) || a.sequence - b.sequence,
  );
}

// =============================================================================
// Engine
// =============================================================================

export class ReconciliationEngine {
  private readonly ledger: Ledger;
  private readonly policy: Policy;
  private readonly logger: Logger;
  private readonly decisions: ReadonlyMap<string, ReviewDecision>;
  private readonly parties: PartyRegistry;
  private readonly classifier: Classifier;
  private readonly calculator: SplitCalculator;
  private readonly queue = new ReviewQueue();
  private readonly audit = new AuditTrail();
  private readonly dataQuality: DataQualityIssue[] = [];
  private readonly opening: BalanceStatement;
  private txCounter = 0;

  constructor(options: EngineOptions) {
    const { ledger, policy } = options;
    const [a, b] = policy.parties;

    if (!ledger.parties.includes(a) || !ledger.parties.includes(b)) {
      throw new PolicyError(
        "INVALID_POLICY",
        `Policy parties ${a}, ${b} do not match ledger parties ${ledger.parties.join(", ")}`,
      );
    }
    if (ledger.currency !== policy.currency || ledger.decimals !== policy.decimals) {
      throw new PolicyError(
        "INVALID_POLICY",
        `Policy currency ${policy.currency}/${String(policy.decimals)} does not match ledger ${ledger.currency}/${String(ledger.decimals)}`,
      );
    }

    this.ledger = ledger;
    this.policy = policy;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.decisions = options.decisions ?? new Map();
    this.parties = new PartyRegistry(ledger.parties);
    this.classifier = new Classifier(policy);
    this.calculator = new SplitCalculator(policy);
    this.opening = ledger.currentBalance();
  }

  // ===========================================================================
  // Batch Processing
  // ===========================================================================

  /**
   * Reconcile a batch of intake results in chronological order.
   */
  process(batch: readonly IntakeResult[]): FinalBalance {
    const records: TransactionRecord[] = [];

    for (const result of batch) {
      if (result.ok) {
        records.push(result.record);
      } else {
        this.dataQuality.push(result.issue);
        this.logger.warn(
          { code: result.issue.code, sourceRef: result.issue.sourceRef },
          "Record excluded from ledger",
        );
      }
    }

    for (const record of sortChronologically(records)) {
      this.processRecord(record);
    }

    const final = this.finalBalance();
    this.logger.info(
      {
        records: batch.length,
        posted: final.postedCount,
        pending: final.pendingCount,
        skipped: final.skippedCount,
        balance: final.balance,
      },
      "Batch reconciled",
    );
    return final;
  }

  private processRecord(record: TransactionRecord): void {
    this.txCounter += 1;
    const id = `tx-${String(this.txCounter).padStart(6, "0")}`;

    const classification = this.classifier.classify(record.description, record.payer);
    const reasons: ReviewReason[] = [...this.classifier.reviewReasons(classification)];
    reasons.push(...this.validateRecord(record));

    const notes = [...classification.notes];
    let splitKind: SplitKind = "manual";
    let shares: Readonly<Record<PartyId, Money>> = {};
    let settlement: SettlementDirection | undefined;

    if (this.parties.has(record.payer)) {
      const split = this.calculator.split(classification.category, record.amount, record.payer, record.description);
      splitKind = split.kind;
      shares = split.shares;
      settlement = split.settlement;
      notes.push(...split.notes);
      reasons.push(...split.reviewReasons);
    } else {
      notes.push("payer unknown; shares left to a reviewer");
    }

    const ceiling = toMoney(
      parseAmount(this.policy.suspiciousAmount, record.amount.decimals),
      record.amount.currency,
      record.amount.decimals,
    );
    if (compareMoney(record.amount, ceiling) > 0) {
      reasons.push({
        code: "SUSPICIOUS_AMOUNT",
        message: `${record.amount.amount} is above the ${this.policy.suspiciousAmount} ceiling`,
      });
    }

    const transaction: Transaction = {
      ...record,
      id,
      category: classification.category,
      confidence: classification.confidence,
      splitKind,
      shares,
      notes,
      review: { required: reasons.length > 0, reasons },
      ...(settlement === undefined ? {} : { settlement }),
      origin: "classified",
    };

    if (reasons.length === 0) {
      this.post(transaction);
      return;
    }

    const item = this.queue.enqueue(transaction, reasons);
    const decision = this.decisions.get(record.sourceRef);

    if (decision === undefined) {
      this.logger.info(
        { itemId: item.id, sourceRef: record.sourceRef, reasons: reasons.map((r) => r.code) },
        "Queued for manual review",
      );
      return;
    }

    try {
      this.resolveReview(item.id, decision);
    } catch (err) {
      if (!(err instanceof ReviewError) || err.code !== "INVALID_DECISION") {
        throw err;
      }
      this.logger.warn(
        { itemId: item.id, sourceRef: record.sourceRef, reasons: err.reasons.map((r) => r.code) },
        "Recorded decision rejected; item left pending",
      );
    }
  }

  private validateRecord(record: TransactionRecord): ReviewReason[] {
    const reasons: ReviewReason[] = [];
    if (!isPositive(record.amount)) {
      reasons.push({ code: "NON_POSITIVE_AMOUNT", message: `amount ${record.amount.amount} is not positive` });
    }
    if (!this.parties.has(record.payer)) {
      reasons.push({ code: "UNKNOWN_PARTY", message: `payer "${record.payer}" is not a configured party` });
    }
    return reasons;
  }

  // ===========================================================================
  // Posting
  // ===========================================================================

  private post(transaction: Transaction): AuditEntry {
    const meta = { id: transaction.id, timestamp: transaction.timestamp, description: transaction.description };
    let postingId: string | null = null;
    let crossShare = zeroMoney(transaction.amount.currency, transaction.amount.decimals);

    if (transaction.category === "settlement") {
      const direction = transaction.settlement;
      if (direction === undefined) {
        throw new Error(`Settlement ${transaction.id} has no direction`);
      }
      const result = this.ledger.settle(direction.from, direction.to, transaction.amount, meta);
      postingId = result.postingId;
      crossShare = transaction.amount;
      if (result.flipped) {
        this.logger.info(
          { txId: transaction.id, from: direction.from, remainder: result.remainder.amount },
          "Settlement overpaid; balance direction flipped",
        );
      }
    } else {
      const other = this.parties.other(transaction.payer);
      const share = transaction.shares[other];
      if (share !== undefined && isPositive(share)) {
        postingId = this.ledger.post(other, transaction.payer, share, meta).postingId;
        crossShare = share;
      }
    }

    const entry = this.audit.append({
      transaction,
      postingId,
      crossShare,
      ledger: this.ledger.state(),
      balance: this.ledger.currentBalance(),
    });

    this.logger.debug(
      { position: entry.position, txId: transaction.id, category: transaction.category, crossShare: crossShare.amount },
      "Transaction posted",
    );
    return entry;
  }

  // ===========================================================================
  // Manual Review
  // ===========================================================================

  /**
   * Apply a reviewer's decision: bypass the classifier, split for the
   * decided category (or use the explicit shares), post, and mark the
   * item resolved. The posting lands at the end of the audit trail.
   *
   * @throws {ReviewError} ITEM_NOT_FOUND, ALREADY_RESOLVED, or INVALID_DECISION
   *   (the item then stays pending)
   */
  resolveReview(itemId: string, decision: ReviewDecision): AuditEntry {
    const item = this.queue.get(itemId);
    if (item.status === "resolved") {
      throw new ReviewError("ALREADY_RESOLVED", `Review item "${itemId}" is already resolved`);
    }

    const transaction = this.decide(item, decision);
    const entry = this.post(transaction);
    this.queue.markResolved(itemId, decision);

    this.logger.info(
      { itemId, reviewer: decision.reviewer, category: decision.category, position: entry.position },
      "Review resolved",
    );
    return entry;
  }

  private decide(item: ManualReviewItem, decision: ReviewDecision): Transaction {
    const original = item.transaction;
    const reasons: ReviewReason[] = [];

    if (!isPositive(original.amount)) {
      reasons.push({ code: "NON_POSITIVE_AMOUNT", message: `amount ${original.amount.amount} is not positive` });
    }
    if (!this.parties.has(original.payer)) {
      reasons.push({ code: "UNKNOWN_PARTY", message: `payer "${original.payer}" is not a configured party` });
    }
    if (reasons.length > 0) {
      throw new ReviewError("INVALID_DECISION", `Decision for "${item.id}" cannot be applied`, reasons);
    }

    let splitKind: SplitKind;
    let shares: Readonly<Record<PartyId, Money>>;
    let settlement: SettlementDirection | undefined;
    const notes = [...original.notes, `manual decision by ${decision.reviewer}: ${decision.category}`];

    if (decision.shares !== undefined) {
      const explicit = decision.shares;
      reasons.push(...this.validateShares(explicit, original.amount));
      splitKind = "manual";
      shares = explicit;
      if (decision.category === "settlement" && reasons.length === 0) {
        const sender = this.parties.pair.find((p) => {
          const share = explicit[p];
          return share !== undefined && compareMoney(share, original.amount) === 0;
        });
        if (sender === undefined) {
          reasons.push({ code: "INVALID_SHARES", message: "a settlement needs one party to hold the full amount" });
        } else {
          settlement = { from: sender, to: this.parties.other(sender) };
        }
      }
    } else {
      const split = this.calculator.split(decision.category, original.amount, original.payer, original.description);
      reasons.push(...split.reviewReasons);
      splitKind = split.kind;
      shares = split.shares;
      settlement = split.settlement;
      notes.push(...split.notes);
    }

    if (reasons.length > 0) {
      throw new ReviewError(
        "INVALID_DECISION",
        `Decision for "${item.id}" fails validation: ${reasons.map((r) => r.code).join(", ")}`,
        reasons,
      );
    }

    if (decision.notes !== undefined && decision.notes.trim() !== "") {
      notes.push(decision.notes.trim());
    }

    return {
      ...original,
      category: decision.category,
      confidence: 1,
      splitKind,
      shares,
      notes,
      review: { required: true, reasons: item.reasons },
      ...(settlement === undefined ? {} : { settlement }),
      origin: "manual",
    };
  }

  private validateShares(shares: Readonly<Record<PartyId, Money>>, amount: Money): ReviewReason[] {
    const invalid = (message: string): ReviewReason[] => [{ code: "INVALID_SHARES", message }];

    const keys = Object.keys(shares);
    if (keys.length !== 2 || !this.parties.pair.every((p) => keys.includes(p))) {
      return invalid(`shares must name exactly ${this.parties.pair.join(" and ")}`);
    }

    let sum = zeroMoney(amount.currency, amount.decimals);
    for (const party of this.parties.pair) {
      const share = shares[party];
      if (share === undefined) {
        return invalid(`no share for ${party}`);
      }
      try {
        validateMoney(share);
        sum = addMoney(sum, share);
      } catch (err) {
        if (err instanceof LedgerError) {
          return invalid(`share for ${party}: ${err.message}`);
        }
        throw err;
      }
      if (isNegative(share)) {
        return invalid(`share for ${party} is negative`);
      }
    }

    if (compareMoney(sum, amount) !== 0) {
      return invalid(`shares sum to ${sum.amount}, not ${amount.amount}`);
    }
    return [];
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  finalBalance(): FinalBalance {
    return {
      balance: this.ledger.currentBalance(),
      postedCount: this.audit.size,
      pendingCount: this.queue.pending().length,
      pendingTotal: this.queue.pendingTotal(this.ledger.currency, this.ledger.decimals),
      resolvedCount: this.queue.resolved().length,
      skippedCount: this.dataQuality.length,
    };
  }

  summary(): ReconciliationSummary {
    const byCategory: Record<Category, number> = {
      rent: 0,
      settlement: 0,
      personal: 0,
      income: 0,
      "shared-expense": 0,
    };
    for (const entry of this.audit.entries()) {
      byCategory[entry.transaction.category] += 1;
    }

    return {
      ...this.finalBalance(),
      opening: this.opening,
      byCategory,
      auditTrailValid: this.audit.verify().valid,
    };
  }

  auditTrail(): readonly AuditEntry[] {
    return this.audit.entries();
  }

  verifyAuditTrail(): AuditVerification {
    return this.audit.verify();
  }

  pendingReview(): readonly ManualReviewItem[] {
    return this.queue.pending();
  }

  reviewItems(): readonly ManualReviewItem[] {
    return this.queue.all();
  }

  dataQualityLog(): readonly DataQualityIssue[] {
    return [...this.dataQuality];
  }
}
