/**
 * Flat exports of the audit trail, review queue and data-quality log.
 *
 * CSV for spreadsheets, JSONL (one canonical JSON object per line) for
 * machines. Amounts are written as the decimal strings the ledger holds.
 */

import { canonicalize } from "json-canonicalize";
import type { PartyPair } from "@splitledger/types";
import { computeNet, formatAmount } from "@splitledger/ledger";
import type { AuditEntry, DataQualityIssue, ManualReviewItem } from "./types.js";

const REVIEW_HEADER = "review_id,status,source_ref,date,payer,description,amount,category,reasons,reviewer,decided_category";
const DATA_QUALITY_HEADER = "sequence,source_ref,code,message";

export function escapeCsv(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replaceAll('"', '""')}"`;
  }

  return value;
}

function row(values: readonly string[]): string {
  return values.map((value) => escapeCsv(value)).join(",");
}

/**
 * One row per audit entry. Share, net and cross-share columns are named
 * after the two parties, in configured order.
 */
export function auditTrailToCsv(entries: readonly AuditEntry[], parties: PartyPair): string {
  const [a, b] = parties;
  const header = [
    "position",
    "transaction_id",
    "source_ref",
    "date",
    "payer",
    "description",
    "amount",
    "category",
    "split_kind",
    `share_${a}`,
    `share_${b}`,
    "cross_share",
    `net_${a}`,
    `net_${b}`,
    "origin",
    "hash",
  ].join(",");

  const lines = entries.map((entry) => {
    const tx = entry.transaction;
    return row([
      String(entry.position),
      tx.id,
      tx.sourceRef,
      tx.timestamp.slice(0, 10),
      tx.payer,
      tx.description,
      tx.amount.amount,
      tx.category,
      tx.splitKind,
      tx.shares[a]?.amount ?? "",
      tx.shares[b]?.amount ?? "",
      entry.crossShare.amount,
      formatAmount(computeNet(entry.ledger, a), entry.ledger.decimals),
      formatAmount(computeNet(entry.ledger, b), entry.ledger.decimals),
      tx.origin,
      entry.hash,
    ]);
  });

  return [header, ...lines].join("\n");
}

export function reviewQueueToCsv(items: readonly ManualReviewItem[]): string {
  const lines = items.map((item) => {
    const tx = item.transaction;
    return row([
      item.id,
      item.status,
      tx.sourceRef,
      tx.timestamp.slice(0, 10),
      tx.payer,
      tx.description,
      tx.amount.amount,
      tx.category,
      item.reasons.map((r) => r.code).join(";"),
      item.decision?.reviewer ?? "",
      item.decision?.category ?? "",
    ]);
  });

  return [REVIEW_HEADER, ...lines].join("\n");
}

export function dataQualityToCsv(issues: readonly DataQualityIssue[]): string {
  const lines = issues.map((issue) =>
    row([String(issue.sequence), issue.sourceRef, issue.code, issue.message]),
  );

  return [DATA_QUALITY_HEADER, ...lines].join("\n");
}

/**
 * Canonical JSON, one entry per line. Re-hashing a line's content
 * (without `hash`) reproduces the chain.
 */
export function auditTrailToJsonl(entries: readonly AuditEntry[]): string {
  return entries.map((entry) => canonicalize(entry)).join("\n");
}
