/**
 * Intake — raw records → normalized TransactionRecords.
 *
 * Problems are values, not exceptions: every raw record yields either
 * `{ ok: true, record }` or `{ ok: false, issue }`. A missing or
 * unparseable amount is never read as zero.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import type { Currency, PartyPair, TransactionRecord } from "@splitledger/types";
import { PartyRegistry, parseCurrencyText, toMoney } from "@splitledger/ledger";
import type { DataQualityCode, IntakeResult } from "./types.js";

// =============================================================================
// Raw Shape
// =============================================================================

export const RawRecordSchema = z.object({
  date: z.string().optional(),
  payer: z.string().optional(),
  description: z.string().default(""),
  amount: z.union([z.string(), z.number()]).nullish(),
  source: z.string().min(1).optional(),
});

export type RawRecord = z.input<typeof RawRecordSchema>;

export interface IntakeOptions {
  readonly parties: PartyPair;
  readonly currency: Currency;
  readonly decimals: number;
}

// =============================================================================
// Field Parsing
// =============================================================================

function utcDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString();
}

/**
 * Parse a record date into an ISO 8601 UTC timestamp.
 *
 * Accepts "2024-03-01", "3/1/2024" (month first) and full ISO 8601
 * timestamps with an offset. Returns null for anything else, including
 * impossible calendar dates.
 */
export function parseRecordDate(text: string): string | null {
  const trimmed = text.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(trimmed);
  if (iso !== null) {
    return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(trimmed);
  if (us !== null) {
    return utcDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/.test(trimmed)) {
    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
  }

  return null;
}

/**
 * Lowercased, whitespace-collapsed description used for duplicate detection.
 */
export function normalizeDescription(description: string): string {
  return description.toLowerCase().replace(/\s+/g, " ").trim();
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize one raw record.
 *
 * @param sequence - ingestion order, used to break timestamp ties
 */
export function normalizeRecord(raw: unknown, sequence: number, options: IntakeOptions): IntakeResult {
  const fallbackRef = `record:${String(sequence)}`;
  const issue = (code: DataQualityCode, sourceRef: string, message: string): IntakeResult => ({
    ok: false,
    issue: { code, sourceRef, sequence, message, raw },
  });

  const parsed = RawRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    return issue("MALFORMED_RECORD", fallbackRef, `Malformed record: ${detail}`);
  }

  const record = parsed.data;
  const sourceRef = record.source ?? fallbackRef;

  const amountText = record.amount === undefined || record.amount === null ? "" : String(record.amount);
  if (amountText.trim() === "") {
    return issue("MISSING_AMOUNT", sourceRef, "Amount is missing");
  }
  const scaled = parseCurrencyText(amountText, options.decimals);
  if (scaled === null) {
    return issue("INVALID_AMOUNT", sourceRef, `Amount "${amountText}" is not a valid ${options.currency} amount`);
  }

  const timestamp = record.date === undefined ? null : parseRecordDate(record.date);
  if (timestamp === null) {
    return issue("INVALID_DATE", sourceRef, `Date "${record.date ?? ""}" is not a valid date`);
  }

  if (record.payer === undefined || record.payer.trim() === "") {
    return issue("MISSING_PAYER", sourceRef, "Payer is missing");
  }
  const payer = new PartyRegistry(options.parties).resolve(record.payer);
  if (payer === undefined) {
    return issue("UNKNOWN_PAYER", sourceRef, `Payer "${record.payer}" is not one of ${options.parties.join(", ")}`);
  }

  const normalized: TransactionRecord = {
    sourceRef,
    sequence,
    timestamp,
    payer,
    description: record.description.trim(),
    amount: toMoney(scaled, options.currency, options.decimals),
  };
  return { ok: true, record: normalized };
}

/**
 * Fingerprint used to detect the same transaction arriving twice.
 */
export function recordFingerprint(record: TransactionRecord): string {
  const key = [
    record.timestamp.slice(0, 10),
    record.amount.amount,
    normalizeDescription(record.description),
    record.payer,
  ].join("|");
  return createHash("sha256").update(key).digest("hex");
}

/**
 * Mark later copies of a record as DUPLICATE_TRANSACTION.
 * Two records are duplicates when date, amount, normalized description
 * and payer all match. Source references are not compared: the same row
 * exported twice carries a different reference each time. The first
 * occurrence is kept.
 */
export function dedupeRecords(results: readonly IntakeResult[]): IntakeResult[] {
  const seen = new Map<string, string>();

  return results.map((result): IntakeResult => {
    if (!result.ok) {
      return result;
    }

    const fingerprint = recordFingerprint(result.record);
    const original = seen.get(fingerprint);
    if (original === undefined) {
      seen.set(fingerprint, result.record.sourceRef);
      return result;
    }

    return {
      ok: false,
      issue: {
        code: "DUPLICATE_TRANSACTION",
        sourceRef: result.record.sourceRef,
        sequence: result.record.sequence,
        message: `Duplicate of ${original}`,
        raw: result.record,
      },
    };
  });
}

/**
 * Normalize a batch in ingestion order (sequence starts at 1) and dedupe it.
 */
export function normalizeBatch(raws: readonly unknown[], options: IntakeOptions): IntakeResult[] {
  return dedupeRecords(raws.map((raw, i) => normalizeRecord(raw, i + 1, options)));
}
