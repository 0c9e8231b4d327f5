/**
 * @splitledger/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @splitledger/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored postings
 * - Fail-closed: invalid postings throw, never silently succeed
 */

import type {
  BalanceStatement,
  Currency,
  LedgerEntry,
  LedgerState,
  Money,
  PartyId,
  PartyPair,
} from "@splitledger/types";

// ─── Posting Types ───────────────────────────────────────────────────────

/**
 * A balanced group of ledger entries applied atomically.
 * Total debits must equal total credits.
 */
export interface Posting {
  readonly id: string;
  readonly entries: readonly LedgerEntry[];
  readonly timestamp: string;
  readonly description?: string | undefined;
}

/**
 * Identifying metadata for a posting built by `post()` or `settle()`.
 */
export interface PostingMeta {
  readonly id: string;
  readonly timestamp: string;
  readonly description?: string | undefined;
}

/**
 * Result of a successful append.
 * The posting is reduced to a single debit/credit pair.
 */
export interface PostingResult {
  readonly postingId: string;
  readonly debtor: PartyId;
  readonly creditor: PartyId;
  readonly amount: Money;
  /** Amount cancelled against an opposing receivable after applying the pair */
  readonly netted: Money;
}

/**
 * Result of a settlement transfer.
 */
export interface SettlementResult extends PostingResult {
  /** Portion of the transfer that paid down the sender's payable */
  readonly reduced: Money;
  /** Portion left over, now owed back to the sender */
  readonly remainder: Money;
  /** True when the transfer reversed an existing debt */
  readonly flipped: boolean;
}

// ─── Construction ────────────────────────────────────────────────────────

/**
 * Starting position of a ledger: either a who-owes-whom statement
 * or the four balances as recorded by a previous run.
 */
export type OpeningBalance = BalanceStatement | LedgerState;

export interface LedgerOptions {
  readonly parties: PartyPair;
  readonly currency: Currency;
  readonly decimals: number;
  readonly opening?: OpeningBalance | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire ledger.
 * Restoring replays every posting with full validation.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly parties: PartyPair;
  readonly currency: Currency;
  readonly decimals: number;
  readonly opening: LedgerState;
  readonly postings: readonly Posting[];
  readonly state: LedgerState;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNBALANCED_POSTING"
  | "UNKNOWN_PARTY"
  | "INVALID_PARTIES"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "DUPLICATE_POSTING_ID"
  | "EMPTY_POSTING"
  | "SELF_POSTING"
  | "INVARIANT_VIOLATION";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 *
 * INVARIANT_VIOLATION indicates a defect, not bad input;
 * callers must let it abort the run.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

export function isInvariantViolation(err: unknown): err is LedgerError {
  return err instanceof LedgerError && err.code === "INVARIANT_VIOLATION";
}
