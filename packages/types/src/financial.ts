/**
 * Financial Types
 *
 * Core financial primitives for deterministic two-party accounting.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit USD)
 * - Ledger entries are append-only by contract
 */

/**
 * Currency identifier (ISO 4217 code, e.g. "USD").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic happens on bigint values scaled by `decimals`.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "2100.00") */
  readonly amount: string;

  /** Currency identifier (e.g., "USD") */
  readonly currency: Currency;

  /**
   * Number of decimal places for this currency.
   * USD = 2 (cents).
   */
  readonly decimals: number;
}

/**
 * Identity of one of the two participants sharing expenses.
 * The set of valid parties is configuration, not code.
 */
export type PartyId = string;

/**
 * The two participants of a reconciliation, in configured order.
 */
export type PartyPair = readonly [PartyId, PartyId];

/**
 * Type of ledger entry (double-entry accounting).
 *
 * - debit: the party owes more (payable grows)
 * - credit: the party is owed more (receivable grows)
 */
export type LedgerEntryType = "debit" | "credit";

/**
 * A single line of a posting.
 * Always part of a balanced posting (debits = credits).
 */
export interface LedgerEntry {
  /** Which party this entry affects */
  readonly party: PartyId;

  /** Debit or credit */
  readonly type: LedgerEntryType;

  /** The amount (always positive) */
  readonly money: Money;
}

/**
 * The four running balances of a two-party ledger, keyed by party.
 * All values are non-negative decimal strings.
 */
export interface LedgerState {
  readonly currency: Currency;
  readonly decimals: number;
  readonly receivable: Readonly<Record<PartyId, string>>;
  readonly payable: Readonly<Record<PartyId, string>>;
}

/**
 * Who owes whom, as a single statement.
 */
export type BalanceStatement =
  | { readonly status: "balanced"; readonly amount: Money }
  | {
      readonly status: "owes";
      readonly debtor: PartyId;
      readonly creditor: PartyId;
      readonly amount: Money;
    };
