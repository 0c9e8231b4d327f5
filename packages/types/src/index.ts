/**
 * @splitledger/types — Shared domain types for two-party reconciliation.
 *
 * These types are used across all splitledger packages:
 * - Financial primitives (Money, parties, ledger entries, balances)
 * - Transactions, categories and review reasons
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  Money,
  Currency,
  PartyId,
  PartyPair,
  LedgerEntry,
  LedgerEntryType,
  LedgerState,
  BalanceStatement,
} from "./financial.js";

// Transaction types
export type {
  Category,
  SplitKind,
  TransactionOrigin,
  ReviewReasonCode,
  ReviewReason,
  TransactionRecord,
  SettlementDirection,
  Transaction,
} from "./transaction.js";

export { CATEGORIES } from "./transaction.js";
