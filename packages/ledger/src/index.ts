/**
 * @splitledger/ledger — Two-party double-entry ledger engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces double-entry accounting invariants:
 * - Every posting balances (debits = credits)
 * - Postings are immutable once appended
 * - Balances are kept netted, so one party at most is owed
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Core engine
export { Ledger } from "./ledger.js";

// Party registry
export { PartyRegistry } from "./parties.js";

// Balance computation
export {
  buildState,
  computeNet,
  computeStatement,
  findInvariantViolations,
  payableOf,
  receivableOf,
  stateFromStatement,
  zeroState,
} from "./balance-calculator.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  toMoney,
  scaledOf,
  roundHalfUp,
  parseRatio,
  applyPercentage,
  parseCurrencyText,
  validateMoney,
  assertSameCurrency,
  addMoney,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  absMoney,
} from "./money-math.js";
export type { Ratio } from "./money-math.js";

// Types
export type {
  Posting,
  PostingMeta,
  PostingResult,
  SettlementResult,
  OpeningBalance,
  LedgerOptions,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, isInvariantViolation } from "./types.js";
