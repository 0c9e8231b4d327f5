/**
 * @splitledger/ledger — Balance calculation engine.
 *
 * Derives nets, who-owes-whom statements and invariant checks from the
 * four balances of a two-party ledger. All calculations are deterministic
 * using bigint arithmetic.
 *
 * Rules:
 * - Balances are never negative
 * - receivable[A] mirrors payable[B] and the other way round
 * - Nets of the two parties always sum to exactly zero
 */

import type { BalanceStatement, Currency, LedgerState, PartyId, PartyPair } from "@splitledger/types";
import { formatAmount, parseAmount, toMoney } from "./money-math.js";
import { LedgerError } from "./types.js";

/**
 * Read one balance of a state as a scaled bigint. Missing keys read as zero.
 */
function balanceOf(
  side: Readonly<Record<PartyId, string>>,
  party: PartyId,
  decimals: number,
): bigint {
  const value = side[party];
  return value === undefined ? 0n : parseAmount(value, decimals);
}

export function receivableOf(state: LedgerState, party: PartyId): bigint {
  return balanceOf(state.receivable, party, state.decimals);
}

export function payableOf(state: LedgerState, party: PartyId): bigint {
  return balanceOf(state.payable, party, state.decimals);
}

/**
 * net(p) = receivable[p] − payable[p]. Positive means the party is owed money.
 */
export function computeNet(state: LedgerState, party: PartyId): bigint {
  return receivableOf(state, party) - payableOf(state, party);
}

/**
 * Build a state from per-party scaled balances.
 */
export function buildState(
  parties: PartyPair,
  currency: Currency,
  decimals: number,
  receivable: ReadonlyMap<PartyId, bigint>,
  payable: ReadonlyMap<PartyId, bigint>,
): LedgerState {
  const rec: Record<PartyId, string> = {};
  const pay: Record<PartyId, string> = {};
  for (const party of parties) {
    rec[party] = formatAmount(receivable.get(party) ?? 0n, decimals);
    pay[party] = formatAmount(payable.get(party) ?? 0n, decimals);
  }
  return { currency, decimals, receivable: rec, payable: pay };
}

/**
 * All balances zero.
 */
export function zeroState(parties: PartyPair, currency: Currency, decimals: number): LedgerState {
  return buildState(parties, currency, decimals, new Map(), new Map());
}

/**
 * Express a who-owes-whom statement as the four balances.
 */
export function stateFromStatement(
  statement: BalanceStatement,
  parties: PartyPair,
  currency: Currency,
  decimals: number,
): LedgerState {
  if (statement.amount.currency !== currency || statement.amount.decimals !== decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Opening balance is in ${statement.amount.currency}/${String(statement.amount.decimals)}, ledger uses ${currency}/${String(decimals)}`,
    );
  }

  const amount = parseAmount(statement.amount.amount, decimals);

  if (statement.status === "balanced") {
    if (amount !== 0n) {
      throw new LedgerError("INVALID_AMOUNT", `A balanced statement must carry zero, got "${statement.amount.amount}"`);
    }
    return zeroState(parties, currency, decimals);
  }

  for (const party of [statement.debtor, statement.creditor]) {
    if (party !== parties[0] && party !== parties[1]) {
      throw new LedgerError("UNKNOWN_PARTY", `Unknown party in opening balance: "${party}"`);
    }
  }
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Opening balance must not be negative, got "${statement.amount.amount}"`);
  }

  return buildState(
    parties,
    currency,
    decimals,
    new Map([[statement.creditor, amount]]),
    new Map([[statement.debtor, amount]]),
  );
}

/**
 * Summarize a state as a single statement.
 */
export function computeStatement(state: LedgerState, parties: PartyPair): BalanceStatement {
  const [a, b] = parties;
  const netA = computeNet(state, a);

  if (netA === 0n) {
    return { status: "balanced", amount: toMoney(0n, state.currency, state.decimals) };
  }

  return netA > 0n
    ? { status: "owes", debtor: b, creditor: a, amount: toMoney(netA, state.currency, state.decimals) }
    : { status: "owes", debtor: a, creditor: b, amount: toMoney(-netA, state.currency, state.decimals) };
}

/**
 * List every structural invariant the state breaks. Empty when sound.
 */
export function findInvariantViolations(state: LedgerState, parties: PartyPair): string[] {
  const [a, b] = parties;
  const violations: string[] = [];

  for (const key of [...Object.keys(state.receivable), ...Object.keys(state.payable)]) {
    if (key !== a && key !== b) {
      violations.push(`balance recorded for unknown party "${key}"`);
    }
  }

  for (const party of parties) {
    if (receivableOf(state, party) < 0n) {
      violations.push(`receivable[${party}] is negative`);
    }
    if (payableOf(state, party) < 0n) {
      violations.push(`payable[${party}] is negative`);
    }
  }

  if (receivableOf(state, a) !== payableOf(state, b)) {
    violations.push(`receivable[${a}] does not mirror payable[${b}]`);
  }
  if (receivableOf(state, b) !== payableOf(state, a)) {
    violations.push(`receivable[${b}] does not mirror payable[${a}]`);
  }

  if (receivableOf(state, a) > 0n && receivableOf(state, b) > 0n) {
    violations.push("both parties hold a receivable");
  }

  if (computeNet(state, a) + computeNet(state, b) !== 0n) {
    violations.push(`net(${a}) + net(${b}) is not zero`);
  }

  return violations;
}
