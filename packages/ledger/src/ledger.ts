/**
 * @splitledger/ledger — Core Ledger class.
 *
 * Append-only double-entry ledger between exactly two parties. Once a
 * posting is written, it is permanent. Corrections are new postings.
 *
 * API surface:
 * - append() — Append a balanced posting
 * - post() — Append a single debit/credit pair
 * - settle() — Record a transfer of money from one party to the other
 * - assertInvariant() — Re-derive every balance invariant, throw if broken
 * - net() / currentBalance() / state() — Balance queries
 * - getPostings() — All postings in append order
 * - snapshot() / fromSnapshot() — Serialize and restore by replay
 *
 * There is NO update(), delete(), or modify().
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
import {
  buildState,
  computeStatement,
  findInvariantViolations,
  payableOf,
  receivableOf,
  stateFromStatement,
  zeroState,
} from "./balance-calculator.js";
import { formatAmount, parseAmount, toMoney, validateMoney } from "./money-math.js";
import { PartyRegistry } from "./parties.js";
import type {
  LedgerOptions,
  LedgerSnapshot,
  OpeningBalance,
  Posting,
  PostingMeta,
  PostingResult,
  SettlementResult,
} from "./types.js";
import { LedgerError } from "./types.js";

function isStatement(opening: OpeningBalance): opening is BalanceStatement {
  return "status" in opening;
}

/**
 * Two-party double-entry ledger.
 *
 * Every posting must be balanced (total debits equal total credits).
 * A posting reduces to a single pair: the party whose debits exceed its
 * credits owes the difference to the other. Simultaneous receivables
 * are netted after every posting, so at most one party is ever owed.
 */
export class Ledger {
  private readonly _parties: PartyRegistry;
  private readonly _currency: Currency;
  private readonly _decimals: number;
  private readonly _opening: LedgerState;

  private readonly _receivable: Map<PartyId, bigint> = new Map();
  private readonly _payable: Map<PartyId, bigint> = new Map();
  private readonly _credits: Map<PartyId, bigint> = new Map();
  private readonly _debits: Map<PartyId, bigint> = new Map();

  private readonly _postings: Posting[] = [];
  private readonly _postingIds: Set<string> = new Set();

  constructor(options: LedgerOptions) {
    this._parties = new PartyRegistry(options.parties);
    this._currency = options.currency;
    this._decimals = options.decimals;

    if (!Number.isInteger(options.decimals) || options.decimals < 0) {
      throw new LedgerError("INVALID_MONEY", `Decimals must be a non-negative integer, got ${String(options.decimals)}`);
    }

    const opening = this._openingState(options.opening);
    const violations = findInvariantViolations(opening, this._parties.pair);
    if (violations.length > 0) {
      throw new LedgerError("INVARIANT_VIOLATION", `Opening balance is inconsistent: ${violations.join("; ")}`);
    }

    for (const party of this._parties.pair) {
      this._receivable.set(party, receivableOf(opening, party));
      this._payable.set(party, payableOf(opening, party));
      this._credits.set(party, 0n);
      this._debits.set(party, 0n);
    }

    this._opening = opening;
    this.assertInvariant();
  }

  private _openingState(opening: OpeningBalance | undefined): LedgerState {
    const parties = this._parties.pair;

    if (opening === undefined) {
      return zeroState(parties, this._currency, this._decimals);
    }

    if (isStatement(opening)) {
      return stateFromStatement(opening, parties, this._currency, this._decimals);
    }

    if (opening.currency !== this._currency || opening.decimals !== this._decimals) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Opening state is in ${opening.currency}/${String(opening.decimals)}, ledger uses ${this._currency}/${String(this._decimals)}`,
      );
    }
    return opening;
  }

  // ─── Accessors ───────────────────────────────────────────────────────

  get parties(): PartyPair {
    return this._parties.pair;
  }

  get currency(): Currency {
    return this._currency;
  }

  get decimals(): number {
    return this._decimals;
  }

  /**
   * The counterparty of a known party.
   */
  otherParty(party: PartyId): PartyId {
    return this._parties.other(party);
  }

  // ─── Core Append (The Only Write Operation) ──────────────────────────

  /**
   * Append a balanced posting.
   *
   * Validation rules (fail-closed — all must pass):
   * 1. Entries must not be empty
   * 2. Posting IDs are unique
   * 3. Every party is known
   * 4. Every Money value is valid, in the ledger's currency, and positive
   * 5. Total debits equal total credits
   * 6. The posting moves a non-zero amount between the parties
   *
   * Throws LedgerError if any validation fails. Nothing is applied then.
   */
  append(posting: Posting): PostingResult {
    if (posting.entries.length === 0) {
      throw new LedgerError("EMPTY_POSTING", `Posting "${posting.id}" has no entries`);
    }

    if (this._postingIds.has(posting.id)) {
      throw new LedgerError("DUPLICATE_POSTING_ID", `Posting ID already exists in ledger: "${posting.id}"`);
    }

    const credits = new Map<PartyId, bigint>();
    const debits = new Map<PartyId, bigint>();

    for (const entry of posting.entries) {
      const scaled = this._validateEntry(posting.id, entry);
      const side = entry.type === "debit" ? debits : credits;
      side.set(entry.party, (side.get(entry.party) ?? 0n) + scaled);
    }

    let totalDebits = 0n;
    let totalCredits = 0n;
    for (const value of debits.values()) totalDebits += value;
    for (const value of credits.values()) totalCredits += value;

    if (totalDebits !== totalCredits) {
      throw new LedgerError(
        "UNBALANCED_POSTING",
        `Posting "${posting.id}" is unbalanced: debits=${formatAmount(totalDebits, this._decimals)}, credits=${formatAmount(totalCredits, this._decimals)}`,
      );
    }

    // Reduce to one pair: delta(p) = credits(p) − debits(p), delta(A) = −delta(B)
    const [a, b] = this._parties.pair;
    const deltaA = (credits.get(a) ?? 0n) - (debits.get(a) ?? 0n);

    if (deltaA === 0n) {
      throw new LedgerError(
        "SELF_POSTING",
        `Posting "${posting.id}" moves nothing between the parties`,
      );
    }

    const creditor = deltaA > 0n ? a : b;
    const debtor = deltaA > 0n ? b : a;
    const amount = deltaA > 0n ? deltaA : -deltaA;

    // All validations passed — apply
    this._add(this._payable, debtor, amount);
    this._add(this._receivable, creditor, amount);
    const netted = this._net();

    for (const party of this._parties.pair) {
      this._add(this._credits, party, credits.get(party) ?? 0n);
      this._add(this._debits, party, debits.get(party) ?? 0n);
    }

    this._postings.push({
      id: posting.id,
      entries: [...posting.entries],
      timestamp: posting.timestamp,
      description: posting.description,
    });
    this._postingIds.add(posting.id);

    this.assertInvariant();

    return {
      postingId: posting.id,
      debtor,
      creditor,
      amount: this._money(amount),
      netted: this._money(netted),
    };
  }

  /**
   * Append a balanced pair: `debitParty` owes `creditParty` the amount more.
   */
  post(debitParty: PartyId, creditParty: PartyId, amount: Money, meta: PostingMeta): PostingResult {
    this._parties.assertKnown(debitParty);
    this._parties.assertKnown(creditParty);
    if (debitParty === creditParty) {
      throw new LedgerError("SELF_POSTING", `Party "${debitParty}" cannot post against itself`);
    }

    return this.append({
      id: meta.id,
      timestamp: meta.timestamp,
      description: meta.description,
      entries: [
        { party: debitParty, type: "debit", money: amount },
        { party: creditParty, type: "credit", money: amount },
      ],
    });
  }

  /**
   * Record money sent from `from` to `to`.
   *
   * The transfer pays down `from`'s payable first. Anything beyond that
   * becomes a receivable for `from`.
   */
  settle(from: PartyId, to: PartyId, amount: Money, meta: PostingMeta): SettlementResult {
    this._parties.assertKnown(from);
    this._parties.assertKnown(to);

    const owed = this._payable.get(from) ?? 0n;
    const result = this.post(to, from, amount, meta);

    const scaled = parseAmount(amount.amount, amount.decimals);
    const reduced = scaled < owed ? scaled : owed;
    const remainder = scaled - reduced;

    return {
      ...result,
      reduced: this._money(reduced),
      remainder: this._money(remainder),
      flipped: owed > 0n && remainder > 0n,
    };
  }

  private _validateEntry(postingId: string, entry: LedgerEntry): bigint {
    this._parties.assertKnown(entry.party);
    validateMoney(entry.money);

    if (entry.money.currency !== this._currency || entry.money.decimals !== this._decimals) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Posting "${postingId}" uses ${entry.money.currency}/${String(entry.money.decimals)}, ledger uses ${this._currency}/${String(this._decimals)}`,
      );
    }

    const scaled = parseAmount(entry.money.amount, entry.money.decimals);
    if (scaled <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Entry amounts must be positive. Posting "${postingId}" has amount "${entry.money.amount}"`,
      );
    }
    return scaled;
  }

  private _add(map: Map<PartyId, bigint>, party: PartyId, amount: bigint): void {
    map.set(party, (map.get(party) ?? 0n) + amount);
  }

  /**
   * Cancel simultaneous receivables. Returns the amount cancelled.
   */
  private _net(): bigint {
    const [a, b] = this._parties.pair;
    const recA = this._receivable.get(a) ?? 0n;
    const recB = this._receivable.get(b) ?? 0n;
    const n = recA < recB ? recA : recB;

    if (n > 0n) {
      this._add(this._receivable, a, -n);
      this._add(this._payable, b, -n);
      this._add(this._receivable, b, -n);
      this._add(this._payable, a, -n);
    }
    return n;
  }

  private _money(scaled: bigint): Money {
    return toMoney(scaled, this._currency, this._decimals);
  }

  // ─── Invariant ───────────────────────────────────────────────────────

  /**
   * Re-derive every balance invariant. Throws INVARIANT_VIOLATION when any
   * is broken; callers must treat that as fatal.
   */
  assertInvariant(): void {
    const parties = this._parties.pair;
    const state = this.state();
    const violations = findInvariantViolations(state, parties);

    for (const party of parties) {
      const net = (this._receivable.get(party) ?? 0n) - (this._payable.get(party) ?? 0n);
      const opening = receivableOf(this._opening, party) - payableOf(this._opening, party);
      const expected = opening + (this._credits.get(party) ?? 0n) - (this._debits.get(party) ?? 0n);
      if (net !== expected) {
        violations.push(`net(${party}) drifted from its postings`);
      }
    }

    if (violations.length > 0) {
      throw new LedgerError("INVARIANT_VIOLATION", `Ledger invariant violated: ${violations.join("; ")}`);
    }
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * receivable − payable for a party. Positive means the party is owed.
   */
  net(party: PartyId): Money {
    this._parties.assertKnown(party);
    return this._money((this._receivable.get(party) ?? 0n) - (this._payable.get(party) ?? 0n));
  }

  /**
   * Who owes whom right now.
   */
  currentBalance(): BalanceStatement {
    return computeStatement(this.state(), this._parties.pair);
  }

  /**
   * The four balances.
   */
  state(): LedgerState {
    return buildState(this._parties.pair, this._currency, this._decimals, this._receivable, this._payable);
  }

  /**
   * The balances the ledger was opened with.
   */
  openingState(): LedgerState {
    return this._opening;
  }

  getPostings(): readonly Posting[] {
    return [...this._postings];
  }

  get postingCount(): number {
    return this._postings.length;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with Ledger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      parties: this._parties.pair,
      currency: this._currency,
      decimals: this._decimals,
      opening: this._opening,
      postings: this.getPostings(),
      state: this.state(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Replays every posting with full validation, then checks the result
   * against the recorded state.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    const ledger = new Ledger({
      parties: snapshot.parties,
      currency: snapshot.currency,
      decimals: snapshot.decimals,
      opening: snapshot.opening,
    });

    for (const posting of snapshot.postings) {
      ledger.append(posting);
    }

    const replayed = ledger.state();
    for (const party of ledger.parties) {
      if (
        receivableOf(replayed, party) !== receivableOf(snapshot.state, party) ||
        payableOf(replayed, party) !== payableOf(snapshot.state, party)
      ) {
        throw new LedgerError(
          "INVARIANT_VIOLATION",
          `Snapshot state for "${party}" does not match its replayed postings`,
        );
      }
    }

    return ledger;
  }
}
