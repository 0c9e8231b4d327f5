/**
 * @splitledger/ledger — Party registry.
 *
 * Holds the two participants of a reconciliation. Fixed at construction;
 * parties cannot be added, renamed or removed afterwards.
 *
 * Rules:
 * - Exactly two distinct, non-empty party IDs
 * - Any other identity is rejected
 */

import type { PartyId, PartyPair } from "@splitledger/types";
import { LedgerError } from "./types.js";

export class PartyRegistry {
  private readonly _pair: PartyPair;

  constructor(parties: PartyPair) {
    const [a, b] = parties;
    if (a.trim() === "" || b.trim() === "") {
      throw new LedgerError("INVALID_PARTIES", "Party IDs must be non-empty strings");
    }
    if (a === b) {
      throw new LedgerError("INVALID_PARTIES", `Parties must be distinct, got "${a}" twice`);
    }
    this._pair = [a, b];
  }

  /**
   * Both parties, in configured order.
   */
  get pair(): PartyPair {
    return this._pair;
  }

  has(id: string): boolean {
    return id === this._pair[0] || id === this._pair[1];
  }

  /**
   * Assert a party exists. Throws if not found.
   */
  assertKnown(id: string): PartyId {
    if (!this.has(id)) {
      throw new LedgerError("UNKNOWN_PARTY", `Unknown party: "${id}"`);
    }
    return id;
  }

  /**
   * The counterparty of a known party.
   */
  other(id: PartyId): PartyId {
    this.assertKnown(id);
    return id === this._pair[0] ? this._pair[1] : this._pair[0];
  }

  /**
   * Match free text to a party ID, ignoring case and surrounding space.
   * Returns undefined when the text names neither party.
   */
  resolve(name: string): PartyId | undefined {
    const needle = name.trim().toLowerCase();
    return this._pair.find((p) => p.toLowerCase() === needle);
  }
}
