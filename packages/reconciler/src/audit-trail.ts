/**
 * Audit Trail — tamper-evident, append-only record of every posted
 * transaction and the ledger state right after it.
 *
 * Each entry is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Entries carry no wall-clock fields, so the same input always yields
 * the same chain.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { BalanceStatement, LedgerState, Money, Transaction } from "@splitledger/types";
import type { AuditChainBreak, AuditEntry, AuditVerification } from "./types.js";

/**
 * The hash used as `previousHash` for the first entry.
 */
export const GENESIS_HASH = "genesis";

export interface AuditAppend {
  readonly transaction: Transaction;
  readonly postingId: string | null;
  readonly crossShare: Money;
  readonly ledger: LedgerState;
  readonly balance: BalanceStatement;
}

/**
 * Hash an entry's content (everything except `hash`) given its predecessor's hash.
 */
export function computeEntryHash(entry: Omit<AuditEntry, "hash">, previousHash: string): string {
  const content = canonicalize({
    position: entry.position,
    transaction: entry.transaction,
    postingId: entry.postingId,
    crossShare: entry.crossShare,
    ledger: entry.ledger,
    balance: entry.balance,
    previousHash: entry.previousHash,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Recompute a chain and report the first break.
 */
export function verifyAuditChain(entries: readonly AuditEntry[]): AuditVerification {
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const [i, entry] of entries.entries()) {
    let failure: AuditChainBreak | null = null;

    if (entry.position !== i + 1) {
      failure = { position: i + 1, reason: `expected position ${String(i + 1)}, found ${String(entry.position)}` };
    } else if (entry.previousHash !== previousHash) {
      failure = { position: entry.position, reason: `previousHash mismatch at position ${String(entry.position)}` };
    } else if (computeEntryHash(entry, previousHash) !== entry.hash) {
      failure = { position: entry.position, reason: `hash mismatch at position ${String(entry.position)}` };
    }

    if (failure !== null) {
      return { valid: false, lastVerifiedPosition, firstBreak: failure };
    }

    previousHash = entry.hash;
    lastVerifiedPosition = entry.position;
  }

  return { valid: true, lastVerifiedPosition, firstBreak: null };
}

export class AuditTrail {
  private readonly _entries: AuditEntry[] = [];

  append(input: AuditAppend): AuditEntry {
    const last = this._entries[this._entries.length - 1];
    const previousHash = last === undefined ? GENESIS_HASH : last.hash;

    const content: Omit<AuditEntry, "hash"> = {
      position: this._entries.length + 1,
      transaction: input.transaction,
      postingId: input.postingId,
      crossShare: input.crossShare,
      ledger: input.ledger,
      balance: input.balance,
      previousHash,
    };

    const entry: AuditEntry = { ...content, hash: computeEntryHash(content, previousHash) };
    this._entries.push(entry);
    return entry;
  }

  entries(): readonly AuditEntry[] {
    return [...this._entries];
  }

  get size(): number {
    return this._entries.length;
  }

  /**
   * Hash of the newest entry, or GENESIS_HASH when empty.
   */
  get headHash(): string {
    return this._entries[this._entries.length - 1]?.hash ?? GENESIS_HASH;
  }

  verify(): AuditVerification {
    return verifyAuditChain(this._entries);
  }
}
