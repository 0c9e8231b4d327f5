/**
 * Manual Review Queue
 *
 * Append-only. Items are never removed; resolving an item replaces it
 * with a resolved copy that carries the decision. A resolved item
 * cannot be resolved again.
 */

import type { Money, ReviewReason, Transaction } from "@splitledger/types";
import { addMoney, absMoney, zeroMoney } from "@splitledger/ledger";
import type { ManualReviewItem, ReviewDecision } from "./types.js";
import { ReviewError } from "./types.js";

export class ReviewQueue {
  private readonly items: ManualReviewItem[] = [];
  private readonly index = new Map<string, number>();

  enqueue(transaction: Transaction, reasons: readonly ReviewReason[]): ManualReviewItem {
    const item: ManualReviewItem = {
      id: `review-${String(this.items.length + 1).padStart(4, "0")}`,
      transaction,
      reasons: [...reasons],
      status: "pending",
      queuedAt: transaction.timestamp,
    };
    this.index.set(item.id, this.items.length);
    this.items.push(item);
    return item;
  }

  /**
   * @throws {ReviewError} ITEM_NOT_FOUND
   */
  get(id: string): ManualReviewItem {
    const position = this.index.get(id);
    const item = position === undefined ? undefined : this.items[position];
    if (item === undefined) {
      throw new ReviewError("ITEM_NOT_FOUND", `No review item "${id}"`);
    }
    return item;
  }

  /**
   * @throws {ReviewError} ITEM_NOT_FOUND, ALREADY_RESOLVED
   */
  markResolved(id: string, decision: ReviewDecision): ManualReviewItem {
    const item = this.get(id);
    if (item.status === "resolved") {
      throw new ReviewError("ALREADY_RESOLVED", `Review item "${id}" is already resolved`);
    }

    const resolved: ManualReviewItem = { ...item, status: "resolved", decision };
    const position = this.index.get(id);
    if (position !== undefined) {
      this.items[position] = resolved;
    }
    return resolved;
  }

  pending(): readonly ManualReviewItem[] {
    return this.items.filter((i) => i.status === "pending");
  }

  resolved(): readonly ManualReviewItem[] {
    return this.items.filter((i) => i.status === "resolved");
  }

  all(): readonly ManualReviewItem[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Sum of the absolute amounts still awaiting review.
   */
  pendingTotal(currency: string, decimals: number): Money {
    return this.pending().reduce(
      (sum, item) => addMoney(sum, absMoney(item.transaction.amount)),
      zeroMoney(currency, decimals),
    );
  }
}
