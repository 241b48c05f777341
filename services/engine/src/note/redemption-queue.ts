/**
 * Redemption Queue
 *
 * FIFO of accepted tranche instances. The head is the next tranche that
 * must be redeemed. Each instance appears at most once.
 *
 * peek() never mutates. advance() evicts aged heads and is idempotent:
 * a second call with the same predicate evicts nothing.
 */

import type { Snapshottable } from "@perpnote/ledger";

export class RedemptionQueue<T> implements Snapshottable {
  private items: T[] = [];

  count(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items[index];
  }

  contains(item: T): boolean {
    return this.items.includes(item);
  }

  toArray(): readonly T[] {
    return [...this.items];
  }

  peek(): T | undefined {
    return this.items[0];
  }

  /**
   * Appends the item unless already queued. Returns whether it was added.
   */
  enqueue(item: T): boolean {
    if (this.contains(item)) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  dequeue(): T | undefined {
    return this.items.shift();
  }

  /**
   * Pops heads while they are evictable and returns them in order
   */
  advance(isEvictable: (item: T) => boolean): T[] {
    const evicted: T[] = [];
    let head = this.peek();
    while (head !== undefined && isEvictable(head)) {
      this.items.shift();
      evicted.push(head);
      head = this.peek();
    }
    return evicted;
  }

  captureState(): () => void {
    const items = [...this.items];
    return () => {
      this.items = items;
    };
  }
}
