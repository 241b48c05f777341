/**
 * Reserve
 *
 * Insertion-ordered set of tokens the engine holds. Membership follows the
 * balance: a token is in the reserve while its balance is non-zero. The
 * collateral token is pinned at index 0.
 */

import type { Address } from "viem";
import type { Snapshottable, Token } from "@perpnote/ledger";

export class Reserve implements Snapshottable {
  private tokens: Token[];

  constructor(
    readonly holder: Address,
    readonly collateral: Token
  ) {
    this.tokens = [collateral];
  }

  count(): number {
    return this.tokens.length;
  }

  at(index: number): Token | undefined {
    return this.tokens[index];
  }

  list(): readonly Token[] {
    return [...this.tokens];
  }

  balanceOf(token: Token): bigint {
    return token.balanceOf(this.holder);
  }

  has(token: Token): boolean {
    if (token === this.collateral) {
      return this.balanceOf(token) > 0n;
    }
    return this.tokens.includes(token);
  }

  /**
   * Brings membership in line with the current balance and returns it
   */
  sync(token: Token): bigint {
    const balance = this.balanceOf(token);
    if (token === this.collateral) {
      return balance;
    }

    const listed = this.tokens.includes(token);
    if (balance > 0n && !listed) {
      this.tokens.push(token);
    } else if (balance === 0n && listed) {
      this.tokens = this.tokens.filter((t) => t !== token);
    }
    return balance;
  }

  captureState(): () => void {
    const tokens = [...this.tokens];
    return () => {
      this.tokens = tokens;
    };
  }
}
