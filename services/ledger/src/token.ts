/**
 * Token
 *
 * Fungible balance ledger with a total supply. Tranche tokens additionally
 * know their bond, seniority index and ratio.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import type { Ledger } from "./ledger.js";
import { ZERO_ADDRESS } from "./ledger.js";
import type { Snapshottable, TokenEvents, TrancheLedger } from "./types.js";
import { InsufficientBalanceError, InvalidAmountError } from "./types.js";

// ============================================
// TOKEN
// ============================================

export class Token extends EventEmitter<TokenEvents> implements Snapshottable {
  readonly address: Address;
  readonly decimals = 18;

  private balances: Map<Address, bigint> = new Map();
  private supply = 0n;

  constructor(
    protected readonly ledger: Ledger,
    readonly symbol: string
  ) {
    super();
    this.address = ledger.createAddress(`token:${symbol}`);
    ledger.register(this);
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  mint(to: Address, amount: bigint): void {
    this.assertAmount(amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
    this.emit("transfer", ZERO_ADDRESS, to, amount);
  }

  burn(from: Address, amount: bigint): void {
    this.assertAmount(amount);
    this.debit(from, amount);
    this.supply -= amount;
    this.emit("transfer", from, ZERO_ADDRESS, amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.assertAmount(amount);
    if (amount === 0n) {
      return;
    }
    this.debit(from, amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.emit("transfer", from, to, amount);
  }

  captureState(): () => void {
    const balances = new Map(this.balances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.supply = supply;
    };
  }

  private debit(from: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(
        `${this.symbol}: transfer amount exceeds balance`,
        this.address,
        from,
        amount,
        balance
      );
    }
    const remaining = balance - amount;
    if (remaining === 0n) {
      this.balances.delete(from);
    } else {
      this.balances.set(from, remaining);
    }
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new InvalidAmountError(`${this.symbol}: negative amount`, amount);
    }
  }
}

// ============================================
// TRANCHE
// ============================================

export class Tranche extends Token {
  constructor(
    ledger: Ledger,
    readonly bond: TrancheLedger,
    readonly index: number,
    readonly ratio: bigint,
    symbol: string
  ) {
    super(ledger, symbol);
  }
}

export function isTranche(token: Token): token is Tranche {
  return token instanceof Tranche;
}

export function createToken(ledger: Ledger, symbol: string): Token {
  return new Token(ledger, symbol);
}
