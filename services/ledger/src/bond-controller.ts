/**
 * Bond Controller
 *
 * Tranche ledger for one collateral token:
 * - Deposits split collateral into tranche tokens by ratio
 * - Immature bonds redeem pro-rata across all tranches
 * - Maturity runs the waterfall, after which each tranche redeems alone
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import {
  TRANCHE_RATIO_GRANULARITY,
  ledgerLogger as logger,
  minBigInt,
  mulDiv,
} from "@perpnote/shared";
import type { Ledger } from "./ledger.js";
import { Token, Tranche } from "./token.js";
import type { BondEvents, Snapshottable, TrancheLedger } from "./types.js";
import {
  AlreadyMatureError,
  BondError,
  BondNotMatureError,
  InvalidAmountError,
  InvalidTrancheRatiosError,
} from "./types.js";

const bondLogger = logger.child({ component: "bond-controller" });

// ============================================
// BOND CONTROLLER
// ============================================

export class BondController extends EventEmitter<BondEvents> implements TrancheLedger, Snapshottable {
  readonly address: Address;
  private readonly trancheList: readonly Tranche[];
  private matured = false;

  constructor(
    private readonly ledger: Ledger,
    readonly collateralToken: Token,
    ratios: readonly bigint[],
    readonly maturityDate: number,
    readonly owner: Address,
    label = "BOND"
  ) {
    super();
    validateTrancheRatios(ratios);

    this.address = ledger.createAddress(`bond:${label}`);
    ledger.register(this);

    this.trancheList = ratios.map(
      (ratio, index) =>
        new Tranche(ledger, this, index, ratio, `${label}-${String.fromCharCode(65 + index)}`)
    );

    bondLogger.debug({
      bond: this.address,
      ratios: ratios.map((r) => r.toString()),
      maturityDate,
    }, "Bond created");
  }

  // ============================================
  // VIEWS
  // ============================================

  isMature(): boolean {
    return this.matured;
  }

  timeToMaturity(): number {
    return Math.max(this.maturityDate - this.ledger.now(), 0);
  }

  trancheCount(): number {
    return this.trancheList.length;
  }

  tranches(index: number): Tranche {
    const tranche = this.trancheList[index];
    if (!tranche) {
      throw new BondError(`BondController: Invalid tranche index ${index}`, this.address);
    }
    return tranche;
  }

  allTranches(): readonly Tranche[] {
    return this.trancheList;
  }

  hasTranche(token: Token): token is Tranche {
    return this.trancheList.some((t) => t === token);
  }

  totalDebt(): bigint {
    return this.trancheList.reduce((sum, t) => sum + t.totalSupply(), 0n);
  }

  collateralBalance(): bigint {
    return this.collateralToken.balanceOf(this.address);
  }

  /**
   * Collateral backing each tranche. Before maturity the bond's collateral is
   * assigned senior first up to each tranche's supply, the most junior tranche
   * taking the remainder. After maturity it is what each tranche holds.
   */
  trancheCollateralBalances(): bigint[] {
    if (this.matured) {
      return this.trancheList.map((t) => this.collateralToken.balanceOf(t.address));
    }
    let remaining = this.collateralBalance();
    return this.trancheList.map((t, i) => {
      if (i === this.trancheList.length - 1) {
        return remaining;
      }
      const share = minBigInt(t.totalSupply(), remaining);
      remaining -= share;
      return share;
    });
  }

  // ============================================
  // OPERATIONS
  // ============================================

  deposit(caller: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new InvalidAmountError("BondController: invalid amount", amount);
    }
    if (this.matured) {
      throw new BondError("BondController: Bond is already mature", this.address);
    }

    const totalDebt = this.totalDebt();
    const collateralBalance = this.collateralBalance();
    const newDebt =
      totalDebt > 0n && collateralBalance > 0n
        ? mulDiv(amount, totalDebt, collateralBalance)
        : amount;

    this.collateralToken.transfer(caller, this.address, amount);
    for (const tranche of this.trancheList) {
      const trancheAmt = mulDiv(newDebt, tranche.ratio, TRANCHE_RATIO_GRANULARITY);
      if (trancheAmt > 0n) {
        tranche.mint(caller, trancheAmt);
      }
    }

    this.emit("deposit", caller, amount);
  }

  redeem(caller: Address, amounts: readonly bigint[]): void {
    if (this.matured) {
      throw new BondError("BondController: Bond is already mature", this.address);
    }
    if (amounts.length !== this.trancheList.length) {
      throw new BondError("BondController: Invalid redeem amounts", this.address);
    }

    const total = amounts.reduce((sum, a) => sum + a, 0n);
    this.trancheList.forEach((tranche, i) => {
      if (amounts[i] * TRANCHE_RATIO_GRANULARITY !== total * tranche.ratio) {
        throw new BondError("BondController: Invalid redemption ratio", this.address);
      }
    });
    if (total === 0n) {
      throw new InvalidAmountError("BondController: invalid amount", total);
    }

    const collateralOut = mulDiv(this.collateralBalance(), total, this.totalDebt());
    this.trancheList.forEach((tranche, i) => tranche.burn(caller, amounts[i]));
    this.collateralToken.transfer(this.address, caller, collateralOut);

    this.emit("redeem", caller, amounts);
  }

  mature(caller: Address): void {
    if (this.matured) {
      throw new AlreadyMatureError(this.address);
    }
    if (caller !== this.owner && this.ledger.now() < this.maturityDate) {
      throw new BondError("BondController: Invalid call to mature", this.address);
    }

    const shares = this.trancheCollateralBalances();
    this.trancheList.forEach((tranche, i) => {
      this.collateralToken.transfer(this.address, tranche.address, shares[i]);
    });
    this.matured = true;

    bondLogger.info({ bond: this.address, caller }, "Bond matured");
    this.emit("mature", caller);
  }

  redeemMature(caller: Address, tranche: Tranche, amount: bigint): void {
    if (!this.matured) {
      throw new BondNotMatureError(this.address);
    }
    if (!this.hasTranche(tranche)) {
      throw new BondError("BondController: Invalid tranche", this.address);
    }

    const supply = tranche.totalSupply();
    const collateralOut =
      supply > 0n ? mulDiv(this.collateralToken.balanceOf(tranche.address), amount, supply) : 0n;
    tranche.burn(caller, amount);
    this.collateralToken.transfer(tranche.address, caller, collateralOut);

    this.emit("redeemMature", caller, tranche.address, amount);
  }

  captureState(): () => void {
    const matured = this.matured;
    return () => {
      this.matured = matured;
    };
  }
}

// ============================================
// HELPERS
// ============================================

export function validateTrancheRatios(ratios: readonly bigint[]): void {
  const sum = ratios.reduce((acc, r) => acc + r, 0n);
  if (ratios.length === 0 || sum !== TRANCHE_RATIO_GRANULARITY || ratios.some((r) => r <= 0n)) {
    throw new InvalidTrancheRatiosError("Tranche ratios must be positive and sum to granularity", ratios);
  }
}
