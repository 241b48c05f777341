/**
 * Rollover Vault Tests
 *
 * Tests for deploy and recover, vault valuation, share deposit/redeem and
 * the re-entrancy lock.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { InsufficientBalanceError } from "@perpnote/ledger";
import { ONE, TIME } from "@perpnote/shared";
import {
  DeployedCountOverLimitError,
  InsufficientDeploymentError,
  InsufficientLiquidityError,
  PausedError,
  ReentrancyError,
  UnacceptableBurnAmountError,
  UnacceptableSwapError,
  UnauthorizedError,
  UnexpectedAssetError,
  type RolloverVaultConfig,
} from "../index.js";
import { advanceDays, amt, setupSystem, trancheFor, type TestSystem } from "./fixtures.js";

const SHARES_PER_UNIT = 1_000_000n;

/**
 * An engine holding 1000 aged seniors that left the queue, and a vault
 * with 1000 idle collateral, 15 days after the first bond
 */
function agedSystem(vault: Partial<RolloverVaultConfig> = {}): TestSystem {
  const sys = setupSystem({ note: { minTolerableTrancheMaturity: 14 * TIME.day }, vault });
  const aged = trancheFor(sys, sys.user, amt(5000n));
  sys.engine.mint(sys.user, aged.tranches(0), amt(1000n));
  advanceDays(sys, 15);
  sys.vault.deposit(sys.other, amt(1000n));
  return sys;
}

// ============================================
// DEPLOY
// ============================================

describe("RolloverVault.deploy", () => {
  it("should fail without changes when there is nothing to deploy", () => {
    const sys = setupSystem();

    expect(() => sys.vault.deploy(sys.other)).toThrow(InsufficientDeploymentError);
    expect(sys.issuer.issuedCount()).toBe(0);
    expect(sys.engine.getDepositBond()).toBeUndefined();
    expect(sys.vault.deployedCount()).toBe(0);
  });

  it("should undo the bond deposit when nothing can be rolled", () => {
    const sys = setupSystem();
    sys.vault.deposit(sys.other, amt(1000n));

    expect(() => sys.vault.deploy(sys.other)).toThrow(InsufficientDeploymentError);
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(1000n));
    expect(sys.vault.deployedCount()).toBe(0);
  });

  it("should tranche idle collateral and roll the senior into the engine", () => {
    const sys = agedSystem();
    const deployed = vi.fn();
    sys.vault.on("vault:deployed", deployed);
    const aged = sys.issuer.issuedBondAt(0);

    const rolled = sys.vault.deploy(sys.other);

    const fresh = sys.issuer.issuedBondAt(1);
    expect(rolled).toBe(amt(200n));
    expect(sys.vault.deployedCount()).toBe(2);
    expect(sys.vault.deployedAt(0)).toBe(fresh.tranches(1));
    expect(sys.vault.deployedAt(1)).toBe(aged.tranches(0));
    expect(sys.vault.getVaultAssetValue(aged.tranches(0))).toBe(amt(200n));
    expect(sys.vault.getVaultAssetValue(fresh.tranches(1))).toBe(amt(800n));
    expect(sys.vault.getTVL()).toBe(amt(1000n));
    expect(sys.engine.getRedemptionQueueAt(0)).toBe(fresh.tranches(0));
    expect(sys.engine.getReserveTokenBalance(aged.tranches(0))).toBe(amt(800n));
    expect(sys.engine.note.totalSupply()).toBe(amt(1000n));
    expect(deployed).toHaveBeenCalledWith(amt(200n), 2);
  });

  it("should keep idle collateral below the minimum deployment", () => {
    const sys = agedSystem({ minDeploymentAmt: amt(5000n) });

    expect(() => sys.vault.deploy(sys.other)).toThrow(InsufficientDeploymentError);
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(1000n));
  });

  it("should cap the number of deployed assets", () => {
    const sys = agedSystem({ maxDeployedAssets: 1 });

    expect(() => sys.vault.deploy(sys.other)).toThrow(DeployedCountOverLimitError);
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(1000n));
    expect(sys.vault.deployedCount()).toBe(0);
  });

  it("should restrict the minimum deployment setter to the owner", () => {
    const sys = setupSystem();
    expect(() => sys.vault.setMinDeploymentAmt(sys.other, 1n)).toThrow(UnauthorizedError);

    sys.vault.setMinDeploymentAmt(sys.owner, amt(10n));
    expect(sys.vault.getConfig().minDeploymentAmt).toBe(amt(10n));
  });
});

// ============================================
// RECOVER
// ============================================

describe("RolloverVault.recover", () => {
  it("should redeem matured tranches and keep immature ones", () => {
    const sys = agedSystem();
    sys.vault.deploy(sys.other);
    const recovered = vi.fn();
    sys.vault.on("vault:recovered", recovered);

    // past the first bond's maturity, 14 days before the second's
    advanceDays(sys, 14);
    sys.vault.recover(sys.other);

    const fresh = sys.issuer.issuedBondAt(1);
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(200n));
    expect(sys.vault.deployedCount()).toBe(1);
    expect(sys.vault.deployedAt(0)).toBe(fresh.tranches(1));
    expect(sys.vault.getTVL()).toBe(amt(1000n));
    expect(recovered).toHaveBeenCalledWith(undefined, 1);
  });

  it("should roll recovered collateral into the engine's matured collateral", () => {
    const sys = agedSystem();
    sys.vault.deploy(sys.other);
    advanceDays(sys, 14);

    // 200 recovered collateral buys 40 seniors of the newest bond
    const rolled = sys.vault.recoverAndRedeploy(sys.other);

    const fresh = sys.issuer.issuedBondAt(1);
    const newest = sys.issuer.issuedBondAt(2);
    expect(rolled).toBe(amt(40n));
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(40n));
    expect(sys.vault.deployedCount()).toBe(2);
    expect(sys.vault.deployedAt(0)).toBe(fresh.tranches(1));
    expect(sys.vault.deployedAt(1)).toBe(newest.tranches(1));
    expect(sys.engine.getReserveTokenBalance(newest.tranches(0))).toBe(amt(40n));
    expect(sys.engine.getMatureTrancheBalance()).toBe(amt(760n));
    expect(sys.vault.getTVL()).toBe(amt(1000n));
  });

  it("should redeem immature bonds pro-rata", () => {
    const sys = setupSystem();
    const bond = trancheFor(sys, sys.user, amt(1000n));
    bond.tranches(0).transfer(sys.user, sys.vault.address, amt(100n));
    bond.tranches(1).transfer(sys.user, sys.vault.address, amt(400n));
    // the senior is tracked once the vault redeems notes for it
    sys.engine.mint(sys.user, bond.tranches(0), amt(100n));
    sys.engine.note.transfer(sys.user, sys.vault.address, amt(50n));
    sys.vault.recover(sys.user, sys.engine.note);

    expect(sys.vault.deployedAt(0)).toBe(bond.tranches(0));
    expect(bond.tranches(0).balanceOf(sys.vault.address)).toBe(amt(150n));

    sys.vault.recover(sys.user, bond.tranches(0));

    // 150/200 and 400/800 units: the smaller, 0.5e18 units, is redeemed
    expect(bond.tranches(0).balanceOf(sys.vault.address)).toBe(amt(50n));
    expect(bond.tranches(1).balanceOf(sys.vault.address)).toBe(0n);
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(500n));
  });

  it("should redeem held notes against the queue head", () => {
    const sys = setupSystem();
    const senior = trancheFor(sys, sys.user, amt(5000n)).tranches(0);
    sys.engine.mint(sys.user, senior, amt(1000n));
    sys.engine.note.transfer(sys.user, sys.vault.address, amt(100n));

    sys.vault.recover(sys.user, sys.engine.note);

    expect(senior.balanceOf(sys.vault.address)).toBe(amt(100n));
    expect(sys.engine.note.balanceOf(sys.vault.address)).toBe(0n);
    expect(sys.vault.deployedCount()).toBe(1);
    expect(sys.vault.getVaultAssetValue(senior)).toBe(amt(100n));
  });

  it("should leave room for the burn fee when redeeming held notes", () => {
    const sys = setupSystem();
    const senior = trancheFor(sys, sys.user, amt(5000n)).tranches(0);
    sys.engine.mint(sys.user, senior, amt(1000n));
    sys.vault.deposit(sys.other, amt(10_000n));
    sys.feePolicy.setFeePerc(sys.owner, "noteBurnFeePerc", 2_000_000n);
    sys.engine.note.transfer(sys.user, sys.vault.address, amt(100n));

    sys.vault.recover(sys.user, sys.engine.note);

    // 100 / 1.02 burnt, 2% of that paid to the collector
    expect(senior.balanceOf(sys.vault.address)).toBe(98_039_215_686_274_509_803n);
    expect(sys.engine.note.balanceOf(sys.engine.getFeeCollector())).toBe(1_960_784_313_725_490_196n);
    expect(sys.engine.note.balanceOf(sys.vault.address)).toBe(1n);
  });

  it("should reject assets the vault does not hold", () => {
    const sys = setupSystem();
    expect(() => sys.vault.recover(sys.user, sys.collateral)).toThrow(UnexpectedAssetError);
  });

  it("should pay out every asset on recoverAndRedeem", () => {
    const sys = agedSystem();
    sys.vault.deploy(sys.other);
    const aged = sys.issuer.issuedBondAt(0);
    const fresh = sys.issuer.issuedBondAt(1);

    const payouts = sys.vault.recoverAndRedeem(sys.other, amt(1000n) * SHARES_PER_UNIT);

    expect(payouts).toEqual([
      { token: sys.collateral.address, amount: 0n },
      { token: fresh.tranches(1).address, amount: amt(800n) },
      { token: aged.tranches(0).address, amount: amt(200n) },
      { token: sys.engine.note.address, amount: 0n },
    ]);
    expect(sys.vault.deployedCount()).toBe(0);
    expect(sys.vault.shares.totalSupply()).toBe(0n);
  });
});

// ============================================
// SHARES
// ============================================

describe("RolloverVault shares", () => {
  let sys: TestSystem;

  beforeEach(() => {
    sys = setupSystem();
  });

  it("should mint at the initial rate, then pro-rata to value", () => {
    expect(sys.vault.deposit(sys.user, 0n)).toBe(0n);
    expect(sys.vault.deposit(sys.user, amt(100n))).toBe(amt(100n) * SHARES_PER_UNIT);
    expect(sys.vault.deposit(sys.other, amt(50n))).toBe(amt(50n) * SHARES_PER_UNIT);
    expect(sys.vault.getTVL()).toBe(amt(150n));
  });

  it("should pay a pro-rata slice of each asset", () => {
    sys.vault.deposit(sys.user, amt(100n));
    sys.vault.deposit(sys.other, amt(50n));
    const redeemed = vi.fn();
    sys.vault.on("vault:redeemed", redeemed);

    const payouts = sys.vault.redeem(sys.user, amt(50n) * SHARES_PER_UNIT);

    expect(payouts).toEqual([
      { token: sys.collateral.address, amount: amt(50n) },
      { token: sys.engine.note.address, amount: 0n },
    ]);
    expect(sys.vault.shares.balanceOf(sys.user)).toBe(amt(50n) * SHARES_PER_UNIT);
    expect(redeemed).toHaveBeenCalledWith(sys.user, amt(50n) * SHARES_PER_UNIT, payouts);
  });

  it("should apply vault mint and burn fees", () => {
    sys.feePolicy.setFeePerc(sys.owner, "vaultMintFeePerc", 1_000_000n);
    sys.feePolicy.setFeePerc(sys.owner, "vaultBurnFeePerc", 1_000_000n);

    const shares = sys.vault.deposit(sys.user, amt(100n));
    expect(shares).toBe(amt(99n) * SHARES_PER_UNIT);

    const payouts = sys.vault.redeem(sys.user, shares);
    expect(payouts[0]).toEqual({ token: sys.collateral.address, amount: amt(99n) });
  });

  it("should reject burns on an empty vault or above the balance", () => {
    expect(sys.vault.redeem(sys.user, 0n)).toEqual([]);
    expect(() => sys.vault.redeem(sys.user, 1n)).toThrow(UnacceptableBurnAmountError);

    sys.vault.deposit(sys.other, amt(50n));
    expect(() => sys.vault.redeem(sys.other, amt(60n) * SHARES_PER_UNIT)).toThrow(InsufficientBalanceError);
  });

  it("should refuse deposits while paused", () => {
    sys.vault.pause(sys.owner);
    expect(() => sys.vault.deposit(sys.user, amt(1n))).toThrow(PausedError);
  });

  it("should reject re-entrant calls and roll back the outer one", () => {
    const hook = (): void => {
      sys.vault.deploy(sys.other);
    };
    sys.collateral.on("transfer", hook);

    expect(() => sys.vault.deposit(sys.user, amt(100n))).toThrow(ReentrancyError);
    expect(sys.vault.shares.totalSupply()).toBe(0n);
    expect(sys.collateral.balanceOf(sys.user)).toBe(amt(100_000n));

    sys.collateral.off("transfer", hook);
    expect(sys.vault.deposit(sys.user, amt(100n))).toBe(amt(100n) * SHARES_PER_UNIT);
  });
});

// ============================================
// SWAPS
// ============================================

describe("RolloverVault swaps", () => {
  let sys: TestSystem;

  beforeEach(() => {
    sys = setupSystem();
    const senior = trancheFor(sys, sys.user, amt(5000n)).tranches(0);
    sys.engine.mint(sys.user, senior, amt(1000n));
  });

  it("should mint notes for underlying and keep the vault fee", () => {
    sys.vault.deposit(sys.other, amt(10_000n));
    sys.feePolicy.setFeePerc(sys.owner, "vaultUnderlyingToNoteSwapFeePerc", 10_000_000n);
    const swapped = vi.fn();
    sys.vault.on("vault:swapped", swapped);

    const result = sys.vault.swapUnderlyingForNotes(sys.user, amt(100n));

    expect(result).toEqual({
      amountIn: amt(100n),
      amountOut: amt(90n),
      noteFeeAmt: 0n,
      vaultFeeAmt: amt(10n),
      drPost: 170_881_749n,
    });
    const bond = sys.issuer.issuedBondAt(0);
    expect(sys.engine.note.balanceOf(sys.user)).toBe(amt(1090n));
    expect(sys.engine.note.totalSupply()).toBe(amt(1090n));
    expect(sys.engine.getReserveTokenBalance(bond.tranches(0))).toBe(amt(1090n));
    // 450 tranched into 90 senior and 360 junior
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(9650n));
    expect(sys.vault.deployedCount()).toBe(1);
    expect(sys.vault.deployedAt(0)).toBe(bond.tranches(1));
    expect(bond.tranches(1).balanceOf(sys.vault.address)).toBe(amt(360n));
    expect(sys.vault.getTVL()).toBe(amt(10_010n));
    expect(swapped).toHaveBeenCalledWith(sys.user, "underlyingToNote", result);
  });

  it("should pay underlying for notes less the note and vault fees", () => {
    sys.vault.deposit(sys.other, amt(5000n));
    sys.feePolicy.setFeePerc(sys.owner, "noteBurnFeePerc", 2_000_000n);
    sys.feePolicy.setFeePerc(sys.owner, "vaultNoteToUnderlyingSwapFeePerc", 5_000_000n);

    const result = sys.vault.swapNotesForUnderlying(sys.user, amt(100n));

    expect(result).toEqual({
      amountIn: amt(100n),
      amountOut: amt(93n),
      noteFeeAmt: amt(2n),
      vaultFeeAmt: amt(5n),
      drPost: 104_427_735n,
    });
    expect(sys.collateral.balanceOf(sys.user)).toBe(amt(95_093n));
    expect(sys.engine.note.balanceOf(sys.user)).toBe(amt(900n));
    expect(sys.engine.note.balanceOf(sys.vault.address)).toBe(amt(98n));
    expect(sys.engine.note.balanceOf(sys.engine.getFeeCollector())).toBe(amt(2n));
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(4907n));
    expect(sys.vault.getTVL()).toBe(amt(5005n));
  });

  it("should reject zero amounts", () => {
    sys.vault.deposit(sys.other, amt(10_000n));
    expect(() => sys.vault.swapUnderlyingForNotes(sys.user, 0n)).toThrow(UnacceptableSwapError);
    expect(() => sys.vault.swapNotesForUnderlying(sys.user, 0n)).toThrow(UnacceptableSwapError);
  });

  it("should refuse swaps while the fees are at 100%", () => {
    sys.vault.deposit(sys.other, amt(10_000n));

    expect(() => sys.vault.swapUnderlyingForNotes(sys.user, amt(100n))).toThrow(UnacceptableSwapError);
    expect(() => sys.vault.swapNotesForUnderlying(sys.user, amt(100n))).toThrow(UnacceptableSwapError);
    expect(sys.engine.note.balanceOf(sys.user)).toBe(amt(1000n));
    expect(sys.collateral.balanceOf(sys.vault.address)).toBe(amt(10_000n));
  });

  it("should refuse underlying swaps that leave the system under-subscribed", () => {
    sys.vault.deposit(sys.other, amt(2000n));
    sys.feePolicy.setFeePerc(sys.owner, "vaultUnderlyingToNoteSwapFeePerc", 10_000_000n);

    expect(() => sys.vault.swapUnderlyingForNotes(sys.user, amt(100n))).toThrow(UnacceptableSwapError);
  });

  it("should fail without changes when idle underlying cannot cover the payout", () => {
    sys.vault.deposit(sys.other, amt(50n));
    sys.feePolicy.setDeviationRatioBounds(sys.owner, 0n, 2n * ONE);
    sys.feePolicy.setFeePerc(sys.owner, "vaultNoteToUnderlyingSwapFeePerc", 5_000_000n);

    expect(() => sys.vault.swapNotesForUnderlying(sys.user, amt(100n))).toThrow(InsufficientLiquidityError);
    expect(sys.engine.note.balanceOf(sys.user)).toBe(amt(1000n));
    expect(sys.engine.note.balanceOf(sys.vault.address)).toBe(0n);
  });
});
