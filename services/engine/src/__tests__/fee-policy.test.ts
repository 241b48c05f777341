/**
 * Fee Policy Tests
 *
 * Tests for the deviation ratio, the rollover fee curve, note, vault and
 * swap fees and the owner setters.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "viem";
import { Ledger } from "@perpnote/ledger";
import { MAX_DEVIATION_RATIO, ONE } from "@perpnote/shared";
import {
  AccessControl,
  FeePolicy,
  InvalidDRBoundsError,
  InvalidFeeCurveError,
  InvalidPercError,
  InvalidTargetSRBoundsError,
  UnauthorizedError,
} from "../index.js";

const pct = (value: bigint): bigint => value * 1_000_000n; // whole percent

describe("FeePolicy", () => {
  let owner: Address;
  let stranger: Address;
  let access: AccessControl;
  let policy: FeePolicy;

  beforeEach(() => {
    const ledger = new Ledger();
    owner = ledger.createAddress("owner");
    stranger = ledger.createAddress("stranger");
    access = new AccessControl(owner, "Governance");
    policy = new FeePolicy(access);
  });

  // ============================================
  // DEVIATION RATIO
  // ============================================

  describe("computeDeviationRatio", () => {
    it("should be ONE when the vault is subscribed at the target", () => {
      // 532 * 200 / (100 * 800) = 1.33
      expect(policy.computeDeviationRatio({ perpTVL: 100n, vaultTVL: 532n, seniorTR: 200n })).toBe(ONE);
    });

    it("should scale the subscription ratio by the target", () => {
      expect(policy.computeDeviationRatio({ perpTVL: 1000n, vaultTVL: 1000n, seniorTR: 200n })).toBe(18_796_992n);
    });

    it("should report the maximum when the note has no value", () => {
      expect(policy.computeDeviationRatio({ perpTVL: 0n, vaultTVL: 1000n, seniorTR: 200n })).toBe(MAX_DEVIATION_RATIO);
    });

    it("should be zero for degenerate senior ratios", () => {
      expect(policy.computeDeviationRatio({ perpTVL: 100n, vaultTVL: 100n, seniorTR: 0n })).toBe(0n);
      expect(policy.computeDeviationRatio({ perpTVL: 100n, vaultTVL: 100n, seniorTR: 1000n })).toBe(0n);
    });
  });

  // ============================================
  // ROLLOVER FEE
  // ============================================

  describe("computeRolloverFeePerc", () => {
    it("should clamp the debasement branch at the floor", () => {
      policy = new FeePolicy(access, {
        targetSubscriptionRatio: 150_000_000n,
        rolloverFee: {
          debasementSlope: 8_000_000n,
          enrichmentSlope: 0n,
          minRolloverFeePerc: -pct(5n),
          maxRolloverFeePerc: 0n,
        },
      });

      expect(policy.computeRolloverFeePerc(50_000_000n)).toBe(-5_000_000n);
    });

    it("should return the raw debasement fee above the floor", () => {
      policy = new FeePolicy(access, {
        targetSubscriptionRatio: 150_000_000n,
        rolloverFee: {
          debasementSlope: 8_000_000n,
          enrichmentSlope: 0n,
          minRolloverFeePerc: -ONE,
          maxRolloverFeePerc: 0n,
        },
      });

      expect(policy.computeRolloverFeePerc(50_000_000n)).toBe(-5_333_333n);
    });

    it("should return the floor when dr is zero", () => {
      policy = new FeePolicy(access, {
        rolloverFee: {
          debasementSlope: 8_000_000n,
          enrichmentSlope: 0n,
          minRolloverFeePerc: -pct(3n),
          maxRolloverFeePerc: 0n,
        },
      });

      expect(policy.computeRolloverFeePerc(0n)).toBe(-pct(3n));
    });

    it("should charge on the enrichment branch up to the cap", () => {
      const curve = {
        debasementSlope: 0n,
        enrichmentSlope: pct(10n),
        minRolloverFeePerc: 0n,
        maxRolloverFeePerc: pct(2n),
      };
      policy = new FeePolicy(access, { rolloverFee: curve });
      expect(policy.computeRolloverFeePerc(150_000_000n)).toBe(pct(2n));

      policy.setRolloverFeeCurve(owner, { ...curve, maxRolloverFeePerc: ONE });
      expect(policy.computeRolloverFeePerc(150_000_000n)).toBe(pct(5n));
    });

    it("should be zero with the default curve", () => {
      expect(policy.computeRolloverFeePerc(0n)).toBe(0n);
      expect(policy.computeRolloverFeePerc(ONE)).toBe(0n);
      expect(policy.computeRolloverFeePerc(3n * ONE)).toBe(0n);
    });
  });

  // ============================================
  // NOTE AND VAULT FEES
  // ============================================

  describe("note fees", () => {
    beforeEach(() => {
      policy = new FeePolicy(access, { noteMintFeePerc: pct(1n), noteBurnFeePerc: pct(2n) });
    });

    it("should charge mints only when under-subscribed", () => {
      expect(policy.computeNoteMintFeePerc(ONE)).toBe(pct(1n));
      expect(policy.computeNoteMintFeePerc(ONE + 1n)).toBe(0n);
    });

    it("should charge burns only when over-subscribed", () => {
      expect(policy.computeNoteBurnFeePerc(ONE)).toBe(0n);
      expect(policy.computeNoteBurnFeePerc(ONE + 1n)).toBe(pct(2n));
    });
  });

  it("should report flat vault fees", () => {
    policy = new FeePolicy(access, { vaultMintFeePerc: pct(1n), vaultBurnFeePerc: pct(3n) });
    expect(policy.computeVaultMintFeePerc()).toBe(pct(1n));
    expect(policy.computeVaultBurnFeePerc()).toBe(pct(3n));
  });

  describe("swap fees", () => {
    beforeEach(() => {
      policy = new FeePolicy(access, {
        noteBurnFeePerc: pct(2n),
        vaultUnderlyingToNoteSwapFeePerc: pct(1n),
        vaultNoteToUnderlyingSwapFeePerc: pct(3n),
      });
    });

    it("should allow underlying to note swaps only when over-subscribed", () => {
      expect(policy.computeUnderlyingToNoteSwapFeePercs(150_000_000n)).toEqual([0n, pct(1n)]);
      expect(policy.computeUnderlyingToNoteSwapFeePercs(ONE)).toEqual([ONE, ONE]);
    });

    it("should price note to underlying swaps with the burn fee", () => {
      expect(policy.computeNoteToUnderlyingSwapFeePercs(150_000_000n)).toEqual([pct(2n), pct(3n)]);
      expect(policy.computeNoteToUnderlyingSwapFeePercs(ONE)).toEqual([0n, pct(3n)]);
    });

    it("should disable swaps outside the dr bounds", () => {
      expect(policy.computeUnderlyingToNoteSwapFeePercs(250_000_000n)).toEqual([ONE, ONE]);
      expect(policy.computeNoteToUnderlyingSwapFeePercs(50_000_000n)).toEqual([ONE, ONE]);
    });

    it("should disable swaps on invalid price data", () => {
      expect(policy.computeUnderlyingToNoteSwapFeePercs(150_000_000n, false)).toEqual([ONE, ONE]);
      expect(policy.computeNoteToUnderlyingSwapFeePercs(150_000_000n, false)).toEqual([ONE, ONE]);
    });
  });

  // ============================================
  // SETTERS
  // ============================================

  describe("setters", () => {
    it("should bound the target subscription ratio", () => {
      expect(() => policy.setTargetSubscriptionRatio(owner, 3n * ONE)).toThrow(InvalidTargetSRBoundsError);
      expect(() => policy.setTargetSubscriptionRatio(owner, ONE - 1n)).toThrow(InvalidTargetSRBoundsError);

      policy.setTargetSubscriptionRatio(owner, 2n * ONE);
      expect(policy.snapshot().targetSubscriptionRatio).toBe(2n * ONE);
    });

    it("should bound percentages", () => {
      expect(() => policy.setFeePerc(owner, "noteMintFeePerc", ONE + 1n)).toThrow(InvalidPercError);
      expect(() => policy.setFeePerc(owner, "vaultBurnFeePerc", -1n)).toThrow(InvalidPercError);
    });

    it("should validate the rollover fee curve", () => {
      const curve = { debasementSlope: 0n, enrichmentSlope: 0n, minRolloverFeePerc: 0n, maxRolloverFeePerc: 0n };
      expect(() => policy.setRolloverFeeCurve(owner, { ...curve, debasementSlope: -1n })).toThrow(InvalidFeeCurveError);
      expect(() => policy.setRolloverFeeCurve(owner, { ...curve, minRolloverFeePerc: 1n })).toThrow(InvalidPercError);
      expect(() => policy.setRolloverFeeCurve(owner, { ...curve, maxRolloverFeePerc: ONE + 1n })).toThrow(InvalidPercError);
    });

    it("should reject inverted dr bounds", () => {
      expect(() => policy.setDeviationRatioBounds(owner, 2n * ONE, ONE)).toThrow(InvalidDRBoundsError);
    });

    it("should restrict setters to the owner", () => {
      expect(() => policy.setFeePerc(stranger, "noteMintFeePerc", 1n)).toThrow(UnauthorizedError);
    });

    it("should leave earlier snapshots untouched", () => {
      const before = policy.snapshot();
      policy.setFeePerc(owner, "noteMintFeePerc", pct(1n));

      expect(before.noteMintFeePerc).toBe(0n);
      expect(policy.snapshot().noteMintFeePerc).toBe(pct(1n));
      expect(Object.isFrozen(before)).toBe(true);
    });

    it("should reject an invalid initial configuration", () => {
      expect(() => new FeePolicy(access, { noteBurnFeePerc: 2n * ONE })).toThrow(InvalidPercError);
    });
  });
});
