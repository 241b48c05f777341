/**
 * Fee Policy
 *
 * Prices note mint/burn, rollovers and vault operations from the
 * deviation ratio between the vault's and the note's value.
 *
 *   dr = (vaultTVL * seniorTR) / (perpTVL * juniorTR) / targetSR
 *
 * dr <= 1: under-subscribed, rollovers pay the caller, mints are charged.
 * dr > 1:  over-subscribed, rollovers charge the caller, burns are charged.
 */

import type { Address } from "viem";
import {
  FEE_POLICY_LIMITS,
  MAX_DEVIATION_RATIO,
  ONE,
  TRANCHE_RATIO_GRANULARITY,
  engineLogger as logger,
  formatFixed,
  maxBigInt,
  minBigInt,
  mulDiv,
} from "@perpnote/shared";
import type { AccessControl } from "../access/index.js";
import type { FeePolicyConfig, RolloverFeeCurve, SubscriptionParams, SwapFeePercs } from "./types.js";
import {
  DEFAULT_FEE_POLICY_CONFIG,
  InvalidDRBoundsError,
  InvalidFeeCurveError,
  InvalidPercError,
  InvalidTargetSRBoundsError,
} from "./types.js";

const feeLogger = logger.child({ component: "fee-policy" });

const SWAP_DISABLED: SwapFeePercs = [ONE, ONE];

export type PercField =
  | "noteMintFeePerc"
  | "noteBurnFeePerc"
  | "vaultMintFeePerc"
  | "vaultBurnFeePerc"
  | "vaultUnderlyingToNoteSwapFeePerc"
  | "vaultNoteToUnderlyingSwapFeePerc";

// ============================================
// FEE POLICY
// ============================================

export class FeePolicy {
  private config: Readonly<FeePolicyConfig>;

  constructor(
    private readonly access: AccessControl,
    config?: Partial<FeePolicyConfig>
  ) {
    const merged: FeePolicyConfig = { ...DEFAULT_FEE_POLICY_CONFIG, ...config };
    validateConfig(merged);
    this.config = Object.freeze(merged);

    feeLogger.info({
      targetSubscriptionRatio: formatFixed(merged.targetSubscriptionRatio, 8),
      noteMintFeePerc: formatFixed(merged.noteMintFeePerc, 8),
      noteBurnFeePerc: formatFixed(merged.noteBurnFeePerc, 8),
    }, "FeePolicy initialized");
  }

  /**
   * Frozen view of the configuration. Operations take one snapshot at the
   * start and compute every fee from it.
   */
  snapshot(): Readonly<FeePolicyConfig> {
    return this.config;
  }

  // ============================================
  // DEVIATION RATIO
  // ============================================

  computeDeviationRatio(
    params: SubscriptionParams,
    config: Readonly<FeePolicyConfig> = this.config
  ): bigint {
    const { perpTVL, vaultTVL, seniorTR } = params;
    if (perpTVL === 0n) {
      return MAX_DEVIATION_RATIO;
    }
    const juniorTR = TRANCHE_RATIO_GRANULARITY - seniorTR;
    if (seniorTR <= 0n || juniorTR <= 0n) {
      return 0n;
    }
    const subscriptionRatio = mulDiv(vaultTVL * seniorTR, ONE, perpTVL * juniorTR);
    return mulDiv(subscriptionRatio, ONE, config.targetSubscriptionRatio);
  }

  // ============================================
  // NOTE FEES
  // ============================================

  computeNoteMintFeePerc(dr: bigint, config: Readonly<FeePolicyConfig> = this.config): bigint {
    return dr <= ONE ? config.noteMintFeePerc : 0n;
  }

  computeNoteBurnFeePerc(dr: bigint, config: Readonly<FeePolicyConfig> = this.config): bigint {
    return dr > ONE ? config.noteBurnFeePerc : 0n;
  }

  /**
   * Signed rollover fee. Negative values flow from the note to the caller.
   */
  computeRolloverFeePerc(dr: bigint, config: Readonly<FeePolicyConfig> = this.config): bigint {
    const curve = config.rolloverFee;

    if (dr <= ONE) {
      const denominator = minBigInt(mulDiv(dr, config.targetSubscriptionRatio, ONE), ONE);
      if (denominator === 0n) {
        return curve.minRolloverFeePerc;
      }
      const magnitude = mulDiv(ONE - dr, curve.debasementSlope, denominator);
      return maxBigInt(-magnitude, curve.minRolloverFeePerc);
    }

    const fee = mulDiv(dr - ONE, curve.enrichmentSlope, ONE);
    return minBigInt(fee, curve.maxRolloverFeePerc);
  }

  // ============================================
  // VAULT FEES
  // ============================================

  computeVaultMintFeePerc(config: Readonly<FeePolicyConfig> = this.config): bigint {
    return config.vaultMintFeePerc;
  }

  computeVaultBurnFeePerc(config: Readonly<FeePolicyConfig> = this.config): bigint {
    return config.vaultBurnFeePerc;
  }

  /**
   * Fees for swapping underlying into notes through the vault.
   * drPost is the deviation ratio after the swap; valid is false when any
   * value feeding it came from an invalid price.
   */
  computeUnderlyingToNoteSwapFeePercs(
    drPost: bigint,
    valid = true,
    config: Readonly<FeePolicyConfig> = this.config
  ): SwapFeePercs {
    if (!valid || !this.withinSwapBounds(drPost, config) || drPost <= ONE) {
      return SWAP_DISABLED;
    }
    return [0n, config.vaultUnderlyingToNoteSwapFeePerc];
  }

  /**
   * Fees for swapping notes into underlying through the vault
   */
  computeNoteToUnderlyingSwapFeePercs(
    drPost: bigint,
    valid = true,
    config: Readonly<FeePolicyConfig> = this.config
  ): SwapFeePercs {
    if (!valid || !this.withinSwapBounds(drPost, config)) {
      return SWAP_DISABLED;
    }
    return [this.computeNoteBurnFeePerc(drPost, config), config.vaultNoteToUnderlyingSwapFeePerc];
  }

  private withinSwapBounds(dr: bigint, config: Readonly<FeePolicyConfig>): boolean {
    return dr >= config.deviationRatioBoundLower && dr <= config.deviationRatioBoundUpper;
  }

  // ============================================
  // OWNER SETTERS
  // ============================================

  setTargetSubscriptionRatio(caller: Address, ratio: bigint): void {
    this.access.onlyOwner(caller);
    this.update({ targetSubscriptionRatio: ratio });
  }

  setFeePerc(caller: Address, field: PercField, perc: bigint): void {
    this.access.onlyOwner(caller);
    const patch: Partial<FeePolicyConfig> = {};
    patch[field] = perc;
    this.update(patch);
  }

  setRolloverFeeCurve(caller: Address, curve: RolloverFeeCurve): void {
    this.access.onlyOwner(caller);
    this.update({ rolloverFee: { ...curve } });
  }

  setDeviationRatioBounds(caller: Address, lower: bigint, upper: bigint): void {
    this.access.onlyOwner(caller);
    this.update({ deviationRatioBoundLower: lower, deviationRatioBoundUpper: upper });
  }

  private update(patch: Partial<FeePolicyConfig>): void {
    const next: FeePolicyConfig = { ...this.config, ...patch };
    validateConfig(next);
    this.config = Object.freeze(next);
    feeLogger.info({ fields: Object.keys(patch) }, "FeePolicy updated");
  }
}

// ============================================
// VALIDATION
// ============================================

function validateConfig(config: FeePolicyConfig): void {
  if (
    config.targetSubscriptionRatio < FEE_POLICY_LIMITS.targetSubscriptionRatioLower ||
    config.targetSubscriptionRatio > FEE_POLICY_LIMITS.targetSubscriptionRatioUpper
  ) {
    throw new InvalidTargetSRBoundsError(config.targetSubscriptionRatio);
  }

  const percFields: PercField[] = [
    "noteMintFeePerc",
    "noteBurnFeePerc",
    "vaultMintFeePerc",
    "vaultBurnFeePerc",
    "vaultUnderlyingToNoteSwapFeePerc",
    "vaultNoteToUnderlyingSwapFeePerc",
  ];
  for (const field of percFields) {
    const value = config[field];
    if (value < 0n || value > ONE) {
      throw new InvalidPercError(field, value);
    }
  }

  const curve = config.rolloverFee;
  if (curve.debasementSlope < 0n || curve.enrichmentSlope < 0n) {
    throw new InvalidFeeCurveError("FeePolicy: slopes must be non-negative", curve);
  }
  if (curve.minRolloverFeePerc < -ONE || curve.minRolloverFeePerc > 0n) {
    throw new InvalidPercError("minRolloverFeePerc", curve.minRolloverFeePerc);
  }
  if (curve.maxRolloverFeePerc < 0n || curve.maxRolloverFeePerc > ONE) {
    throw new InvalidPercError("maxRolloverFeePerc", curve.maxRolloverFeePerc);
  }

  if (config.deviationRatioBoundLower > config.deviationRatioBoundUpper) {
    throw new InvalidDRBoundsError(config.deviationRatioBoundLower, config.deviationRatioBoundUpper);
  }
}

export function createFeePolicy(access: AccessControl, config?: Partial<FeePolicyConfig>): FeePolicy {
  return new FeePolicy(access, config);
}
