/**
 * Fee Policy Types
 *
 * Percentages and ratios are 8-decimal fixed-point bigints where ONE = 100%.
 */

import { FEE_POLICY_LIMITS, ONE } from "@perpnote/shared";

// ============================================
// CONFIGURATION
// ============================================

export interface RolloverFeeCurve {
  // Steepness of the negative branch (dr <= 1)
  debasementSlope: bigint;
  // Steepness of the positive branch (dr > 1)
  enrichmentSlope: bigint;
  // Most negative fee, in [-ONE, 0]
  minRolloverFeePerc: bigint;
  // Largest positive fee, in [0, ONE]
  maxRolloverFeePerc: bigint;
}

export interface FeePolicyConfig {
  targetSubscriptionRatio: bigint;

  // Note fees, charged on one side of dr = 1 only
  noteMintFeePerc: bigint;
  noteBurnFeePerc: bigint;

  // Flat vault fees
  vaultMintFeePerc: bigint;
  vaultBurnFeePerc: bigint;
  vaultUnderlyingToNoteSwapFeePerc: bigint;
  vaultNoteToUnderlyingSwapFeePerc: bigint;

  rolloverFee: RolloverFeeCurve;

  // Swaps are disabled when the post-swap dr leaves these bounds
  deviationRatioBoundLower: bigint;
  deviationRatioBoundUpper: bigint;
}

export const DEFAULT_ROLLOVER_FEE_CURVE: RolloverFeeCurve = {
  debasementSlope: 0n,
  enrichmentSlope: 0n,
  minRolloverFeePerc: 0n,
  maxRolloverFeePerc: 0n,
};

export const DEFAULT_FEE_POLICY_CONFIG: FeePolicyConfig = {
  targetSubscriptionRatio: FEE_POLICY_LIMITS.defaultTargetSubscriptionRatio,
  noteMintFeePerc: 0n,
  noteBurnFeePerc: 0n,
  vaultMintFeePerc: 0n,
  vaultBurnFeePerc: 0n,
  vaultUnderlyingToNoteSwapFeePerc: ONE,
  vaultNoteToUnderlyingSwapFeePerc: ONE,
  rolloverFee: DEFAULT_ROLLOVER_FEE_CURVE,
  deviationRatioBoundLower: ONE,
  deviationRatioBoundUpper: 2n * ONE,
};

// ============================================
// INPUTS / OUTPUTS
// ============================================

/**
 * Aggregate values the deviation ratio is computed from
 */
export interface SubscriptionParams {
  perpTVL: bigint;
  vaultTVL: bigint;
  // Senior tranche ratio of the deposit bond, in TRANCHE_RATIO_GRANULARITY parts
  seniorTR: bigint;
}

/**
 * [note-side fee, vault-side fee]
 */
export type SwapFeePercs = readonly [bigint, bigint];

// ============================================
// ERRORS
// ============================================

export class InvalidPercError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: bigint
  ) {
    super(`FeePolicy: invalid percentage for ${field}: ${value}`);
    this.name = "InvalidPercError";
  }
}

export class InvalidTargetSRBoundsError extends Error {
  constructor(public readonly value: bigint) {
    super(`FeePolicy: target subscription ratio out of bounds: ${value}`);
    this.name = "InvalidTargetSRBoundsError";
  }
}

export class InvalidDRBoundsError extends Error {
  constructor(
    public readonly lower: bigint,
    public readonly upper: bigint
  ) {
    super(`FeePolicy: invalid deviation ratio bounds [${lower}, ${upper}]`);
    this.name = "InvalidDRBoundsError";
  }
}

export class InvalidFeeCurveError extends Error {
  constructor(
    message: string,
    public readonly curve: RolloverFeeCurve
  ) {
    super(message);
    this.name = "InvalidFeeCurveError";
  }
}
