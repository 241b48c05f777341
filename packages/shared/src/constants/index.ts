/**
 * perpnote Constants
 * Fixed-point precision and protocol limits
 */

// ============================================
// FIXED-POINT PRECISION
// ============================================
export const DECIMALS = {
  amount: 18,
  price: 8,
  yield: 18,
  percentage: 8,
} as const;

/** One whole token, 18 decimals */
export const AMOUNT_UNIT = 10n ** BigInt(DECIMALS.amount);

/** Price of 1.0, 8 decimals */
export const PRICE_UNIT = 10n ** BigInt(DECIMALS.price);

/** Yield of 1.0, 18 decimals */
export const YIELD_UNIT = 10n ** BigInt(DECIMALS.yield);

/** 100% for fees, ratios and the deviation ratio, 8 decimals */
export const ONE = 10n ** BigInt(DECIMALS.percentage);

// ============================================
// TRANCHE CONFIGURATION
// ============================================
export const TRANCHE_CONFIG = {
  // Tranche ratios are expressed in parts of this granularity
  ratioGranularity: 1000n,
  // Tranche balances below this are ignored when valuing the vault
  dustAmount: 10_000_000n,
} as const;

export const TRANCHE_RATIO_GRANULARITY = TRANCHE_CONFIG.ratioGranularity;
export const TRANCHE_DUST_AMT = TRANCHE_CONFIG.dustAmount;

// ============================================
// FEE POLICY LIMITS
// ============================================
export const FEE_POLICY_LIMITS = {
  // Target subscription ratio bounds
  targetSubscriptionRatioLower: ONE,
  targetSubscriptionRatioUpper: 2n * ONE,
  defaultTargetSubscriptionRatio: (ONE * 133n) / 100n,
  // Reported when the note has no value to subscribe against
  maxDeviationRatio: 100n * ONE,
} as const;

export const MAX_DEVIATION_RATIO = FEE_POLICY_LIMITS.maxDeviationRatio;

// ============================================
// VAULT CONFIGURATION
// ============================================
export const VAULT_CONFIG = {
  // Shares minted per unit of underlying on the first deposit
  initialRate: 1_000_000n,
  // Deployed assets tracked at most at once
  maxDeployedAssets: 47,
} as const;

// ============================================
// TIME
// ============================================
export const TIME = {
  hour: 60 * 60,
  day: 24 * 60 * 60,
  week: 7 * 24 * 60 * 60,
} as const;
