/**
 * Strategy Types
 *
 * Pricing and yield adapters consulted by the note engine. The set of
 * implementations is closed: Unit, CDR and CDR lower bound for pricing,
 * tranche-class lookup for yields.
 */

import type { Hex } from "viem";
import type { Token, Tranche } from "@perpnote/ledger";

// ============================================
// PRICING
// ============================================

/**
 * A price together with whether it can be relied on. Consumers treat an
 * invalid reading as unusable, never as par.
 */
export interface PriceReading {
  price: bigint;
  valid: boolean;
}

export interface PricingStrategy {
  readonly kind: "unit" | "cdr" | "cdr-lb";
  readonly decimals: number;

  /** Price of one tranche token */
  computeTranchePrice(tranche: Tranche): PriceReading;

  /** Price of one unit of mature tranche balance held as collateral */
  computeMatureTranchePrice(
    collateral: Token,
    collateralBalance: bigint,
    matureTrancheBalance: bigint
  ): PriceReading;
}

// ============================================
// YIELD
// ============================================

export interface YieldStrategy {
  readonly decimals: number;

  /** Current defined yield for the tranche's class */
  computeYield(tranche: Tranche): bigint;
}

export interface DefinedYield {
  trancheClass: Hex;
  yieldFactor: bigint;
}

// ============================================
// ERRORS
// ============================================

export class InvalidYieldError extends Error {
  constructor(
    public readonly trancheClass: Hex,
    public readonly yieldFactor: bigint
  ) {
    super(`Invalid yield ${yieldFactor} for class ${trancheClass}`);
    this.name = "InvalidYieldError";
  }
}
