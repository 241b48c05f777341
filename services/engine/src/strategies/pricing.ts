/**
 * Pricing Strategies
 *
 * Prices are 8-decimal fixed-point values in units of collateral.
 */

import type { Token, Tranche } from "@perpnote/ledger";
import { DECIMALS, PRICE_UNIT, maxBigInt, mulDiv } from "@perpnote/shared";
import type { PriceReading, PricingStrategy } from "./types.js";

// ============================================
// UNIT
// ============================================

/**
 * Every tranche and the mature collateral are worth par
 */
export class UnitPricingStrategy implements PricingStrategy {
  readonly kind = "unit";
  readonly decimals = DECIMALS.price;

  computeTranchePrice(_tranche: Tranche): PriceReading {
    return { price: PRICE_UNIT, valid: true };
  }

  computeMatureTranchePrice(_collateral: Token, _collateralBalance: bigint, _matureTrancheBalance: bigint): PriceReading {
    return { price: PRICE_UNIT, valid: true };
  }
}

// ============================================
// CDR
// ============================================

/**
 * Immature tranches are priced at par. Mature tranches and the mature
 * collateral are priced at their collateral-to-debt ratio.
 */
export class CDRPricingStrategy implements PricingStrategy {
  readonly kind: "cdr" | "cdr-lb" = "cdr";
  readonly decimals = DECIMALS.price;

  computeTranchePrice(tranche: Tranche): PriceReading {
    if (!tranche.bond.isMature()) {
      return { price: PRICE_UNIT, valid: true };
    }
    const collateralBalance = tranche.bond.collateralToken.balanceOf(tranche.address);
    return this.bound(cdrReading(collateralBalance, tranche.totalSupply()));
  }

  computeMatureTranchePrice(_collateral: Token, collateralBalance: bigint, matureTrancheBalance: bigint): PriceReading {
    return this.bound(cdrReading(collateralBalance, matureTrancheBalance));
  }

  protected bound(reading: PriceReading): PriceReading {
    return reading;
  }
}

/**
 * CDR pricing that never reports below par
 */
export class CDRLBPricingStrategy extends CDRPricingStrategy {
  override readonly kind = "cdr-lb";

  protected override bound(reading: PriceReading): PriceReading {
    if (!reading.valid) {
      return reading;
    }
    return { price: maxBigInt(reading.price, PRICE_UNIT), valid: true };
  }
}

function cdrReading(collateralBalance: bigint, debt: bigint): PriceReading {
  if (debt === 0n) {
    return { price: 0n, valid: false };
  }
  return { price: mulDiv(collateralBalance, PRICE_UNIT, debt), valid: true };
}

// ============================================
// FACTORY
// ============================================

export function createPricingStrategy(kind: PricingStrategy["kind"]): PricingStrategy {
  switch (kind) {
    case "unit":
      return new UnitPricingStrategy();
    case "cdr":
      return new CDRPricingStrategy();
    case "cdr-lb":
      return new CDRLBPricingStrategy();
  }
}
