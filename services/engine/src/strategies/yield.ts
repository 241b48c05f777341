/**
 * Tranche Class Yield Strategy
 *
 * Yields are defined per tranche class: the hash of the collateral token,
 * the bond's ordered tranche ratios and the tranche's seniority index.
 * Tranches from different bonds with the same class share one yield.
 */

import { type Address, type Hex, encodeAbiParameters, keccak256 } from "viem";
import type { Tranche } from "@perpnote/ledger";
import { DECIMALS, YIELD_UNIT, engineLogger as logger, formatFixed } from "@perpnote/shared";
import type { AccessControl } from "../access/index.js";
import type { DefinedYield, YieldStrategy } from "./types.js";
import { InvalidYieldError } from "./types.js";

const yieldLogger = logger.child({ component: "yield-strategy" });

// ============================================
// TRANCHE CLASS
// ============================================

export function computeTrancheClass(collateral: Address, ratios: readonly bigint[], index: number): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: "address" }, { type: "uint256[]" }, { type: "uint256" }],
      [collateral, ratios, BigInt(index)]
    )
  );
}

export function trancheClassOf(tranche: Tranche): Hex {
  const bond = tranche.bond;
  const ratios: bigint[] = [];
  for (let i = 0; i < bond.trancheCount(); i++) {
    ratios.push(bond.tranches(i).ratio);
  }
  return computeTrancheClass(bond.collateralToken.address, ratios, tranche.index);
}

// ============================================
// STRATEGY
// ============================================

export class TrancheClassYieldStrategy implements YieldStrategy {
  readonly decimals = DECIMALS.yield;
  private readonly definedYields: Map<Hex, bigint> = new Map();

  constructor(private readonly access: AccessControl) {}

  computeYield(tranche: Tranche): bigint {
    return this.definedYields.get(trancheClassOf(tranche)) ?? 0n;
  }

  definedYieldOf(trancheClass: Hex): bigint {
    return this.definedYields.get(trancheClass) ?? 0n;
  }

  /**
   * Sets the yield for a class. Zero removes the definition.
   */
  updateDefinedYield(caller: Address, trancheClass: Hex, yieldFactor: bigint): void {
    this.access.onlyOwner(caller);
    if (yieldFactor < 0n) {
      throw new InvalidYieldError(trancheClass, yieldFactor);
    }

    if (yieldFactor === 0n) {
      this.definedYields.delete(trancheClass);
    } else {
      this.definedYields.set(trancheClass, yieldFactor);
    }

    yieldLogger.info({
      trancheClass,
      yieldFactor: formatFixed(yieldFactor, DECIMALS.yield),
    }, "Defined yield updated");
  }

  listDefinedYields(): DefinedYield[] {
    return [...this.definedYields.entries()].map(([trancheClass, yieldFactor]) => ({
      trancheClass,
      yieldFactor,
    }));
  }
}

/**
 * Convenience for the common case of a full yield on every tranche of a bond
 * except the most junior one.
 */
export function defineSeniorYields(
  strategy: TrancheClassYieldStrategy,
  caller: Address,
  tranches: readonly Tranche[],
  yieldFactor: bigint = YIELD_UNIT
): void {
  tranches.slice(0, -1).forEach((tranche) => {
    strategy.updateDefinedYield(caller, trancheClassOf(tranche), yieldFactor);
  });
}
