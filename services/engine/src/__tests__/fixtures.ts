/**
 * Shared test setup for the engine suites
 */

import type { Address } from "viem";
import type { BondController } from "@perpnote/ledger";
import { TIME } from "@perpnote/shared";
import { createSystem, defineSeniorYields, type PerpSystem, type SystemOptions } from "../index.js";

export const E18 = 10n ** 18n;
export const amt = (whole: bigint): bigint => whole * E18;

// Start of a 604800s issue window is 1_699_488_000, so the next bond
// becomes available 92_800s after this
export const T0 = 1_700_000_000;

export interface TestSystem extends PerpSystem {
  user: Address;
  other: Address;
}

export function setupSystem(options: SystemOptions = {}): TestSystem {
  const system = createSystem({ startTime: T0, pricing: "cdr", ...options });
  const user = system.ledger.createAddress("user");
  const other = system.ledger.createAddress("other");
  system.collateral.mint(user, amt(100_000n));
  system.collateral.mint(other, amt(100_000n));
  return { ...system, user, other };
}

/**
 * Adopts the issuer's latest bond as deposit bond and gives its senior
 * tranche a yield of 1.0
 */
export function currentBond(system: TestSystem): BondController {
  system.engine.advance();
  const bond = system.issuer.issuedBondAt(system.issuer.issuedCount() - 1);
  defineSeniorYields(system.yields, system.owner, bond.allTranches());
  return bond;
}

/**
 * Deposits collateral into the current bond for holder. Ratios default to
 * 200/800, so 5 collateral buys 1 senior and 4 junior tranches.
 */
export function trancheFor(system: TestSystem, holder: Address, collateralAmt: bigint): BondController {
  const bond = currentBond(system);
  bond.deposit(holder, collateralAmt);
  return bond;
}

export function advanceDays(system: TestSystem, days: number): void {
  system.ledger.advanceTime(days * TIME.day);
}
