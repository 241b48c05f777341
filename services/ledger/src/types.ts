/**
 * Ledger Types
 *
 * Types for the in-process token and bond ledger:
 * - Snapshot participants for atomic scopes
 * - Tranche ledger and bond issuer contracts
 * - Issuer configuration
 * - Errors
 */

import type { Address } from "viem";
import type { Token, Tranche } from "./token.js";

// ============================================
// ATOMIC SCOPES
// ============================================

/**
 * Anything whose state is rolled back when an atomic scope fails.
 * captureState returns a function that restores the captured state.
 */
export interface Snapshottable {
  captureState(): () => void;
}

// ============================================
// TRANCHE LEDGER
// ============================================

/**
 * A bond that splits collateral deposits into ordered tranche claims
 */
export interface TrancheLedger {
  readonly address: Address;
  readonly collateralToken: Token;
  readonly maturityDate: number;

  isMature(): boolean;
  timeToMaturity(): number;
  trancheCount(): number;
  tranches(index: number): Tranche;
  totalDebt(): bigint;
  collateralBalance(): bigint;

  deposit(caller: Address, amount: bigint): void;
  redeem(caller: Address, amounts: readonly bigint[]): void;
  redeemMature(caller: Address, tranche: Tranche, amount: bigint): void;
  mature(caller: Address): void;
}

/**
 * Periodic issuer of bonds against one collateral token
 */
export interface BondIssuerLike {
  getLatestBond(): TrancheLedger | undefined;
  isInstance(bond: TrancheLedger): boolean;
}

// ============================================
// ISSUER CONFIGURATION
// ============================================

export interface BondIssuerConfig {
  // Ratios in parts of TRANCHE_RATIO_GRANULARITY, senior first
  trancheRatios: readonly bigint[];
  // Bond lifetime from issuance
  maxMaturityDuration: number;
  // Minimum spacing between issues
  minIssueTimeIntervalSec: number;
  // Offset of each issue window inside the interval
  issueWindowOffsetSec: number;
}

export const DEFAULT_BOND_ISSUER_CONFIG: BondIssuerConfig = {
  trancheRatios: [200n, 800n],
  maxMaturityDuration: 28 * 24 * 60 * 60, // 4 weeks
  minIssueTimeIntervalSec: 7 * 24 * 60 * 60, // weekly
  issueWindowOffsetSec: 0,
};

// ============================================
// EVENTS
// ============================================

export interface TokenEvents {
  transfer: (from: Address, to: Address, amount: bigint) => void;
}

export interface BondEvents {
  deposit: (caller: Address, amount: bigint) => void;
  redeem: (caller: Address, amounts: readonly bigint[]) => void;
  redeemMature: (caller: Address, tranche: Address, amount: bigint) => void;
  mature: (caller: Address) => void;
}

export interface BondIssuerEvents {
  bondIssued: (bond: Address) => void;
}

// ============================================
// ERRORS
// ============================================

export class InsufficientBalanceError extends Error {
  constructor(
    message: string,
    public readonly token: Address,
    public readonly holder: Address,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(message);
    this.name = "InsufficientBalanceError";
  }
}

export class InvalidAmountError extends Error {
  constructor(
    message: string,
    public readonly amount: bigint
  ) {
    super(message);
    this.name = "InvalidAmountError";
  }
}

export class BondError extends Error {
  constructor(
    message: string,
    public readonly bond: Address
  ) {
    super(message);
    this.name = "BondError";
  }
}

export class AlreadyMatureError extends BondError {
  constructor(bond: Address) {
    super("BondController: Already mature", bond);
    this.name = "AlreadyMatureError";
  }
}

export class BondNotMatureError extends BondError {
  constructor(bond: Address) {
    super("BondController: Bond is not mature", bond);
    this.name = "BondNotMatureError";
  }
}

export class NotOwnerError extends Error {
  constructor(
    message: string,
    public readonly caller: Address,
    public readonly owner: Address
  ) {
    super(message);
    this.name = "NotOwnerError";
  }
}

export class InvalidTrancheRatiosError extends Error {
  constructor(
    message: string,
    public readonly ratios: readonly bigint[]
  ) {
    super(message);
    this.name = "InvalidTrancheRatiosError";
  }
}
