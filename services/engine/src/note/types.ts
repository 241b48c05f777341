/**
 * Note Engine Types
 *
 * Configuration, operation results, events and errors for the perpetual
 * note engine.
 */

import type { Address } from "viem";
import { TIME } from "@perpnote/shared";

// ============================================
// CONFIGURATION
// ============================================

export interface NoteEngineConfig {
  name: string;
  symbol: string;
  // Deposit bonds must mature inside this window (seconds from now)
  minTolerableTrancheMaturity: number;
  maxTolerableTrancheMaturity: number;
  // 0 means unlimited
  maxSupply: bigint;
  // 0 means unlimited
  maxMintAmtPerTranche: bigint;
}

export const DEFAULT_NOTE_ENGINE_CONFIG: NoteEngineConfig = {
  name: "Perpetual Note",
  symbol: "PNOTE",
  minTolerableTrancheMaturity: 0,
  maxTolerableTrancheMaturity: 365 * TIME.day,
  maxSupply: 0n,
  maxMintAmtPerTranche: 0n,
};

// ============================================
// SUBSCRIPTION
// ============================================

/**
 * The other side of the deviation ratio, usually the rollover vault
 */
export interface SubscriptionSource {
  getTVL(): bigint;
}

export interface TVLReading {
  value: bigint;
  valid: boolean;
}

// ============================================
// OPERATION RESULTS
// ============================================

export interface MintResult {
  // Note value of the deposited tranches
  noteAmt: bigint;
  // Signed fee; negative amounts were paid to the caller
  fee: bigint;
}

export interface RedeemResult {
  // Notes burnt from the caller
  burntAmt: bigint;
  // Token paid out, in the token's own units
  tokenOutAmt: bigint;
  // Tranche-equivalent amount removed from the reserve
  trancheOutAmt: bigint;
  // Part of the request that the reserve balance could not cover
  leftoverAmt: bigint;
  fee: bigint;
}

export interface RolloverResult {
  // Note value of the tranches rolled in
  noteRolledAmt: bigint;
  // Token paid out, in the token's own units
  tokenOutAmt: bigint;
  // Tranche-equivalent amount removed from the reserve
  trancheOutAmt: bigint;
  // Tranches taken from the caller
  trancheInAmt: bigint;
  // Offered tranches left with the caller
  remainingTrancheInAmt: bigint;
}

export type DequeueReason = "redeemed" | "evicted";

// ============================================
// EVENTS
// ============================================

export interface NoteEngineEvents {
  "reserve:synced": (token: Address, balance: bigint) => void;
  "queue:enqueued": (tranche: Address) => void;
  "queue:dequeued": (tranche: Address, reason: DequeueReason) => void;
  "depositBond:updated": (bond: Address) => void;
  "yield:applied": (tranche: Address, yieldFactor: bigint) => void;
  "tranche:matured": (tranche: Address, trancheAmt: bigint, collateralAmt: bigint) => void;
  "note:minted": (caller: Address, tranche: Address, result: MintResult) => void;
  "note:redeemed": (caller: Address, token: Address, result: RedeemResult) => void;
  "note:rolledOver": (caller: Address, trancheIn: Address, tokenOut: Address, result: RolloverResult) => void;
}

// ============================================
// ERRORS
// ============================================

export class UnexpectedAssetError extends Error {
  constructor(
    message: string,
    public readonly token: Address
  ) {
    super(message);
    this.name = "UnexpectedAssetError";
  }
}

export class UnacceptableMintAmountError extends Error {
  constructor(
    public readonly trancheAmt: bigint,
    public readonly noteAmt: bigint
  ) {
    super("Expected to mint a non-zero amount");
    this.name = "UnacceptableMintAmountError";
  }
}

export class UnacceptableBurnAmountError extends Error {
  constructor(public readonly requestedAmt: bigint) {
    super("Expected to burn a non-zero amount");
    this.name = "UnacceptableBurnAmountError";
  }
}

export class UnexpectedRedemptionOrderError extends Error {
  constructor(
    public readonly token: Address,
    public readonly head: Address
  ) {
    super("Expected to redeem burning tranche or queue to be empty");
    this.name = "UnexpectedRedemptionOrderError";
  }
}

export class UnacceptableRolloverError extends Error {
  constructor(
    message: string,
    public readonly trancheIn: Address,
    public readonly tokenOut: Address
  ) {
    super(message);
    this.name = "UnacceptableRolloverError";
  }
}

export class UnacceptableRolloverAmountError extends Error {
  constructor(
    public readonly trancheInAmt: bigint,
    public readonly noteRolledAmt: bigint
  ) {
    super("Expected to roll over a non-zero amount");
    this.name = "UnacceptableRolloverAmountError";
  }
}

export class ExceededMaxSupplyError extends Error {
  constructor(
    public readonly newSupply: bigint,
    public readonly maxSupply: bigint
  ) {
    super(`Supply ${newSupply} exceeds max supply ${maxSupply}`);
    this.name = "ExceededMaxSupplyError";
  }
}

export class ExceededMaxMintPerTrancheError extends Error {
  constructor(
    public readonly tranche: Address,
    public readonly mintedAmt: bigint,
    public readonly maxMintAmt: bigint
  ) {
    super(`Minted ${mintedAmt} against tranche exceeds ${maxMintAmt}`);
    this.name = "ExceededMaxMintPerTrancheError";
  }
}

export class InvalidMaturityBoundsError extends Error {
  constructor(
    public readonly min: number,
    public readonly max: number
  ) {
    super(`Invalid tolerable maturity bounds [${min}, ${max}]`);
    this.name = "InvalidMaturityBoundsError";
  }
}
