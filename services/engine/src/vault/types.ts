/**
 * Rollover Vault Types
 */

import type { Address } from "viem";
import { VAULT_CONFIG } from "@perpnote/shared";

// ============================================
// CONFIGURATION
// ============================================

export interface RolloverVaultConfig {
  symbol: string;
  // Idle underlying below this stays idle on deploy
  minDeploymentAmt: bigint;
  maxDeployedAssets: number;
  // Shares per unit of underlying on the first deposit
  initialRate: bigint;
}

export const DEFAULT_ROLLOVER_VAULT_CONFIG: RolloverVaultConfig = {
  symbol: "PNV",
  minDeploymentAmt: 0n,
  maxDeployedAssets: VAULT_CONFIG.maxDeployedAssets,
  initialRate: VAULT_CONFIG.initialRate,
};

// ============================================
// RESULTS
// ============================================

export interface TokenAmount {
  token: Address;
  amount: bigint;
}

export type SwapDirection = "underlyingToNote" | "noteToUnderlying";

/**
 * Amounts of a vault swap. Fee amounts are in the input token's units
 * for the vault side and in notes for the note side.
 */
export interface SwapResult {
  amountIn: bigint;
  amountOut: bigint;
  noteFeeAmt: bigint;
  vaultFeeAmt: bigint;
  drPost: bigint;
}

// ============================================
// EVENTS
// ============================================

export interface RolloverVaultEvents {
  "vault:assetSynced": (token: Address, balance: bigint) => void;
  "vault:deployed": (noteRolledAmt: bigint, deployedCount: number) => void;
  "vault:recovered": (token: Address | undefined, deployedCount: number) => void;
  "vault:deposited": (caller: Address, amount: bigint, shares: bigint) => void;
  "vault:redeemed": (caller: Address, shares: bigint, payouts: readonly TokenAmount[]) => void;
  "vault:swapped": (caller: Address, direction: SwapDirection, result: SwapResult) => void;
}

// ============================================
// ERRORS
// ============================================

export class InsufficientDeploymentError extends Error {
  constructor(public readonly idleAmt: bigint) {
    super("Expected to roll over a non-zero amount");
    this.name = "InsufficientDeploymentError";
  }
}

export class DeployedCountOverLimitError extends Error {
  constructor(
    public readonly count: number,
    public readonly limit: number
  ) {
    super(`Deployed asset count ${count} exceeds ${limit}`);
    this.name = "DeployedCountOverLimitError";
  }
}

export class UnacceptableDepositAmountError extends Error {
  constructor(
    public readonly amount: bigint,
    public readonly shares: bigint
  ) {
    super("Expected to mint a non-zero amount of shares");
    this.name = "UnacceptableDepositAmountError";
  }
}

export class UnacceptableSwapError extends Error {
  constructor(
    message: string,
    public readonly direction: SwapDirection,
    public readonly amountIn: bigint
  ) {
    super(message);
    this.name = "UnacceptableSwapError";
  }
}

export class InsufficientLiquidityError extends Error {
  constructor(
    public readonly available: bigint,
    public readonly required: bigint
  ) {
    super(`Vault holds ${available} idle underlying, swap needs ${required}`);
    this.name = "InsufficientLiquidityError";
  }
}
