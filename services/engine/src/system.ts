/**
 * System Factory
 *
 * Wires a ledger, collateral token, bond issuer, fee policy, strategies,
 * note engine and rollover vault together, and binds the vault as the
 * engine's subscription source.
 */

import type { Address } from "viem";
import {
  type BondIssuerConfig,
  BondIssuer,
  Ledger,
  Token,
} from "@perpnote/ledger";
import { engineLogger as logger } from "@perpnote/shared";
import { AccessControl } from "./access/index.js";
import { type FeePolicyConfig, FeePolicy } from "./fee-policy/index.js";
import {
  type PricingStrategy,
  TrancheClassYieldStrategy,
  createPricingStrategy,
} from "./strategies/index.js";
import { type NoteEngineConfig, NoteEngine } from "./note/index.js";
import { type RolloverVaultConfig, RolloverVault } from "./vault/index.js";
import type { EngineConfig } from "./config.js";

export interface SystemOptions {
  owner?: Address;
  startTime?: number;
  collateralSymbol?: string;
  pricing?: PricingStrategy["kind"];
  // Environment-derived sections, overridden by the explicit ones below
  config?: EngineConfig;
  issuer?: Partial<BondIssuerConfig>;
  feePolicy?: Partial<FeePolicyConfig>;
  note?: Partial<NoteEngineConfig>;
  vault?: Partial<RolloverVaultConfig>;
}

export interface PerpSystem {
  ledger: Ledger;
  owner: Address;
  collateral: Token;
  issuer: BondIssuer;
  governance: AccessControl;
  feePolicy: FeePolicy;
  pricing: PricingStrategy;
  yields: TrancheClassYieldStrategy;
  engine: NoteEngine;
  vault: RolloverVault;
}

export function createSystem(options: SystemOptions = {}): PerpSystem {
  const ledger = new Ledger(options.startTime);
  const owner = options.owner ?? ledger.createAddress("owner");
  const collateral = new Token(ledger, options.collateralSymbol ?? "COL");
  const issuer = new BondIssuer(ledger, collateral, owner, options.issuer);

  const governance = new AccessControl(owner, "Governance");
  const feePolicy = new FeePolicy(governance, { ...options.config?.feePolicy, ...options.feePolicy });
  const pricing = createPricingStrategy(options.pricing ?? "cdr");
  const yields = new TrancheClassYieldStrategy(governance);

  const engine = new NoteEngine(
    { ledger, collateral, issuer, feePolicy, pricing, yields, owner },
    { ...options.config?.note, ...options.note }
  );
  const vault = new RolloverVault(
    { ledger, engine, feePolicy, owner },
    { ...options.config?.vault, ...options.vault }
  );
  engine.init(owner, vault);

  logger.info({
    engine: engine.address,
    vault: vault.address,
    pricing: pricing.kind,
  }, "System created");

  return { ledger, owner, collateral, issuer, governance, feePolicy, pricing, yields, engine, vault };
}
