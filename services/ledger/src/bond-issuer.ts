/**
 * Bond Issuer
 *
 * Issues a new bond once per issue window. getLatestBond issues lazily
 * when a window has opened since the last issue.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import { ledgerLogger as logger } from "@perpnote/shared";
import type { Ledger } from "./ledger.js";
import type { Token } from "./token.js";
import { BondController, validateTrancheRatios } from "./bond-controller.js";
import type { BondIssuerConfig, BondIssuerEvents, BondIssuerLike, Snapshottable, TrancheLedger } from "./types.js";
import { DEFAULT_BOND_ISSUER_CONFIG, NotOwnerError } from "./types.js";

const issuerLogger = logger.child({ component: "bond-issuer" });

// ============================================
// BOND ISSUER
// ============================================

export class BondIssuer extends EventEmitter<BondIssuerEvents> implements BondIssuerLike, Snapshottable {
  private config: BondIssuerConfig;
  private issued: BondController[] = [];
  private lastIssueWindow = 0;

  constructor(
    private readonly ledger: Ledger,
    readonly collateral: Token,
    readonly owner: Address,
    config?: Partial<BondIssuerConfig>
  ) {
    super();
    this.config = { ...DEFAULT_BOND_ISSUER_CONFIG, ...config };
    validateTrancheRatios(this.config.trancheRatios);
    ledger.register(this);

    issuerLogger.info({
      collateral: collateral.symbol,
      trancheRatios: this.config.trancheRatios.map((r) => r.toString()),
      maxMaturityDuration: this.config.maxMaturityDuration,
      minIssueTimeIntervalSec: this.config.minIssueTimeIntervalSec,
    }, "BondIssuer initialized");
  }

  getConfig(): Readonly<BondIssuerConfig> {
    return this.config;
  }

  lastIssueWindowTimestamp(): number {
    return this.lastIssueWindow;
  }

  issuedCount(): number {
    return this.issued.length;
  }

  issuedBondAt(index: number): BondController {
    const bond = this.issued[index];
    if (!bond) {
      throw new RangeError(`No bond issued at index ${index}`);
    }
    return bond;
  }

  isInstance(bond: TrancheLedger): boolean {
    return this.issued.some((b) => b === bond);
  }

  // ============================================
  // ISSUANCE
  // ============================================

  /**
   * Issues a bond when the current issue window has not been served yet.
   * Returns the new bond, or undefined when nothing was issued.
   */
  issue(): BondController | undefined {
    const now = this.ledger.now();
    const { minIssueTimeIntervalSec, issueWindowOffsetSec } = this.config;

    if (this.issued.length > 0 && now < this.lastIssueWindow + minIssueTimeIntervalSec) {
      return undefined;
    }

    this.lastIssueWindow = now - (now % minIssueTimeIntervalSec) + issueWindowOffsetSec;

    const bond = new BondController(
      this.ledger,
      this.collateral,
      this.config.trancheRatios,
      now + this.config.maxMaturityDuration,
      this.owner,
      `${this.collateral.symbol}-${this.issued.length + 1}`
    );
    this.issued.push(bond);

    issuerLogger.info({
      bond: bond.address,
      maturityDate: bond.maturityDate,
      issueWindow: this.lastIssueWindow,
    }, "Bond issued");
    this.emit("bondIssued", bond.address);

    return bond;
  }

  getLatestBond(): BondController | undefined {
    this.issue();
    return this.issued[this.issued.length - 1];
  }

  // ============================================
  // CONFIGURATION
  // ============================================

  updateTrancheRatios(caller: Address, ratios: readonly bigint[]): void {
    this.assertOwner(caller);
    validateTrancheRatios(ratios);
    this.config = { ...this.config, trancheRatios: [...ratios] };
  }

  updateMaxMaturityDuration(caller: Address, duration: number): void {
    this.assertOwner(caller);
    this.config = { ...this.config, maxMaturityDuration: duration };
  }

  updateIssuanceTimingConfig(caller: Address, minIssueTimeIntervalSec: number, issueWindowOffsetSec: number): void {
    this.assertOwner(caller);
    this.config = { ...this.config, minIssueTimeIntervalSec, issueWindowOffsetSec };
  }

  captureState(): () => void {
    const issued = [...this.issued];
    const lastIssueWindow = this.lastIssueWindow;
    const config = this.config;
    return () => {
      this.issued = issued;
      this.lastIssueWindow = lastIssueWindow;
      this.config = config;
    };
  }

  private assertOwner(caller: Address): void {
    if (caller !== this.owner) {
      throw new NotOwnerError("BondIssuer: caller is not the owner", caller, this.owner);
    }
  }
}

export function createBondIssuer(
  ledger: Ledger,
  collateral: Token,
  owner: Address,
  config?: Partial<BondIssuerConfig>
): BondIssuer {
  return new BondIssuer(ledger, collateral, owner, config);
}
