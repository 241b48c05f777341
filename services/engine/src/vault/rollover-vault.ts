/**
 * Rollover Vault
 *
 * Holds underlying collateral, tranches it through the note engine's
 * deposit bond and rolls the senior tranches into the engine in exchange
 * for aged reserve assets. The junior tranche stays in the vault.
 *
 * deploy()   idle underlying -> deposit bond -> rollover pairs
 * recover()  deployed tranches -> underlying (mature or pro-rata)
 *
 * Vault shares are claims on a pro-rata slice of every asset the vault
 * holds: underlying, deployed tranches and notes.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import {
  type Ledger,
  type Snapshottable,
  type Tranche,
  type TrancheLedger,
  InsufficientBalanceError,
  Token,
  isTranche,
} from "@perpnote/ledger";
import {
  ONE,
  TRANCHE_DUST_AMT,
  TRANCHE_RATIO_GRANULARITY,
  logError,
  logOperation,
  minBigInt,
  mulDiv,
  mulDivCeil,
  vaultLogger as logger,
  withTiming,
} from "@perpnote/shared";
import { AccessControl, ReentrancyGuard } from "../access/index.js";
import type { FeePolicy } from "../fee-policy/index.js";
import type { NoteEngine, SubscriptionSource } from "../note/index.js";
import { UnacceptableBurnAmountError, UnexpectedAssetError } from "../note/index.js";
import type {
  RolloverVaultConfig,
  RolloverVaultEvents,
  SwapDirection,
  SwapResult,
  TokenAmount,
} from "./types.js";
import {
  DEFAULT_ROLLOVER_VAULT_CONFIG,
  DeployedCountOverLimitError,
  InsufficientDeploymentError,
  InsufficientLiquidityError,
  UnacceptableDepositAmountError,
  UnacceptableSwapError,
} from "./types.js";

const vaultLogger = logger.child({ component: "rollover-vault" });

export interface RolloverVaultDeps {
  ledger: Ledger;
  engine: NoteEngine;
  feePolicy: FeePolicy;
  owner: Address;
}

// ============================================
// ROLLOVER VAULT
// ============================================

export class RolloverVault
  extends EventEmitter<RolloverVaultEvents>
  implements SubscriptionSource, Snapshottable
{
  readonly address: Address;
  readonly shares: Token;
  readonly underlying: Token;
  readonly access: AccessControl;

  private readonly ledger: Ledger;
  private readonly engine: NoteEngine;
  private readonly feePolicy: FeePolicy;
  private readonly guard = new ReentrancyGuard("RolloverVault");
  private config: RolloverVaultConfig;

  // Tranches with a non-zero vault balance, in acquisition order
  private deployed: Tranche[] = [];

  constructor(deps: RolloverVaultDeps, config?: Partial<RolloverVaultConfig>) {
    super();
    this.config = { ...DEFAULT_ROLLOVER_VAULT_CONFIG, ...config };
    this.ledger = deps.ledger;
    this.engine = deps.engine;
    this.feePolicy = deps.feePolicy;
    this.underlying = deps.engine.collateral;
    this.access = new AccessControl(deps.owner, "RolloverVault");

    this.address = this.ledger.createAddress("rollover-vault");
    this.shares = new Token(this.ledger, this.config.symbol);
    this.ledger.register(this);

    vaultLogger.info({
      address: this.address,
      underlying: this.underlying.symbol,
      minDeploymentAmt: this.config.minDeploymentAmt.toString(),
      maxDeployedAssets: this.config.maxDeployedAssets,
    }, "RolloverVault initialized");
  }

  // ============================================
  // DEPLOY
  // ============================================

  /**
   * Tranches idle underlying and rolls the deposit bond's senior tranches
   * into the engine. Returns the note value rolled over.
   */
  deploy(caller: Address): bigint {
    return this.execute("deploy", caller, () => this.deployAll(caller));
  }

  private deployAll(caller: Address): bigint {
    return withTiming("vault.deploy", () => {
      this.engine.advance();

      const bond = this.engine.getDepositBond();
      const idleAmt = this.underlying.balanceOf(this.address);
      if (bond === undefined) {
        throw new InsufficientDeploymentError(idleAmt);
      }

      this.trancheIdle(bond, idleAmt);
      const noteRolledAmt = this.rolloverSeniors(bond);
      if (noteRolledAmt === 0n) {
        throw new InsufficientDeploymentError(idleAmt);
      }

      this.syncAll();
      if (this.deployed.length > this.config.maxDeployedAssets) {
        throw new DeployedCountOverLimitError(this.deployed.length, this.config.maxDeployedAssets);
      }

      logOperation(vaultLogger, {
        operation: "deploy",
        caller,
        token: bond.address,
        amounts: { idleAmt, noteRolledAmt },
      }, "Vault deployed");
      this.emit("vault:deployed", noteRolledAmt, this.deployed.length);
      return noteRolledAmt;
    }, vaultLogger);
  }

  private trancheIdle(bond: TrancheLedger, idleAmt: bigint): void {
    if (idleAmt === 0n || idleAmt < this.config.minDeploymentAmt) {
      return;
    }
    bond.deposit(this.address, idleAmt);
    this.syncAsset(this.underlying);
    for (let i = 0; i < bond.trancheCount(); i++) {
      this.syncAsset(bond.tranches(i));
    }
  }

  /**
   * Pairs deposit-bond tranches (senior first, junior excluded) with the
   * engine's rollover candidates until one side runs out
   */
  private rolloverSeniors(bond: TrancheLedger): bigint {
    const tranchesIn: Tranche[] = [];
    for (let i = 0; i < bond.trancheCount() - 1; i++) {
      tranchesIn.push(bond.tranches(i));
    }
    const tokensOut = this.engine.getReserveTokensUpForRollover();

    let total = 0n;
    let a = 0;
    let b = 0;
    while (a < tranchesIn.length && b < tokensOut.length) {
      const trancheIn = tranchesIn[a];
      const tokenOut = tokensOut[b];

      const availableIn = trancheIn.balanceOf(this.address);
      if (availableIn === 0n) {
        a++;
        continue;
      }
      if (this.engine.getReserveTokenBalance(tokenOut) === 0n) {
        b++;
        continue;
      }

      const preview = this.engine.previewRollover(trancheIn, tokenOut, availableIn);
      if (preview.noteRolledAmt === 0n || preview.trancheInAmt === 0n || preview.trancheOutAmt === 0n) {
        vaultLogger.debug({ trancheIn: trancheIn.address, tokenOut: tokenOut.address }, "Rollover pair skipped");
        b++;
        continue;
      }

      const result = this.engine.rollover(this.address, trancheIn, tokenOut, availableIn);
      this.syncAsset(trancheIn);
      this.syncAsset(tokenOut);
      total += result.noteRolledAmt;

      vaultLogger.debug({
        trancheIn: trancheIn.address,
        tokenOut: tokenOut.address,
        trancheInAmt: result.trancheInAmt.toString(),
        tokenOutAmt: result.tokenOutAmt.toString(),
      }, "Rollover pair executed");
    }
    return total;
  }

  // ============================================
  // RECOVER
  // ============================================

  /**
   * Recovers every deployed tranche, or only the given asset. Passing the
   * note token redeems the vault's notes against the engine.
   */
  recover(caller: Address, token?: Token): void {
    this.execute("recover", caller, () => {
      if (token === undefined) {
        this.recoverAll();
      } else {
        this.recoverAsset(token);
      }
      logOperation(vaultLogger, {
        operation: "recover",
        caller,
        token: token?.address,
        amounts: { idleAmt: this.underlying.balanceOf(this.address) },
      }, "Vault recovered");
      this.emit("vault:recovered", token?.address, this.deployed.length);
    });
  }

  recoverAndRedeploy(caller: Address): bigint {
    return this.execute("recoverAndRedeploy", caller, () => {
      this.recoverAll();
      this.emit("vault:recovered", undefined, this.deployed.length);
      return this.deployAll(caller);
    });
  }

  private recoverAll(): void {
    this.engine.advance();
    const bonds = new Set<TrancheLedger>(this.deployed.map((t) => t.bond));
    for (const bond of bonds) {
      this.recoverBond(bond);
    }
    this.syncAll();
  }

  private recoverAsset(token: Token): void {
    if (token === this.engine.note) {
      this.redeemNotes();
      return;
    }
    if (!isTranche(token) || !this.deployed.includes(token)) {
      throw new UnexpectedAssetError("Expected a deployed asset", token.address);
    }
    this.engine.advance();
    if (this.isPastMaturity(token.bond)) {
      this.redeemMatureTranche(token);
    } else {
      this.recoverBond(token.bond);
    }
    this.syncAll();
  }

  private recoverBond(bond: TrancheLedger): void {
    if (this.isPastMaturity(bond)) {
      for (let i = 0; i < bond.trancheCount(); i++) {
        this.redeemMatureTranche(bond.tranches(i));
      }
      return;
    }

    // largest redeemable multiple of the tranche ratios
    let units: bigint | undefined;
    for (let i = 0; i < bond.trancheCount(); i++) {
      const tranche = bond.tranches(i);
      const trancheUnits = tranche.balanceOf(this.address) / tranche.ratio;
      units = units === undefined ? trancheUnits : minBigInt(units, trancheUnits);
    }
    if (units === undefined || units === 0n) {
      return;
    }

    const amounts: bigint[] = [];
    for (let i = 0; i < bond.trancheCount(); i++) {
      amounts.push(units * bond.tranches(i).ratio);
    }
    bond.redeem(this.address, amounts);
    vaultLogger.debug({ bond: bond.address, units: units.toString() }, "Bond redeemed pro-rata");
  }

  private redeemMatureTranche(tranche: Tranche): void {
    const balance = tranche.balanceOf(this.address);
    if (balance === 0n) {
      return;
    }
    if (!tranche.bond.isMature()) {
      tranche.bond.mature(this.address);
    }
    tranche.bond.redeemMature(this.address, tranche, balance);
    vaultLogger.debug({ tranche: tranche.address, amount: balance.toString() }, "Mature tranche redeemed");
  }

  /**
   * Burns the vault's notes against the queue head, or against reserve
   * assets in order once the queue is empty, until all are burnt or
   * nothing redeemable is left. The engine charges the burn fee on top of
   * the burnt amount, so each request leaves room for it.
   */
  private redeemNotes(): void {
    this.engine.advance();
    let remaining = this.engine.note.balanceOf(this.address);
    while (remaining > 0n) {
      const target = this.engine.peekRedemptionQueue() ?? this.firstValuedReserveAsset();
      if (target === undefined) {
        break;
      }
      const feeConfig = this.feePolicy.snapshot();
      const burnFeePerc = this.feePolicy.computeNoteBurnFeePerc(this.engine.computeDeviationRatio(feeConfig), feeConfig);
      const requestedAmt = mulDiv(remaining, ONE, ONE + burnFeePerc);
      if (requestedAmt === 0n) {
        break;
      }

      const result = this.engine.redeem(this.address, target, requestedAmt);
      this.syncAsset(target);

      const left = this.engine.note.balanceOf(this.address);
      if (result.leftoverAmt === 0n || left >= remaining) {
        break;
      }
      remaining = left;
    }
    this.syncAll();
  }

  private firstValuedReserveAsset(): Token | undefined {
    for (let i = 0; i < this.engine.getReserveCount(); i++) {
      const token = this.engine.getReserveAt(i);
      if (token !== undefined && this.engine.getReserveTokenValue(token) > 0n) {
        return token;
      }
    }
    return undefined;
  }

  private isPastMaturity(bond: TrancheLedger): boolean {
    return bond.isMature() || this.ledger.now() >= bond.maturityDate;
  }

  // ============================================
  // SHARES
  // ============================================

  deposit(caller: Address, amount: bigint): bigint {
    return this.execute("deposit", caller, () => {
      if (amount === 0n) {
        return 0n;
      }

      const supply = this.shares.totalSupply();
      let minted: bigint;
      if (supply === 0n) {
        minted = amount * this.config.initialRate;
      } else {
        const tvl = this.getTVL();
        minted = tvl > 0n ? mulDiv(amount, supply, tvl) : 0n;
      }
      const sharesOut = mulDiv(minted, ONE - this.feePolicy.computeVaultMintFeePerc(), ONE);
      if (sharesOut === 0n) {
        throw new UnacceptableDepositAmountError(amount, sharesOut);
      }

      this.underlying.transfer(caller, this.address, amount);
      this.syncAsset(this.underlying);
      this.shares.mint(caller, sharesOut);

      logOperation(vaultLogger, {
        operation: "deposit",
        caller,
        amounts: { amount, shares: sharesOut },
      }, "Vault deposit");
      this.emit("vault:deposited", caller, amount, sharesOut);
      return sharesOut;
    });
  }

  /**
   * Burns shares for a pro-rata slice of every vault asset, less the burn
   * fee, in asset order
   */
  redeem(caller: Address, shareAmt: bigint): TokenAmount[] {
    return this.execute("redeem", caller, () => this.redeemShares(caller, shareAmt));
  }

  recoverAndRedeem(caller: Address, shareAmt: bigint): TokenAmount[] {
    return this.execute("recoverAndRedeem", caller, () => {
      this.recoverAll();
      this.emit("vault:recovered", undefined, this.deployed.length);
      return this.redeemShares(caller, shareAmt);
    });
  }

  private redeemShares(caller: Address, shareAmt: bigint): TokenAmount[] {
    if (shareAmt === 0n) {
      return [];
    }
    const supply = this.shares.totalSupply();
    if (supply === 0n) {
      throw new UnacceptableBurnAmountError(shareAmt);
    }
    const held = this.shares.balanceOf(caller);
    if (shareAmt > held) {
      throw new InsufficientBalanceError(
        `${this.shares.symbol}: burn amount exceeds balance`,
        this.shares.address,
        caller,
        shareAmt,
        held
      );
    }

    const keepPerc = ONE - this.feePolicy.computeVaultBurnFeePerc();
    const payouts = this.assets().map((token) => ({
      token,
      amount: mulDiv(mulDiv(token.balanceOf(this.address), shareAmt, supply), keepPerc, ONE),
    }));

    this.shares.burn(caller, shareAmt);
    for (const payout of payouts) {
      payout.token.transfer(this.address, caller, payout.amount);
      this.syncAsset(payout.token);
    }

    const result: TokenAmount[] = payouts.map((p) => ({ token: p.token.address, amount: p.amount }));
    logOperation(vaultLogger, {
      operation: "redeem",
      caller,
      amounts: { shares: shareAmt },
    }, "Vault redeem");
    this.emit("vault:redeemed", caller, shareAmt, result);
    return result;
  }

  // ============================================
  // SWAPS
  // ============================================

  /**
   * Swaps the caller's underlying for notes. The vault tranches enough
   * underlying to mint the notes with the deposit bond's senior tranche and
   * keeps the juniors. The vault fee stays in the vault as underlying.
   */
  swapUnderlyingForNotes(caller: Address, underlyingAmt: bigint): SwapResult {
    const direction: SwapDirection = "underlyingToNote";
    return this.execute("swapUnderlyingForNotes", caller, () => {
      if (underlyingAmt <= 0n) {
        throw new UnacceptableSwapError("Expected a non-zero swap amount", direction, underlyingAmt);
      }
      this.engine.advance();
      const bond = this.requireDepositBond(direction, underlyingAmt);

      const feeConfig = this.feePolicy.snapshot();
      const perp = this.engine.getTVLReading();
      const supply = this.engine.note.totalSupply();
      const noteAmt = supply > 0n && perp.value > 0n ? mulDiv(underlyingAmt, supply, perp.value) : underlyingAmt;
      const drPost = this.feePolicy.computeDeviationRatio(
        { perpTVL: perp.value + underlyingAmt, vaultTVL: this.getTVL(), seniorTR: bond.tranches(0).ratio },
        feeConfig
      );
      const [noteFeePerc, vaultFeePerc] = this.feePolicy.computeUnderlyingToNoteSwapFeePercs(drPost, perp.valid, feeConfig);
      assertSwapFees(direction, underlyingAmt, noteFeePerc, vaultFeePerc);

      const noteFeeAmt = mulDiv(noteAmt, noteFeePerc, ONE);
      const vaultFeeAmt = mulDiv(underlyingAmt, vaultFeePerc, ONE);
      const noteAmtOut = mulDiv(noteAmt, ONE - noteFeePerc - vaultFeePerc, ONE);
      if (noteAmtOut === 0n) {
        throw new UnacceptableSwapError("Expected a non-zero swap output", direction, underlyingAmt);
      }

      this.underlying.transfer(caller, this.address, underlyingAmt);
      this.mintNotes(bond, noteAmtOut + noteFeeAmt, direction, underlyingAmt);
      this.engine.note.transfer(this.address, caller, noteAmtOut);
      this.engine.note.transfer(this.address, this.engine.getFeeCollector(), noteFeeAmt);
      this.syncAll();

      return this.settleSwap(caller, direction, {
        amountIn: underlyingAmt,
        amountOut: noteAmtOut,
        noteFeeAmt,
        vaultFeeAmt,
        drPost,
      });
    });
  }

  /**
   * Swaps the caller's notes for idle underlying. The vault holds the notes
   * as an asset until they are recovered; the note fee goes to the engine's
   * fee collector.
   */
  swapNotesForUnderlying(caller: Address, noteAmt: bigint): SwapResult {
    const direction: SwapDirection = "noteToUnderlying";
    return this.execute("swapNotesForUnderlying", caller, () => {
      if (noteAmt <= 0n) {
        throw new UnacceptableSwapError("Expected a non-zero swap amount", direction, noteAmt);
      }
      this.engine.advance();
      const bond = this.requireDepositBond(direction, noteAmt);

      const feeConfig = this.feePolicy.snapshot();
      const perp = this.engine.getTVLReading();
      const vaultTVL = this.getTVL();
      this.engine.note.transfer(caller, this.address, noteAmt);

      const underlyingAmt = mulDiv(noteAmt, perp.value, this.engine.note.totalSupply());
      const drPost = this.feePolicy.computeDeviationRatio(
        { perpTVL: perp.value - underlyingAmt, vaultTVL, seniorTR: bond.tranches(0).ratio },
        feeConfig
      );
      const [noteFeePerc, vaultFeePerc] = this.feePolicy.computeNoteToUnderlyingSwapFeePercs(drPost, perp.valid, feeConfig);
      assertSwapFees(direction, noteAmt, noteFeePerc, vaultFeePerc);

      const noteFeeAmt = mulDiv(noteAmt, noteFeePerc, ONE);
      const vaultFeeAmt = mulDiv(underlyingAmt, vaultFeePerc, ONE);
      const underlyingAmtOut = mulDiv(underlyingAmt, ONE - noteFeePerc - vaultFeePerc, ONE);
      if (underlyingAmtOut === 0n) {
        throw new UnacceptableSwapError("Expected a non-zero swap output", direction, noteAmt);
      }
      const idle = this.underlying.balanceOf(this.address);
      if (idle < underlyingAmtOut) {
        throw new InsufficientLiquidityError(idle, underlyingAmtOut);
      }

      this.engine.note.transfer(this.address, this.engine.getFeeCollector(), noteFeeAmt);
      this.underlying.transfer(this.address, caller, underlyingAmtOut);
      this.syncAll();

      return this.settleSwap(caller, direction, {
        amountIn: noteAmt,
        amountOut: underlyingAmtOut,
        noteFeeAmt,
        vaultFeeAmt,
        drPost,
      });
    });
  }

  private requireDepositBond(direction: SwapDirection, amountIn: bigint): TrancheLedger {
    const bond = this.engine.getDepositBond();
    if (bond === undefined) {
      throw new UnacceptableSwapError("Expected a deposit bond", direction, amountIn);
    }
    return bond;
  }

  /**
   * Mints at least noteAmt notes to the vault with the bond's senior
   * tranche, tranching idle underlying for what the vault does not hold
   */
  private mintNotes(bond: TrancheLedger, noteAmt: bigint, direction: SwapDirection, amountIn: bigint): void {
    const senior = bond.tranches(0);
    const seniorAmt = this.engine.computeTrancheAmtForNotes(senior, noteAmt);
    if (seniorAmt === 0n) {
      throw new UnacceptableSwapError("Expected a priced senior tranche", direction, amountIn);
    }

    const shortfall = seniorAmt - minBigInt(senior.balanceOf(this.address), seniorAmt);
    if (shortfall > 0n) {
      const depositAmt = bondDepositFor(bond, shortfall);
      const idle = this.underlying.balanceOf(this.address);
      if (idle < depositAmt) {
        throw new InsufficientLiquidityError(idle, depositAmt);
      }
      bond.deposit(this.address, depositAmt);
      for (let i = 0; i < bond.trancheCount(); i++) {
        this.syncAsset(bond.tranches(i));
      }
    }

    this.engine.mint(this.address, senior, seniorAmt);
    this.syncAsset(senior);
  }

  private settleSwap(caller: Address, direction: SwapDirection, result: SwapResult): SwapResult {
    logOperation(vaultLogger, {
      operation: direction === "underlyingToNote" ? "swapUnderlyingForNotes" : "swapNotesForUnderlying",
      caller,
      amounts: {
        amountIn: result.amountIn,
        amountOut: result.amountOut,
        noteFeeAmt: result.noteFeeAmt,
        vaultFeeAmt: result.vaultFeeAmt,
        drPost: result.drPost,
      },
    }, "Vault swap");
    this.emit("vault:swapped", caller, direction, result);
    return result;
  }

  // ============================================
  // VALUATION
  // ============================================

  getTVL(): bigint {
    return this.assets().reduce((sum, token) => sum + this.getVaultAssetValue(token), 0n);
  }

  /**
   * Value of the vault's balance of token in underlying units
   */
  getVaultAssetValue(token: Token): bigint {
    const balance = token.balanceOf(this.address);
    if (token === this.underlying) {
      return balance;
    }

    if (token === this.engine.note) {
      const supply = token.totalSupply();
      return supply > 0n ? mulDiv(balance, this.engine.getTVL(), supply) : 0n;
    }

    if (isTranche(token) && this.deployed.includes(token)) {
      const supply = token.totalSupply();
      if (balance < TRANCHE_DUST_AMT || supply === 0n) {
        return 0n;
      }
      return mulDiv(balance, trancheCollateralBalance(token), supply);
    }

    return 0n;
  }

  // ============================================
  // QUERIES
  // ============================================

  deployedCount(): number {
    return this.deployed.length;
  }

  deployedAt(index: number): Tranche | undefined {
    return this.deployed[index];
  }

  isVaultAsset(token: Token): boolean {
    return token === this.underlying || token === this.engine.note || (isTranche(token) && this.deployed.includes(token));
  }

  getConfig(): Readonly<RolloverVaultConfig> {
    return this.config;
  }

  // ============================================
  // OWNER / KEEPER CONFIGURATION
  // ============================================

  setMinDeploymentAmt(caller: Address, amount: bigint): void {
    this.access.onlyOwner(caller);
    this.config = { ...this.config, minDeploymentAmt: amount };
    vaultLogger.info({ minDeploymentAmt: amount.toString() }, "Min deployment amount updated");
  }

  setKeeper(caller: Address, keeper: Address): void {
    this.access.setKeeper(caller, keeper);
  }

  pause(caller: Address): void {
    this.access.pause(caller);
  }

  unpause(caller: Address): void {
    this.access.unpause(caller);
  }

  captureState(): () => void {
    const deployed = [...this.deployed];
    return () => {
      this.deployed = deployed;
    };
  }

  // ============================================
  // INTERNALS
  // ============================================

  private execute<T>(operation: string, caller: Address, fn: () => T): T {
    this.access.whenNotPaused();
    try {
      return this.guard.run(operation, () => this.ledger.atomic(fn));
    } catch (error) {
      if (!this.ledger.inAtomicScope() && error instanceof Error) {
        logError(error, { operation, caller }, `${operation} failed`, vaultLogger);
      }
      throw error;
    }
  }

  private assets(): Token[] {
    return [this.underlying, ...this.deployed, this.engine.note];
  }

  private syncAsset(token: Token): void {
    const balance = token.balanceOf(this.address);
    if (isTranche(token)) {
      const listed = this.deployed.includes(token);
      if (balance > 0n && !listed) {
        this.deployed.push(token);
      } else if (balance === 0n && listed) {
        this.deployed = this.deployed.filter((t) => t !== token);
      }
    }
    this.emit("vault:assetSynced", token.address, balance);
  }

  private syncAll(): void {
    for (const tranche of [...this.deployed]) {
      this.syncAsset(tranche);
    }
    this.syncAsset(this.underlying);
  }
}

// ============================================
// HELPERS
// ============================================

/**
 * Collateral backing a tranche's whole supply: the bond's waterfall before
 * maturity, what the tranche holds after
 */
export function trancheCollateralBalance(tranche: Tranche): bigint {
  const bond = tranche.bond;
  if (bond.isMature()) {
    return bond.collateralToken.balanceOf(tranche.address);
  }

  let remaining = bond.collateralBalance();
  const junior = bond.trancheCount() - 1;
  for (let i = 0; i < junior; i++) {
    const share = minBigInt(bond.tranches(i).totalSupply(), remaining);
    if (i === tranche.index) {
      return share;
    }
    remaining -= share;
  }
  return remaining;
}

function assertSwapFees(direction: SwapDirection, amountIn: bigint, noteFeePerc: bigint, vaultFeePerc: bigint): void {
  if (noteFeePerc + vaultFeePerc >= ONE) {
    throw new UnacceptableSwapError("Swap fees consume the whole amount", direction, amountIn);
  }
}

/**
 * Collateral to deposit into bond for at least seniorAmt of its senior
 * tranche at the bond's current collateral-to-debt ratio
 */
function bondDepositFor(bond: TrancheLedger, seniorAmt: bigint): bigint {
  const debtAmt = mulDivCeil(seniorAmt, TRANCHE_RATIO_GRANULARITY, bond.tranches(0).ratio);
  const totalDebt = bond.totalDebt();
  const collateral = bond.collateralBalance();
  return totalDebt > 0n && collateral > 0n ? mulDivCeil(debtAmt, collateral, totalDebt) : debtAmt;
}

export function createRolloverVault(deps: RolloverVaultDeps, config?: Partial<RolloverVaultConfig>): RolloverVault {
  return new RolloverVault(deps, config);
}
