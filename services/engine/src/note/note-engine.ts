/**
 * Note Engine
 *
 * Mints and burns the perpetual note against tranche deposits and
 * withdrawals, and exchanges fresh tranches for aged reserve assets:
 * - Mint against tranches of the current deposit bond
 * - Redeem in strict maturity order through the redemption queue
 * - Rollover without changing supply
 *
 * Every public mutation runs inside one ledger atomic scope and calls
 * advance() first, so the deposit bond, queue and mature collateral are
 * current before anything is priced.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import {
  type BondIssuerLike,
  type Ledger,
  type Snapshottable,
  type Tranche,
  type TrancheLedger,
  Token,
  isTranche,
} from "@perpnote/ledger";
import {
  ONE,
  PRICE_UNIT,
  YIELD_UNIT,
  applyPerc,
  engineLogger as logger,
  logError,
  logOperation,
  minBigInt,
  mulDiv,
  mulDivCeil,
} from "@perpnote/shared";
import { AccessControl, OneTimeInit, UnauthorizedError } from "../access/index.js";
import type { FeePolicy, FeePolicyConfig } from "../fee-policy/index.js";
import type { PriceReading, PricingStrategy, YieldStrategy } from "../strategies/index.js";
import { RedemptionQueue } from "./redemption-queue.js";
import { Reserve } from "./reserve.js";
import type {
  MintResult,
  NoteEngineConfig,
  NoteEngineEvents,
  RedeemResult,
  RolloverResult,
  SubscriptionSource,
  TVLReading,
} from "./types.js";
import {
  DEFAULT_NOTE_ENGINE_CONFIG,
  ExceededMaxMintPerTrancheError,
  ExceededMaxSupplyError,
  InvalidMaturityBoundsError,
  UnacceptableBurnAmountError,
  UnacceptableMintAmountError,
  UnacceptableRolloverAmountError,
  UnacceptableRolloverError,
  UnexpectedAssetError,
  UnexpectedRedemptionOrderError,
} from "./types.js";

const noteLogger = logger.child({ component: "note-engine" });

// yield * price of exactly 1.0
const VALUE_UNITS = YIELD_UNIT * PRICE_UNIT;

export interface NoteEngineDeps {
  ledger: Ledger;
  collateral: Token;
  issuer: BondIssuerLike;
  feePolicy: FeePolicy;
  pricing: PricingStrategy;
  yields: YieldStrategy;
  owner: Address;
}

interface RedemptionAmts {
  burntAmt: bigint;
  trancheOutAmt: bigint;
  leftoverAmt: bigint;
}

// ============================================
// NOTE ENGINE
// ============================================

export class NoteEngine extends EventEmitter<NoteEngineEvents> implements Snapshottable {
  readonly address: Address;
  readonly note: Token;
  readonly collateral: Token;
  readonly access: AccessControl;

  private readonly ledger: Ledger;
  private readonly issuer: BondIssuerLike;
  private readonly feePolicy: FeePolicy;
  private readonly pricing: PricingStrategy;
  private readonly yields: YieldStrategy;
  private readonly initializer = new OneTimeInit("NoteEngine");
  private readonly queue = new RedemptionQueue<Tranche>();
  private readonly reserve: Reserve;

  private config: NoteEngineConfig;
  private subscription: SubscriptionSource | undefined;
  private feeCollector: Address;
  private readonly authorizedRollers: Set<Address> = new Set();

  // Rolled back with the ledger
  private appliedYields: Map<Tranche, bigint> = new Map();
  private mintedPerTranche: Map<Tranche, bigint> = new Map();
  private matureTrancheBalance = 0n;
  private depositBond: TrancheLedger | undefined;

  constructor(deps: NoteEngineDeps, config?: Partial<NoteEngineConfig>) {
    super();
    this.config = { ...DEFAULT_NOTE_ENGINE_CONFIG, ...config };
    assertMaturityBounds(this.config.minTolerableTrancheMaturity, this.config.maxTolerableTrancheMaturity);

    this.ledger = deps.ledger;
    this.collateral = deps.collateral;
    this.issuer = deps.issuer;
    this.feePolicy = deps.feePolicy;
    this.pricing = deps.pricing;
    this.yields = deps.yields;
    this.access = new AccessControl(deps.owner, "NoteEngine");

    this.address = this.ledger.createAddress("note-engine");
    this.note = new Token(this.ledger, this.config.symbol);
    this.feeCollector = this.address;
    this.reserve = new Reserve(this.address, this.collateral);

    this.ledger.register(this);
    this.ledger.register(this.queue);
    this.ledger.register(this.reserve);
  }

  /**
   * Binds the value source on the other side of the deviation ratio.
   * Callable once, by the owner.
   */
  init(caller: Address, subscription: SubscriptionSource): void {
    this.access.onlyOwner(caller);
    this.initializer.run(() => {
      this.subscription = subscription;
    });

    noteLogger.info({
      address: this.address,
      note: this.note.symbol,
      collateral: this.collateral.symbol,
      pricing: this.pricing.kind,
      minTolerableTrancheMaturity: this.config.minTolerableTrancheMaturity,
      maxTolerableTrancheMaturity: this.config.maxTolerableTrancheMaturity,
    }, "NoteEngine initialized");
  }

  // ============================================
  // MINT
  // ============================================

  mint(caller: Address, tranche: Token, trancheAmt: bigint): MintResult {
    return this.execute("mint", caller, () => {
      this.advance();

      if (!isTranche(tranche) || !this.isAcceptableDepositTranche(tranche)) {
        throw new UnexpectedAssetError("Expected tranche to be of deposit bond", tranche.address);
      }

      const noteAmt = trancheAmt > 0n ? this.computeMintAmt(tranche, trancheAmt) : 0n;
      if (trancheAmt <= 0n || noteAmt === 0n) {
        throw new UnacceptableMintAmountError(trancheAmt, noteAmt);
      }

      const feeConfig = this.feePolicy.snapshot();
      const dr = this.computeDeviationRatio(feeConfig);
      const fee = applyPerc(noteAmt, this.feePolicy.computeNoteMintFeePerc(dr, feeConfig), ONE);

      tranche.transfer(caller, this.address, trancheAmt);
      this.acceptTranche(tranche);
      this.syncReserve(tranche);

      if (fee > 0n) {
        this.note.mint(caller, noteAmt - fee);
        this.note.mint(this.feeCollector, fee);
      } else {
        this.note.mint(caller, noteAmt);
        if (fee < 0n) {
          this.note.transfer(this.feeCollector, caller, -fee);
        }
      }

      this.enforceMintCaps(tranche, noteAmt);

      const result: MintResult = { noteAmt, fee };
      logOperation(noteLogger, {
        operation: "mint",
        caller,
        token: tranche.address,
        amounts: { trancheAmt, noteAmt, fee, dr },
      }, "Notes minted");
      this.emit("note:minted", caller, tranche.address, result);
      return result;
    });
  }

  /**
   * Note value of a tranche amount at the tranche's applied yield, or its
   * defined yield when it has not been accepted yet
   */
  computeMintAmt(tranche: Token, trancheAmt: bigint): bigint {
    if (!isTranche(tranche)) {
      return 0n;
    }
    return noteValue(trancheAmt, this.yieldOf(tranche), this.usablePrice(tranche));
  }

  /**
   * Smallest tranche amount whose mint amount covers noteAmt, or 0 when the
   * tranche cannot be priced
   */
  computeTrancheAmtForNotes(tranche: Token, noteAmt: bigint): bigint {
    if (!isTranche(tranche) || noteAmt <= 0n) {
      return 0n;
    }
    const units = this.yieldOf(tranche) * this.usablePrice(tranche);
    return units > 0n ? mulDivCeil(noteAmt, VALUE_UNITS, units) : 0n;
  }

  // ============================================
  // REDEEM
  // ============================================

  redeem(caller: Address, token: Token, requestedAmt: bigint): RedeemResult {
    return this.execute("redeem", caller, () => {
      this.advance();

      const head = this.queue.peek();
      if (head !== undefined && token !== head) {
        throw new UnexpectedRedemptionOrderError(token.address, head.address);
      }
      if (head === undefined && !this.reserve.has(token)) {
        throw new UnexpectedAssetError("Expected a reserve asset", token.address);
      }

      const amts = this.computeRedemptionAmts(token, requestedAmt);
      if (amts.burntAmt === 0n) {
        throw new UnacceptableBurnAmountError(requestedAmt);
      }

      const feeConfig = this.feePolicy.snapshot();
      const dr = this.computeDeviationRatio(feeConfig);
      const fee = applyPerc(amts.burntAmt, this.feePolicy.computeNoteBurnFeePerc(dr, feeConfig), ONE);

      this.note.burn(caller, amts.burntAmt);
      if (fee > 0n) {
        this.note.transfer(caller, this.feeCollector, fee);
      } else if (fee < 0n) {
        this.note.transfer(this.feeCollector, caller, -fee);
      }

      const tokenOutAmt = this.transferOut(token, amts.trancheOutAmt, caller);
      if (isTranche(token)) {
        this.releaseMintCap(token, amts.burntAmt);
      }

      if (head === token && this.reserve.balanceOf(token) === 0n) {
        this.queue.dequeue();
        this.emit("queue:dequeued", token.address, "redeemed");
      }

      const result: RedeemResult = {
        burntAmt: amts.burntAmt,
        tokenOutAmt,
        trancheOutAmt: amts.trancheOutAmt,
        leftoverAmt: amts.leftoverAmt,
        fee,
      };
      logOperation(noteLogger, {
        operation: "redeem",
        caller,
        token: token.address,
        amounts: { requestedAmt, burntAmt: amts.burntAmt, tokenOutAmt, leftoverAmt: amts.leftoverAmt, fee, dr },
      }, "Notes redeemed");
      this.emit("note:redeemed", caller, token.address, result);
      return result;
    });
  }

  /**
   * Splits a requested note amount into the part the reserve balance of
   * token covers and the leftover. The leftover rounds up so a partial
   * redemption never pays out more value than it burns.
   */
  computeRedemptionAmts(token: Token, requestedAmt: bigint): RedemptionAmts {
    const yieldFactor = this.yieldOf(token);
    const price = this.usablePrice(token);
    if (requestedAmt <= 0n || yieldFactor === 0n || price === 0n) {
      return { burntAmt: 0n, trancheOutAmt: 0n, leftoverAmt: requestedAmt > 0n ? requestedAmt : 0n };
    }

    const balance = this.trancheEquivalentBalance(token);
    const trancheMax = mulDiv(requestedAmt, VALUE_UNITS, yieldFactor * price);
    if (trancheMax === 0n) {
      return { burntAmt: 0n, trancheOutAmt: 0n, leftoverAmt: requestedAmt };
    }
    if (trancheMax <= balance) {
      return { burntAmt: requestedAmt, trancheOutAmt: trancheMax, leftoverAmt: 0n };
    }

    const leftoverAmt = mulDivCeil(requestedAmt, trancheMax - balance, trancheMax);
    return { burntAmt: requestedAmt - leftoverAmt, trancheOutAmt: balance, leftoverAmt };
  }

  // ============================================
  // ROLLOVER
  // ============================================

  rollover(caller: Address, trancheIn: Token, tokenOut: Token, trancheInAmtAvailable: bigint): RolloverResult {
    return this.execute("rollover", caller, () => {
      if (this.authorizedRollers.size > 0 && !this.authorizedRollers.has(caller)) {
        throw new UnauthorizedError("NoteEngine: caller is not an authorized roller", caller, "roller");
      }

      this.advance();

      if (!isTranche(trancheIn) || !this.isAcceptableDepositTranche(trancheIn)) {
        throw new UnacceptableRolloverError(
          "Expected tranche in to be of deposit bond",
          trancheIn.address,
          tokenOut.address
        );
      }
      if (!this.isRolloverEligible(tokenOut)) {
        throw new UnacceptableRolloverError(
          "Expected token out to be an aged reserve asset",
          trancheIn.address,
          tokenOut.address
        );
      }
      if (trancheInAmtAvailable <= 0n) {
        throw new UnacceptableRolloverAmountError(trancheInAmtAvailable, 0n);
      }

      const feeConfig = this.feePolicy.snapshot();
      const dr = this.computeDeviationRatio(feeConfig);
      const feePerc = this.feePolicy.computeRolloverFeePerc(dr, feeConfig);
      const amts = this.computeRolloverAmt(trancheIn, tokenOut, trancheInAmtAvailable, feePerc);
      if (amts.noteRolledAmt === 0n || amts.trancheInAmt === 0n || amts.trancheOutAmt === 0n) {
        throw new UnacceptableRolloverAmountError(amts.trancheInAmt, amts.noteRolledAmt);
      }

      trancheIn.transfer(caller, this.address, amts.trancheInAmt);
      this.acceptTranche(trancheIn);
      this.syncReserve(trancheIn);

      const tokenOutAmt = this.transferOut(tokenOut, amts.trancheOutAmt, caller);

      const result: RolloverResult = { ...amts, tokenOutAmt };
      logOperation(noteLogger, {
        operation: "rollover",
        caller,
        token: tokenOut.address,
        amounts: {
          trancheInAmt: amts.trancheInAmt,
          tokenOutAmt,
          noteRolledAmt: amts.noteRolledAmt,
          feePerc,
          dr,
        },
      }, "Rollover executed");
      this.emit("note:rolledOver", caller, trancheIn.address, tokenOut.address, result);
      return result;
    });
  }

  /**
   * Rollover amounts at the fee the current deviation ratio implies
   */
  previewRollover(trancheIn: Token, tokenOut: Token, trancheInAmtAvailable: bigint): RolloverResult {
    const feeConfig = this.feePolicy.snapshot();
    const feePerc = this.feePolicy.computeRolloverFeePerc(this.computeDeviationRatio(feeConfig), feeConfig);
    return this.computeRolloverAmt(trancheIn, tokenOut, trancheInAmtAvailable, feePerc);
  }

  /**
   * Amounts exchanged when rolling trancheIn for tokenOut at a signed fee.
   * The payout is capped at tokenOut's reserve balance, in which case the
   * tranche-in amount is scaled down and rounded up.
   */
  computeRolloverAmt(
    trancheIn: Token,
    tokenOut: Token,
    trancheInAmtAvailable: bigint,
    feePerc: bigint
  ): RolloverResult {
    const nothing: RolloverResult = {
      noteRolledAmt: 0n,
      tokenOutAmt: 0n,
      trancheOutAmt: 0n,
      trancheInAmt: 0n,
      remainingTrancheInAmt: trancheInAmtAvailable,
    };

    const unitsIn = this.yieldOf(trancheIn) * this.usablePrice(trancheIn);
    const unitsOut = this.yieldOf(tokenOut) * this.usablePrice(tokenOut);
    const feeFactor = ONE - feePerc;
    if (trancheInAmtAvailable <= 0n || unitsIn === 0n || unitsOut === 0n || feeFactor <= 0n) {
      return nothing;
    }

    let noteRolledAmt = mulDiv(trancheInAmtAvailable, unitsIn, VALUE_UNITS);
    let trancheInAmt = trancheInAmtAvailable;
    let trancheOutAmt = mulDiv(mulDiv(noteRolledAmt, VALUE_UNITS, unitsOut), feeFactor, ONE);

    const balanceOut = this.trancheEquivalentBalance(tokenOut);
    if (trancheOutAmt > balanceOut) {
      trancheOutAmt = balanceOut;
      noteRolledAmt = mulDivCeil(mulDivCeil(balanceOut, unitsOut, VALUE_UNITS), ONE, feeFactor);
      trancheInAmt = minBigInt(mulDivCeil(noteRolledAmt, VALUE_UNITS, unitsIn), trancheInAmtAvailable);
    }

    return {
      noteRolledAmt,
      tokenOutAmt: this.toTokenAmt(tokenOut, trancheOutAmt),
      trancheOutAmt,
      trancheInAmt,
      remainingTrancheInAmt: trancheInAmtAvailable - trancheInAmt,
    };
  }

  // ============================================
  // ADVANCE
  // ============================================

  /**
   * Brings lazily maintained state up to date:
   * 1. adopts the issuer's latest bond when it is acceptable
   * 2. evicts queue heads that aged out of the maturity window
   * 3. redeems reserve tranches of matured bonds into collateral
   * Running it twice in a row changes nothing the second time.
   */
  advance(): void {
    this.ledger.atomic(() => {
      this.updateDepositBond();

      const evicted = this.queue.advance((tranche) => this.isEvictable(tranche));
      for (const tranche of evicted) {
        noteLogger.debug({ tranche: tranche.address }, "Tranche evicted from redemption queue");
        this.emit("queue:dequeued", tranche.address, "evicted");
      }

      this.redeemMatureTranches();
    });
  }

  private updateDepositBond(): void {
    const latest = this.issuer.getLatestBond();
    if (latest === undefined || latest === this.depositBond || !this.isAcceptableBond(latest)) {
      return;
    }
    this.depositBond = latest;
    noteLogger.info({ bond: latest.address, maturityDate: latest.maturityDate }, "Deposit bond updated");
    this.emit("depositBond:updated", latest.address);
  }

  private redeemMatureTranches(): void {
    for (const token of this.reserve.list()) {
      if (!isTranche(token) || this.queue.contains(token)) {
        continue;
      }
      const bond = token.bond;
      if (!bond.isMature() && this.ledger.now() < bond.maturityDate) {
        continue;
      }
      if (!bond.isMature()) {
        bond.mature(this.address);
      }

      const trancheAmt = this.reserve.balanceOf(token);
      const collateralBefore = this.reserve.balanceOf(this.collateral);
      bond.redeemMature(this.address, token, trancheAmt);
      const collateralAmt = this.reserve.balanceOf(this.collateral) - collateralBefore;

      this.matureTrancheBalance += mulDiv(trancheAmt, this.yieldOf(token), YIELD_UNIT);
      this.syncReserve(token);
      this.syncReserve(this.collateral);

      noteLogger.info({
        tranche: token.address,
        trancheAmt: trancheAmt.toString(),
        collateralAmt: collateralAmt.toString(),
      }, "Mature tranche redeemed into collateral");
      this.emit("tranche:matured", token.address, trancheAmt, collateralAmt);
    }
  }

  // ============================================
  // VALUATION
  // ============================================

  getTVLReading(): TVLReading {
    let value = 0n;
    let valid = true;
    for (const token of this.reserve.list()) {
      const balance = this.trancheEquivalentBalance(token);
      if (balance === 0n) {
        continue;
      }
      const reading = this.priceOf(token);
      if (!reading.valid) {
        valid = false;
        continue;
      }
      value += noteValue(balance, this.yieldOf(token), reading.price);
    }
    return { value, valid };
  }

  getTVL(): bigint {
    return this.getTVLReading().value;
  }

  getReserveTokenValue(token: Token): bigint {
    if (!this.reserve.has(token)) {
      return 0n;
    }
    return noteValue(this.trancheEquivalentBalance(token), this.yieldOf(token), this.usablePrice(token));
  }

  computeDeviationRatio(feeConfig: Readonly<FeePolicyConfig> = this.feePolicy.snapshot()): bigint {
    const seniorTR = this.depositBond !== undefined ? this.depositBond.tranches(0).ratio : 0n;
    return this.feePolicy.computeDeviationRatio(
      {
        perpTVL: this.getTVL(),
        vaultTVL: this.subscription !== undefined ? this.subscription.getTVL() : 0n,
        seniorTR,
      },
      feeConfig
    );
  }

  // ============================================
  // QUERIES
  // ============================================

  getDepositBond(): TrancheLedger | undefined {
    return this.depositBond;
  }

  getReserveCount(): number {
    return this.reserve.count();
  }

  getReserveAt(index: number): Token | undefined {
    return this.reserve.at(index);
  }

  getReserveTokenBalance(token: Token): bigint {
    return this.reserve.balanceOf(token);
  }

  inReserve(token: Token): boolean {
    return this.reserve.has(token);
  }

  getRedemptionQueueCount(): number {
    return this.queue.count();
  }

  getRedemptionQueueAt(index: number): Tranche | undefined {
    return this.queue.at(index);
  }

  peekRedemptionQueue(): Tranche | undefined {
    return this.queue.peek();
  }

  getMatureTrancheBalance(): bigint {
    return this.matureTrancheBalance;
  }

  getAppliedYield(tranche: Tranche): bigint | undefined {
    return this.appliedYields.get(tranche);
  }

  getFeeCollector(): Address {
    return this.feeCollector;
  }

  getConfig(): Readonly<NoteEngineConfig> {
    return this.config;
  }

  isAuthorizedRoller(roller: Address): boolean {
    return this.authorizedRollers.size === 0 || this.authorizedRollers.has(roller);
  }

  /**
   * Reserve assets that can be taken out by a rollover: mature collateral
   * first, then aged tranches in reserve order
   */
  getReserveTokensUpForRollover(): Token[] {
    const tokens: Token[] = [];
    if (this.reserve.has(this.collateral)) {
      tokens.push(this.collateral);
    }
    for (const token of this.reserve.list()) {
      if (token !== this.collateral && this.isRolloverEligible(token)) {
        tokens.push(token);
      }
    }
    return tokens;
  }

  isAcceptableDepositTranche(tranche: Tranche): boolean {
    const bond = this.depositBond;
    return bond !== undefined && tranche.bond === bond && this.isAcceptableBond(bond);
  }

  isRolloverEligible(token: Token): boolean {
    if (!this.reserve.has(token)) {
      return false;
    }
    if (!isTranche(token)) {
      return token === this.collateral;
    }
    return token.bond !== this.depositBond && !this.queue.contains(token);
  }

  // ============================================
  // OWNER / KEEPER CONFIGURATION
  // ============================================

  setKeeper(caller: Address, keeper: Address): void {
    this.access.setKeeper(caller, keeper);
  }

  pause(caller: Address): void {
    this.access.pause(caller);
  }

  unpause(caller: Address): void {
    this.access.unpause(caller);
  }

  authorizeRoller(caller: Address, roller: Address, authorized: boolean): void {
    this.access.onlyOwner(caller);
    if (authorized) {
      this.authorizedRollers.add(roller);
    } else {
      this.authorizedRollers.delete(roller);
    }
    noteLogger.info({ roller, authorized }, "Roller authorization updated");
  }

  setFeeCollector(caller: Address, collector: Address): void {
    this.access.onlyOwner(caller);
    this.feeCollector = collector;
  }

  setTolerableTrancheMaturity(caller: Address, min: number, max: number): void {
    this.access.onlyOwner(caller);
    assertMaturityBounds(min, max);
    this.config = { ...this.config, minTolerableTrancheMaturity: min, maxTolerableTrancheMaturity: max };
    noteLogger.info({ min, max }, "Tolerable tranche maturity updated");
  }

  setMaxSupply(caller: Address, maxSupply: bigint): void {
    this.access.onlyOwner(caller);
    this.config = { ...this.config, maxSupply };
  }

  setMaxMintAmtPerTranche(caller: Address, maxMintAmtPerTranche: bigint): void {
    this.access.onlyOwner(caller);
    this.config = { ...this.config, maxMintAmtPerTranche };
  }

  // ============================================
  // SNAPSHOT
  // ============================================

  captureState(): () => void {
    const appliedYields = new Map(this.appliedYields);
    const mintedPerTranche = new Map(this.mintedPerTranche);
    const matureTrancheBalance = this.matureTrancheBalance;
    const depositBond = this.depositBond;
    return () => {
      this.appliedYields = appliedYields;
      this.mintedPerTranche = mintedPerTranche;
      this.matureTrancheBalance = matureTrancheBalance;
      this.depositBond = depositBond;
    };
  }

  // ============================================
  // INTERNALS
  // ============================================

  private execute<T>(operation: string, caller: Address, fn: () => T): T {
    this.initializer.assertInitialized();
    this.access.whenNotPaused();
    try {
      return this.ledger.atomic(fn);
    } catch (error) {
      if (!this.ledger.inAtomicScope() && error instanceof Error) {
        logError(error, { operation, caller }, `${operation} failed`, noteLogger);
      }
      throw error;
    }
  }

  private isAcceptableBond(bond: TrancheLedger): boolean {
    if (bond.isMature() || !this.issuer.isInstance(bond)) {
      return false;
    }
    const timeToMaturity = bond.timeToMaturity();
    return (
      timeToMaturity >= this.config.minTolerableTrancheMaturity &&
      timeToMaturity <= this.config.maxTolerableTrancheMaturity
    );
  }

  private isEvictable(tranche: Tranche): boolean {
    const timeToMaturity = tranche.bond.timeToMaturity();
    return (
      tranche.bond.isMature() ||
      timeToMaturity === 0 ||
      timeToMaturity < this.config.minTolerableTrancheMaturity
    );
  }

  private acceptTranche(tranche: Tranche): void {
    if (!this.appliedYields.has(tranche)) {
      const yieldFactor = this.yields.computeYield(tranche);
      this.appliedYields.set(tranche, yieldFactor);
      this.emit("yield:applied", tranche.address, yieldFactor);
    }
    if (this.queue.enqueue(tranche)) {
      this.emit("queue:enqueued", tranche.address);
    }
  }

  private syncReserve(token: Token): void {
    const balance = this.reserve.sync(token);
    this.emit("reserve:synced", token.address, balance);
  }

  /**
   * Pays out a tranche-equivalent amount of token and returns the amount
   * actually transferred in the token's own units
   */
  private transferOut(token: Token, trancheOutAmt: bigint, to: Address): bigint {
    const tokenAmt = this.toTokenAmt(token, trancheOutAmt);
    if (token === this.collateral) {
      this.matureTrancheBalance -= trancheOutAmt;
    }
    token.transfer(this.address, to, tokenAmt);
    this.syncReserve(token);
    return tokenAmt;
  }

  private toTokenAmt(token: Token, trancheEquivalentAmt: bigint): bigint {
    if (token !== this.collateral) {
      return trancheEquivalentAmt;
    }
    if (this.matureTrancheBalance === 0n) {
      return 0n;
    }
    return mulDiv(trancheEquivalentAmt, this.reserve.balanceOf(this.collateral), this.matureTrancheBalance);
  }

  private trancheEquivalentBalance(token: Token): bigint {
    return token === this.collateral ? this.matureTrancheBalance : this.reserve.balanceOf(token);
  }

  private yieldOf(token: Token): bigint {
    if (token === this.collateral) {
      return YIELD_UNIT;
    }
    if (!isTranche(token)) {
      return 0n;
    }
    return this.appliedYields.get(token) ?? this.yields.computeYield(token);
  }

  private priceOf(token: Token): PriceReading {
    if (token === this.collateral) {
      return this.pricing.computeMatureTranchePrice(
        this.collateral,
        this.reserve.balanceOf(this.collateral),
        this.matureTrancheBalance
      );
    }
    if (isTranche(token)) {
      return this.pricing.computeTranchePrice(token);
    }
    return { price: 0n, valid: false };
  }

  private usablePrice(token: Token): bigint {
    const reading = this.priceOf(token);
    return reading.valid ? reading.price : 0n;
  }

  private enforceMintCaps(tranche: Tranche, noteAmt: bigint): void {
    const { maxSupply, maxMintAmtPerTranche } = this.config;
    const supply = this.note.totalSupply();
    if (maxSupply > 0n && supply > maxSupply) {
      throw new ExceededMaxSupplyError(supply, maxSupply);
    }

    const minted = (this.mintedPerTranche.get(tranche) ?? 0n) + noteAmt;
    if (maxMintAmtPerTranche > 0n && minted > maxMintAmtPerTranche) {
      throw new ExceededMaxMintPerTrancheError(tranche.address, minted, maxMintAmtPerTranche);
    }
    this.mintedPerTranche.set(tranche, minted);
  }

  private releaseMintCap(tranche: Tranche, burntAmt: bigint): void {
    const minted = this.mintedPerTranche.get(tranche) ?? 0n;
    this.mintedPerTranche.set(tranche, minted > burntAmt ? minted - burntAmt : 0n);
  }
}

// ============================================
// HELPERS
// ============================================

function noteValue(trancheAmt: bigint, yieldFactor: bigint, price: bigint): bigint {
  return mulDiv(trancheAmt * yieldFactor, price, VALUE_UNITS);
}

function assertMaturityBounds(min: number, max: number): void {
  if (min < 0 || min > max) {
    throw new InvalidMaturityBoundsError(min, max);
  }
}

export function createNoteEngine(deps: NoteEngineDeps, config?: Partial<NoteEngineConfig>): NoteEngine {
  return new NoteEngine(deps, config);
}
