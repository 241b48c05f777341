/**
 * Access Control
 *
 * Ownership, keeper role and pause switch held as a field by the
 * components that need them.
 */

import type { Address } from "viem";
import { engineLogger as logger } from "@perpnote/shared";
import { PausedError, UnauthorizedError } from "./types.js";

const accessLogger = logger.child({ component: "access-control" });

export class AccessControl {
  private currentOwner: Address;
  private currentKeeper: Address;
  private paused = false;

  constructor(
    owner: Address,
    private readonly component: string
  ) {
    this.currentOwner = owner;
    this.currentKeeper = owner;
  }

  owner(): Address {
    return this.currentOwner;
  }

  keeper(): Address {
    return this.currentKeeper;
  }

  isPaused(): boolean {
    return this.paused;
  }

  // ============================================
  // GUARDS
  // ============================================

  onlyOwner(caller: Address): void {
    if (caller !== this.currentOwner) {
      throw new UnauthorizedError(`${this.component}: caller is not the owner`, caller, "owner");
    }
  }

  onlyKeeper(caller: Address): void {
    if (caller !== this.currentKeeper && caller !== this.currentOwner) {
      throw new UnauthorizedError(`${this.component}: caller is not the keeper`, caller, "keeper");
    }
  }

  whenNotPaused(): void {
    if (this.paused) {
      throw new PausedError(this.component);
    }
  }

  // ============================================
  // ROLE MANAGEMENT
  // ============================================

  transferOwnership(caller: Address, newOwner: Address): void {
    this.onlyOwner(caller);
    this.currentOwner = newOwner;
    accessLogger.info({ component: this.component, newOwner }, "Ownership transferred");
  }

  setKeeper(caller: Address, keeper: Address): void {
    this.onlyOwner(caller);
    this.currentKeeper = keeper;
    accessLogger.info({ component: this.component, keeper }, "Keeper updated");
  }

  pause(caller: Address): void {
    this.onlyKeeper(caller);
    this.paused = true;
    accessLogger.warn({ component: this.component, caller }, "Paused");
  }

  unpause(caller: Address): void {
    this.onlyKeeper(caller);
    this.paused = false;
    accessLogger.info({ component: this.component, caller }, "Unpaused");
  }
}
