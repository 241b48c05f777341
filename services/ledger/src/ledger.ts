/**
 * Ledger
 *
 * Shared state host for tokens, bonds and the engines built on them:
 * - Deterministic address book
 * - Block clock in seconds
 * - All-or-nothing atomic scopes over every registered participant
 */

import { type Address, encodePacked, getAddress, keccak256, slice } from "viem";
import { ledgerLogger as logger } from "@perpnote/shared";
import type { Snapshottable } from "./types.js";

const atomicLogger = logger.child({ component: "ledger" });

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

// ============================================
// LEDGER
// ============================================

export class Ledger {
  private timestamp: number;
  private nonce = 0n;
  private depth = 0;
  private readonly participants: Snapshottable[] = [];

  constructor(startTime = 1_700_000_000) {
    this.timestamp = startTime;
  }

  // ============================================
  // CLOCK
  // ============================================

  now(): number {
    return this.timestamp;
  }

  advanceTime(seconds: number): number {
    if (seconds < 0) {
      throw new Error(`Cannot move the clock backwards by ${seconds}s`);
    }
    this.timestamp += seconds;
    return this.timestamp;
  }

  setTime(timestamp: number): void {
    if (timestamp < this.timestamp) {
      throw new Error(`Cannot move the clock backwards to ${timestamp}`);
    }
    this.timestamp = timestamp;
  }

  // ============================================
  // ADDRESSES
  // ============================================

  /**
   * Derives a fresh checksummed address from a label and a running nonce
   */
  createAddress(label: string): Address {
    this.nonce += 1n;
    const hash = keccak256(encodePacked(["string", "uint256"], [label, this.nonce]));
    return getAddress(slice(hash, 12));
  }

  // ============================================
  // ATOMIC SCOPES
  // ============================================

  register(participant: Snapshottable): void {
    this.participants.push(participant);
  }

  inAtomicScope(): boolean {
    return this.depth > 0;
  }

  /**
   * Runs fn so that either all of its effects persist or none do.
   * Nested scopes join the outermost one.
   */
  atomic<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth++;
      try {
        return fn();
      } finally {
        this.depth--;
      }
    }

    const registered = this.participants.length;
    const restores = this.participants.map((p) => p.captureState());
    const nonce = this.nonce;

    this.depth = 1;
    try {
      return fn();
    } catch (error) {
      for (let i = restores.length - 1; i >= 0; i--) {
        restores[i]();
      }
      // participants created inside the failed scope are discarded
      this.participants.length = registered;
      this.nonce = nonce;
      atomicLogger.debug(
        { restored: restores.length, error: error instanceof Error ? error.name : String(error) },
        "Atomic scope rolled back"
      );
      throw error;
    } finally {
      this.depth = 0;
    }
  }
}

export function createLedger(startTime?: number): Ledger {
  return new Ledger(startTime);
}
