/**
 * Access Types
 *
 * Errors raised by the ownership, initializer and re-entrancy capabilities
 */

import type { Address } from "viem";

// ============================================
// ERRORS
// ============================================

export class UnauthorizedError extends Error {
  constructor(
    message: string,
    public readonly caller: Address,
    public readonly role: "owner" | "keeper" | "roller"
  ) {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export class PausedError extends Error {
  constructor(public readonly component: string) {
    super(`${component}: paused`);
    this.name = "PausedError";
  }
}

export class AlreadyInitializedError extends Error {
  constructor(public readonly component: string) {
    super(`${component}: already initialized`);
    this.name = "AlreadyInitializedError";
  }
}

export class NotInitializedError extends Error {
  constructor(public readonly component: string) {
    super(`${component}: not initialized`);
    this.name = "NotInitializedError";
  }
}

export class ReentrancyError extends Error {
  constructor(
    public readonly component: string,
    public readonly operation: string
  ) {
    super(`${component}: reentrant call to ${operation}`);
    this.name = "ReentrancyError";
  }
}
