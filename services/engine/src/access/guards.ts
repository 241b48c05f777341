/**
 * One-time initializer and re-entrancy lock
 */

import { AlreadyInitializedError, NotInitializedError, ReentrancyError } from "./types.js";

// ============================================
// ONE-TIME INIT
// ============================================

export class OneTimeInit {
  private initialized = false;

  constructor(private readonly component: string) {}

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Runs fn exactly once over the component's lifetime
   */
  run<T>(fn: () => T): T {
    if (this.initialized) {
      throw new AlreadyInitializedError(this.component);
    }
    const result = fn();
    this.initialized = true;
    return result;
  }

  assertInitialized(): void {
    if (!this.initialized) {
      throw new NotInitializedError(this.component);
    }
  }
}

// ============================================
// RE-ENTRANCY GUARD
// ============================================

export class ReentrancyGuard {
  private activeOperation: string | undefined;

  constructor(private readonly component: string) {}

  isLocked(): boolean {
    return this.activeOperation !== undefined;
  }

  /**
   * Holds the lock for the whole of fn. The lock is released on the single
   * exit path whether fn returns or throws.
   */
  run<T>(operation: string, fn: () => T): T {
    if (this.activeOperation !== undefined) {
      throw new ReentrancyError(this.component, operation);
    }
    this.activeOperation = operation;
    try {
      return fn();
    } finally {
      this.activeOperation = undefined;
    }
  }
}
