/**
 * @perpnote/shared
 * Shared logger, fixed-point math, constants and schemas for perpnote
 */

// Export schemas (includes envSchema and primitive validators)
export * from "./schemas/index.js";

// Export constants (includes ONE, PRICE_UNIT, YIELD_UNIT, etc.)
export * from "./constants/index.js";

// Export fixed-point math
export * from "./math/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  ledgerLogger,
  engineLogger,
  vaultLogger,
  logOperation,
  logError,
  createTimer,
  withTiming,
} from "./logger/index.js";
