/**
 * @perpnote/engine
 *
 * Perpetual note engine, rollover vault and deviation-ratio fee policy:
 * - Access capabilities (owner, keeper, pause, one-time init, re-entrancy)
 * - Fee policy
 * - Pricing and yield strategies
 * - Note engine with reserve and redemption queue
 * - Rollover vault
 */

// Access
export * from "./access/index.js";

// Fee policy
export * from "./fee-policy/index.js";

// Strategies
export * from "./strategies/index.js";

// Note engine
export * from "./note/index.js";

// Vault
export * from "./vault/index.js";

// Configuration and wiring
export * from "./config.js";
export * from "./system.js";
