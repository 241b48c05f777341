/**
 * @perpnote/ledger
 *
 * In-process token and tranche bond ledger:
 * - Ledger clock, address book and atomic scopes
 * - Fungible tokens and tranche tokens
 * - Bond controller (deposit, pro-rata redeem, maturity waterfall)
 * - Periodic bond issuer
 */

// Types
export * from "./types.js";

// Ledger host
export * from "./ledger.js";

// Tokens
export * from "./token.js";

// Bonds
export * from "./bond-controller.js";
export * from "./bond-issuer.js";
