/**
 * Vault Module Exports
 */

export * from "./types.js";
export * from "./rollover-vault.js";
