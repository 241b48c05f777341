/**
 * Fee Policy Module Exports
 */

export * from "./types.js";
export * from "./fee-policy.js";
