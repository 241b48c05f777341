/**
 * Strategy Module Exports
 */

export * from "./types.js";
export * from "./pricing.js";
export * from "./yield.js";
