/**
 * Access Module Exports
 */

export * from "./types.js";
export * from "./access-control.js";
export * from "./guards.js";
