/**
 * Note Module Exports
 */

export * from "./types.js";
export * from "./redemption-queue.js";
export * from "./reserve.js";
export * from "./note-engine.js";
