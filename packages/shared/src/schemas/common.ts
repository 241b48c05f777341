/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { ONE } from "../constants/index.js";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** Ethereum-style address validation */
export const addressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, "Invalid address");

/** 32-byte hash validation */
export const hashSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{64}$/, "Invalid hash");

/** Fixed-point amount as string for precision preservation */
export const amountStringSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a numeric string");

/** BigInt from a bigint, a numeric string or a safe integer */
export const bigIntSchema = z.union([
  z.bigint(),
  amountStringSchema.transform((val) => BigInt(val)),
  z.number().int().transform((val) => BigInt(val)),
]);

/** Non-negative bigint */
export const amountSchema = bigIntSchema.refine((val) => val >= 0n, {
  message: "Amount must be non-negative",
});

/** Percentage in [0, ONE] */
export const percentageSchema = bigIntSchema.refine((val) => val >= 0n && val <= ONE, {
  message: "Percentage must be within [0, 1]",
});

/** Signed percentage in [-ONE, ONE] */
export const signedPercentageSchema = bigIntSchema.refine((val) => val >= -ONE && val <= ONE, {
  message: "Percentage must be within [-1, 1]",
});

export type Amount = z.infer<typeof amountSchema>;
