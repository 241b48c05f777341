/**
 * perpnote Zod Schemas
 * Validation schemas for addresses, amounts and the environment
 */

import { z } from "zod";
import { parseFixed } from "../math/index.js";
import { DECIMALS } from "../constants/index.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

// Common primitives
export * from "./common.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

/** Decimal string such as "1.33" parsed to an 8-decimal fixed-point value */
const percentageEnv = (fallback: string) =>
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, "Expected a decimal number")
    .default(fallback)
    .transform((v) => parseFixed(v, DECIMALS.percentage));

/** Decimal string parsed to an 18-decimal token amount */
const amountEnv = (fallback: string) =>
  z
    .string()
    .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal number")
    .default(fallback)
    .transform((v) => parseFixed(v, DECIMALS.amount));

export const envSchema = z.object({
  // Runtime
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Fee policy
  PERPNOTE_TARGET_SR: percentageEnv("1.33"),
  PERPNOTE_MINT_FEE_PERC: percentageEnv("0"),
  PERPNOTE_BURN_FEE_PERC: percentageEnv("0"),

  // Note engine
  PERPNOTE_MIN_MATURITY_SEC: z.string().transform(Number).pipe(z.number().int().nonnegative()).default("0"),
  PERPNOTE_MAX_MATURITY_SEC: z
    .string()
    .transform(Number)
    .pipe(z.number().int().nonnegative())
    .default(String(Number.MAX_SAFE_INTEGER)),
  PERPNOTE_MAX_SUPPLY: amountEnv("0"),

  // Vault
  PERPNOTE_MIN_DEPLOYMENT_AMT: amountEnv("0"),
});

export type Env = z.infer<typeof envSchema>;
