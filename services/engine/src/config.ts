/**
 * Engine Configuration
 *
 * Maps the parsed environment onto the fee policy, note engine and vault
 * sections consumed by createSystem.
 */

import { z } from "zod";
import {
  FEE_POLICY_LIMITS,
  amountSchema,
  bigIntSchema,
  envSchema,
  percentageSchema,
} from "@perpnote/shared";

// ============================================
// SCHEMA
// ============================================

export const engineConfigSchema = z.object({
  feePolicy: z.object({
    targetSubscriptionRatio: bigIntSchema.refine(
      (v) =>
        v >= FEE_POLICY_LIMITS.targetSubscriptionRatioLower &&
        v <= FEE_POLICY_LIMITS.targetSubscriptionRatioUpper,
      { message: "Target subscription ratio must be within [1, 2]" }
    ),
    noteMintFeePerc: percentageSchema,
    noteBurnFeePerc: percentageSchema,
  }),
  note: z
    .object({
      minTolerableTrancheMaturity: z.number().int().nonnegative(),
      maxTolerableTrancheMaturity: z.number().int().nonnegative(),
      maxSupply: amountSchema,
    })
    .refine((n) => n.minTolerableTrancheMaturity <= n.maxTolerableTrancheMaturity, {
      message: "Minimum tranche maturity must not exceed the maximum",
    }),
  vault: z.object({
    minDeploymentAmt: amountSchema,
  }),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

// ============================================
// LOADER
// ============================================

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = envSchema.parse(env);

  return engineConfigSchema.parse({
    feePolicy: {
      targetSubscriptionRatio: parsed.PERPNOTE_TARGET_SR,
      noteMintFeePerc: parsed.PERPNOTE_MINT_FEE_PERC,
      noteBurnFeePerc: parsed.PERPNOTE_BURN_FEE_PERC,
    },
    note: {
      minTolerableTrancheMaturity: parsed.PERPNOTE_MIN_MATURITY_SEC,
      maxTolerableTrancheMaturity: parsed.PERPNOTE_MAX_MATURITY_SEC,
      maxSupply: parsed.PERPNOTE_MAX_SUPPLY,
    },
    vault: {
      minDeploymentAmt: parsed.PERPNOTE_MIN_DEPLOYMENT_AMT,
    },
  });
}
