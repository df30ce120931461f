// Zod schemas for failover configuration

import { z } from "zod";

export const BackoffStrategySchema = z.enum(["exponential", "linear", "fixed"]);

/**
 * Failover configuration schema (all fields resolved)
 */
export const FailoverConfigSchema = z
  .object({
    maxRetryTime: z.number().int().min(1),
    maxRetryTimesForEachRegion: z.number().int().min(1),
    multiRegionRetry: z.boolean(),
    primaryRegionRandomDistribution: z.boolean(),
    nextRetryTimeWindow: z.number().int().min(0),
    crossRegionInference: z.boolean(),
    retryDelay: z.number().min(0),
    maxRetryDelay: z.number().min(0),
    backoff: BackoffStrategySchema,
    attemptTimeoutMs: z.number().positive().optional(),
    validationErrorNames: z.array(z.string()),
    maxErrorLog: z.number().int().min(0),
  })
  .refine(
    (config) => config.maxRetryTimesForEachRegion <= config.maxRetryTime,
    {
      message: "maxRetryTimesForEachRegion cannot exceed maxRetryTime",
      path: ["maxRetryTimesForEachRegion"],
    },
  );
