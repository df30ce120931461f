// Failover configuration builder

import type { FailoverConfig } from "../types/failover";
import { FAILOVER_DEFAULTS } from "../types/failover";
import { FailoverConfigSchema } from "../zod/failover";
import { FailoverError, FailoverErrorCodes } from "../utils/errors";

/**
 * Resolve a partial configuration against the defaults, validate it and
 * freeze the result.
 *
 * @throws FailoverError INVALID_CONFIG when a value is out of range
 *
 * @example
 * ```typescript
 * const config = createFailoverConfig({ maxRetryTime: 3 });
 * config.maxRetryTimesForEachRegion; // 1
 * ```
 */
export function createFailoverConfig(
  config: Partial<FailoverConfig> = {},
): FailoverConfig {
  const resolved: FailoverConfig = {
    maxRetryTime: config.maxRetryTime ?? FAILOVER_DEFAULTS.maxRetryTime,
    maxRetryTimesForEachRegion:
      config.maxRetryTimesForEachRegion ??
      FAILOVER_DEFAULTS.maxRetryTimesForEachRegion,
    multiRegionRetry:
      config.multiRegionRetry ?? FAILOVER_DEFAULTS.multiRegionRetry,
    primaryRegionRandomDistribution:
      config.primaryRegionRandomDistribution ??
      FAILOVER_DEFAULTS.primaryRegionRandomDistribution,
    nextRetryTimeWindow:
      config.nextRetryTimeWindow ?? FAILOVER_DEFAULTS.nextRetryTimeWindow,
    crossRegionInference:
      config.crossRegionInference ?? FAILOVER_DEFAULTS.crossRegionInference,
    retryDelay: config.retryDelay ?? FAILOVER_DEFAULTS.retryDelay,
    maxRetryDelay: config.maxRetryDelay ?? FAILOVER_DEFAULTS.maxRetryDelay,
    backoff: config.backoff ?? FAILOVER_DEFAULTS.backoff,
    attemptTimeoutMs: config.attemptTimeoutMs,
    validationErrorNames: [
      ...(config.validationErrorNames ??
        FAILOVER_DEFAULTS.validationErrorNames),
    ],
    maxErrorLog: config.maxErrorLog ?? FAILOVER_DEFAULTS.maxErrorLog,
  };

  const parsed = FailoverConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new FailoverError(
      `Invalid failover config: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue"}`,
      {
        code: FailoverErrorCodes.INVALID_CONFIG,
        cause: parsed.error,
      },
    );
  }

  Object.freeze(resolved.validationErrorNames);
  return Object.freeze(resolved);
}

/**
 * Copy of `config` with some fields replaced, validated and frozen again
 */
export function withConfigOverrides(
  config: FailoverConfig,
  overrides: Partial<FailoverConfig>,
): FailoverConfig {
  return createFailoverConfig({ ...config, ...overrides });
}
