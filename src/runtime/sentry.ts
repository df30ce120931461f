// Sentry integration for failover error tracking

import type * as Sentry from "@sentry/node";
import { EventType } from "../types/observability";
import type {
  FailoverEvent,
  FailoverEventHandler,
} from "../types/observability";

/**
 * Sentry client interface (compatible with @sentry/node)
 */
export interface SentryClient {
  captureMessage: typeof Sentry.captureMessage;
  addBreadcrumb: typeof Sentry.addBreadcrumb;
  setTag: typeof Sentry.setTag;
}

export interface SentryConfig {
  /**
   * Sentry client. Pass the namespace: `import * as Sentry from "@sentry/node"`
   */
  sentry: SentryClient;

  /**
   * Add a breadcrumb for every failed attempt
   * @default true
   */
  breadcrumbsForAttempts?: boolean;

  /**
   * Capture a message when a session ends without success
   * @default true
   */
  captureExhausted?: boolean;

  /**
   * Capture a message when the endpoint file could not be written
   * @default true
   */
  capturePersistFailures?: boolean;

  /**
   * Tags set once when the handler is created
   */
  tags?: Record<string, string>;
}

/**
 * Event handler that reports failover activity to Sentry.
 *
 * @example
 * ```typescript
 * import * as Sentry from "@sentry/node";
 *
 * const failover = await createRegionFailover({
 *   transport,
 *   modelId,
 *   onEvent: combineEvents(
 *     createOpenTelemetryHandler({ tracer, meter }),
 *     createSentryHandler({ sentry: Sentry }),
 *   ),
 * });
 * ```
 */
export function createSentryHandler(
  config: SentryConfig,
): FailoverEventHandler {
  const { sentry } = config;
  const breadcrumbsForAttempts = config.breadcrumbsForAttempts ?? true;
  const captureExhausted = config.captureExhausted ?? true;
  const capturePersistFailures = config.capturePersistFailures ?? true;

  if (config.tags) {
    for (const [key, value] of Object.entries(config.tags)) {
      sentry.setTag(key, value);
    }
  }

  return (event: FailoverEvent) => {
    switch (event.type) {
      case EventType.ATTEMPT_ERROR:
        if (!breadcrumbsForAttempts) break;
        sentry.addBreadcrumb({
          type: "default",
          category: "region_failover.attempt",
          message: `Attempt ${event.attempt} in ${event.region} failed: ${event.error}`,
          level: event.errorClass === "validation" ? "warning" : "error",
          data: {
            sessionId: event.sessionId,
            region: event.region,
            modelId: event.modelId,
            reason: event.reason,
            retryBudgetRemaining: event.retryBudgetRemaining,
          },
        });
        break;

      case EventType.REGION_FAILED:
        sentry.addBreadcrumb({
          type: "default",
          category: "region_failover.region",
          message: `Region ${event.region} marked failed`,
          level: "warning",
          data: { sessionId: event.sessionId },
        });
        break;

      case EventType.CONFIG_LOAD_FAILED:
        sentry.addBreadcrumb({
          type: "default",
          category: "region_failover.config",
          message: event.error,
          level: "error",
          data: {
            path: event.path,
            retainedEndpointCount: event.retainedEndpointCount,
          },
        });
        break;

      case EventType.SESSION_END:
        if (event.outcome !== "exhausted" || !captureExhausted) break;
        sentry.captureMessage(
          `Region failover exhausted after ${event.invocations} attempts`,
          {
            level: "error",
            tags: { "region_failover.outcome": event.outcome },
            extra: {
              sessionId: event.sessionId,
              failedRegions: event.failedRegions,
              durationMs: event.durationMs,
            },
          },
        );
        break;

      case EventType.PERSIST_END:
        if (event.ok || !capturePersistFailures) break;
        sentry.captureMessage(`Failed to persist endpoint file ${event.path}`, {
          level: "error",
          extra: { regions: event.regions, error: event.error },
        });
        break;

      default:
        break;
    }
  };
}
