/**
 * Event Handler Utilities
 *
 * Helpers for combining and composing event handlers for the failover
 * observability pipeline.
 */

import type {
  EventType,
  FailoverEvent,
  FailoverEventHandler,
} from "../types/observability";

/**
 * Combine multiple event handlers into a single handler.
 *
 * @example
 * ```typescript
 * const failover = await createRegionFailover({
 *   transport,
 *   modelId,
 *   onEvent: combineEvents(
 *     createOpenTelemetryHandler({ tracer, meter }),
 *     createSentryHandler({ sentry: Sentry }),
 *     (event) => console.log(event.type),
 *   ),
 * });
 * ```
 */
export function combineEvents(
  ...handlers: Array<FailoverEventHandler | undefined>
): FailoverEventHandler {
  const validHandlers = handlers.filter(
    (h): h is FailoverEventHandler => typeof h === "function",
  );

  if (validHandlers.length === 0) {
    return () => {};
  }

  if (validHandlers.length === 1 && validHandlers[0]) {
    return validHandlers[0];
  }

  return (event: FailoverEvent) => {
    for (const handler of validHandlers) {
      try {
        handler(event);
      } catch (error) {
        // One handler failing shouldn't break the others
        console.error(
          `Event handler error for ${event.type}:`,
          error instanceof Error ? error.message : error,
        );
      }
    }
  };
}

/**
 * Create a handler that only receives the given event types
 */
export function filterEvents(
  types: EventType[],
  handler: FailoverEventHandler,
): FailoverEventHandler {
  const typeSet = new Set<string>(types);
  return (event: FailoverEvent) => {
    if (typeSet.has(event.type)) {
      handler(event);
    }
  };
}

/**
 * Create a handler that skips the given event types
 */
export function excludeEvents(
  types: EventType[],
  handler: FailoverEventHandler,
): FailoverEventHandler {
  const typeSet = new Set<string>(types);
  return (event: FailoverEvent) => {
    if (!typeSet.has(event.type)) {
      handler(event);
    }
  };
}

/**
 * One-line human readable description of an event
 */
export function formatEvent(event: FailoverEvent): string {
  switch (event.type) {
    case "CONFIG_LOADED":
      return `loaded ${event.endpointCount} endpoints from ${event.path}`;
    case "CONFIG_LOAD_FAILED":
      return `${event.error} (keeping ${event.retainedEndpointCount} endpoints)`;
    case "SESSION_START":
      return `session ${event.sessionId} ${event.shape}${event.stream ? " (stream)" : ""} model=${event.modelId} candidates=[${event.candidates.join(", ")}] budget=${event.retryBudget}`;
    case "ATTEMPT_START":
      return `attempt ${event.attempt} region=${event.region} model=${event.modelId} (region attempt ${event.regionAttempt})`;
    case "ATTEMPT_ERROR":
      return `attempt ${event.attempt} region=${event.region} failed [${event.errorClass}/${event.reason}]: ${event.error}; budget left ${event.retryBudgetRemaining}`;
    case "REGION_FAILED":
      return `region ${event.region} marked failed`;
    case "REGION_ADVANCE":
      return `moving from ${event.fromRegion} to ${event.toRegion}`;
    case "PROFILE_PREFIX_MISSING":
      return `no inference profile prefix for ${event.region}, using ${event.modelId}`;
    case "SESSION_END":
      return `session ${event.sessionId} ${event.outcome}${event.region ? ` via ${event.region}` : ""} after ${event.invocations} invocations`;
    case "PERSIST_START":
      return `disabling [${event.regions.join(", ")}] until ${event.nextAvailableTime} in ${event.path}`;
    case "PERSIST_END":
      return event.ok
        ? `persisted ${event.path}`
        : `persist of ${event.path} failed: ${event.error ?? "unknown error"}`;
    case "PERSIST_SKIPPED":
      return `persist skipped: ${event.reason}`;
  }
}

/**
 * Handler that writes every event to the console. Used by `debug: true`.
 */
export function createConsoleEventHandler(
  write: (line: string) => void = (line) => console.debug(line),
): FailoverEventHandler {
  return (event: FailoverEvent) => {
    write(`[region-failover] ${event.type} ${formatEvent(event)}`);
  };
}
