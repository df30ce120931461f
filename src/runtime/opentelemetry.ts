// OpenTelemetry integration for failover tracing and metrics

import type {
  Attributes,
  Counter,
  Histogram,
  Meter,
  Span,
  Tracer,
} from "@opentelemetry/api";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { EventType } from "../types/observability";
import type {
  FailoverEvent,
  FailoverEventHandler,
} from "../types/observability";

export { SpanKind, SpanStatusCode };

/**
 * OpenTelemetry configuration for failover sessions
 */
export interface OpenTelemetryConfig {
  /**
   * Tracer instance, from `trace.getTracer("region-failover")`.
   * Without it no spans are created.
   */
  tracer?: Pick<Tracer, "startSpan">;

  /**
   * Meter instance, from `metrics.getMeter("region-failover")`.
   * Without it no metrics are recorded.
   */
  meter?: Pick<Meter, "createCounter" | "createHistogram">;

  /**
   * Span name prefix
   * @default "region_failover"
   */
  serviceName?: string;

  /**
   * Attributes added to every span
   */
  defaultAttributes?: Attributes;
}

/**
 * Attribute names used on spans and metrics
 */
export const FailoverAttributes = {
  SESSION_ID: "region_failover.session_id",
  SHAPE: "region_failover.shape",
  STREAM: "region_failover.stream",
  MODEL: "gen_ai.request.model",
  CANDIDATES: "region_failover.candidates",
  REGION: "region_failover.region",
  OUTCOME: "region_failover.outcome",
  INVOCATIONS: "region_failover.invocations",
  FAILED_REGIONS: "region_failover.failed_regions",
  ERROR_CLASS: "region_failover.error_class",
  REASON: "region_failover.reason",
} as const;

interface FailoverInstruments {
  sessions: Counter;
  attempts: Counter;
  attemptErrors: Counter;
  failedRegions: Counter;
  persists: Counter;
  duration: Histogram;
}

function createInstruments(
  meter: Pick<Meter, "createCounter" | "createHistogram">,
): FailoverInstruments {
  return {
    sessions: meter.createCounter("region_failover.sessions", {
      description: "Completed failover sessions",
      unit: "1",
    }),
    attempts: meter.createCounter("region_failover.attempts", {
      description: "Invocations sent to a region",
      unit: "1",
    }),
    attemptErrors: meter.createCounter("region_failover.attempt_errors", {
      description: "Failed invocations",
      unit: "1",
    }),
    failedRegions: meter.createCounter("region_failover.failed_regions", {
      description: "Regions marked failed",
      unit: "1",
    }),
    persists: meter.createCounter("region_failover.persists", {
      description: "Endpoint file writes",
      unit: "1",
    }),
    duration: meter.createHistogram("region_failover.session_duration", {
      description: "Session duration in milliseconds",
      unit: "ms",
    }),
  };
}

/**
 * Event handler that traces each session as one span and counts attempts,
 * failures and persists.
 *
 * @example
 * ```typescript
 * import { trace, metrics } from "@opentelemetry/api";
 *
 * const failover = await createRegionFailover({
 *   transport,
 *   modelId,
 *   configPath,
 *   onEvent: createOpenTelemetryHandler({
 *     tracer: trace.getTracer("region-failover"),
 *     meter: metrics.getMeter("region-failover"),
 *   }),
 * });
 * ```
 */
export function createOpenTelemetryHandler(
  config: OpenTelemetryConfig,
): FailoverEventHandler {
  const { tracer, meter, defaultAttributes } = config;
  const serviceName = config.serviceName ?? "region_failover";
  const instruments = meter ? createInstruments(meter) : undefined;
  const spans = new Map<string, Span>();

  return (event: FailoverEvent) => {
    switch (event.type) {
      case EventType.SESSION_START: {
        if (!tracer) break;
        const span = tracer.startSpan(`${serviceName}.session`, {
          kind: SpanKind.CLIENT,
          attributes: {
            ...defaultAttributes,
            [FailoverAttributes.SESSION_ID]: event.sessionId,
            [FailoverAttributes.SHAPE]: event.shape,
            [FailoverAttributes.STREAM]: event.stream,
            [FailoverAttributes.MODEL]: event.modelId,
            [FailoverAttributes.CANDIDATES]: event.candidates,
          },
        });
        spans.set(event.sessionId, span);
        break;
      }

      case EventType.ATTEMPT_START: {
        instruments?.attempts.add(1, {
          [FailoverAttributes.REGION]: event.region,
        });
        spans.get(event.sessionId)?.addEvent("attempt", {
          [FailoverAttributes.REGION]: event.region,
          "region_failover.attempt": event.attempt,
        });
        break;
      }

      case EventType.ATTEMPT_ERROR: {
        instruments?.attemptErrors.add(1, {
          [FailoverAttributes.REGION]: event.region,
          [FailoverAttributes.ERROR_CLASS]: event.errorClass,
          [FailoverAttributes.REASON]: event.reason,
        });
        spans.get(event.sessionId)?.addEvent("attempt_error", {
          [FailoverAttributes.REGION]: event.region,
          [FailoverAttributes.REASON]: event.reason,
          "exception.message": event.error,
        });
        break;
      }

      case EventType.REGION_FAILED: {
        instruments?.failedRegions.add(1, {
          [FailoverAttributes.REGION]: event.region,
        });
        break;
      }

      case EventType.SESSION_END: {
        instruments?.sessions.add(1, {
          [FailoverAttributes.OUTCOME]: event.outcome,
        });
        instruments?.duration.record(event.durationMs, {
          [FailoverAttributes.OUTCOME]: event.outcome,
        });

        const span = spans.get(event.sessionId);
        if (!span) break;
        spans.delete(event.sessionId);

        span.setAttributes({
          [FailoverAttributes.OUTCOME]: event.outcome,
          [FailoverAttributes.INVOCATIONS]: event.invocations,
          [FailoverAttributes.FAILED_REGIONS]: event.failedRegions,
        });
        if (event.region !== undefined) {
          span.setAttribute(FailoverAttributes.REGION, event.region);
        }
        span.setStatus(
          event.outcome === "success"
            ? { code: SpanStatusCode.OK }
            : { code: SpanStatusCode.ERROR, message: event.outcome },
        );
        span.end();
        break;
      }

      case EventType.PERSIST_END: {
        instruments?.persists.add(1, { ok: event.ok });
        break;
      }

      default:
        break;
    }
  };
}
