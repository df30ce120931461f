// OpenTelemetry handler tests

import { describe, it, expect, vi } from "vitest";
import {
  INVALID_SPAN_CONTEXT,
  trace,
  type Attributes,
  type Meter,
  type Span,
  type SpanOptions,
} from "@opentelemetry/api";
import {
  FailoverAttributes,
  SpanKind,
  SpanStatusCode,
  createOpenTelemetryHandler,
} from "../src/runtime/opentelemetry";
import type { FailoverEvent } from "../src/types/observability";

const base = { ts: 1, instanceId: "instance-1", context: {} };

interface Recorded {
  name: string;
  value: number;
  attributes?: Attributes;
}

function fakeMeter() {
  const recorded: Recorded[] = [];
  function instrument(name: string) {
    const write = (value: number, attributes?: Attributes) => {
      recorded.push({ name, value, attributes });
    };
    return { add: write, record: write };
  }
  const meter: Pick<Meter, "createCounter" | "createHistogram"> = {
    createCounter: (name) => instrument(name),
    createHistogram: (name) => instrument(name),
  };
  return { meter, recorded };
}

function fakeTracer() {
  const spans: Span[] = [];
  const startSpan = vi.fn((_name: string, _options?: SpanOptions): Span => {
    const span = trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
    vi.spyOn(span, "addEvent");
    vi.spyOn(span, "setAttributes");
    vi.spyOn(span, "setAttribute");
    vi.spyOn(span, "setStatus");
    vi.spyOn(span, "end");
    spans.push(span);
    return span;
  });
  return { tracer: { startSpan }, startSpan, spans };
}

const sessionStart = (sessionId: string): FailoverEvent => ({
  ...base,
  type: "SESSION_START",
  sessionId,
  shape: "messages",
  stream: false,
  modelId: "model-x",
  candidates: ["A", "B"],
  retryBudget: 5,
});

const attemptError: FailoverEvent = {
  ...base,
  type: "ATTEMPT_ERROR",
  sessionId: "s1",
  region: "A",
  modelId: "model-x",
  attempt: 1,
  regionAttempt: 1,
  errorClass: "transport",
  reason: "throttled",
  error: "Too many requests",
  retryBudgetRemaining: 4,
};

describe("createOpenTelemetryHandler", () => {
  it("should open a client span per session", () => {
    const { tracer, startSpan } = fakeTracer();
    const handler = createOpenTelemetryHandler({
      tracer,
      defaultAttributes: { "service.tier": "gold" },
    });
    handler(sessionStart("s1"));

    expect(startSpan).toHaveBeenCalledWith("region_failover.session", {
      kind: SpanKind.CLIENT,
      attributes: {
        "service.tier": "gold",
        [FailoverAttributes.SESSION_ID]: "s1",
        [FailoverAttributes.SHAPE]: "messages",
        [FailoverAttributes.STREAM]: false,
        [FailoverAttributes.MODEL]: "model-x",
        [FailoverAttributes.CANDIDATES]: ["A", "B"],
      },
    });
  });

  it("should use the configured span name prefix", () => {
    const { tracer, startSpan } = fakeTracer();
    createOpenTelemetryHandler({ tracer, serviceName: "chat" })(
      sessionStart("s1"),
    );
    expect(startSpan.mock.calls[0]?.[0]).toBe("chat.session");
  });

  it("should add attempt events to the session span", () => {
    const { tracer, spans } = fakeTracer();
    const handler = createOpenTelemetryHandler({ tracer });
    handler(sessionStart("s1"));
    handler({
      ...base,
      type: "ATTEMPT_START",
      sessionId: "s1",
      region: "A",
      modelId: "model-x",
      attempt: 1,
      regionAttempt: 1,
      retryBudgetRemaining: 5,
    });
    handler(attemptError);

    const span = spans[0];
    expect(span?.addEvent).toHaveBeenNthCalledWith(1, "attempt", {
      [FailoverAttributes.REGION]: "A",
      "region_failover.attempt": 1,
    });
    expect(span?.addEvent).toHaveBeenNthCalledWith(2, "attempt_error", {
      [FailoverAttributes.REGION]: "A",
      [FailoverAttributes.REASON]: "throttled",
      "exception.message": "Too many requests",
    });
  });

  it("should close the span with the session outcome", () => {
    const { tracer, spans } = fakeTracer();
    const handler = createOpenTelemetryHandler({ tracer });
    handler(sessionStart("ok"));
    handler(sessionStart("bad"));

    handler({
      ...base,
      type: "SESSION_END",
      sessionId: "ok",
      outcome: "success",
      region: "B",
      invocations: 2,
      failedRegions: ["A"],
      durationMs: 40,
    });
    handler({
      ...base,
      type: "SESSION_END",
      sessionId: "bad",
      outcome: "exhausted",
      invocations: 2,
      failedRegions: ["A", "B"],
      durationMs: 50,
    });

    const [ok, bad] = spans;
    expect(ok?.setAttributes).toHaveBeenCalledWith({
      [FailoverAttributes.OUTCOME]: "success",
      [FailoverAttributes.INVOCATIONS]: 2,
      [FailoverAttributes.FAILED_REGIONS]: ["A"],
    });
    expect(ok?.setAttribute).toHaveBeenCalledWith(
      FailoverAttributes.REGION,
      "B",
    );
    expect(ok?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
    expect(ok?.end).toHaveBeenCalledTimes(1);

    expect(bad?.setAttribute).not.toHaveBeenCalled();
    expect(bad?.setStatus).toHaveBeenCalledWith({
      code: SpanStatusCode.ERROR,
      message: "exhausted",
    });
    expect(bad?.end).toHaveBeenCalledTimes(1);
  });

  it("should ignore session ends without a span", () => {
    const { tracer, spans } = fakeTracer();
    const handler = createOpenTelemetryHandler({ tracer });
    expect(() =>
      handler({
        ...base,
        type: "SESSION_END",
        sessionId: "unknown",
        outcome: "no_endpoint",
        invocations: 0,
        failedRegions: [],
        durationMs: 0,
      }),
    ).not.toThrow();
    expect(spans).toHaveLength(0);
  });

  it("should record metrics", () => {
    const { meter, recorded } = fakeMeter();
    const handler = createOpenTelemetryHandler({ meter });

    handler(sessionStart("s1"));
    handler(attemptError);
    handler({ ...base, type: "REGION_FAILED", sessionId: "s1", region: "A" });
    handler({
      ...base,
      type: "SESSION_END",
      sessionId: "s1",
      outcome: "exhausted",
      invocations: 1,
      failedRegions: ["A"],
      durationMs: 25,
    });
    handler({
      ...base,
      type: "PERSIST_END",
      path: "endpoints.json",
      ok: true,
      regions: ["A"],
    });

    expect(recorded).toEqual([
      {
        name: "region_failover.attempt_errors",
        value: 1,
        attributes: {
          [FailoverAttributes.REGION]: "A",
          [FailoverAttributes.ERROR_CLASS]: "transport",
          [FailoverAttributes.REASON]: "throttled",
        },
      },
      {
        name: "region_failover.failed_regions",
        value: 1,
        attributes: { [FailoverAttributes.REGION]: "A" },
      },
      {
        name: "region_failover.sessions",
        value: 1,
        attributes: { [FailoverAttributes.OUTCOME]: "exhausted" },
      },
      {
        name: "region_failover.session_duration",
        value: 25,
        attributes: { [FailoverAttributes.OUTCOME]: "exhausted" },
      },
      {
        name: "region_failover.persists",
        value: 1,
        attributes: { ok: true },
      },
    ]);
  });
});
