// Retry engine: walks candidate regions under a global retry budget

import { v7 as uuidv7 } from "uuid";
import type { EndpointSnapshot } from "../types/endpoint";
import type {
  AttemptRecord,
  FailoverConfig,
  FailoverFailure,
  FailoverResult,
  FailoverSuccess,
  RetrySessionState,
} from "../types/failover";
import { CallShapes } from "../types/transport";
import type {
  FailoverRequest,
  FailoverTransport,
  InvocationTarget,
  MessagesInputBase,
  RawBodyInputBase,
} from "../types/transport";
import type { SessionOutcome } from "../types/observability";
import type { EventDispatcher } from "./event-dispatcher";
import type { FailureTracker } from "./failure-tracker";
import type { FailoverState, StateTransition } from "./state-machine";
import { FailoverStates, createStateMachine } from "./state-machine";
import {
  dispatchRequest,
  getCallShapeHandler,
  hasRequestPayload,
} from "../shapes";
import {
  FailoverError,
  FailoverErrorCodes,
  classifyInvocationError,
  toError,
} from "../utils/errors";
import { calculateBackoff, sleep, withTimeout } from "../utils/timers";

/**
 * Inputs of one retry session
 */
export interface RetrySessionInput {
  /** Ordered candidate regions from the region selector */
  candidates: readonly string[];
  /** Snapshot the candidates were drawn from, used for profile prefixes */
  snapshot: EndpointSnapshot;
  modelId: string;
  crossRegionInference: boolean;
  extractContent?: boolean;
  sessionId?: string;
}

export interface RetryEngineOptions<
  TMessages extends MessagesInputBase,
  TRawBody extends RawBodyInputBase,
> {
  config: FailoverConfig;
  transport: FailoverTransport<TMessages, TRawBody>;
  dispatcher: EventDispatcher;
  /** Lifetime failed-region set; every session's failures are added to it */
  tracker: FailureTracker;
  sleep?: (ms: number) => Promise<void>;
  /** Called on every session state change */
  onStateChange?: (state: FailoverState) => void;
}

type InvocationOutcome =
  | { ok: true; response: unknown }
  | { ok: false; error: Error };

/**
 * Model id sent to a region. With cross-region inference on, the region's
 * profile prefix is joined to the model id with a dot.
 */
export function resolveTarget(
  region: string,
  snapshot: EndpointSnapshot,
  modelId: string,
  crossRegionInference: boolean,
): { target: InvocationTarget; prefixMissing: boolean } {
  if (!crossRegionInference) {
    return { target: { region, modelId }, prefixMissing: false };
  }
  const prefix = snapshot.find(
    (record) => record.region === region,
  )?.regionProfilePrefix;
  if (!prefix) {
    return { target: { region, modelId }, prefixMissing: true };
  }
  return {
    target: { region, modelId: `${prefix}.${modelId}` },
    prefixMissing: false,
  };
}

/**
 * Runs one logical call per `run()`.
 *
 * The engine holds no per-session state between runs; everything a session
 * needs lives in its `RetrySessionState`. Failed regions are reported to
 * the shared `FailureTracker`.
 */
export class RetryEngine<
  TMessages extends MessagesInputBase,
  TRawBody extends RawBodyInputBase,
> {
  private readonly config: FailoverConfig;
  private readonly transport: FailoverTransport<TMessages, TRawBody>;
  private readonly dispatcher: EventDispatcher;
  private readonly tracker: FailureTracker;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onStateChange?: (state: FailoverState) => void;

  constructor(options: RetryEngineOptions<TMessages, TRawBody>) {
    this.config = options.config;
    this.transport = options.transport;
    this.dispatcher = options.dispatcher;
    this.tracker = options.tracker;
    this.sleep = options.sleep ?? sleep;
    this.onStateChange = options.onStateChange;
  }

  async run(
    request: FailoverRequest<TMessages, TRawBody>,
    input: RetrySessionInput,
  ): Promise<FailoverResult> {
    const startedAt = Date.now();
    const stream = request.stream ?? false;
    const machine = createStateMachine();
    const unsubscribe = this.onStateChange
      ? machine.subscribe(this.onStateChange)
      : undefined;

    const candidates = this.config.multiRegionRetry
      ? [...input.candidates]
      : input.candidates.slice(0, 1);

    const state: RetrySessionState = {
      sessionId: input.sessionId ?? uuidv7(),
      retryBudgetRemaining: this.config.maxRetryTime,
      perRegionRetryLimit: this.config.maxRetryTimesForEachRegion,
      candidates,
      failedRegions: [],
      attempts: [],
      invocations: 0,
    };

    this.dispatcher.emit({
      type: "SESSION_START",
      sessionId: state.sessionId,
      shape: request.shape,
      stream,
      modelId: input.modelId,
      candidates: [...candidates],
      retryBudget: state.retryBudgetRemaining,
    });

    const end = (outcome: SessionOutcome, region?: string): void => {
      unsubscribe?.();
      this.dispatcher.emit({
        type: "SESSION_END",
        sessionId: state.sessionId,
        outcome,
        region,
        invocations: state.invocations,
        failedRegions: [...state.failedRegions],
        durationMs: Date.now() - startedAt,
      });
    };

    if (!hasRequestPayload(request)) {
      machine.transition(FailoverStates.EXHAUSTED);
      end("invalid_request");
      return this.failure(
        state,
        request,
        machine.getHistory(),
        new FailoverError(
          `Request has no ${request.shape === CallShapes.MESSAGES ? "messages" : "body"}`,
          { code: FailoverErrorCodes.INVALID_REQUEST, invocations: 0 },
        ),
      );
    }

    if (candidates.length === 0) {
      machine.transition(FailoverStates.EXHAUSTED);
      end("no_endpoint");
      return this.failure(
        state,
        request,
        machine.getHistory(),
        new FailoverError("No endpoint available", {
          code: FailoverErrorCodes.NO_ENDPOINT,
          invocations: 0,
        }),
      );
    }

    let lastError: Error | undefined;
    let previousRegion: string | undefined;

    for (const region of candidates) {
      if (state.retryBudgetRemaining <= 0) break;

      if (previousRegion !== undefined) {
        machine.transition(FailoverStates.ADVANCE_REGION);
        this.dispatcher.emit({
          type: "REGION_ADVANCE",
          sessionId: state.sessionId,
          fromRegion: previousRegion,
          toRegion: region,
        });
        machine.transition(FailoverStates.SELECTING);
      }
      previousRegion = region;

      const { target, prefixMissing } = resolveTarget(
        region,
        input.snapshot,
        input.modelId,
        input.crossRegionInference,
      );
      if (prefixMissing) {
        this.dispatcher.emit({
          type: "PROFILE_PREFIX_MISSING",
          sessionId: state.sessionId,
          region,
          modelId: input.modelId,
        });
      }

      for (
        let regionAttempt = 1;
        regionAttempt <= state.perRegionRetryLimit &&
        state.retryBudgetRemaining > 0;
        regionAttempt++
      ) {
        if (regionAttempt > 1) {
          machine.transition(FailoverStates.RETRY_SAME_REGION);
        }
        if (state.invocations > 0) {
          await this.pause(state.invocations - 1);
        }

        machine.transition(FailoverStates.INVOKING);
        state.invocations++;
        const attempt = state.invocations;

        this.dispatcher.emit({
          type: "ATTEMPT_START",
          sessionId: state.sessionId,
          region,
          modelId: target.modelId,
          attempt,
          regionAttempt,
          retryBudgetRemaining: state.retryBudgetRemaining,
        });

        const outcome = await this.invokeOnce(target, request);
        machine.transition(FailoverStates.EVALUATING);

        if (outcome.ok) {
          machine.transition(FailoverStates.SUCCESS);
          end("success", region);
          return this.success(
            state,
            request,
            target,
            outcome.response,
            input.extractContent ?? false,
            machine.getHistory(),
          );
        }

        state.retryBudgetRemaining--;
        lastError = outcome.error;

        const { errorClass, reason } = classifyInvocationError(
          outcome.error,
          this.config.validationErrorNames,
        );
        const record: AttemptRecord = {
          region,
          modelId: target.modelId,
          attempt,
          regionAttempt,
          errorClass,
          reason,
          message: outcome.error.message,
          timestamp: Date.now(),
        };
        state.attempts.push(record);

        this.dispatcher.emit({
          type: "ATTEMPT_ERROR",
          sessionId: state.sessionId,
          region,
          modelId: target.modelId,
          attempt,
          regionAttempt,
          errorClass,
          reason,
          error: outcome.error.message,
          retryBudgetRemaining: state.retryBudgetRemaining,
        });

        // Only a transport failure on the first sub-attempt blames the region;
        // validation failures are the caller's
        if (
          errorClass === "transport" &&
          regionAttempt === 1 &&
          !state.failedRegions.includes(region)
        ) {
          state.failedRegions.push(region);
          this.tracker.recordFailure(region);
          this.dispatcher.emit({
            type: "REGION_FAILED",
            sessionId: state.sessionId,
            region,
          });
        }
      }
    }

    machine.transition(FailoverStates.EXHAUSTED);
    end("exhausted");
    return this.failure(
      state,
      request,
      machine.getHistory(),
      new FailoverError(
        `All regions failed after ${state.invocations} attempts${lastError ? `: ${lastError.message}` : ""}`,
        {
          code: FailoverErrorCodes.EXHAUSTED,
          invocations: state.invocations,
          failedRegions: [...state.failedRegions],
          cause: lastError,
        },
      ),
    );
  }

  /**
   * One transport call. Never throws; failures come back as outcomes.
   */
  private async invokeOnce(
    target: InvocationTarget,
    request: FailoverRequest<TMessages, TRawBody>,
  ): Promise<InvocationOutcome> {
    try {
      const pending = dispatchRequest(this.transport, target, request);
      const timeoutMs = this.config.attemptTimeoutMs;
      const response =
        timeoutMs !== undefined
          ? await withTimeout(
              pending,
              timeoutMs,
              `Invocation in ${target.region} timed out after ${timeoutMs}ms`,
            )
          : await pending;

      if (response === null || response === undefined) {
        return {
          ok: false,
          error: new FailoverError(`Empty response from ${target.region}`, {
            code: FailoverErrorCodes.TRANSPORT_FAILURE,
            region: target.region,
            metadata: { emptyResponse: true },
          }),
        };
      }
      return { ok: true, response };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  /**
   * Backoff before retry number `retry` (0-based)
   */
  private async pause(retry: number): Promise<void> {
    const delay = calculateBackoff(
      this.config.backoff,
      retry,
      this.config.retryDelay,
      this.config.maxRetryDelay,
    );
    if (delay > 0) {
      await this.sleep(delay);
    }
  }

  private success(
    state: RetrySessionState,
    request: FailoverRequest<TMessages, TRawBody>,
    target: InvocationTarget,
    response: unknown,
    extractContent: boolean,
    transitions: StateTransition[],
  ): FailoverSuccess {
    const stream = request.stream ?? false;
    const result: FailoverSuccess = {
      ok: true,
      sessionId: state.sessionId,
      shape: request.shape,
      stream,
      region: target.region,
      modelId: target.modelId,
      invocations: state.invocations,
      response,
      attempts: state.attempts,
      failedRegions: state.failedRegions,
      transitions,
    };
    if (extractContent && !stream) {
      result.content = getCallShapeHandler(request.shape).extractContent(
        response,
      );
    }
    return result;
  }

  private failure(
    state: RetrySessionState,
    request: FailoverRequest<TMessages, TRawBody>,
    transitions: StateTransition[],
    error: FailoverError,
  ): FailoverFailure {
    return {
      ok: false,
      sessionId: state.sessionId,
      shape: request.shape,
      error,
      invocations: state.invocations,
      attempts: state.attempts,
      failedRegions: state.failedRegions,
      transitions,
    };
  }
}
