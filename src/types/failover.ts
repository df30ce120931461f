// Failover configuration, session state and result types

import type { FailoverError } from "../utils/errors";
import type { CallShape } from "./transport";

/**
 * Session state constants - use these instead of string literals
 */
export const FailoverStates = {
  SELECTING: "selecting",
  INVOKING: "invoking",
  EVALUATING: "evaluating",
  RETRY_SAME_REGION: "retry_same_region",
  ADVANCE_REGION: "advance_region",
  SUCCESS: "success",
  EXHAUSTED: "exhausted",
} as const;

export type FailoverState = (typeof FailoverStates)[keyof typeof FailoverStates];

export interface StateTransition {
  from: FailoverState;
  to: FailoverState;
  timestamp: number;
}

export type BackoffStrategy = "exponential" | "linear" | "fixed";

/**
 * Engine configuration. Built once by `createFailoverConfig()` and frozen;
 * every engine instance owns its own copy.
 */
export interface FailoverConfig {
  /**
   * Total invocation attempts allowed in one session, across all regions
   * (default: 5). Recommended values are 3-5.
   */
  readonly maxRetryTime: number;

  /**
   * Attempts against one region before moving to the next (default: 1).
   * May not exceed `maxRetryTime`.
   */
  readonly maxRetryTimesForEachRegion: number;

  /**
   * Move on to other regions when a region fails (default: true).
   * When false only the first candidate region is tried.
   */
  readonly multiRegionRetry: boolean;

  /**
   * Prefer primary regions and pick the leading one at random (default: true)
   */
  readonly primaryRegionRandomDistribution: boolean;

  /**
   * Cooldown in seconds added to the current time for failed regions
   * (default: 3600)
   */
  readonly nextRetryTimeWindow: number;

  /**
   * Route through cross-region inference profiles (default: false)
   */
  readonly crossRegionInference: boolean;

  /**
   * Delay before each retry in milliseconds (default: 0)
   */
  readonly retryDelay: number;

  /**
   * Cap for backoff delays in milliseconds (default: 10000)
   */
  readonly maxRetryDelay: number;

  readonly backoff: BackoffStrategy;

  /**
   * Per-attempt timeout in milliseconds. Unset means the transport's own
   * timeouts apply.
   */
  readonly attemptTimeoutMs?: number;

  /**
   * Error names treated as caller-side validation failures
   */
  readonly validationErrorNames: readonly string[];

  /**
   * Maximum entries kept in the instance error log (default: 100)
   */
  readonly maxErrorLog: number;
}

export const FAILOVER_DEFAULTS = {
  maxRetryTime: 5,
  maxRetryTimesForEachRegion: 1,
  multiRegionRetry: true,
  primaryRegionRandomDistribution: true,
  nextRetryTimeWindow: 3600,
  crossRegionInference: false,
  retryDelay: 0,
  maxRetryDelay: 10000,
  backoff: "fixed",
  validationErrorNames: ["ValidationException", "ParamValidationError"],
  maxErrorLog: 100,
} as const;

/**
 * Single region, single attempt
 */
export const minimalFailover: Partial<FailoverConfig> = {
  maxRetryTime: 1,
  maxRetryTimesForEachRegion: 1,
  multiRegionRetry: false,
};

/**
 * One attempt per region, up to five regions
 */
export const recommendedFailover: Partial<FailoverConfig> = {
  maxRetryTime: 5,
  maxRetryTimesForEachRegion: 1,
  multiRegionRetry: true,
};

/**
 * Two attempts per region with exponential backoff
 */
export const strictFailover: Partial<FailoverConfig> = {
  maxRetryTime: 6,
  maxRetryTimesForEachRegion: 2,
  multiRegionRetry: true,
  retryDelay: 200,
  backoff: "exponential",
  maxRetryDelay: 2000,
};

/**
 * How a failed invocation is accounted for
 */
export type FailureClass = "validation" | "transport";

export type FailureReason =
  | "validation"
  | "timeout"
  | "throttled"
  | "network"
  | "service"
  | "empty_response";

export interface ErrorClassification {
  errorClass: FailureClass;
  reason: FailureReason;
}

/**
 * One failed invocation, kept for diagnostics
 */
export interface AttemptRecord {
  region: string;
  modelId: string;
  /** 1-based attempt number within the session */
  attempt: number;
  /** 1-based attempt number within the region */
  regionAttempt: number;
  errorClass: FailureClass;
  reason: FailureReason;
  message: string;
  timestamp: number;
}

/**
 * Mutable state of one logical call. Created per call, discarded after.
 */
export interface RetrySessionState {
  sessionId: string;
  retryBudgetRemaining: number;
  perRegionRetryLimit: number;
  candidates: readonly string[];
  /** Regions blamed in this session, insertion ordered, no duplicates */
  failedRegions: string[];
  attempts: AttemptRecord[];
  invocations: number;
}

export interface FailoverSuccess {
  ok: true;
  sessionId: string;
  shape: CallShape;
  stream: boolean;
  region: string;
  modelId: string;
  /** Invocations made, including the successful one */
  invocations: number;
  response: unknown;
  /** First text block, filled when `extractContent` was requested */
  content?: string;
  attempts: readonly AttemptRecord[];
  failedRegions: readonly string[];
  /** State changes of the session, oldest first */
  transitions: readonly StateTransition[];
}

export interface FailoverFailure {
  ok: false;
  sessionId: string;
  shape: CallShape;
  /** INVALID_REQUEST, NO_ENDPOINT or EXHAUSTED */
  error: FailoverError;
  invocations: number;
  attempts: readonly AttemptRecord[];
  failedRegions: readonly string[];
  transitions: readonly StateTransition[];
}

export type FailoverResult = FailoverSuccess | FailoverFailure;

export interface InvokeOptions {
  /**
   * Override the instance model id for this call
   */
  modelId?: string;

  /**
   * Pre-extract the first text block of a non-streamed response
   * @default false
   */
  extractContent?: boolean;
}
