/**
 * Region Failover Observability Event System
 *
 * All events include: type, ts (Unix ms), instanceId (UUID v7 of the
 * failover instance) and context (user-provided context). Session events
 * also carry the sessionId of the call they belong to.
 */

import type { CallShape } from "./transport";
import type { FailureClass, FailureReason } from "./failover";

export const EventType = {
  CONFIG_LOADED: "CONFIG_LOADED",
  CONFIG_LOAD_FAILED: "CONFIG_LOAD_FAILED",
  SESSION_START: "SESSION_START",
  ATTEMPT_START: "ATTEMPT_START",
  ATTEMPT_ERROR: "ATTEMPT_ERROR",
  REGION_FAILED: "REGION_FAILED",
  REGION_ADVANCE: "REGION_ADVANCE",
  PROFILE_PREFIX_MISSING: "PROFILE_PREFIX_MISSING",
  SESSION_END: "SESSION_END",
  PERSIST_START: "PERSIST_START",
  PERSIST_END: "PERSIST_END",
  PERSIST_SKIPPED: "PERSIST_SKIPPED",
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export interface BaseEvent {
  type: EventType;
  ts: number;
  instanceId: string;
  context: Readonly<Record<string, unknown>>;
}

export interface ConfigLoadedEvent extends BaseEvent {
  type: typeof EventType.CONFIG_LOADED;
  path: string;
  endpointCount: number;
}

export interface ConfigLoadFailedEvent extends BaseEvent {
  type: typeof EventType.CONFIG_LOAD_FAILED;
  path: string;
  error: string;
  /** Endpoints still in use after the failed load */
  retainedEndpointCount: number;
}

export interface SessionStartEvent extends BaseEvent {
  type: typeof EventType.SESSION_START;
  sessionId: string;
  shape: CallShape;
  stream: boolean;
  modelId: string;
  candidates: string[];
  retryBudget: number;
}

export interface AttemptStartEvent extends BaseEvent {
  type: typeof EventType.ATTEMPT_START;
  sessionId: string;
  region: string;
  modelId: string;
  attempt: number;
  regionAttempt: number;
  retryBudgetRemaining: number;
}

export interface AttemptErrorEvent extends BaseEvent {
  type: typeof EventType.ATTEMPT_ERROR;
  sessionId: string;
  region: string;
  modelId: string;
  attempt: number;
  regionAttempt: number;
  errorClass: FailureClass;
  reason: FailureReason;
  error: string;
  retryBudgetRemaining: number;
}

export interface RegionFailedEvent extends BaseEvent {
  type: typeof EventType.REGION_FAILED;
  sessionId: string;
  region: string;
}

export interface RegionAdvanceEvent extends BaseEvent {
  type: typeof EventType.REGION_ADVANCE;
  sessionId: string;
  fromRegion: string;
  toRegion: string;
}

export interface ProfilePrefixMissingEvent extends BaseEvent {
  type: typeof EventType.PROFILE_PREFIX_MISSING;
  sessionId: string;
  region: string;
  modelId: string;
}

export type SessionOutcome =
  | "success"
  | "exhausted"
  | "invalid_request"
  | "no_endpoint";

export interface SessionEndEvent extends BaseEvent {
  type: typeof EventType.SESSION_END;
  sessionId: string;
  outcome: SessionOutcome;
  region?: string;
  invocations: number;
  failedRegions: string[];
  durationMs: number;
}

export interface PersistStartEvent extends BaseEvent {
  type: typeof EventType.PERSIST_START;
  path: string;
  regions: string[];
  nextAvailableTime: number;
}

export interface PersistEndEvent extends BaseEvent {
  type: typeof EventType.PERSIST_END;
  path: string;
  ok: boolean;
  regions: string[];
  error?: string;
}

export interface PersistSkippedEvent extends BaseEvent {
  type: typeof EventType.PERSIST_SKIPPED;
  reason: "no_failures" | "no_path";
}

export type FailoverEvent =
  | ConfigLoadedEvent
  | ConfigLoadFailedEvent
  | SessionStartEvent
  | AttemptStartEvent
  | AttemptErrorEvent
  | RegionFailedEvent
  | RegionAdvanceEvent
  | ProfilePrefixMissingEvent
  | SessionEndEvent
  | PersistStartEvent
  | PersistEndEvent
  | PersistSkippedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/**
 * Event as handed to the dispatcher, before ts/instanceId/context are added
 */
export type FailoverEventInput = DistributiveOmit<
  FailoverEvent,
  "ts" | "instanceId" | "context"
>;

export type FailoverEventHandler = (event: FailoverEvent) => void;
