// region-failover - multi-region resilience for inference calls
// Main entry point

// Facade
export {
  RegionFailover,
  createRegionFailover,
  withRegionFailover,
  streamContent,
  collectContent,
} from "./runtime/failover";
export type { RegionFailoverOptions, CallOptions } from "./runtime/failover";

// Configuration
export { createFailoverConfig, withConfigOverrides } from "./runtime/config";

// Engine parts
export {
  FileEndpointStore,
  InMemoryEndpointStore,
  parseEndpointFile,
  serializeEndpoints,
  hasLastError,
} from "./runtime/endpoint-store";
export type { FileEndpointStoreOptions } from "./runtime/endpoint-store";
export { RegionSelector, selectRegions } from "./runtime/region-selector";
export { RetryEngine, resolveTarget } from "./runtime/retry-engine";
export type {
  RetryEngineOptions,
  RetrySessionInput,
} from "./runtime/retry-engine";
export {
  FailureTracker,
  computeDisableUpdates,
} from "./runtime/failure-tracker";
export { StateMachine, createStateMachine } from "./runtime/state-machine";

// Call shapes
export {
  getCallShapeHandler,
  dispatchRequest,
  hasRequestPayload,
  messagesShape,
  rawBodyShape,
  collectStream,
  isAsyncIterable,
  toStreamChunks,
  StreamEventError,
} from "./shapes";
export type { CallShapeHandler } from "./shapes";

// Events and observability
export {
  EventDispatcher,
  createEventDispatcher,
} from "./runtime/event-dispatcher";
export {
  combineEvents,
  filterEvents,
  excludeEvents,
  formatEvent,
  createConsoleEventHandler,
} from "./runtime/event-handlers";
export {
  createOpenTelemetryHandler,
  FailoverAttributes,
} from "./runtime/opentelemetry";
export type { OpenTelemetryConfig } from "./runtime/opentelemetry";
export { createSentryHandler } from "./runtime/sentry";
export type { SentryClient, SentryConfig } from "./runtime/sentry";

// Errors
export {
  FailoverError,
  FailoverErrorCodes,
  isFailoverError,
  classifyInvocationError,
  getErrorCategory,
} from "./utils/errors";
export type {
  FailoverErrorCode,
  FailoverErrorCategory,
  FailoverErrorContext,
} from "./utils/errors";
export { TimeoutError } from "./utils/timers";

// Adapters
export { BedrockTransport, createSdkClient } from "./adapters";
export type {
  BedrockMessagesInput,
  BedrockRawBodyInput,
  BedrockRegionClient,
  BedrockTransportOptions,
  ClientLifetime,
} from "./adapters";

// Types and schemas
export * from "./types";
export * from "./zod";
