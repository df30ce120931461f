// Region failover facade: endpoint snapshot, sessions and persistence

import type { EndpointSnapshot, EndpointStore } from "../types/endpoint";
import type {
  FailoverConfig,
  FailoverResult,
  FailoverSuccess,
  InvokeOptions,
} from "../types/failover";
import type {
  FailoverRequest,
  FailoverTransport,
  MessagesInput,
  MessagesInputBase,
  RawBodyInput,
  RawBodyInputBase,
  ReadStreamOptions,
  StreamChunk,
} from "../types/transport";
import { CallShapes } from "../types/transport";
import type { FailoverEventHandler } from "../types/observability";
import { createFailoverConfig, withConfigOverrides } from "./config";
import { FileEndpointStore, hasLastError } from "./endpoint-store";
import { EventDispatcher } from "./event-dispatcher";
import { createConsoleEventHandler } from "./event-handlers";
import { FailureTracker, computeDisableUpdates } from "./failure-tracker";
import { RegionSelector } from "./region-selector";
import { RetryEngine } from "./retry-engine";
import type { FailoverState } from "./state-machine";
import { collectStream, getCallShapeHandler } from "../shapes";
import {
  FailoverError,
  FailoverErrorCodes,
  errorMessage,
} from "../utils/errors";
import { unixSeconds } from "../utils/timers";

export interface RegionFailoverOptions<
  TMessages extends MessagesInputBase = MessagesInput,
  TRawBody extends RawBodyInputBase = RawBodyInput,
> {
  /**
   * Client that performs the actual remote calls
   */
  transport: FailoverTransport<TMessages, TRawBody>;

  /**
   * Model id used when a call does not name one
   */
  modelId: string;

  /**
   * Endpoint file. Without it the instance starts with no endpoints and
   * cannot persist.
   */
  configPath?: string;

  /**
   * Load `configPath` on creation
   * @default true
   */
  autoLoad?: boolean;

  /**
   * @default new FileEndpointStore()
   */
  store?: EndpointStore;

  config?: Partial<FailoverConfig>;

  /**
   * Time source for eligibility and cooldowns, read once per session
   * @default () => new Date()
   */
  clock?: () => Date;

  /**
   * Random source in [0, 1) for primary region selection
   * @default Math.random
   */
  random?: () => number;

  /**
   * Delay function used for backoff between attempts
   */
  sleep?: (ms: number) => Promise<void>;

  onEvent?: FailoverEventHandler;

  /**
   * Called on every session state change
   */
  onStateChange?: (state: FailoverState) => void;

  /**
   * Log every event through console.debug
   * @default false
   */
  debug?: boolean;

  /**
   * User context attached to every event
   */
  context?: Record<string, unknown>;
}

/**
 * Options for the shape-fixed helpers `converse()` and `invokeModel()`
 */
export interface CallOptions extends InvokeOptions {
  /**
   * @default false
   */
  stream?: boolean;
}

/**
 * Resilience layer over a multi-region inference service.
 *
 * Holds the endpoint snapshot and the lifetime failed-region set. Each call
 * selects candidate regions, runs one retry session and records the
 * regions that failed. `recordAndPersistFailures()` writes their cooldowns
 * back to the endpoint file; it is never run implicitly.
 */
export class RegionFailover<
  TMessages extends MessagesInputBase = MessagesInput,
  TRawBody extends RawBodyInputBase = RawBodyInput,
> {
  private config: FailoverConfig;
  private modelId: string;
  private configPath: string | undefined;
  private snapshot: EndpointSnapshot = Object.freeze([]);
  private engine: RetryEngine<TMessages, TRawBody>;
  private readonly errorLog: string[] = [];

  private readonly transport: FailoverTransport<TMessages, TRawBody>;
  private readonly store: EndpointStore;
  private readonly clock: () => Date;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly onStateChange?: (state: FailoverState) => void;
  private readonly tracker = new FailureTracker();
  private readonly selector: RegionSelector;
  private readonly dispatcher: EventDispatcher;

  constructor(options: RegionFailoverOptions<TMessages, TRawBody>) {
    this.config = createFailoverConfig(options.config);
    this.transport = options.transport;
    this.modelId = options.modelId;
    this.configPath = options.configPath;
    this.store = options.store ?? new FileEndpointStore();
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep;
    this.onStateChange = options.onStateChange;
    this.selector = new RegionSelector({
      preferPrimary: this.config.primaryRegionRandomDistribution,
      random: options.random,
    });

    this.dispatcher = new EventDispatcher(options.context);
    if (options.onEvent) this.dispatcher.onEvent(options.onEvent);
    if (options.debug) this.dispatcher.onEvent(createConsoleEventHandler());

    this.engine = this.createEngine();
  }

  private createEngine(): RetryEngine<TMessages, TRawBody> {
    return new RetryEngine({
      config: this.config,
      transport: this.transport,
      dispatcher: this.dispatcher,
      tracker: this.tracker,
      sleep: this.sleep,
      onStateChange: this.onStateChange,
    });
  }

  /**
   * Replace the endpoint snapshot from `path` (default: the configured
   * path). On failure the previous snapshot is kept and `false` returned.
   */
  async reload(path: string | undefined = this.configPath): Promise<boolean> {
    if (path === undefined) {
      this.log("Load configuration file failed! No path configured");
      return false;
    }

    try {
      this.snapshot = await this.store.load(path);
    } catch (error) {
      const message = errorMessage(error);
      this.log(message);
      this.dispatcher.emit({
        type: "CONFIG_LOAD_FAILED",
        path,
        error: message,
        retainedEndpointCount: this.snapshot.length,
      });
      return false;
    }

    this.configPath = path;
    this.dispatcher.emit({
      type: "CONFIG_LOADED",
      path,
      endpointCount: this.snapshot.length,
    });
    return true;
  }

  setCrossRegionInferenceEnabled(enabled: boolean): void {
    this.config = withConfigOverrides(this.config, {
      crossRegionInference: enabled,
    });
    this.engine = this.createEngine();
  }

  setModelId(modelId: string): void {
    this.modelId = modelId;
  }

  /**
   * Run one logical call across the eligible regions.
   * Resolves with a failure result instead of throwing when nothing
   * succeeded.
   */
  async invokeWithFailover(
    request: FailoverRequest<TMessages, TRawBody>,
    options: InvokeOptions = {},
  ): Promise<FailoverResult> {
    const snapshot = this.snapshot;
    const candidates = this.selector.select(snapshot, this.now());

    const result = await this.engine.run(request, {
      candidates,
      snapshot,
      modelId: options.modelId ?? this.modelId,
      crossRegionInference: this.config.crossRegionInference,
      extractContent: options.extractContent,
    });

    for (const attempt of result.attempts) {
      this.log(`[${attempt.region}] ${attempt.message}`);
    }
    if (!result.ok) {
      this.log(result.error.message);
    }
    return result;
  }

  converse(input: TMessages, options: CallOptions = {}): Promise<FailoverResult> {
    const { stream = false, ...invokeOptions } = options;
    return this.invokeWithFailover(
      { shape: CallShapes.MESSAGES, input, stream },
      invokeOptions,
    );
  }

  invokeModel(
    input: TRawBody,
    options: CallOptions = {},
  ): Promise<FailoverResult> {
    const { stream = false, ...invokeOptions } = options;
    return this.invokeWithFailover(
      { shape: CallShapes.RAW_BODY, input, stream },
      invokeOptions,
    );
  }

  /**
   * Write cooldowns for every region failed since the last successful
   * persist. Returns `false` when there was nothing to write or the write
   * failed (a rejecting store included); the failed set is kept in both
   * cases. Regions that fail while the write runs stay tracked.
   */
  async recordAndPersistFailures(): Promise<boolean> {
    if (this.tracker.size === 0) {
      this.dispatcher.emit({ type: "PERSIST_SKIPPED", reason: "no_failures" });
      return false;
    }

    const path = this.configPath;
    if (path === undefined) {
      this.dispatcher.emit({ type: "PERSIST_SKIPPED", reason: "no_path" });
      return false;
    }

    const now = this.now();
    const updates = this.tracker.computeDisableUpdates(
      this.snapshot,
      now,
      this.config.nextRetryTimeWindow,
    );
    if (updates === null) {
      this.dispatcher.emit({ type: "PERSIST_SKIPPED", reason: "no_failures" });
      return false;
    }

    const regions = this.tracker.getFailedRegions();
    this.dispatcher.emit({
      type: "PERSIST_START",
      path,
      regions,
      nextAvailableTime: now + this.config.nextRetryTimeWindow,
    });

    let ok: boolean;
    let error: string | undefined;
    try {
      ok = await this.store.persist(path, updates);
    } catch (persistError) {
      ok = false;
      error = errorMessage(persistError);
    }

    if (ok) {
      // Other calls may have failed regions or reloaded while the write ran
      this.tracker.forget(regions);
      this.snapshot = Object.freeze(
        computeDisableUpdates(
          this.snapshot,
          regions,
          now,
          this.config.nextRetryTimeWindow,
        ) ?? this.snapshot,
      );
    } else {
      error =
        error ??
        (hasLastError(this.store)
          ? this.store.getLastError()?.message
          : undefined) ??
        `Error writing to file: ${path}`;
      this.log(error);
    }

    this.dispatcher.emit({ type: "PERSIST_END", path, ok, regions, error });
    return ok;
  }

  /**
   * Forget failed regions without persisting them
   */
  resetFailures(): void {
    this.tracker.reset();
  }

  getFailedRegions(): string[] {
    return this.tracker.getFailedRegions();
  }

  /**
   * Messages of failed attempts and load/persist failures, oldest first
   */
  getErrorLog(): readonly string[] {
    return [...this.errorLog];
  }

  getSnapshot(): EndpointSnapshot {
    return this.snapshot;
  }

  /**
   * Regions a call started now would try, in order
   */
  getCandidates(): string[] {
    return this.selector.select(this.snapshot, this.now());
  }

  getConfig(): FailoverConfig {
    return this.config;
  }

  getModelId(): string {
    return this.modelId;
  }

  getConfigPath(): string | undefined {
    return this.configPath;
  }

  onEvent(handler: FailoverEventHandler): void {
    this.dispatcher.onEvent(handler);
  }

  offEvent(handler: FailoverEventHandler): void {
    this.dispatcher.offEvent(handler);
  }

  getInstanceId(): string {
    return this.dispatcher.getInstanceId();
  }

  private now(): number {
    return unixSeconds(this.clock());
  }

  private log(message: string): void {
    this.errorLog.push(message);
    while (this.errorLog.length > this.config.maxErrorLog) {
      this.errorLog.shift();
    }
  }
}

/**
 * Create a failover instance and load its endpoint file.
 * A failed load leaves the instance with no endpoints; it does not throw.
 *
 * @example
 * ```typescript
 * const failover = await createRegionFailover({
 *   transport: new BedrockTransport(),
 *   modelId: "anthropic.claude-3-haiku-20240307-v1:0",
 *   configPath: "./endpoints.json",
 * });
 *
 * const result = await failover.converse({
 *   messages: [{ role: "user", content: [{ text: "Hello" }] }],
 * }, { extractContent: true });
 *
 * if (result.ok) console.log(result.content);
 * await failover.recordAndPersistFailures();
 * ```
 */
export async function createRegionFailover<
  TMessages extends MessagesInputBase = MessagesInput,
  TRawBody extends RawBodyInputBase = RawBodyInput,
>(
  options: RegionFailoverOptions<TMessages, TRawBody>,
): Promise<RegionFailover<TMessages, TRawBody>> {
  const failover = new RegionFailover(options);
  if (options.configPath !== undefined && options.autoLoad !== false) {
    await failover.reload();
  }
  return failover;
}

/**
 * Create an instance, run `fn` with it and persist failures afterwards,
 * also when `fn` throws. Persist failures are reported through `persisted`
 * and the error log.
 */
export async function withRegionFailover<
  T,
  TMessages extends MessagesInputBase = MessagesInput,
  TRawBody extends RawBodyInputBase = RawBodyInput,
>(
  options: RegionFailoverOptions<TMessages, TRawBody>,
  fn: (failover: RegionFailover<TMessages, TRawBody>) => Promise<T>,
): Promise<{ value: T; persisted: boolean }> {
  const failover = await createRegionFailover(options);
  let value: T;
  try {
    value = await fn(failover);
  } catch (error) {
    await failover.recordAndPersistFailures();
    throw error;
  }
  const persisted = await failover.recordAndPersistFailures();
  return { value, persisted };
}

/**
 * Read a streamed success through its call shape
 */
export function streamContent(
  result: FailoverSuccess,
  options: ReadStreamOptions = {},
): AsyncGenerator<StreamChunk> {
  if (!result.stream) {
    throw new FailoverError("Result was not streamed", {
      code: FailoverErrorCodes.STREAM_ERROR,
      region: result.region,
    });
  }
  return getCallShapeHandler(result.shape).readStream(result.response, options);
}

/**
 * Full text of a success, streamed or not
 */
export async function collectContent(result: FailoverSuccess): Promise<string> {
  if (result.stream) {
    return collectStream(streamContent(result));
  }
  return (
    result.content ??
    getCallShapeHandler(result.shape).extractContent(result.response) ??
    ""
  );
}
