// Transport and call shape types for region failover

/**
 * Supported call shapes. Use these instead of string literals.
 */
export const CallShapes = {
  /** Structured conversation call (messages + system prompts) */
  MESSAGES: "messages",
  /** Raw request body invoke */
  RAW_BODY: "raw_body",
} as const;

export type CallShape = (typeof CallShapes)[keyof typeof CallShapes];

/**
 * Minimum a messages-shape input must carry. Transports narrow it further.
 */
export interface MessagesInputBase {
  messages?: readonly unknown[];
}

/**
 * Minimum a raw-body input must carry.
 */
export interface RawBodyInputBase {
  body?: unknown;
}

/**
 * Default messages-shape input when no transport-specific type is used
 */
export interface MessagesInput extends MessagesInputBase {
  messages: readonly unknown[];
  system?: readonly unknown[];
  inferenceConfig?: Record<string, unknown>;
  toolConfig?: Record<string, unknown>;
  guardrailConfig?: Record<string, unknown>;
  additionalModelRequestFields?: Record<string, unknown>;
  additionalModelResponseFieldPaths?: string[];
}

/**
 * Default raw-body input when no transport-specific type is used
 */
export interface RawBodyInput extends RawBodyInputBase {
  body: string | Uint8Array;
  contentType?: string;
  accept?: string;
  trace?: "ENABLED" | "DISABLED";
  guardrailIdentifier?: string;
  guardrailVersion?: string;
}

/**
 * Where a single invocation goes
 */
export interface InvocationTarget {
  region: string;
  /**
   * Model id as sent to the region, already combined with the region
   * profile prefix when cross-region inference is enabled
   */
  modelId: string;
}

export interface InvocationOptions {
  stream: boolean;
}

/**
 * Remote API client supplied by the caller.
 *
 * Implementations throw on failure. Errors named in
 * `FailoverConfig.validationErrorNames` are treated as caller-side; any
 * other error is blamed on the region.
 */
export interface FailoverTransport<
  TMessages extends MessagesInputBase = MessagesInput,
  TRawBody extends RawBodyInputBase = RawBodyInput,
> {
  converse(
    target: InvocationTarget,
    input: TMessages,
    options: InvocationOptions,
  ): Promise<unknown>;

  invokeModel(
    target: InvocationTarget,
    input: TRawBody,
    options: InvocationOptions,
  ): Promise<unknown>;
}

/**
 * One logical call, tagged by call shape
 */
export type FailoverRequest<
  TMessages extends MessagesInputBase = MessagesInput,
  TRawBody extends RawBodyInputBase = RawBodyInput,
> =
  | {
      shape: typeof CallShapes.MESSAGES;
      input: TMessages;
      stream?: boolean;
    }
  | {
      shape: typeof CallShapes.RAW_BODY;
      input: TRawBody;
      stream?: boolean;
    };

/**
 * Chunk produced while reading a streamed response
 */
export type StreamChunk =
  | { type: "text"; value: string }
  | { type: "event"; value: unknown };

export interface ReadStreamOptions {
  /**
   * Only yield text deltas, skipping metadata events
   * @default true
   */
  contentOnly?: boolean;
}
