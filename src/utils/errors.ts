// Error types and invocation error classification for region failover

import type { ErrorClassification } from "../types/failover";

/**
 * Error codes for failover errors
 */
export const FailoverErrorCodes = {
  CONFIG_LOAD_FAILED: "CONFIG_LOAD_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG",
  INVALID_REQUEST: "INVALID_REQUEST",
  NO_ENDPOINT: "NO_ENDPOINT",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  TRANSPORT_FAILURE: "TRANSPORT_FAILURE",
  EXHAUSTED: "EXHAUSTED",
  PERSIST_FAILED: "PERSIST_FAILED",
  STREAM_ERROR: "STREAM_ERROR",
} as const;

export type FailoverErrorCode =
  (typeof FailoverErrorCodes)[keyof typeof FailoverErrorCodes];

/**
 * Broad grouping used for routing and reporting
 */
export type FailoverErrorCategory =
  | "config" // Endpoint file or engine configuration
  | "caller" // Request was unusable or nothing could serve it
  | "endpoint" // Remote side failed
  | "storage"; // Durable state could not be written

export function getErrorCategory(
  code: FailoverErrorCode,
): FailoverErrorCategory {
  switch (code) {
    case FailoverErrorCodes.CONFIG_LOAD_FAILED:
    case FailoverErrorCodes.INVALID_CONFIG:
      return "config";
    case FailoverErrorCodes.INVALID_REQUEST:
    case FailoverErrorCodes.NO_ENDPOINT:
    case FailoverErrorCodes.VALIDATION_ERROR:
      return "caller";
    case FailoverErrorCodes.PERSIST_FAILED:
      return "storage";
    case FailoverErrorCodes.TRANSPORT_FAILURE:
    case FailoverErrorCodes.EXHAUSTED:
    case FailoverErrorCodes.STREAM_ERROR:
    default:
      return "endpoint";
  }
}

/**
 * Context information for failover errors
 */
export interface FailoverErrorContext {
  code: FailoverErrorCode;

  /**
   * Endpoint file involved
   */
  path?: string;

  /**
   * Region involved
   */
  region?: string;

  /**
   * Invocations made in the session before the error
   */
  invocations?: number;

  /**
   * Regions blamed in the session
   */
  failedRegions?: readonly string[];

  /**
   * Text read from a stream before it broke
   */
  partialContent?: string;

  /**
   * Underlying error
   */
  cause?: unknown;

  metadata?: Record<string, unknown>;
}

export class FailoverError extends Error {
  readonly code: FailoverErrorCode;
  readonly context: FailoverErrorContext;
  readonly timestamp: number;

  constructor(message: string, context: FailoverErrorContext) {
    super(message);
    this.name = "FailoverError";
    this.code = context.code;
    this.context = context;
    this.timestamp = Date.now();

    Object.setPrototypeOf(this, FailoverError.prototype);
  }

  get category(): FailoverErrorCategory {
    return getErrorCategory(this.code);
  }

  /**
   * Create a descriptive string with context
   */
  toDetailedString(): string {
    const parts = [this.message];

    if (this.context.path !== undefined) {
      parts.push(`Path: ${this.context.path}`);
    }
    if (this.context.region !== undefined) {
      parts.push(`Region: ${this.context.region}`);
    }
    if (this.context.invocations !== undefined) {
      parts.push(`Invocations: ${this.context.invocations}`);
    }
    if (this.context.failedRegions && this.context.failedRegions.length > 0) {
      parts.push(`Failed: ${this.context.failedRegions.join(",")}`);
    }

    return parts.join(" | ");
  }

  /**
   * Serialize error for logging/transport
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      timestamp: this.timestamp,
      path: this.context.path,
      region: this.context.region,
      invocations: this.context.invocations,
      failedRegions: this.context.failedRegions,
    };
  }
}

export function isFailoverError(error: unknown): error is FailoverError {
  return error instanceof FailoverError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Read the message of anything thrown
 */
export function errorMessage(value: unknown): string {
  return toError(value).message;
}

interface CodedError extends Error {
  code?: unknown;
  $metadata?: { httpStatusCode?: number };
}

function getErrorCode(error: CodedError): string | undefined {
  return typeof error.code === "string" ? error.code : undefined;
}

function getStatusCode(error: CodedError): number | undefined {
  const status = error.$metadata?.httpStatusCode;
  return typeof status === "number" ? status : undefined;
}

export function isTimeoutError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const code = getErrorCode(error);
  return (
    error.name === "TimeoutError" ||
    error.name === "ModelTimeoutException" ||
    message.includes("timeout") ||
    message.includes("timed out") ||
    code === "ETIMEDOUT"
  );
}

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
]);

export function isNetworkError(error: Error): boolean {
  const code = getErrorCode(error);
  if (code !== undefined && NETWORK_CODES.has(code)) return true;
  const message = error.message.toLowerCase();
  return (
    message.includes("socket hang up") ||
    message.includes("network") ||
    message.includes("getaddrinfo")
  );
}

export function isThrottlingError(error: Error): boolean {
  return (
    error.name === "ThrottlingException" ||
    error.name === "ServiceQuotaExceededException" ||
    getStatusCode(error) === 429
  );
}

/**
 * Classify a failed invocation.
 *
 * Validation-class failures are the caller's fault and never count against
 * the region. Everything else, timeouts included, is blamed on the region.
 */
export function classifyInvocationError(
  error: Error,
  validationErrorNames: readonly string[],
): ErrorClassification {
  if (
    validationErrorNames.includes(error.name) ||
    (isFailoverError(error) &&
      error.code === FailoverErrorCodes.VALIDATION_ERROR)
  ) {
    return { errorClass: "validation", reason: "validation" };
  }
  if (
    isFailoverError(error) &&
    error.code === FailoverErrorCodes.TRANSPORT_FAILURE &&
    error.context.metadata?.emptyResponse === true
  ) {
    return { errorClass: "transport", reason: "empty_response" };
  }
  if (isTimeoutError(error)) {
    return { errorClass: "transport", reason: "timeout" };
  }
  if (isThrottlingError(error)) {
    return { errorClass: "transport", reason: "throttled" };
  }
  if (isNetworkError(error)) {
    return { errorClass: "transport", reason: "network" };
  }
  return { errorClass: "transport", reason: "service" };
}
