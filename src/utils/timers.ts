// Backoff, clock and timeout helpers for region failover

import type { BackoffStrategy } from "../types/failover";

/**
 * Current time as whole Unix seconds, the unit of `nextAvailableTime`
 */
export function unixSeconds(date: Date = new Date()): number {
  return Math.round(date.getTime() / 1000);
}

/**
 * Calculate the delay before retry number `attempt` (0-based)
 * @param strategy - Backoff strategy
 * @param attempt - Retry number (0-based)
 * @param baseDelay - Base delay in milliseconds
 * @param maxDelay - Maximum delay cap in milliseconds
 */
export function calculateBackoff(
  strategy: BackoffStrategy,
  attempt: number,
  baseDelay: number,
  maxDelay: number = 10000,
): number {
  if (baseDelay <= 0) return 0;

  switch (strategy) {
    case "exponential":
      return Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
    case "linear":
      return Math.min(baseDelay * (attempt + 1), maxDelay);
    case "fixed":
    default:
      return Math.min(baseDelay, maxDelay);
  }
}

/**
 * Sleep/delay helper
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Error raised when an attempt runs past its deadline
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Race a promise against a timeout. The timer is always cleared.
 * @param promise - Promise to race
 * @param timeoutMs - Timeout in milliseconds
 * @param timeoutMessage - Error message for timeout
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  timeoutMessage: string = "Timeout",
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(timeoutMessage)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
