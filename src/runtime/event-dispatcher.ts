/**
 * Failover Event Dispatcher
 *
 * Centralized event emission for all failover lifecycle events.
 * - Adds ts, instanceId, context automatically to all events
 * - Calls handlers via microtasks (fire-and-forget)
 * - Never throws from handler failures
 */

import { v7 as uuidv7 } from "uuid";
import type {
  FailoverEvent,
  FailoverEventHandler,
  FailoverEventInput,
} from "../types/observability";

/**
 * Deep clone and freeze an object to ensure complete immutability.
 * Handles nested objects and arrays.
 */
function deepCloneAndFreeze(value: unknown): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown) => deepCloneAndFreeze(item)));
  }

  const cloned: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    cloned[key] = deepCloneAndFreeze(item);
  }
  return Object.freeze(cloned);
}

function freezeContext(
  context: Record<string, unknown>,
): Readonly<Record<string, unknown>> {
  const cloned: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(context)) {
    cloned[key] = deepCloneAndFreeze(item);
  }
  return Object.freeze(cloned);
}

export class EventDispatcher {
  private handlers: FailoverEventHandler[] = [];
  private readonly instanceId: string;
  private readonly context: Readonly<Record<string, unknown>>;

  constructor(context: Record<string, unknown> = {}) {
    this.instanceId = uuidv7();
    this.context = freezeContext(context);
  }

  /**
   * Register an event handler
   */
  onEvent(handler: FailoverEventHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Remove an event handler
   */
  offEvent(handler: FailoverEventHandler): void {
    const index = this.handlers.indexOf(handler);
    if (index !== -1) {
      this.handlers.splice(index, 1);
    }
  }

  /**
   * Emit an event to all handlers
   * - Adds ts, instanceId, context automatically
   * - Calls handlers via microtasks (fire-and-forget)
   * - Never throws from handler failures
   */
  emit(input: FailoverEventInput): void {
    // No handlers, no event object
    if (this.handlers.length === 0) return;

    const event: FailoverEvent = {
      ...input,
      ts: Date.now(),
      instanceId: this.instanceId,
      context: this.context,
    };

    // Snapshot handlers so a handler can unsubscribe during dispatch
    for (const handler of [...this.handlers]) {
      queueMicrotask(() => {
        try {
          const result: unknown = handler(event);
          if (result instanceof Promise) {
            result.catch(() => {
              // Async handler errors are fire and forget
            });
          }
        } catch {
          // Sync handler errors are fire and forget
        }
      });
    }
  }

  getInstanceId(): string {
    return this.instanceId;
  }

  getContext(): Readonly<Record<string, unknown>> {
    return this.context;
  }

  getHandlerCount(): number {
    return this.handlers.length;
  }
}

export function createEventDispatcher(
  context: Record<string, unknown> = {},
): EventDispatcher {
  return new EventDispatcher(context);
}
