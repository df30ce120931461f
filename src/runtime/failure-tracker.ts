// Failed region bookkeeping and cooldown computation

import type { EndpointRecord, EndpointSnapshot } from "../types/endpoint";

/**
 * Compute the records to persist after a session.
 *
 * Every record whose region failed gets `nextAvailableTime = now +
 * cooldownWindow`, unless it already holds a later time. Other records pass
 * through unchanged. Returns `null` when nothing failed, meaning there is
 * nothing to persist. The input snapshot is never mutated.
 */
export function computeDisableUpdates(
  snapshot: EndpointSnapshot,
  failedRegions: Iterable<string>,
  now: number,
  cooldownWindow: number,
): EndpointRecord[] | null {
  const failed = new Set(failedRegions);
  if (failed.size === 0) return null;

  const nextAvailableTime = now + cooldownWindow;

  return snapshot.map((record) =>
    failed.has(record.region)
      ? {
          ...record,
          nextAvailableTime: Math.max(
            record.nextAvailableTime,
            nextAvailableTime,
          ),
        }
      : record,
  );
}

/**
 * Accumulates failed regions over the lifetime of a failover instance.
 *
 * The set is not reset between calls. The facade removes regions with
 * `forget()` once their cooldowns have been written.
 */
export class FailureTracker {
  private readonly failed = new Set<string>();

  /**
   * Add a region. Idempotent; first-seen order is kept.
   * @returns true when the region was not tracked yet
   */
  recordFailure(region: string): boolean {
    if (this.failed.has(region)) return false;
    this.failed.add(region);
    return true;
  }

  has(region: string): boolean {
    return this.failed.has(region);
  }

  get size(): number {
    return this.failed.size;
  }

  getFailedRegions(): string[] {
    return Array.from(this.failed);
  }

  computeDisableUpdates(
    snapshot: EndpointSnapshot,
    now: number,
    cooldownWindow: number,
  ): EndpointRecord[] | null {
    return computeDisableUpdates(snapshot, this.failed, now, cooldownWindow);
  }

  /**
   * Drop the given regions, keeping any recorded since they were read
   */
  forget(regions: Iterable<string>): void {
    for (const region of regions) {
      this.failed.delete(region);
    }
  }

  reset(): void {
    this.failed.clear();
  }
}
