// Region candidate selection

import type {
  EndpointSnapshot,
  RegionSelectionOptions,
} from "../types/endpoint";

/**
 * Derive the ordered list of regions usable at `now`.
 *
 * Regions still in cooldown (`nextAvailableTime > now`) are dropped. With
 * primary preference, eligible primaries come first and one of them, drawn
 * uniformly, leads; the rest keep snapshot order. An empty result means no
 * endpoint is available.
 *
 * @example
 * ```typescript
 * selectRegions(
 *   [
 *     { region: "A", primary: true, nextAvailableTime: 0 },
 *     { region: "B", primary: false, nextAvailableTime: 0 },
 *   ],
 *   100,
 * ); // ["A", "B"]
 * ```
 */
export function selectRegions(
  records: EndpointSnapshot,
  now: number,
  options: RegionSelectionOptions = {},
): string[] {
  const { preferPrimary = true, random = Math.random } = options;

  const eligible = records.filter((record) => record.nextAvailableTime <= now);

  if (!preferPrimary) {
    return eligible.map((record) => record.region);
  }

  const primary: string[] = [];
  const other: string[] = [];
  for (const record of eligible) {
    (record.primary ? primary : other).push(record.region);
  }

  if (primary.length > 1) {
    const index = pickIndex(primary.length, random);
    const [leader] = primary.splice(index, 1);
    if (leader !== undefined) primary.unshift(leader);
  }

  return [...primary, ...other];
}

/**
 * Uniform index in [0, length), clamped against out-of-range random sources
 */
function pickIndex(length: number, random: () => number): number {
  const index = Math.floor(random() * length);
  return Math.min(Math.max(index, 0), length - 1);
}

/**
 * Stateful wrapper that remembers the selection options
 */
export class RegionSelector {
  private readonly options: RegionSelectionOptions;

  constructor(options: RegionSelectionOptions = {}) {
    this.options = { ...options };
  }

  select(records: EndpointSnapshot, now: number): string[] {
    return selectRegions(records, now, this.options);
  }
}
