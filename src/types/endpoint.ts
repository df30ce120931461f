// Endpoint types for region failover

/**
 * One regional endpoint of the inference service, as held in memory.
 *
 * Records are immutable apart from `nextAvailableTime`, which only moves
 * forward when a region is disabled.
 */
export interface EndpointRecord {
  /**
   * Region identifier, unique within a snapshot (e.g. "us-east-1")
   */
  readonly region: string;

  /**
   * Preferred for the first attempt of a session
   */
  readonly primary: boolean;

  /**
   * Unix timestamp (seconds) before which the region is skipped
   */
  readonly nextAvailableTime: number;

  /**
   * Prefix combined with the model id when cross-region inference is on
   * (e.g. "us" gives "us.<modelId>")
   */
  readonly regionProfilePrefix?: string;
}

/**
 * Ordered endpoint list read at load time. Never mutated in place.
 */
export type EndpointSnapshot = readonly EndpointRecord[];

/**
 * Shape of one entry of the durable endpoint file
 */
export interface EndpointFileEntry {
  region: string;
  primary: boolean;
  next_available_time: number;
  region_profile_prefix?: string;
}

/**
 * Durable endpoint storage.
 *
 * `load` rejects with a CONFIG_LOAD_FAILED error and never applies a
 * malformed file partially. `persist` replaces the stored content entirely
 * and resolves `false` instead of throwing when nothing was written.
 */
export interface EndpointStore {
  load(path: string): Promise<EndpointSnapshot>;
  persist(path: string, records: EndpointSnapshot): Promise<boolean>;
}

/**
 * Options for region candidate selection
 */
export interface RegionSelectionOptions {
  /**
   * Put eligible primary regions first, one of them picked at random to lead
   * @default true
   */
  preferPrimary?: boolean;

  /**
   * Random source in [0, 1)
   * @default Math.random
   */
  random?: () => number;
}
