// Zod schemas for region failover types

// Endpoint schemas
export {
  EndpointFileEntrySchema,
  EndpointFileSchema,
  EndpointRecordSchema,
  EndpointSnapshotSchema,
  fromFileEntry,
  toFileEntry,
} from "./endpoint";

// Configuration schemas
export {
  BackoffStrategySchema,
  FailoverConfigSchema,
} from "./failover";
