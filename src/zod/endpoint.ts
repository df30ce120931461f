// Zod schemas for endpoint records and the durable endpoint file

import { z } from "zod";
import type { EndpointFileEntry, EndpointRecord } from "../types/endpoint";

/**
 * One entry of the durable endpoint file (snake_case wire names)
 */
export const EndpointFileEntrySchema: z.ZodType<EndpointFileEntry> = z.object({
  region: z.string().min(1),
  primary: z.boolean(),
  next_available_time: z.number().int(),
  region_profile_prefix: z.string().optional(),
});

function rejectDuplicateRegions(
  entries: ReadonlyArray<{ region: string }>,
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.region)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "region"],
        message: `Duplicate region "${entry.region}"`,
      });
    }
    seen.add(entry.region);
  });
}

/**
 * Whole endpoint file: a JSON array with unique regions
 */
export const EndpointFileSchema = z
  .array(EndpointFileEntrySchema)
  .superRefine(rejectDuplicateRegions);

/**
 * In-memory endpoint record
 */
export const EndpointRecordSchema: z.ZodType<EndpointRecord> = z.object({
  region: z.string().min(1),
  primary: z.boolean(),
  nextAvailableTime: z.number().int(),
  regionProfilePrefix: z.string().optional(),
});

export const EndpointSnapshotSchema = z
  .array(EndpointRecordSchema)
  .superRefine(rejectDuplicateRegions);

export function fromFileEntry(entry: EndpointFileEntry): EndpointRecord {
  return entry.region_profile_prefix === undefined
    ? {
        region: entry.region,
        primary: entry.primary,
        nextAvailableTime: entry.next_available_time,
      }
    : {
        region: entry.region,
        primary: entry.primary,
        nextAvailableTime: entry.next_available_time,
        regionProfilePrefix: entry.region_profile_prefix,
      };
}

export function toFileEntry(record: EndpointRecord): EndpointFileEntry {
  const entry: EndpointFileEntry = {
    region: record.region,
    primary: record.primary,
    next_available_time: record.nextAvailableTime,
  };
  if (record.regionProfilePrefix !== undefined) {
    entry.region_profile_prefix = record.regionProfilePrefix;
  }
  return entry;
}
