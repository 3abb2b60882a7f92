import { z } from 'zod';

const TimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'expected an RFC3339 timestamp',
  });

/**
 * One entry of the persisted state file, keyed by
 * `namespace/name@version:packageType:transportType`.
 */
export const ServerStateEntrySchema = z.object({
  namespace: z.string(),
  name: z.string(),
  version: z.string(),
  package_type: z.string(),
  transport_type: z.string(),
  updated_at: TimestampSchema,
  generated_at: TimestampSchema,
  checksum: z.string().optional(),
});

/**
 * On-disk layout of the watch state file.
 */
export const WatchStateFileSchema = z.object({
  last_poll: TimestampSchema.optional(),
  servers: z.record(z.string(), ServerStateEntrySchema).nullish(),
});
