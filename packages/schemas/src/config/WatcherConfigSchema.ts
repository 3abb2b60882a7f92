import { z } from 'zod';
import { PackageTypes, TransportTypes } from '@packsync/models';

export const MIN_POLL_INTERVAL_SECONDS = 30;
export const MIN_MAX_CONCURRENT = 1;

/**
 * Trims, lower-cases and de-duplicates a list, dropping empty entries.
 */
function normalizeList(values: string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const normalized = value.trim().toLowerCase();
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

export const ServerNameSchema = z
  .string()
  .trim()
  .refine(
    (value) => {
      const parts = value.split('/');
      return parts.length === 2 && parts.every((part) => part.trim() !== '');
    },
    (value) => ({
      message: `invalid server name format "${value}": expected format like 'io.github.example/server'`,
    }),
  );

export const PollIntervalSchema = z
  .number()
  .int()
  .min(MIN_POLL_INTERVAL_SECONDS, {
    message: `poll interval must be at least ${MIN_POLL_INTERVAL_SECONDS} seconds`,
  });

export const StateFilePathSchema = z
  .string()
  .trim()
  .min(1, { message: 'state file path cannot be empty' });

export const MaxConcurrentSchema = z
  .number()
  .int()
  .min(MIN_MAX_CONCURRENT, {
    message: `max concurrent must be at least ${MIN_MAX_CONCURRENT}`,
  });

export const NameFilterSchema = z
  .array(ServerNameSchema)
  .transform((names) => [...new Set(names)]);

export const PackageTypeFilterSchema = z
  .array(z.string())
  .transform(normalizeList)
  .pipe(z.array(z.nativeEnum(PackageTypes)));

export const TransportTypeFilterSchema = z
  .array(z.string())
  .transform(normalizeList)
  .pipe(z.array(z.nativeEnum(TransportTypes)));

/**
 * Settings the reconciler validates when it is constructed.
 */
export const WatcherConfigSchema = z.object({
  pollIntervalSeconds: PollIntervalSchema,
  stateFilePath: StateFilePathSchema,
  maxConcurrent: MaxConcurrentSchema,
  nameFilter: NameFilterSchema.default([]),
  packageTypeFilter: PackageTypeFilterSchema.default([]),
  transportTypeFilter: TransportTypeFilterSchema.default([]),
  allowDeprecated: z.boolean().default(false),
  forceOverwrite: z.boolean().default(false),
  dryRun: z.boolean().default(false),
});
