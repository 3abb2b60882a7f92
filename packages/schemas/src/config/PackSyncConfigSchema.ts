import { z } from 'zod';
import { VALID_PACKAGE_TYPES, VALID_TRANSPORT_TYPES } from '@packsync/models';
import {
  MaxConcurrentSchema,
  NameFilterSchema,
  PackageTypeFilterSchema,
  PollIntervalSchema,
  StateFilePathSchema,
  TransportTypeFilterSchema,
} from './WatcherConfigSchema.js';

export const DEFAULT_REGISTRY_URL = 'https://registry.modelcontextprotocol.io';

export const LogLevelSchema = z.enum([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'silent',
]);

export const OutputTypeSchema = z.enum(['packdir', 'archive']);

export const WatchSettingsSchema = z.object({
  pollIntervalSeconds: PollIntervalSchema.default(300),
  stateFilePath: StateFilePathSchema.default('./watch.json'),
  maxConcurrent: MaxConcurrentSchema.default(5),
  nameFilter: NameFilterSchema.default([]),
  packageTypeFilter: PackageTypeFilterSchema.default([...VALID_PACKAGE_TYPES]),
  transportTypeFilter: TransportTypeFilterSchema.default([
    ...VALID_TRANSPORT_TYPES,
  ]),
});

/**
 * Complete configuration of a packsync process, after defaults, the config
 * file and command-line flags have been merged.
 */
export const PackSyncConfigSchema = z.object({
  registryUrl: z.string().url().default(DEFAULT_REGISTRY_URL),
  logLevel: LogLevelSchema.default('info'),
  outputDir: z.string().min(1).default('./packs'),
  outputType: OutputTypeSchema.default('packdir'),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  dryRun: z.boolean().default(false),
  forceOverwrite: z.boolean().default(false),
  allowDeprecated: z.boolean().default(false),
  /** Module exporting `createPackGenerator`; the dry-run generator when unset */
  generator: z.string().optional(),
  watch: WatchSettingsSchema.default({}),
});
