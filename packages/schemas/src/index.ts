import { z } from 'zod';
import {
  PackSyncConfigSchema,
  WatcherConfigSchema,
  LogLevelSchema,
  OutputTypeSchema,
} from './config/index.js';
import { WatchStateFileSchema, ServerStateEntrySchema } from './state/index.js';
import { ServerListResponseSchema } from './registry/index.js';

export * from './config/index.js';
export * from './registry/index.js';
export * from './state/index.js';

export type WatcherConfigInput = z.input<typeof WatcherConfigSchema>;
export type WatcherConfig = z.output<typeof WatcherConfigSchema>;
export type PackSyncConfigInput = z.input<typeof PackSyncConfigSchema>;
export type PackSyncConfig = z.output<typeof PackSyncConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type OutputType = z.infer<typeof OutputTypeSchema>;
export type WatchStateFile = z.infer<typeof WatchStateFileSchema>;
export type ServerStateEntry = z.infer<typeof ServerStateEntrySchema>;
export type ServerListPage = z.output<typeof ServerListResponseSchema>;
