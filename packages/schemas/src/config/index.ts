export {
  MIN_POLL_INTERVAL_SECONDS,
  MIN_MAX_CONCURRENT,
  ServerNameSchema,
  PollIntervalSchema,
  StateFilePathSchema,
  MaxConcurrentSchema,
  NameFilterSchema,
  PackageTypeFilterSchema,
  TransportTypeFilterSchema,
  WatcherConfigSchema,
} from './WatcherConfigSchema.js';
export {
  DEFAULT_REGISTRY_URL,
  LogLevelSchema,
  OutputTypeSchema,
  WatchSettingsSchema,
  PackSyncConfigSchema,
} from './PackSyncConfigSchema.js';
