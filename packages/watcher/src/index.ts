export { Watcher } from './watcher.js';
export type {
  WatcherOptions,
  WatcherStatus,
  PollCycleResult,
  RegistrySource,
} from './watcher.js';
export * from './state/index.js';
export * from './filter/index.js';
export {
  GracefulShutdownError,
  WatcherConfigError,
  StateFileError,
  PollCycleError,
  TaskGenerationError,
  PackGenerationError,
} from './errors.js';
export type { GenerationCounts } from './errors.js';
