export {
  CONFIG_FILE_NAME,
  ConfigError,
  getUserDir,
  getUserBasePath,
  getDefaultProjectConfigPath,
  resolveMergedConfig,
} from './config-loader.js';
export type { ResolveConfigOptions } from './config-loader.js';
export {
  GeneratorLoadError,
  loadPackGenerator,
  toImportSpecifier,
} from './generator-loader.js';
export type {
  PackGeneratorFactory,
  PackGeneratorFactoryContext,
} from './generator-loader.js';
export { createWatcher, flagsToOverrides, runWatch } from './watch-command.js';
export type { WatchCommandOptions } from './watch-command.js';
