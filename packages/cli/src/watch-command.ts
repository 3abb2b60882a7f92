import { RegistryClient } from '@packsync/registry';
import { Watcher } from '@packsync/watcher';
import {
  createScopedLogger,
  setLogLevel,
  type ILogger,
} from '@packsync/core';
import type { PackSyncConfig } from '@packsync/schemas';
import { resolveMergedConfig } from './config-loader.js';
import { loadPackGenerator } from './generator-loader.js';

/**
 * Options as commander hands them over. Every field is optional so that only
 * flags the user actually passed override the config files.
 */
export interface WatchCommandOptions {
  config?: string;
  registryUrl?: string;
  logLevel?: string;
  outputDir?: string;
  outputType?: string;
  requestTimeout?: number;
  dryRun?: boolean;
  forceOverwrite?: boolean;
  allowDeprecated?: boolean;
  generator?: string;
  pollInterval?: number;
  stateFile?: string;
  maxConcurrent?: number;
  filterNames?: string[];
  filterPackageTypes?: string[];
  filterTransportTypes?: string[];
}

function defined(
  entries: Record<string, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(entries).filter(([, value]) => value !== undefined),
  );
}

/**
 * Maps command-line flags onto the config file layout.
 * @internal
 */
export function flagsToOverrides(
  options: WatchCommandOptions,
): Record<string, unknown> {
  const watch = defined({
    pollIntervalSeconds: options.pollInterval,
    stateFilePath: options.stateFile,
    maxConcurrent: options.maxConcurrent,
    nameFilter: options.filterNames,
    packageTypeFilter: options.filterPackageTypes,
    transportTypeFilter: options.filterTransportTypes,
  });

  return defined({
    registryUrl: options.registryUrl,
    logLevel: options.logLevel,
    outputDir: options.outputDir,
    outputType: options.outputType,
    requestTimeoutMs: options.requestTimeout,
    dryRun: options.dryRun,
    forceOverwrite: options.forceOverwrite,
    allowDeprecated: options.allowDeprecated,
    generator: options.generator,
    watch: Object.keys(watch).length > 0 ? watch : undefined,
  });
}

/**
 * Builds the watcher from a resolved configuration.
 * @public
 */
export async function createWatcher(
  config: PackSyncConfig,
  logger: ILogger = createScopedLogger('watch'),
): Promise<Watcher> {
  const client = new RegistryClient({
    baseUrl: config.registryUrl,
    timeoutMs: config.requestTimeoutMs,
    logger: createScopedLogger('registry'),
  });
  const generator = await loadPackGenerator({
    config,
    logger: createScopedLogger('generator'),
  });

  return Watcher.create({
    client,
    generator,
    config: {
      ...config.watch,
      allowDeprecated: config.allowDeprecated,
      forceOverwrite: config.forceOverwrite,
      dryRun: config.dryRun,
    },
    generateOptions: {
      outputDir: config.outputDir,
      outputType: config.outputType,
    },
    logger,
  });
}

/**
 * `packsync watch`: resolves configuration and runs the watcher until
 * `signal` aborts. Always rejects: with GracefulShutdownError on a clean
 * stop, or with whatever ended the loop.
 */
export async function runWatch(
  options: WatchCommandOptions,
  signal: AbortSignal,
): Promise<never> {
  const { config, sources } = resolveMergedConfig({
    projectConfigPath: options.config,
    overrides: flagsToOverrides(options),
  });
  setLogLevel(config.logLevel);

  const logger = createScopedLogger('watch');
  logger.debug('configuration loaded', {
    sources,
    registryUrl: config.registryUrl,
    outputDir: config.outputDir,
    outputType: config.outputType,
    dryRun: config.dryRun,
    forceOverwrite: config.forceOverwrite,
    allowDeprecated: config.allowDeprecated,
    watch: config.watch,
  });

  const watcher = await createWatcher(config, logger);
  return watcher.run(signal);
}
