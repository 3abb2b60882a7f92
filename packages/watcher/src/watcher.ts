/**
 * Poll-and-generate reconciler.
 *
 * Each cycle fetches changed records from the registry, reduces them to
 * generation tasks against the state store, runs the tasks through a bounded
 * pool, records successes and persists the state. A failing task never
 * affects its siblings; critical failures are reported once the whole cycle
 * has settled and been saved.
 * @example
 * ```typescript
 * const watcher = await Watcher.create({
 *   client: new RegistryClient({ baseUrl: DEFAULT_REGISTRY_URL }),
 *   generator: new DryRunPackGenerator(),
 *   config: { pollIntervalSeconds: 300, stateFilePath: './watch.json', maxConcurrent: 5 },
 *   generateOptions: { outputDir: './packs', outputType: 'packdir' },
 * });
 *
 * const controller = new AbortController();
 * process.once('SIGINT', () => controller.abort());
 * await watcher.run(controller.signal);
 * ```
 * @public
 */

import { setTimeout as sleep } from 'timers/promises';
import pLimit from 'p-limit';
import type { GenerationTask, ServerRecord } from '@packsync/models';
import {
  WatcherConfigSchema,
  type WatcherConfig,
  type WatcherConfigInput,
} from '@packsync/schemas';
import { MAX_PAGE_SIZE, type RegistryClient } from '@packsync/registry';
import {
  isPackExistsError,
  type GenerateOptions,
  type PackGenerator,
} from '@packsync/generator';
import {
  createScopedLogger,
  errorMessage,
  isTimeoutReason,
  type ILogger,
} from '@packsync/core';
import { StateStore } from './state/index.js';
import {
  filterServers,
  PackageTypeFilter,
  ServerNameFilter,
  TransportTypeFilter,
  type FilterOptions,
} from './filter/index.js';
import {
  GracefulShutdownError,
  PackGenerationError,
  PollCycleError,
  TaskGenerationError,
  WatcherConfigError,
  type GenerationCounts,
} from './errors.js';

export type WatcherStatus =
  | 'idle'
  | 'polling'
  | 'fetching'
  | 'filtering'
  | 'dispatching'
  | 'persisting'
  | 'stopped';

/** The part of the registry client the watcher uses */
export type RegistrySource = Pick<RegistryClient, 'listAllServers'>;

export interface WatcherOptions {
  client: RegistrySource;
  generator: PackGenerator;
  config: WatcherConfigInput;
  /** Where packs go; dry-run and overwrite come from `config` */
  generateOptions: Pick<GenerateOptions, 'outputDir' | 'outputType'>;
  logger?: ILogger;
  /** Clock, for tests */
  now?: () => Date;
  /** Wait between cycles, for tests; rejects once `signal` aborts */
  delay?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface PollCycleResult extends GenerationCounts {
  durationMs: number;
}

type TaskOutcome =
  | { kind: 'succeeded' }
  | { kind: 'skipped' }
  | { kind: 'benign'; error: TaskGenerationError }
  | { kind: 'critical'; error: TaskGenerationError };

export class Watcher {
  private currentStatus: WatcherStatus = 'idle';
  private readonly filterOptions: FilterOptions;
  private readonly generateOptions: GenerateOptions;

  private constructor(
    private readonly client: RegistrySource,
    private readonly generator: PackGenerator,
    private readonly config: WatcherConfig,
    private readonly store: StateStore,
    generateOptions: Pick<GenerateOptions, 'outputDir' | 'outputType'>,
    private readonly logger: ILogger,
    private readonly now: () => Date,
    private readonly delay: (ms: number, signal: AbortSignal) => Promise<void>,
  ) {
    this.filterOptions = {
      nameFilter: new ServerNameFilter(config.nameFilter),
      packageFilter: new PackageTypeFilter(config.packageTypeFilter),
      transportFilter: new TransportTypeFilter(config.transportTypeFilter),
      forceOverwrite: config.forceOverwrite,
      allowDeprecated: config.allowDeprecated,
    };
    this.generateOptions = {
      ...generateOptions,
      dryRun: config.dryRun,
      forceOverwrite: config.forceOverwrite,
    };
  }

  /**
   * Validates the configuration, then loads the state file.
   * @throws {WatcherConfigError} before touching the file system
   * @throws {StateFileError} when an existing state file is unreadable
   */
  public static async create(options: WatcherOptions): Promise<Watcher> {
    const parsed = WatcherConfigSchema.safeParse(options.config);
    if (!parsed.success) {
      throw new WatcherConfigError(
        parsed.error.issues.map((issue) => issue.message),
      );
    }

    const logger = options.logger ?? createScopedLogger('watcher');
    const now = options.now ?? (() => new Date());
    const store = await StateStore.loadState(parsed.data.stateFilePath, {
      logger,
      now,
    });

    return new Watcher(
      options.client,
      options.generator,
      parsed.data,
      store,
      options.generateOptions,
      logger,
      now,
      options.delay ??
        (async (ms, signal) => {
          await sleep(ms, undefined, { signal });
        }),
    );
  }

  public get status(): WatcherStatus {
    return this.currentStatus;
  }

  /** The state this watcher reads and writes */
  public get state(): StateStore {
    return this.store;
  }

  /**
   * Polls once, then again `pollIntervalSeconds` after each cycle ends, until
   * `signal` aborts. A cycle that overruns the interval does not queue up
   * extra polls. Failed cycles are logged and the loop carries on.
   * @throws {GracefulShutdownError} when the signal is cancelled
   * @throws the signal's reason when it is a `TimeoutError`
   */
  public async run(signal: AbortSignal): Promise<never> {
    this.logger.info('starting watch mode', {
      pollIntervalSeconds: this.config.pollIntervalSeconds,
      stateFile: this.config.stateFilePath,
      maxConcurrent: this.config.maxConcurrent,
      nameFilter: this.config.nameFilter,
      packageTypeFilter: this.config.packageTypeFilter,
      transportTypeFilter: this.config.transportTypeFilter,
    });

    try {
      await this.pollAndReport(signal, 'initial poll failed');
      const intervalMs = this.config.pollIntervalSeconds * 1000;
      for (;;) {
        await this.delay(intervalMs, signal);
        await this.pollAndReport(signal, 'poll failed');
      }
    } catch (error) {
      if (!signal.aborted) throw error;
    }

    this.currentStatus = 'stopped';
    this.logger.info('watch mode stopped');
    if (isTimeoutReason(signal.reason)) {
      throw signal.reason;
    }
    throw new GracefulShutdownError();
  }

  /**
   * Runs one poll cycle.
   * @throws {PollCycleError} when fetching or saving fails
   * @throws {PackGenerationError} when any task failed critically; state has
   *   already been saved by then
   */
  public async poll(signal?: AbortSignal): Promise<PollCycleResult> {
    const startedAt = this.now();
    this.currentStatus = 'polling';
    this.logger.info('starting poll cycle', {
      startTime: startedAt.toISOString(),
    });

    try {
      this.currentStatus = 'fetching';
      const servers = await this.fetchServers(signal);
      this.logger.info('fetched servers from registry', {
        count: servers.length,
      });

      this.currentStatus = 'filtering';
      const tasks = filterServers(
        servers,
        this.filterOptions,
        this.store,
        this.logger,
      );

      if (tasks.length === 0) {
        this.logger.debug('no packs need generation');
        await this.persist(startedAt);
        return {
          attempted: 0,
          succeeded: 0,
          benignFailures: 0,
          criticalFailures: 0,
          skipped: 0,
          durationMs: this.elapsedSince(startedAt),
        };
      }

      this.logger.info('packs need generation', { count: tasks.length });
      this.currentStatus = 'dispatching';
      const outcomes = await this.dispatch(tasks, signal);

      // state is saved whether or not tasks failed
      await this.persist(startedAt);

      const critical: TaskGenerationError[] = [];
      const counts: GenerationCounts = {
        attempted: 0,
        succeeded: 0,
        benignFailures: 0,
        criticalFailures: 0,
        skipped: 0,
      };
      for (const outcome of outcomes) {
        switch (outcome.kind) {
          case 'succeeded':
            counts.succeeded++;
            break;
          case 'skipped':
            counts.skipped++;
            break;
          case 'benign':
            counts.benignFailures++;
            break;
          case 'critical':
            counts.criticalFailures++;
            critical.push(outcome.error);
            break;
        }
      }
      counts.attempted = tasks.length - counts.skipped;

      const durationMs = this.elapsedSince(startedAt);
      this.logger.info('poll cycle completed', {
        durationMs,
        ...counts,
        failed: counts.benignFailures + counts.criticalFailures,
      });
      if (counts.benignFailures > 0) {
        this.logger.warn('pack generation completed with noncritical errors', {
          errors: counts.benignFailures,
        });
      }

      if (critical.length > 0) {
        throw new PackGenerationError(critical, counts);
      }
      return { ...counts, durationMs };
    } finally {
      this.currentStatus = signal?.aborted ? 'stopped' : 'idle';
    }
  }

  private async pollAndReport(
    signal: AbortSignal,
    message: string,
  ): Promise<void> {
    try {
      await this.poll(signal);
    } catch (error) {
      if (signal.aborted) return;
      this.logger.error(message, error);
    }
  }

  private async fetchServers(signal?: AbortSignal): Promise<ServerRecord[]> {
    const updatedSince = this.store.getLastPoll();
    const nameFilter = this.filterOptions.nameFilter;

    try {
      if (nameFilter.isEmpty) {
        return await this.client.listAllServers(
          { limit: MAX_PAGE_SIZE, updatedSince },
          signal,
        );
      }

      const servers: ServerRecord[] = [];
      const seen = new Set<string>();
      for (const name of nameFilter.values()) {
        this.logger.debug('fetching servers by name', { name });
        const records = await this.client.listAllServers(
          { search: name, limit: MAX_PAGE_SIZE, updatedSince },
          signal,
        );
        for (const record of records) {
          const key = `${record.name}@${record.version}`;
          if (seen.has(key)) continue;
          seen.add(key);
          servers.push(record);
        }
      }
      return servers;
    } catch (error) {
      throw new PollCycleError(
        `failed to fetch servers: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private async dispatch(
    tasks: readonly GenerationTask[],
    signal?: AbortSignal,
  ): Promise<TaskOutcome[]> {
    const limit = pLimit(this.config.maxConcurrent);
    return Promise.all(
      tasks.map((task) => limit(() => this.runTask(task, signal))),
    );
  }

  private async runTask(
    task: GenerationTask,
    signal?: AbortSignal,
  ): Promise<TaskOutcome> {
    const { server, pkg, namespace, name } = task;
    const packageType = pkg.registryType;
    const transportType = pkg.transport.type;
    const key = StateStore.key(
      namespace,
      name,
      server.version,
      packageType,
      transportType,
    );

    if (signal?.aborted) {
      this.logger.debug('cycle cancelled, skipping task', { key });
      return { kind: 'skipped' };
    }

    this.logger.info('generating pack', {
      server: server.name,
      version: server.version,
      packageType,
      transportType,
    });

    try {
      const result = await this.generator.generate(
        { server, pkg, transportType, options: this.generateOptions },
        signal,
      );

      const generatedAt = this.now();
      this.store.setServer({
        namespace,
        name,
        version: server.version,
        packageType,
        transportType,
        updatedAt: generatedAt,
        generatedAt,
        checksum: '',
      });

      this.logger.info('pack generated successfully', {
        key,
        path: result.path,
      });
      return { kind: 'succeeded' };
    } catch (error) {
      const failure = new TaskGenerationError(key, error);
      if (isPackExistsError(error)) {
        this.logger.warn('pack already exists, skipping', {
          key,
          reason: errorMessage(error),
        });
        return { kind: 'benign', error: failure };
      }

      this.logger.error('pack generation failed', error, { key });
      return { kind: 'critical', error: failure };
    }
  }

  private async persist(startedAt: Date): Promise<void> {
    this.currentStatus = 'persisting';
    this.store.updateLastPoll(startedAt);
    try {
      await this.store.saveState(this.config.stateFilePath);
    } catch (error) {
      throw new PollCycleError(
        `failed to save state: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private elapsedSince(startedAt: Date): number {
    return this.now().getTime() - startedAt.getTime();
  }
}
