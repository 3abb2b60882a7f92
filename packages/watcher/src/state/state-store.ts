/**
 * Durable record of which `(server, version, package, transport)` tuples have
 * already been generated, plus the start time of the last poll cycle.
 *
 * Map reads and writes are synchronous, so each one is atomic with respect to
 * the event loop; only {@link StateStore.saveState} spans an await and is
 * serialized with a mutex.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { ServerState, WatchState } from '@packsync/models';
import {
  WatchStateFileSchema,
  type ServerStateEntry,
  type WatchStateFile,
} from '@packsync/schemas';
import { Mutex, createScopedLogger, type ILogger } from '@packsync/core';
import { StateFileError } from '../errors.js';

/** Timestamp older state files use for "never polled" */
const ZERO_TIME_MS = Date.parse('0001-01-01T00:00:00Z');

export interface StateStoreOptions {
  logger?: ILogger;
  /** Clock used by {@link StateStore.cleanupOldServers} */
  now?: () => Date;
}

export class StateStore {
  private readonly servers = new Map<string, ServerState>();
  private lastPoll?: Date;
  private readonly saveLock = new Mutex();
  private readonly logger: ILogger;
  private readonly now: () => Date;

  public constructor(state?: WatchState, options: StateStoreOptions = {}) {
    this.logger = options.logger ?? createScopedLogger('state');
    this.now = options.now ?? (() => new Date());
    if (state) {
      this.lastPoll = state.lastPoll;
      for (const [key, server] of state.servers) {
        this.servers.set(key, { ...server });
      }
    }
  }

  /**
   * Composite key `namespace/name@version:packageType:transportType`.
   */
  public static key(
    namespace: string,
    name: string,
    version: string,
    packageType: string,
    transportType: string,
  ): string {
    return `${namespace}/${name}@${version}:${packageType}:${transportType}`;
  }

  public static keyOf(state: ServerState): string {
    return StateStore.key(
      state.namespace,
      state.name,
      state.version,
      state.packageType,
      state.transportType,
    );
  }

  /**
   * Reads a state file. A missing file yields an empty store.
   * @throws {StateFileError} when the file cannot be read or does not decode
   */
  public static async loadState(
    filePath: string,
    options: StateStoreOptions = {},
  ): Promise<StateStore> {
    const logger = options.logger ?? createScopedLogger('state');

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.debug('state file does not exist, starting with empty state', {
          path: filePath,
        });
        return new StateStore(undefined, { ...options, logger });
      }
      throw new StateFileError(
        `failed to read state file ${filePath}`,
        filePath,
        error,
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new StateFileError(
        `failed to parse state file ${filePath}: invalid JSON`,
        filePath,
        error,
      );
    }

    const result = WatchStateFileSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new StateFileError(
        `failed to parse state file ${filePath}: ${issue.path.join('.') || '<root>'}: ${issue.message}`,
        filePath,
        result.error,
      );
    }

    const state = fromFile(result.data);
    logger.debug('state loaded from disk', {
      path: filePath,
      serversCount: state.servers.size,
      lastPoll: state.lastPoll?.toISOString(),
    });
    return new StateStore(state, { ...options, logger });
  }

  /**
   * True when the tuple has never been generated, or upstream changed it
   * after the last generation.
   */
  public needsGeneration(
    namespace: string,
    name: string,
    version: string,
    packageType: string,
    transportType: string,
    updatedAt: Date,
  ): boolean {
    const key = StateStore.key(
      namespace,
      name,
      version,
      packageType,
      transportType,
    );
    const existing = this.servers.get(key);
    if (!existing) {
      this.logger.debug('pack needs generation (key not in state)', {
        key,
        stateSize: this.servers.size,
      });
      return true;
    }

    const needsRegen = updatedAt.getTime() > existing.generatedAt.getTime();
    this.logger.debug('pack in state', {
      key,
      needsRegeneration: needsRegen,
      updatedAt: updatedAt.toISOString(),
      generatedAt: existing.generatedAt.toISOString(),
    });
    return needsRegen;
  }

  public setServer(state: ServerState): void {
    const key = StateStore.keyOf(state);
    this.servers.set(key, { ...state });
    this.logger.debug('state updated', { key, stateSize: this.servers.size });
  }

  public getServer(key: string): ServerState | undefined {
    const state = this.servers.get(key);
    return state ? { ...state } : undefined;
  }

  public get size(): number {
    return this.servers.size;
  }

  public keys(): string[] {
    return [...this.servers.keys()];
  }

  /**
   * Drops entries whose `updatedAt` is older than `maxAgeMs`.
   * @returns number of entries removed
   */
  public cleanupOldServers(maxAgeMs: number): number {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;

    for (const [key, state] of this.servers) {
      if (state.updatedAt.getTime() < cutoff) {
        this.servers.delete(key);
        removed++;
      }
    }

    return removed;
  }

  public updateLastPoll(date: Date): void {
    this.lastPoll = date;
  }

  public getLastPoll(): Date | undefined {
    return this.lastPoll;
  }

  /**
   * Snapshot in the on-disk layout.
   */
  public toFile(): WatchStateFile {
    const servers: Record<string, ServerStateEntry> = {};
    for (const [key, state] of this.servers) {
      servers[key] = {
        namespace: state.namespace,
        name: state.name,
        version: state.version,
        package_type: state.packageType,
        transport_type: state.transportType,
        updated_at: state.updatedAt.toISOString(),
        generated_at: state.generatedAt.toISOString(),
        checksum: state.checksum,
      };
    }

    return {
      ...(this.lastPoll ? { last_poll: this.lastPoll.toISOString() } : {}),
      servers,
    };
  }

  /**
   * Writes the state to `filePath` atomically: the snapshot goes to
   * `filePath.tmp` in the same directory and is then renamed over the target.
   * A failed save leaves the previous file untouched.
   * @throws {StateFileError}
   */
  public async saveState(filePath: string): Promise<void> {
    const contents = `${JSON.stringify(this.toFile(), null, 2)}\n`;
    const serversCount = this.servers.size;

    await this.saveLock.runExclusive(async () => {
      const tmpPath = `${filePath}.tmp`;
      this.logger.debug('saving state to disk', { path: filePath, serversCount });

      try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(tmpPath, contents, 'utf8');
        await fs.rename(tmpPath, filePath);
      } catch (error) {
        await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
          this.logger.warn('failed to remove temporary state file', {
            path: tmpPath,
            error: String(cleanupError),
          });
        });
        throw new StateFileError(
          `failed to save state file ${filePath}`,
          filePath,
          error,
        );
      }
    });
  }
}

function fromFile(file: WatchStateFile): WatchState {
  const servers = new Map<string, ServerState>();
  for (const [key, entry] of Object.entries(file.servers ?? {})) {
    servers.set(key, {
      namespace: entry.namespace,
      name: entry.name,
      version: entry.version,
      packageType: entry.package_type,
      transportType: entry.transport_type,
      updatedAt: new Date(entry.updated_at),
      generatedAt: new Date(entry.generated_at),
      checksum: entry.checksum ?? '',
    });
  }

  const lastPoll = file.last_poll ? new Date(file.last_poll) : undefined;
  return {
    lastPoll:
      lastPoll && lastPoll.getTime() > ZERO_TIME_MS ? lastPoll : undefined,
    servers,
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
