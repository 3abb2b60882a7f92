import {
  ServerStatus,
  type GenerationTask,
  type ServerRecord,
} from '@packsync/models';
import { parseServerName, type ServerNameSpec } from '@packsync/registry';
import { errorMessage, type ILogger } from '@packsync/core';
import type { StateStore } from '../state/index.js';
import type {
  PackageTypeFilter,
  ServerNameFilter,
  TransportTypeFilter,
} from './filters.js';

export interface FilterOptions {
  nameFilter: ServerNameFilter;
  packageFilter: PackageTypeFilter;
  transportFilter: TransportTypeFilter;
  /** Emit tasks even for tuples the state says are up to date */
  forceOverwrite: boolean;
  /** Keep deprecated records; deleted records are always skipped */
  allowDeprecated: boolean;
}

const EPOCH = new Date(0);

/**
 * Reduces fetched records to generation tasks, one per matching package.
 *
 * Tasks come out in record order, then package order. Records with a
 * malformed name are logged and skipped.
 * @public
 */
export function filterServers(
  records: readonly ServerRecord[],
  options: FilterOptions,
  store: StateStore,
  logger: ILogger,
): GenerationTask[] {
  const tasks: GenerationTask[] = [];

  for (const server of records) {
    const spec = parseNameOrWarn(server.name, logger);
    if (!spec) continue;
    const { namespace, name } = spec;

    if (!options.nameFilter.matches(server.name)) {
      logger.debug('server does not match name filter, skipping', {
        server: server.name,
      });
      continue;
    }

    if (
      server.status === ServerStatus.DELETED ||
      (server.status === ServerStatus.DEPRECATED && !options.allowDeprecated)
    ) {
      logger.debug('server is not active, skipping', {
        server: server.name,
        version: server.version,
        status: server.status,
      });
      continue;
    }

    // remote-only servers have nothing to package
    if (server.packages.length === 0) {
      logger.debug('server has no packages, skipping', { server: server.name });
      continue;
    }

    for (const pkg of server.packages) {
      const packageType = pkg.registryType;
      const transportType = pkg.transport.type;

      if (!options.packageFilter.matches(packageType)) {
        logger.debug('package type does not match filter, skipping', {
          server: server.name,
          packageType,
        });
        continue;
      }

      if (!options.transportFilter.matches(transportType)) {
        logger.debug('transport type does not match filter, skipping', {
          server: server.name,
          packageType,
          transportType,
        });
        continue;
      }

      const needed =
        options.forceOverwrite ||
        store.needsGeneration(
          namespace,
          name,
          server.version,
          packageType,
          transportType,
          server.updatedAt ?? EPOCH,
        );

      if (needed) {
        tasks.push({ server, pkg, namespace, name });
        logger.debug('server needs generation', {
          server: server.name,
          version: server.version,
          packageType,
          transportType,
        });
      }
    }
  }

  return tasks;
}

function parseNameOrWarn(
  serverName: string,
  logger: ILogger,
): ServerNameSpec | undefined {
  try {
    return parseServerName(serverName);
  } catch (error) {
    logger.warn('invalid server name format, skipping', {
      server: serverName,
      error: errorMessage(error),
    });
    return undefined;
  }
}
