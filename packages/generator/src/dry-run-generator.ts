import path from 'path';
import { createScopedLogger, type ILogger } from '@packsync/core';
import { computePackName } from './pack-name.js';
import type { GenerateRequest, GenerateResult, PackGenerator } from './types.js';

/**
 * Generator that only reports where a pack would be written.
 *
 * Used when no rendering module is configured, and for `dryRun` runs.
 * @public
 */
export class DryRunPackGenerator implements PackGenerator {
  private readonly logger: ILogger;

  public constructor(logger?: ILogger) {
    this.logger = logger ?? createScopedLogger('generator');
  }

  public async generate(
    request: GenerateRequest,
    signal?: AbortSignal,
  ): Promise<GenerateResult> {
    signal?.throwIfAborted();

    const { server, pkg, transportType, options } = request;
    const packName = computePackName(
      server.name,
      server.version,
      pkg.registryType,
      transportType,
    );

    if (options.outputType === 'archive') {
      const archivePath = path.join(options.outputDir, `${packName}.zip`);
      this.logger.info('would create pack archive', { path: archivePath });
      return { packName, path: archivePath };
    }

    const packDir = path.join(options.outputDir, packName);
    this.logger.info('would create pack directory', { path: packDir });
    return { packName, path: packDir };
  }
}
