import { isAbsolute, resolve } from 'path';
import { pathToFileURL } from 'url';
import { DryRunPackGenerator, type PackGenerator } from '@packsync/generator';
import type { ILogger } from '@packsync/core';
import type { PackSyncConfig } from '@packsync/schemas';

/**
 * What a generator module's `createPackGenerator` receives.
 */
export interface PackGeneratorFactoryContext {
  config: PackSyncConfig;
  logger: ILogger;
}

export type PackGeneratorFactory = (
  context: PackGeneratorFactoryContext,
) => PackGenerator | Promise<PackGenerator>;

/**
 * A generator module could not be loaded or did not provide a generator.
 */
export class GeneratorLoadError extends Error {
  public constructor(
    public readonly specifier: string,
    message: string,
    cause?: unknown,
  ) {
    super(`failed to load generator "${specifier}": ${message}`, { cause });
    this.name = 'GeneratorLoadError';
    Object.setPrototypeOf(this, GeneratorLoadError.prototype);
  }
}

function isPackGenerator(value: unknown): value is PackGenerator {
  return (
    typeof value === 'object' &&
    value !== null &&
    'generate' in value &&
    typeof value.generate === 'function'
  );
}

function isFactory(value: unknown): value is PackGeneratorFactory {
  return typeof value === 'function';
}

/**
 * Relative and absolute paths are loaded from the file system; anything
 * else is treated as a package name.
 * @internal
 */
export function toImportSpecifier(specifier: string, cwd = process.cwd()): string {
  if (specifier.startsWith('.') || isAbsolute(specifier)) {
    return pathToFileURL(resolve(cwd, specifier)).href;
  }
  return specifier;
}

/**
 * Returns the generator named by `config.generator`. Without one, only a
 * dry run is possible: the dry-run generator writes nothing, so using it
 * for a real run would record packs that were never built.
 *
 * The module must export `createPackGenerator(context)`, returning (or
 * resolving to) an object with a `generate` method.
 * @throws {GeneratorLoadError}
 * @public
 */
export async function loadPackGenerator(
  context: PackGeneratorFactoryContext,
): Promise<PackGenerator> {
  const specifier = context.config.generator;
  if (!specifier) {
    if (!context.config.dryRun) {
      throw new GeneratorLoadError(
        '<none>',
        'no generator module configured; pass --generator <module> or run with --dry-run',
      );
    }
    context.logger.info('no generator module configured, using dry-run generator');
    return new DryRunPackGenerator(context.logger);
  }

  let loaded: unknown;
  try {
    loaded = await import(toImportSpecifier(specifier));
  } catch (error) {
    throw new GeneratorLoadError(
      specifier,
      error instanceof Error ? error.message : String(error),
      error,
    );
  }

  const factory =
    typeof loaded === 'object' && loaded !== null && 'createPackGenerator' in loaded
      ? loaded.createPackGenerator
      : undefined;
  if (!isFactory(factory)) {
    throw new GeneratorLoadError(
      specifier,
      'module does not export a createPackGenerator function',
    );
  }

  const generator: unknown = await factory(context);
  if (!isPackGenerator(generator)) {
    throw new GeneratorLoadError(
      specifier,
      'createPackGenerator did not return an object with a generate method',
    );
  }

  context.logger.info('loaded generator module', { module: specifier });
  return generator;
}
