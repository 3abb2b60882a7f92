import { describe, it, expect } from 'vitest';
import { fileURLToPath, pathToFileURL } from 'url';
import { NoOpLogger } from '@packsync/core';
import { DryRunPackGenerator } from '@packsync/generator';
import { ServerStatus } from '@packsync/models';
import { PackSyncConfigSchema } from '@packsync/schemas';
import {
  GeneratorLoadError,
  loadPackGenerator,
  toImportSpecifier,
} from '../generator-loader.js';

const logger = new NoOpLogger();

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe('loadPackGenerator', () => {
  it('uses the dry-run generator for a dry run without a module', async () => {
    const config = PackSyncConfigSchema.parse({ dryRun: true });

    const generator = await loadPackGenerator({ config, logger });

    expect(generator).toBeInstanceOf(DryRunPackGenerator);
  });

  it('refuses a real run without a generator module', async () => {
    const config = PackSyncConfigSchema.parse({});

    await expect(loadPackGenerator({ config, logger })).rejects.toThrow(
      'failed to load generator "<none>": no generator module configured; pass --generator <module> or run with --dry-run',
    );
  });

  it('builds the generator a module exports', async () => {
    const config = PackSyncConfigSchema.parse({
      outputDir: '/srv/packs',
      generator: fixture('custom-generator.ts'),
    });

    const generator = await loadPackGenerator({ config, logger });
    const result = await generator.generate({
      server: {
        name: 'acme/widget',
        version: '1.0.0',
        status: ServerStatus.ACTIVE,
        packages: [],
      },
      pkg: {
        registryType: 'npm',
        identifier: '@acme/widget',
        transport: { type: 'stdio' },
      },
      transportType: 'stdio',
      options: {
        outputDir: '/srv/packs',
        outputType: 'packdir',
        dryRun: false,
        forceOverwrite: false,
      },
    });

    expect(result.path).toBe('/srv/packs/acme/widget');
  });

  it('rejects a module without a factory function', async () => {
    const specifier = fixture('not-a-generator.ts');
    const config = PackSyncConfigSchema.parse({ generator: specifier });

    await expect(loadPackGenerator({ config, logger })).rejects.toThrow(
      `failed to load generator "${specifier}": module does not export a createPackGenerator function`,
    );
  });

  it('wraps import failures', async () => {
    const config = PackSyncConfigSchema.parse({
      generator: fixture('missing-generator.ts'),
    });

    await expect(loadPackGenerator({ config, logger })).rejects.toBeInstanceOf(
      GeneratorLoadError,
    );
  });
});

describe('toImportSpecifier', () => {
  it('turns paths into file URLs and leaves package names alone', () => {
    expect(toImportSpecifier('./gen.js', '/work')).toBe(
      pathToFileURL('/work/gen.js').href,
    );
    expect(toImportSpecifier('/opt/gen.js')).toBe(
      pathToFileURL('/opt/gen.js').href,
    );
    expect(toImportSpecifier('@acme/pack-generator')).toBe(
      '@acme/pack-generator',
    );
  });
});
