#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from 'commander';
import { createScopedLogger } from '@packsync/core';
import { GracefulShutdownError } from '@packsync/watcher';
import { runWatch, type WatchCommandOptions } from './watch-command.js';

const logger = createScopedLogger('cli');

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

function parseList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  return [...previous, ...items];
}

const controller = new AbortController();

/**
 * Translates the first SIGINT/SIGTERM into a cancel of the watch loop.
 */
function handleShutdown(signal: NodeJS.Signals): void {
  if (controller.signal.aborted) return;
  logger.info('shutdown requested', { signal });
  controller.abort();
}

process.once('SIGINT', () => handleShutdown('SIGINT'));
process.once('SIGTERM', () => handleShutdown('SIGTERM'));

const program = new Command();

program
  .name('packsync')
  .description(
    'Generate orchestrator packs from the MCP server registry, continuously',
  )
  .showHelpAfterError();

program
  .command('watch')
  .description('Poll the registry and generate packs for new or changed servers')
  .option('-c, --config <path>', 'Path to a packsync.json config file')
  .option('--registry-url <url>', 'MCP server registry base URL')
  .option('--log-level <level>', 'trace, debug, info, warn, error or silent')
  .option('--output-dir <dir>', 'Directory packs are written to')
  .option('--output-type <type>', 'packdir or archive')
  .option('--request-timeout <ms>', 'Timeout per registry request', parseInteger)
  .option('--dry-run', 'Report packs without writing them')
  .option('--force-overwrite', 'Regenerate packs that already exist')
  .option('--allow-deprecated', 'Also generate packs for deprecated servers')
  .option('--generator <module>', 'Module exporting createPackGenerator')
  .option('--poll-interval <seconds>', 'Seconds between polls (min 30)', parseInteger)
  .option('--state-file <path>', 'Path to the watch state file')
  .option('--max-concurrent <n>', 'Maximum concurrent pack generations', parseInteger)
  .option('--filter-names <names>', 'Server names (comma-separated)', parseList)
  .option(
    '--filter-package-types <types>',
    'Package types: npm, pypi, oci, nuget (comma-separated)',
    parseList,
  )
  .option(
    '--filter-transport-types <types>',
    'Transport types: stdio, http, sse (comma-separated)',
    parseList,
  )
  .action(async (options: WatchCommandOptions) => {
    await runWatch(options, controller.signal);
  });

/**
 * Parses arguments and runs the selected command.
 */
async function bootstrap(): Promise<void> {
  await program.parseAsync(process.argv);
}

bootstrap().then(
  () => process.exit(0),
  (error: unknown) => {
    if (error instanceof GracefulShutdownError) {
      logger.info('watch mode stopped');
      process.exit(0);
    }
    logger.error('packsync failed', error);
    process.exit(1);
  },
);
