import { homedir } from 'os';
import { join, resolve } from 'path';
import { readFileSync, existsSync } from 'fs';
import { deepmergeCustom } from 'deepmerge-ts';
import { type PackSyncConfig, PackSyncConfigSchema } from '@packsync/schemas';

export const CONFIG_FILE_NAME = 'packsync.json';

/**
 * Configuration could not be read or failed validation.
 */
export class ConfigError extends Error {
  public constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and parses a JSON object file if it exists.
 * @throws {ConfigError} When the file is not valid JSON or not an object
 * @internal
 */
function readJsonIfExists(path: string): Record<string, unknown> | undefined {
  if (!existsSync(path)) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`failed to parse config file ${path}`, error);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Returns the user-level configuration directory: PACKSYNC_HOME when set,
 * otherwise ~/.packsync.
 * @public
 */
export function getUserDir(): string {
  const override = process.env.PACKSYNC_HOME;
  if (override && override.trim()) return override;
  return join(homedir(), '.packsync');
}

export function getUserBasePath(): string {
  return join(getUserDir(), CONFIG_FILE_NAME);
}

export function getDefaultProjectConfigPath(cwd = process.cwd()): string {
  return resolve(cwd, CONFIG_FILE_NAME);
}

export interface ResolveConfigOptions {
  /** Explicit project config; defaults to packsync.json in the working directory */
  projectConfigPath?: string;
  /** Values from command-line flags; win over every file */
  overrides?: Record<string, unknown>;
}

/**
 * Loads and merges configuration.
 *
 * Merge precedence (last wins):
 * 1. User base config: ~/.packsync/packsync.json
 * 2. Project config: packsync.json (or explicit path)
 * 3. Command-line overrides
 *
 * Objects merge per key, arrays are replaced. The result is validated with
 * {@link PackSyncConfigSchema}, which also fills in defaults.
 * @throws {ConfigError} When a file is unreadable or the merged config is invalid
 * @public
 */
export function resolveMergedConfig(options: ResolveConfigOptions = {}): {
  config: PackSyncConfig;
  sources: string[];
} {
  const userBasePath = getUserBasePath();
  const projectPath = options.projectConfigPath
    ? resolve(options.projectConfigPath)
    : getDefaultProjectConfigPath();

  if (options.projectConfigPath && !existsSync(projectPath)) {
    throw new ConfigError(`config file ${projectPath} does not exist`);
  }

  const userBase = readJsonIfExists(userBasePath);
  const project = readJsonIfExists(projectPath);

  const merge = deepmergeCustom<Record<string, unknown>>({
    mergeArrays: (values) => values[values.length - 1],
  });
  const merged = merge(userBase ?? {}, project ?? {}, options.overrides ?? {});

  const result = PackSyncConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    throw new ConfigError(`invalid configuration: ${details}`, result.error);
  }

  const sources: string[] = [];
  if (userBase !== undefined) sources.push(userBasePath);
  if (project !== undefined) sources.push(projectPath);

  return { config: result.data, sources };
}
