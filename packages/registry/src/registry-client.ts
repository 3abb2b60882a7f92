/**
 * Client for the MCP server registry API (`/v0/servers`).
 *
 * Every request is bounded by its own timeout and follows the caller's
 * AbortSignal. 5xx responses and transport failures are retried with a
 * linear backoff; 4xx responses are returned to the caller at once.
 * @example
 * ```typescript
 * const client = new RegistryClient({
 *   baseUrl: 'https://registry.modelcontextprotocol.io',
 * });
 *
 * const server = await client.getLatestActiveServer('io.github.example/weather');
 * console.log(`${server.name}@${server.version}`);
 * ```
 * @public
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  ServerStatus,
  type ListServersOptions,
  type ServerListResponse,
  type ServerRecord,
} from '@packsync/models';
import {
  ServerListResponseSchema,
  ServerRecordSchema,
} from '@packsync/schemas';
import {
  createScopedLogger,
  isAbortError,
  withTimeout,
  type ILogger,
} from '@packsync/core';
import {
  RegistryError,
  RegistryErrorCode,
  ServerNotFoundError,
} from './errors.js';
import { isLatestVersion } from './server-name.js';
import { selectHighestVersion } from './semver-utils.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1_000;

/** Largest page the registry serves */
export const MAX_PAGE_SIZE = 100;

/**
 * Configuration options for RegistryClient
 */
export interface RegistryClientOptions {
  /** Registry root, e.g. `https://registry.modelcontextprotocol.io` */
  baseUrl: string;
  /** Timeout for each HTTP attempt (default: 30s) */
  timeoutMs?: number;
  /** Total attempts per request, including the first (default: 3) */
  maxRetries?: number;
  /** Backoff unit; attempt n waits n × retryDelayMs before the next try (default: 1s) */
  retryDelayMs?: number;
  logger?: ILogger;
}

export class RegistryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: ILogger;

  public constructor(options: RegistryClientOptions) {
    const baseUrl = options.baseUrl.trim();
    if (baseUrl === '') {
      throw new RegistryError(
        'registry base URL is required',
        RegistryErrorCode.INVALID_REQUEST,
      );
    }
    if (!URL.canParse(baseUrl)) {
      throw new RegistryError(
        `invalid registry base URL: ${baseUrl}`,
        RegistryErrorCode.INVALID_REQUEST,
      );
    }

    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger ?? createScopedLogger('registry');
  }

  /**
   * Fetches one page of the server listing.
   * @throws {RegistryError} `client_error` for 4xx (never retried),
   *   `server_error` / `network_error` once retries are exhausted,
   *   `invalid_response` when the body does not match the listing schema
   */
  public async listServers(
    options: ListServersOptions = {},
    signal?: AbortSignal,
  ): Promise<ServerListResponse> {
    const url = this.buildListUrl(options);
    const response = await this.fetchWithRetry(url, signal);

    if (!response.ok) {
      throw RegistryError.fromStatus(response.status, await response.text());
    }

    const page = await this.decode(response, ServerListResponseSchema, signal);
    return {
      servers: this.parseRecords(page.servers),
      metadata: page.metadata,
    };
  }

  /**
   * Follows `next_cursor` until the listing is exhausted.
   */
  public async listAllServers(
    options: ListServersOptions = {},
    signal?: AbortSignal,
  ): Promise<ServerRecord[]> {
    const servers: ServerRecord[] = [];
    const seenCursors = new Set<string>();
    let cursor = options.cursor;

    for (;;) {
      const page = await this.listServers({ ...options, cursor }, signal);
      servers.push(...page.servers);

      const next = page.metadata.nextCursor;
      if (!next) break;
      if (seenCursors.has(next)) {
        throw RegistryError.invalidResponse(`registry repeated cursor ${next}`);
      }
      seenCursors.add(next);
      cursor = next;
    }

    return servers;
  }

  /**
   * Fetches a single record by its registry id.
   * @throws {ServerNotFoundError} on 404
   */
  public async getServer(
    serverId: string,
    signal?: AbortSignal,
  ): Promise<ServerRecord> {
    if (serverId.trim() === '') {
      throw new RegistryError(
        'server ID is required',
        RegistryErrorCode.INVALID_REQUEST,
      );
    }

    const url = new URL(
      `${this.baseUrl}/v0/servers/${encodeURIComponent(serverId)}`,
    );
    const response = await this.fetchWithRetry(url, signal);

    if (response.status === 404) {
      await response.body?.cancel();
      throw new ServerNotFoundError(serverId);
    }
    if (!response.ok) {
      throw RegistryError.fromStatus(response.status, await response.text());
    }

    return this.decode(response, ServerRecordSchema, signal);
  }

  /**
   * Resolves the highest semantic version among the *active* records named
   * `serverName`. Deprecated and deleted records never win, whatever their
   * version; versions that do not parse as semver are skipped.
   * @throws {ServerNotFoundError} when no active record exists, or none of
   *   them carries a parseable version
   */
  public async getLatestActiveServer(
    serverName: string,
    signal?: AbortSignal,
  ): Promise<ServerRecord> {
    if (serverName.trim() === '') {
      throw new RegistryError(
        'server name is required',
        RegistryErrorCode.INVALID_REQUEST,
      );
    }

    const records = await this.listAllServers(
      { search: serverName, limit: MAX_PAGE_SIZE },
      signal,
    );
    const active = records.filter(
      (record) =>
        record.name === serverName && record.status === ServerStatus.ACTIVE,
    );

    if (active.length === 0) {
      throw new ServerNotFoundError(
        serverName,
        `no active servers found with name: ${serverName}`,
      );
    }

    const latest = selectHighestVersion(active);
    if (!latest) {
      throw new ServerNotFoundError(
        serverName,
        `no valid semantic version found for active servers with name: ${serverName}`,
      );
    }

    this.logger.debug('resolved latest active server', {
      server: serverName,
      version: latest.version,
      candidates: active.length,
    });
    return latest;
  }

  /**
   * Finds an exact `name@version`, or the registry's latest when version is
   * `latest`.
   * @throws {ServerNotFoundError} if no record matches
   */
  public async getServerByNameAndVersion(
    serverName: string,
    version: string,
    signal?: AbortSignal,
  ): Promise<ServerRecord> {
    if (serverName.trim() === '' || version.trim() === '') {
      throw new RegistryError(
        'server name and version are required',
        RegistryErrorCode.INVALID_REQUEST,
      );
    }

    const latest = isLatestVersion(version);
    const options: ListServersOptions = {
      search: serverName,
      limit: MAX_PAGE_SIZE,
      // the registry only filters on version for "latest"
      version: latest ? 'latest' : undefined,
    };

    let cursor: string | undefined;
    do {
      const page = await this.listServers({ ...options, cursor }, signal);
      const match = page.servers.find(
        (server) =>
          server.name === serverName && (latest || server.version === version),
      );
      if (match) return match;
      cursor = page.metadata.nextCursor;
    } while (cursor);

    throw new ServerNotFoundError(`${serverName}@${version}`);
  }

  public async searchServers(
    searchTerm: string,
    options: Omit<ListServersOptions, 'search'> = {},
    signal?: AbortSignal,
  ): Promise<ServerListResponse> {
    if (searchTerm.trim() === '') {
      throw new RegistryError(
        'search term is required',
        RegistryErrorCode.INVALID_REQUEST,
      );
    }
    return this.listServers({ ...options, search: searchTerm }, signal);
  }

  public async getLatestServers(
    options: Omit<ListServersOptions, 'version'> = {},
    signal?: AbortSignal,
  ): Promise<ServerListResponse> {
    return this.listServers({ ...options, version: 'latest' }, signal);
  }

  public async getUpdatedServers(
    updatedSince: Date | string,
    options: Omit<ListServersOptions, 'updatedSince'> = {},
    signal?: AbortSignal,
  ): Promise<ServerListResponse> {
    if (updatedSince === '') {
      throw new RegistryError(
        'updated_since timestamp is required',
        RegistryErrorCode.INVALID_REQUEST,
      );
    }
    return this.listServers({ ...options, updatedSince }, signal);
  }

  private buildListUrl(options: ListServersOptions): URL {
    const url = new URL(`${this.baseUrl}/v0/servers`);
    const params = url.searchParams;

    if (options.cursor) params.set('cursor', options.cursor);
    if (options.limit !== undefined && options.limit > 0) {
      params.set('limit', String(Math.min(options.limit, MAX_PAGE_SIZE)));
    }
    if (options.updatedSince) {
      const since =
        options.updatedSince instanceof Date
          ? options.updatedSince.toISOString()
          : options.updatedSince;
      params.set('updated_since', since);
    }
    if (options.search) params.set('search', options.search);
    if (options.version) params.set('version', options.version);

    return url;
  }

  /**
   * Issues a GET, retrying 5xx responses and transport failures.
   *
   * Returns the first response below 500, or the last 5xx once attempts run
   * out. Aborting `signal` ends the loop at once with the signal's reason,
   * including while waiting between attempts.
   */
  private async fetchWithRetry(
    url: URL,
    signal?: AbortSignal,
  ): Promise<Response> {
    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();

      let failure: string;
      try {
        const response = await fetch(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: withTimeout(this.timeoutMs, signal),
        });

        if (response.status < 500 || attempt >= this.maxRetries) {
          return response;
        }
        failure = `status ${response.status}`;
        await response.body?.cancel();
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason;
        }
        if (attempt >= this.maxRetries) {
          throw RegistryError.networkError(attempt, error);
        }
        failure = error instanceof Error ? error.message : String(error);
      }

      const delay = attempt * this.retryDelayMs;
      this.logger.warn('registry request failed, retrying', {
        url: url.toString(),
        attempt,
        maxRetries: this.maxRetries,
        delayMs: delay,
        failure,
      });
      try {
        await sleep(delay, undefined, { signal });
      } catch (error) {
        throw signal?.aborted ? signal.reason : error;
      }
    }
  }

  /**
   * Validates listing entries one by one. A malformed entry is logged and
   * dropped; the rest of the page is kept.
   */
  private parseRecords(entries: readonly unknown[]): ServerRecord[] {
    const records: ServerRecord[] = [];
    entries.forEach((entry, index) => {
      const result = ServerRecordSchema.safeParse(entry);
      if (result.success) {
        records.push(result.data);
        return;
      }
      const issue = result.error.issues[0];
      this.logger.warn('skipping malformed server record', {
        index,
        name: entryName(entry),
        reason: `${issue.path.join('.') || '<root>'}: ${issue.message}`,
      });
    });
    return records;
  }

  private async decode<T>(
    response: Response,
    schema: ZodType<T, ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      // the body read shares the request's signal
      if (signal?.aborted) {
        throw signal.reason;
      }
      if (isAbortError(error)) {
        throw new RegistryError(
          'timed out reading response body',
          RegistryErrorCode.NETWORK_ERROR,
          { cause: error },
        );
      }
      throw RegistryError.invalidResponse('body is not valid JSON', error);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw RegistryError.invalidResponse(
        `${issue.path.join('.') || '<root>'}: ${issue.message}`,
        result.error,
      );
    }
    return result.data;
  }
}

function readName(value: unknown): string | undefined {
  return typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string'
    ? value.name
    : undefined;
}

/** Best-effort name of a raw listing entry, for log context */
function entryName(entry: unknown): string | undefined {
  if (typeof entry === 'object' && entry !== null && 'server' in entry) {
    return readName(entry.server);
  }
  return readName(entry);
}
