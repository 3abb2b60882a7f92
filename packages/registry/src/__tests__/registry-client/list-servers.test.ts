/**
 * Tests for RegistryClient - listing and pagination
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RegistryClient } from '../../registry-client.js';
import { RegistryError, RegistryErrorCode } from '../../errors.js';
import {
  BASE_URL,
  calledUrl,
  createClient,
  createRecordingLogger,
  createFetchMock,
  jsonResponse,
  listPage,
  server,
  textResponse,
  type FetchMock,
} from './test-utils.js';

describe('RegistryClient - listServers', () => {
  let mockFetch: FetchMock;

  beforeEach(() => {
    mockFetch = createFetchMock();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends every query parameter and clamps the page size', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(listPage([])));

    await createClient().listServers({
      cursor: 'c1',
      limit: 250,
      updatedSince: new Date('2026-01-01T00:00:00Z'),
      search: 'acme',
      version: 'latest',
    });

    const url = calledUrl(mockFetch);
    expect(url.origin + url.pathname).toBe(`${BASE_URL}/v0/servers`);
    expect(url.searchParams.get('cursor')).toBe('c1');
    expect(url.searchParams.get('limit')).toBe('100');
    expect(url.searchParams.get('updated_since')).toBe(
      '2026-01-01T00:00:00.000Z',
    );
    expect(url.searchParams.get('search')).toBe('acme');
    expect(url.searchParams.get('version')).toBe('latest');
  });

  it('omits unset parameters', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(listPage([])));

    await createClient().listServers();

    expect(calledUrl(mockFetch).search).toBe('');
  });

  it('strips a trailing slash from the base URL', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(listPage([])));

    await createClient({ baseUrl: `${BASE_URL}/` }).listServers();

    expect(calledUrl(mockFetch).pathname).toBe('/v0/servers');
  });

  it('returns normalized records and the next cursor', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(listPage([server('acme/widget', '1.0.0')], 'next-page')),
    );

    const page = await createClient().listServers();

    expect(page.servers).toHaveLength(1);
    expect(page.servers[0].name).toBe('acme/widget');
    expect(page.servers[0].packages[0].registryType).toBe('npm');
    expect(page.metadata.nextCursor).toBe('next-page');
  });

  it('surfaces a 4xx with its body as a client error', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('bad cursor', 400));

    const error = await createClient()
      .listServers({ cursor: 'zzz' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryError);
    expect(error).toMatchObject({
      code: RegistryErrorCode.CLIENT_ERROR,
      status: 400,
      body: 'bad cursor',
      isRetryable: false,
      message: 'unexpected status code 400: bad cursor',
    });
  });

  it('rejects a body that is not JSON', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('<html>', 200));

    await expect(createClient().listServers()).rejects.toMatchObject({
      code: RegistryErrorCode.INVALID_RESPONSE,
    });
  });

  it('rejects a body that does not match the listing envelope', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ servers: 'none' }));

    await expect(createClient().listServers()).rejects.toMatchObject({
      code: RegistryErrorCode.INVALID_RESPONSE,
    });
  });

  it('drops malformed records and keeps the rest of the page', async () => {
    const logger = createRecordingLogger();
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        servers: [
          { name: '', version: '1.0.0' },
          {
            name: 'acme/broken',
            version: '1.0.0',
            packages: [{ registryType: 'npm', identifier: '@acme/broken' }],
          },
          server('acme/widget', '1.0.0'),
        ],
        metadata: { count: 3 },
      }),
    );

    const page = await createClient({ logger }).listServers();

    expect(page.servers.map((s) => s.name)).toEqual(['acme/widget']);
    expect(page.metadata.count).toBe(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenNthCalledWith(
      1,
      'skipping malformed server record',
      expect.objectContaining({ index: 0, name: '' }),
    );
    expect(logger.warn).toHaveBeenNthCalledWith(
      2,
      'skipping malformed server record',
      expect.objectContaining({ index: 1, name: 'acme/broken' }),
    );
  });
});

describe('RegistryClient - listAllServers', () => {
  let mockFetch: FetchMock;

  beforeEach(() => {
    mockFetch = createFetchMock();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('follows cursors until the last page', async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse(listPage([server('acme/a', '1.0.0')], 'p2')),
      )
      .mockResolvedValueOnce(
        jsonResponse(listPage([server('acme/b', '1.0.0')], 'p3')),
      )
      .mockResolvedValueOnce(jsonResponse(listPage([server('acme/c', '1.0.0')])));

    const servers = await createClient().listAllServers({ search: 'acme' });

    expect(servers.map((s) => s.name)).toEqual(['acme/a', 'acme/b', 'acme/c']);
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(calledUrl(mockFetch, 0).searchParams.get('cursor')).toBeNull();
    expect(calledUrl(mockFetch, 1).searchParams.get('cursor')).toBe('p2');
    expect(calledUrl(mockFetch, 2).searchParams.get('cursor')).toBe('p3');
    expect(calledUrl(mockFetch, 2).searchParams.get('search')).toBe('acme');
  });

  it('keeps valid records from a page that also holds malformed ones', async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse(
          listPage(
            [
              { name: 'acme/bad', version: '1.0.0', status: 'archived' },
              server('acme/a', '1.0.0'),
            ],
            'p2',
          ),
        ),
      )
      .mockResolvedValueOnce(jsonResponse(listPage([server('acme/b', '1.0.0')])));

    const servers = await createClient().listAllServers();

    expect(servers.map((s) => s.name)).toEqual(['acme/a', 'acme/b']);
  });

  it('stops on a cursor the registry already returned', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(listPage([], 'loop')))
      .mockResolvedValueOnce(jsonResponse(listPage([], 'loop')));

    await expect(createClient().listAllServers()).rejects.toMatchObject({
      code: RegistryErrorCode.INVALID_RESPONSE,
      message: 'failed to decode response: registry repeated cursor loop',
    });
  });
});

describe('RegistryClient - constructor', () => {
  it('requires a base URL', () => {
    expect(() => new RegistryClient({ baseUrl: ' ' })).toThrow(
      'registry base URL is required',
    );
  });

  it('rejects a base URL that does not parse', () => {
    expect(() => new RegistryClient({ baseUrl: 'not a url' })).toThrow(
      'invalid registry base URL: not a url',
    );
  });
});
