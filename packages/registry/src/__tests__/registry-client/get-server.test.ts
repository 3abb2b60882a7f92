/**
 * Tests for RegistryClient - single-record lookups and version resolution
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ServerNotFoundError, RegistryErrorCode } from '../../errors.js';
import {
  BASE_URL,
  calledUrl,
  createClient,
  createFetchMock,
  jsonResponse,
  listPage,
  server,
  textResponse,
  type FetchMock,
} from './test-utils.js';

describe('RegistryClient - getServer', () => {
  let mockFetch: FetchMock;

  beforeEach(() => {
    mockFetch = createFetchMock();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches the record by id', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(server('acme/widget', '1.2.0')));

    const record = await createClient().getServer('a1b2');

    expect(calledUrl(mockFetch).toString()).toBe(`${BASE_URL}/v0/servers/a1b2`);
    expect(record.version).toBe('1.2.0');
  });

  it('escapes the id in the path', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(server('acme/widget', '1.2.0')));

    await createClient().getServer('acme/widget');

    expect(calledUrl(mockFetch).pathname).toBe('/v0/servers/acme%2Fwidget');
  });

  it('maps 404 to ServerNotFoundError without retrying', async () => {
    mockFetch.mockResolvedValue(textResponse('not found', 404));

    const error = await createClient()
      .getServer('missing')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerNotFoundError);
    expect(error).toMatchObject({
      identifier: 'missing',
      message: 'server not found: missing',
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('treats other 4xx as client errors', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('forbidden', 403));

    await expect(createClient().getServer('x')).rejects.toMatchObject({
      code: RegistryErrorCode.CLIENT_ERROR,
      status: 403,
    });
  });

  it('requires an id', async () => {
    await expect(createClient().getServer('')).rejects.toThrow(
      'server ID is required',
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('RegistryClient - getLatestActiveServer', () => {
  let mockFetch: FetchMock;

  beforeEach(() => {
    mockFetch = createFetchMock();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('picks the highest active version and ignores a newer deprecated one', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(
        listPage([
          server('acme/widget', '1.0.0', 'active'),
          server('acme/widget', '1.5.0', 'active'),
          server('acme/widget', '2.0.0', 'deprecated'),
        ]),
      ),
    );

    const latest = await createClient().getLatestActiveServer('acme/widget');

    expect(latest.version).toBe('1.5.0');
    expect(calledUrl(mockFetch).searchParams.get('search')).toBe('acme/widget');
    expect(calledUrl(mockFetch).searchParams.get('limit')).toBe('100');
  });

  it('compares semantically across pages, not by listing order', async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse(
          listPage(
            [
              server('acme/widget', '1.10.0'),
              server('acme/widget', 'nightly'),
            ],
            'p2',
          ),
        ),
      )
      .mockResolvedValueOnce(
        jsonResponse(
          listPage([
            server('acme/widget', '1.9.0'),
            server('acme/widget-pro', '5.0.0'),
            server('acme/widget', '3.0.0', 'deleted'),
          ]),
        ),
      );

    const latest = await createClient().getLatestActiveServer('acme/widget');

    expect(latest.version).toBe('1.10.0');
    expect(latest.name).toBe('acme/widget');
  });

  it('fails when no record is active', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(listPage([server('acme/widget', '2.0.0', 'deprecated')])),
    );

    await expect(
      createClient().getLatestActiveServer('acme/widget'),
    ).rejects.toThrow('no active servers found with name: acme/widget');
  });

  it('fails when no active version parses', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(listPage([server('acme/widget', 'nightly')])),
    );

    const error = await createClient()
      .getLatestActiveServer('acme/widget')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerNotFoundError);
    expect(error).toMatchObject({
      message:
        'no valid semantic version found for active servers with name: acme/widget',
    });
  });
});

describe('RegistryClient - getServerByNameAndVersion', () => {
  let mockFetch: FetchMock;

  beforeEach(() => {
    mockFetch = createFetchMock();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('finds an exact version on a later page', async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse(listPage([server('acme/widget', '1.0.0')], 'p2')),
      )
      .mockResolvedValueOnce(
        jsonResponse(listPage([server('acme/widget', '1.1.0')])),
      );

    const record = await createClient().getServerByNameAndVersion(
      'acme/widget',
      '1.1.0',
    );

    expect(record.version).toBe('1.1.0');
    expect(calledUrl(mockFetch, 0).searchParams.get('version')).toBeNull();
  });

  it('asks the registry for latest', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(listPage([server('acme/widget', '1.4.0')])),
    );

    const record = await createClient().getServerByNameAndVersion(
      'acme/widget',
      'latest',
    );

    expect(record.version).toBe('1.4.0');
    expect(calledUrl(mockFetch).searchParams.get('version')).toBe('latest');
  });

  it('reports the missing name and version', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(listPage([server('acme/widget', '1.0.0')])),
    );

    await expect(
      createClient().getServerByNameAndVersion('acme/widget', '9.9.9'),
    ).rejects.toThrow('server not found: acme/widget@9.9.9');
  });
});

describe('RegistryClient - listing shortcuts', () => {
  let mockFetch: FetchMock;

  beforeEach(() => {
    mockFetch = createFetchMock();
    mockFetch.mockImplementation(async () => jsonResponse(listPage([])));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('searchServers sets the search term', async () => {
    await createClient().searchServers('weather', { limit: 5 });

    expect(calledUrl(mockFetch).searchParams.get('search')).toBe('weather');
    expect(calledUrl(mockFetch).searchParams.get('limit')).toBe('5');
  });

  it('searchServers requires a term', async () => {
    await expect(createClient().searchServers('')).rejects.toThrow(
      'search term is required',
    );
  });

  it('getLatestServers asks for version=latest', async () => {
    await createClient().getLatestServers();

    expect(calledUrl(mockFetch).searchParams.get('version')).toBe('latest');
  });

  it('getUpdatedServers passes updated_since through', async () => {
    await createClient().getUpdatedServers('2026-05-01T00:00:00Z');

    expect(calledUrl(mockFetch).searchParams.get('updated_since')).toBe(
      '2026-05-01T00:00:00Z',
    );
  });
});
