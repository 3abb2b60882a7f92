import { describe, it, expect } from 'vitest';
import {
  OFFICIAL_META_KEY,
  ServerListResponseSchema,
  ServerRecordSchema,
} from '../../index.js';

const npmStdio = {
  registryType: 'npm',
  identifier: '@acme/widget',
  version: '1.0.0',
  transport: { type: 'stdio' },
};

describe('ServerRecordSchema', () => {
  it('normalizes a flat record with inline status', () => {
    const record = ServerRecordSchema.parse({
      name: 'acme/widget',
      version: '1.0.0',
      status: 'deprecated',
      packages: [npmStdio],
    });

    expect(record).toEqual({
      name: 'acme/widget',
      version: '1.0.0',
      description: undefined,
      status: 'deprecated',
      packages: [
        {
          registryType: 'npm',
          identifier: '@acme/widget',
          version: '1.0.0',
          runtimeHint: undefined,
          transport: { type: 'stdio', url: undefined },
        },
      ],
      updatedAt: undefined,
    });
  });

  it('reads status and update time from the official metadata of a wrapped record', () => {
    const record = ServerRecordSchema.parse({
      server: { name: 'acme/widget', version: '2.0.0', packages: [npmStdio] },
      _meta: {
        [OFFICIAL_META_KEY]: {
          status: 'active',
          updatedAt: '2026-01-02T03:04:05Z',
        },
      },
    });

    expect(record.name).toBe('acme/widget');
    expect(record.status).toBe('active');
    expect(record.updatedAt).toEqual(new Date('2026-01-02T03:04:05Z'));
  });

  it('accepts snake_case package fields', () => {
    const record = ServerRecordSchema.parse({
      name: 'acme/widget',
      version: '1.0.0',
      packages: [
        {
          registry_type: 'pypi',
          identifier: 'acme-widget',
          runtime_hint: 'uvx',
          transport: { type: 'streamable-http', url: 'http://localhost:8000' },
        },
      ],
      _meta: { [OFFICIAL_META_KEY]: { updated_at: '2026-03-01T00:00:00Z' } },
    });

    expect(record.packages[0].registryType).toBe('pypi');
    expect(record.packages[0].runtimeHint).toBe('uvx');
    expect(record.packages[0].transport.type).toBe('streamable-http');
    expect(record.updatedAt).toEqual(new Date('2026-03-01T00:00:00Z'));
  });

  it('defaults to active status and no packages', () => {
    const record = ServerRecordSchema.parse({
      name: 'acme/remote-only',
      version: '0.1.0',
    });

    expect(record.status).toBe('active');
    expect(record.packages).toEqual([]);
  });

  it('ignores an unparseable update time', () => {
    const record = ServerRecordSchema.parse({
      name: 'acme/widget',
      version: '1.0.0',
      _meta: { [OFFICIAL_META_KEY]: { updatedAt: 'yesterday' } },
    });

    expect(record.updatedAt).toBeUndefined();
  });

  it('rejects a package without a registry type', () => {
    const result = ServerRecordSchema.safeParse({
      name: 'acme/widget',
      version: '1.0.0',
      packages: [{ identifier: 'x', transport: { type: 'stdio' } }],
    });

    expect(result.success).toBe(false);
  });

  it('rejects an unknown status', () => {
    const result = ServerRecordSchema.safeParse({
      name: 'acme/widget',
      version: '1.0.0',
      status: 'archived',
    });

    expect(result.success).toBe(false);
  });
});

describe('ServerListResponseSchema', () => {
  it('reads the snake_case cursor', () => {
    const page = ServerListResponseSchema.parse({
      servers: [{ name: 'acme/widget', version: '1.0.0' }],
      metadata: { count: 1, next_cursor: 'abc' },
    });

    expect(page.servers).toHaveLength(1);
    expect(page.metadata).toEqual({ count: 1, nextCursor: 'abc' });
  });

  it('accepts any entry, leaving record checks to ServerRecordSchema', () => {
    const page = ServerListResponseSchema.parse({
      servers: [{ name: '' }, { name: 'acme/widget', version: '1.0.0' }],
    });

    expect(page.servers).toEqual([
      { name: '' },
      { name: 'acme/widget', version: '1.0.0' },
    ]);
    expect(page.metadata.count).toBe(2);
  });

  it('reads the camelCase cursor', () => {
    const page = ServerListResponseSchema.parse({
      servers: [],
      metadata: { count: 0, nextCursor: 'def' },
    });

    expect(page.metadata.nextCursor).toBe('def');
  });

  it('treats null servers, missing metadata and an empty cursor as the last page', () => {
    expect(ServerListResponseSchema.parse({ servers: null })).toEqual({
      servers: [],
      metadata: { count: 0, nextCursor: undefined },
    });
    expect(
      ServerListResponseSchema.parse({
        servers: [],
        metadata: { count: 0, next_cursor: '' },
      }).metadata.nextCursor,
    ).toBeUndefined();
  });
});
