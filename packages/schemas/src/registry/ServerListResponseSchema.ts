import { z } from 'zod';

const ListMetadataSchema = z.object({
  count: z.number().optional(),
  next_cursor: z.string().nullish(),
  nextCursor: z.string().nullish(),
});

/**
 * Envelope of one listing page. Entries are left unvalidated so that the
 * client can check each one with `ServerRecordSchema` and drop only the
 * malformed ones.
 */
export const ServerListResponseSchema = z
  .object({
    servers: z.array(z.unknown()).nullish(),
    metadata: ListMetadataSchema.nullish(),
  })
  .transform((raw) => {
    const servers = raw.servers ?? [];
    const nextCursor = raw.metadata?.nextCursor ?? raw.metadata?.next_cursor;
    return {
      servers,
      metadata: {
        count: raw.metadata?.count ?? servers.length,
        nextCursor: nextCursor || undefined,
      },
    };
  });
