import { z, type ZodType, type ZodTypeDef } from 'zod';
import { ServerStatus, type ServerRecord } from '@packsync/models';
import { PackageSchema } from './PackageSchema.js';

export const OFFICIAL_META_KEY = 'io.modelcontextprotocol.registry/official';

export const ServerStatusSchema = z.nativeEnum(ServerStatus);

const OfficialMetaSchema = z.object({
  status: ServerStatusSchema.optional(),
  updatedAt: z.string().optional(),
  updated_at: z.string().optional(),
});

const RegistryMetaSchema = z.object({
  [OFFICIAL_META_KEY]: OfficialMetaSchema.optional(),
});

type RegistryMeta = z.infer<typeof RegistryMetaSchema>;

const ServerBodySchema = z.object({
  name: z.string().min(1),
  version: z.string(),
  description: z.string().optional(),
  status: ServerStatusSchema.optional(),
  packages: z.array(PackageSchema).nullish(),
  _meta: RegistryMetaSchema.optional(),
});

type ServerBody = z.infer<typeof ServerBodySchema>;

interface ServerEnvelope {
  body: ServerBody;
  meta?: RegistryMeta;
}

// current registry layout: { server: {...}, _meta: {...} }
const WrappedServerSchema = z
  .object({
    server: ServerBodySchema,
    _meta: RegistryMetaSchema.optional(),
  })
  .transform((wrapped): ServerEnvelope => ({
    body: wrapped.server,
    meta: wrapped._meta ?? wrapped.server._meta,
  }));

// legacy layout: the record itself, status inline
const FlatServerSchema = ServerBodySchema.transform(
  (body): ServerEnvelope => ({ body, meta: body._meta }),
);

function parseTimestamp(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

function toServerRecord({ body, meta }: ServerEnvelope): ServerRecord {
  const official = meta?.[OFFICIAL_META_KEY];
  return {
    name: body.name,
    version: body.version,
    description: body.description,
    status: body.status ?? official?.status ?? ServerStatus.ACTIVE,
    packages: body.packages ?? [],
    updatedAt: parseTimestamp(official?.updatedAt ?? official?.updated_at),
  };
}

/**
 * Validates one registry entry in either layout and normalizes it into a
 * {@link ServerRecord}. Entries without any status are treated as active.
 */
export const ServerRecordSchema: ZodType<ServerRecord, ZodTypeDef, unknown> = z
  .union([WrappedServerSchema, FlatServerSchema])
  .transform(toServerRecord);
