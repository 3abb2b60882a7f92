import { z } from 'zod';
import type { ServerPackage } from '@packsync/models';

export const PackageTransportSchema = z.object({
  type: z.string().min(1),
  url: z.string().optional(),
});

/**
 * A package entry as the registry sends it. Older registry builds used
 * snake_case field names, so both spellings are accepted.
 */
export const RawPackageSchema = z.object({
  registryType: z.string().optional(),
  registry_type: z.string().optional(),
  identifier: z.string(),
  version: z.string().optional(),
  runtimeHint: z.string().optional(),
  runtime_hint: z.string().optional(),
  transport: PackageTransportSchema,
});

export const PackageSchema = RawPackageSchema.transform(
  (raw, ctx): ServerPackage => {
    const registryType = raw.registryType ?? raw.registry_type;
    if (!registryType) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `package ${raw.identifier} has no registry type`,
      });
      return z.NEVER;
    }

    return {
      registryType,
      identifier: raw.identifier,
      version: raw.version,
      runtimeHint: raw.runtimeHint ?? raw.runtime_hint,
      transport: { type: raw.transport.type, url: raw.transport.url },
    };
  },
);
