/**
 * Normalized shapes of the records served by the MCP server registry.
 *
 * The registry has served more than one wire layout over time; these types
 * describe what the rest of packsync sees after `@packsync/schemas` has
 * validated and normalized a payload.
 */

import type { ServerStatus } from '../enums/server-status.js';

/**
 * How a packaged server is reached once it runs.
 */
export interface PackageTransport {
  /** Registry-side transport name (e.g. `stdio`, `streamable-http`) */
  readonly type: string;
  readonly url?: string;
}

/**
 * One installable distribution of a server.
 */
export interface ServerPackage {
  /** Package registry the artifact lives in (e.g. `npm`, `pypi`, `oci`) */
  readonly registryType: string;
  /** Identifier within that registry (npm package name, image reference...) */
  readonly identifier: string;
  readonly version?: string;
  readonly runtimeHint?: string;
  readonly transport: PackageTransport;
}

/**
 * A single registry entry.
 *
 * `version` is usually a semantic version but the registry does not enforce it.
 */
export interface ServerRecord {
  /** Full `namespace/name` identity */
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly status: ServerStatus;
  readonly packages: readonly ServerPackage[];
  /** Last upstream modification, when the registry reports one */
  readonly updatedAt?: Date;
}

/**
 * One page of a registry listing.
 */
export interface ServerListResponse {
  readonly servers: readonly ServerRecord[];
  readonly metadata: {
    readonly count: number;
    /** Empty when there are no further pages */
    readonly nextCursor?: string;
  };
}

/**
 * Query parameters understood by `GET /v0/servers`.
 */
export interface ListServersOptions {
  cursor?: string;
  /** Page size; the registry caps it at 100 */
  limit?: number;
  /** Only records updated after this instant */
  updatedSince?: Date | string;
  search?: string;
  /** `latest` or an exact version */
  version?: string;
}
