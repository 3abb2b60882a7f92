import { fromRegistryTransportType } from '@packsync/models';

/**
 * Exact match on `namespace/name`. An empty filter matches every server.
 */
export class ServerNameFilter {
  private readonly names: ReadonlySet<string>;

  public constructor(names: readonly string[] = []) {
    this.names = new Set(names);
  }

  public matches(serverName: string): boolean {
    return this.names.size === 0 || this.names.has(serverName);
  }

  public get isEmpty(): boolean {
    return this.names.size === 0;
  }

  public values(): string[] {
    return [...this.names];
  }
}

/**
 * Case-insensitive match on a package's registry type (`npm`, `pypi`...).
 * An empty filter matches every type.
 */
export class PackageTypeFilter {
  private readonly types: ReadonlySet<string>;

  public constructor(types: readonly string[] = []) {
    this.types = new Set(types.map((type) => type.toLowerCase()));
  }

  public matches(packageType: string): boolean {
    return this.types.size === 0 || this.types.has(packageType.toLowerCase());
  }
}

/**
 * Matches a registry transport name against user-facing transport names,
 * so a filter of `http` accepts packages served over `streamable-http`.
 * An empty filter matches every transport.
 */
export class TransportTypeFilter {
  private readonly types: ReadonlySet<string>;

  public constructor(types: readonly string[] = []) {
    this.types = new Set(types.map((type) => type.toLowerCase()));
  }

  public matches(registryTransportType: string): boolean {
    if (this.types.size === 0) return true;
    const userType = fromRegistryTransportType(registryTransportType);
    return this.types.has(userType.toLowerCase());
  }
}
