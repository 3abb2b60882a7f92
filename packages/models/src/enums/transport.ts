/**
 * Transport names as users write them in filters and flags.
 */
export const TransportTypes = {
  STDIO: 'stdio',
  HTTP: 'http',
  SSE: 'sse',
} as const;

export type TransportType = (typeof TransportTypes)[keyof typeof TransportTypes];

/**
 * Package registries a pack can be generated for.
 */
export const PackageTypes = {
  NPM: 'npm',
  PYPI: 'pypi',
  OCI: 'oci',
  NUGET: 'nuget',
} as const;

export type PackageType = (typeof PackageTypes)[keyof typeof PackageTypes];

export const VALID_TRANSPORT_TYPES: readonly TransportType[] = Object.values(TransportTypes);

export const VALID_PACKAGE_TYPES: readonly PackageType[] = Object.values(PackageTypes);

const FROM_REGISTRY: Readonly<Record<string, string>> = {
  stdio: 'stdio',
  'streamable-http': 'http',
  sse: 'sse',
};

/**
 * Maps a registry transport name (`streamable-http`) to the user-facing
 * name (`http`). Unknown names pass through unchanged.
 * @public
 */
export function fromRegistryTransportType(registryTransportType: string): string {
  return FROM_REGISTRY[registryTransportType.toLowerCase()] ?? registryTransportType;
}
