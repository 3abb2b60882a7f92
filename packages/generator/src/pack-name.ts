/**
 * Makes a server name safe for use as a file name: `/` and `.` become `-`,
 * anything outside `[A-Za-z0-9_-]` is dropped.
 * @internal
 */
export function sanitizeServerName(name: string): string {
  return name.replace(/[/.]/g, '-').replace(/[^A-Za-z0-9_-]/g, '');
}

/**
 * Name of the pack directory (or archive, minus extension) for one
 * server package, e.g. `io-github-acme-widget-1-2-0-npm-stdio`.
 * @public
 */
export function computePackName(
  serverName: string,
  version: string,
  packageType: string,
  transportType: string,
): string {
  const sanitizedVersion = version.replaceAll('.', '-');
  return `${sanitizeServerName(serverName)}-${sanitizedVersion}-${packageType}-${transportType}`;
}
