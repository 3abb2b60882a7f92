import { InvalidServerNameError } from './errors.js';

/**
 * A server identity split into its two parts.
 */
export interface ServerNameSpec {
  namespace: string;
  name: string;
}

/**
 * A server identity plus the version a user asked for.
 */
export interface ServerSearchSpec extends ServerNameSpec {
  /** Exact version or `latest` */
  version: string;
}

/**
 * Splits `io.github.example/server` into namespace and name.
 * @throws {InvalidServerNameError} unless there is exactly one `/` with
 *   non-empty text on both sides
 * @public
 */
export function parseServerName(fullName: string): ServerNameSpec {
  const trimmed = fullName.trim();
  if (trimmed === '') {
    throw new InvalidServerNameError(fullName, 'server name must not be empty');
  }

  const parts = trimmed.split('/');
  if (parts.length !== 2) {
    throw new InvalidServerNameError(
      fullName,
      "expected exactly one '/' separator, like 'io.github.example/server'",
    );
  }

  const namespace = parts[0].trim();
  const name = parts[1].trim();
  if (namespace === '') {
    throw new InvalidServerNameError(fullName, 'namespace must not be empty');
  }
  if (name === '') {
    throw new InvalidServerNameError(fullName, 'name must not be empty');
  }

  return { namespace, name };
}

/**
 * Parses `namespace/name@version`, where version may be `latest`.
 * @public
 */
export function parseServerSearchSpec(spec: string): ServerSearchSpec {
  const trimmed = spec.trim();
  const parts = trimmed.split('@');
  if (parts.length !== 2) {
    throw new InvalidServerNameError(
      spec,
      'expected <namespace/name@version>',
    );
  }

  const version = parts[1].trim();
  if (version === '') {
    throw new InvalidServerNameError(spec, 'version must not be empty');
  }

  return { ...parseServerName(parts[0]), version };
}

export function fullServerName(spec: ServerNameSpec): string {
  return `${spec.namespace}/${spec.name}`;
}

export function isLatestVersion(version: string): boolean {
  return version.toLowerCase() === 'latest';
}
