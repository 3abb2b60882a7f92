import { gt, parse, type SemVer } from 'semver';

/**
 * Picks the record with the greatest semantic version. Records whose version
 * does not parse are ignored.
 * @returns the winning record, or undefined when no version parses
 * @internal
 */
export function selectHighestVersion<T extends { readonly version: string }>(
  records: readonly T[],
): T | undefined {
  let best: { record: T; version: SemVer } | undefined;

  for (const record of records) {
    const version = parse(record.version, { loose: true });
    if (!version) continue;

    if (!best || gt(version, best.version)) {
      best = { record, version };
    }
  }

  return best?.record;
}
