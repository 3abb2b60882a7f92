export type PackExistsKind = 'directory' | 'archive';

/**
 * The target pack already exists and overwriting was not requested.
 *
 * A watcher treats this as a benign outcome: the pack is already there.
 */
export class PackExistsError extends Error {
  public readonly kind: PackExistsKind;
  public readonly path: string;

  public constructor(kind: PackExistsKind, path: string) {
    super(`pack ${kind} ${path} already exists`);
    this.name = 'PackExistsError';
    this.kind = kind;
    this.path = path;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, PackExistsError.prototype);
  }

  public static directory(path: string): PackExistsError {
    return new PackExistsError('directory', path);
  }

  public static archive(path: string): PackExistsError {
    return new PackExistsError('archive', path);
  }
}

/**
 * True if `error`, or any error in its `cause` chain, is a PackExistsError.
 * @public
 */
export function isPackExistsError(error: unknown): boolean {
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof PackExistsError) return true;
    seen.add(current);
    current = current.cause;
  }
  return false;
}
