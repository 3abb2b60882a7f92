/**
 * Helpers for working with AbortSignal, which plays the role of a
 * cancellation context throughout packsync.
 */

function hasName(value: unknown, name: string): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    value.name === name
  );
}

/**
 * True when an abort reason is a deadline (`AbortSignal.timeout`) rather
 * than an explicit cancel.
 * @public
 */
export function isTimeoutReason(reason: unknown): boolean {
  return hasName(reason, 'TimeoutError');
}

/**
 * True for the error shapes Node and fetch use to report an aborted operation.
 * @public
 */
export function isAbortError(error: unknown): boolean {
  return hasName(error, 'AbortError') || isTimeoutReason(error);
}

/**
 * Combines the optional caller signal with a per-operation timeout.
 * @public
 */
export function withTimeout(
  timeoutMs: number,
  signal?: AbortSignal,
): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Human-readable message for any thrown value.
 * @public
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
