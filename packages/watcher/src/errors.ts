/**
 * Error types raised by the reconciler.
 */

/**
 * The watch loop ended because its signal was cancelled. Hosts treat this as
 * a clean exit.
 */
export class GracefulShutdownError extends Error {
  public constructor(message = 'graceful shutdown') {
    super(message);
    this.name = 'GracefulShutdownError';
    Object.setPrototypeOf(this, GracefulShutdownError.prototype);
  }
}

/**
 * Watcher settings failed validation. Raised before any I/O happens.
 */
export class WatcherConfigError extends Error {
  public readonly issues: readonly string[];

  public constructor(issues: readonly string[]) {
    super(`invalid watcher configuration: ${issues.join('; ')}`);
    this.name = 'WatcherConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, WatcherConfigError.prototype);
  }
}

/**
 * The state file could not be read, decoded or written.
 */
export class StateFileError extends Error {
  public readonly path: string;

  public constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StateFileError';
    this.path = path;
    Object.setPrototypeOf(this, StateFileError.prototype);
  }
}

/**
 * A poll cycle could not complete: fetching from the registry or saving
 * state failed. `cause` carries the underlying error.
 */
export class PollCycleError extends Error {
  public constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'PollCycleError';
    Object.setPrototypeOf(this, PollCycleError.prototype);
  }
}

/**
 * Generation failed for one task. `taskKey` is
 * `namespace/name@version:packageType:transportType`.
 */
export class TaskGenerationError extends Error {
  public readonly taskKey: string;

  public constructor(taskKey: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to generate ${taskKey}: ${reason}`, { cause });
    this.name = 'TaskGenerationError';
    this.taskKey = taskKey;
    Object.setPrototypeOf(this, TaskGenerationError.prototype);
  }
}

/**
 * Counts for one poll cycle's generation phase.
 */
export interface GenerationCounts {
  attempted: number;
  succeeded: number;
  benignFailures: number;
  criticalFailures: number;
  /** Tasks never started because the cycle was cancelled */
  skipped: number;
}

/**
 * One or more tasks in a cycle failed with a critical error. `errors` holds
 * only the critical failures; benign ones are counted, not carried.
 */
export class PackGenerationError extends AggregateError {
  public readonly counts: GenerationCounts;

  public constructor(
    errors: readonly TaskGenerationError[],
    counts: GenerationCounts,
  ) {
    super(
      errors,
      `pack generation completed with ${errors.length} critical errors`,
    );
    this.name = 'PackGenerationError';
    this.counts = counts;
    Object.setPrototypeOf(this, PackGenerationError.prototype);
  }
}
