import type { ServerPackage, ServerRecord } from './registry.js';

/**
 * A single unit of work for the pack generator: one server, one of its packages.
 */
export interface GenerationTask {
  readonly server: ServerRecord;
  readonly pkg: ServerPackage;
  readonly namespace: string;
  readonly name: string;
}
