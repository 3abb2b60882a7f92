/**
 * One successfully generated `(server, version, package type, transport)` tuple.
 */
export interface ServerState {
  namespace: string;
  name: string;
  version: string;
  packageType: string;
  /** Registry-side transport name */
  transportType: string;
  updatedAt: Date;
  generatedAt: Date;
  /** Reserved for content-based staleness checks; always empty today */
  checksum: string;
}

/**
 * Everything the reconciler persists between runs.
 */
export interface WatchState {
  /** Start time of the last completed poll cycle; absent before the first one */
  lastPoll?: Date;
  servers: Map<string, ServerState>;
}
