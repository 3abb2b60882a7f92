export type {
  PackageTransport,
  ServerPackage,
  ServerRecord,
  ServerListResponse,
  ListServersOptions,
} from './registry.js';
export type { ServerState, WatchState } from './state.js';
export type { GenerationTask } from './task.js';
