export { StateStore } from './state-store.js';
export type { StateStoreOptions } from './state-store.js';
