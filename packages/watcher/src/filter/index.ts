export {
  ServerNameFilter,
  PackageTypeFilter,
  TransportTypeFilter,
} from './filters.js';
export { filterServers } from './filter-servers.js';
export type { FilterOptions } from './filter-servers.js';
