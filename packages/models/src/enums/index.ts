export { ServerStatus } from './server-status.js';
export {
  TransportTypes,
  PackageTypes,
  VALID_TRANSPORT_TYPES,
  VALID_PACKAGE_TYPES,
  fromRegistryTransportType,
} from './transport.js';
export type { TransportType, PackageType } from './transport.js';
