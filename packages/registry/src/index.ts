export { RegistryClient, MAX_PAGE_SIZE } from './registry-client.js';
export type { RegistryClientOptions } from './registry-client.js';
export {
  RegistryError,
  RegistryErrorCode,
  ServerNotFoundError,
  InvalidServerNameError,
} from './errors.js';
export {
  parseServerName,
  parseServerSearchSpec,
  fullServerName,
  isLatestVersion,
} from './server-name.js';
export type { ServerNameSpec, ServerSearchSpec } from './server-name.js';
export { selectHighestVersion } from './semver-utils.js';
