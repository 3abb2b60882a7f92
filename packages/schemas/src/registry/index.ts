export {
  PackageSchema,
  PackageTransportSchema,
  RawPackageSchema,
} from './PackageSchema.js';
export {
  OFFICIAL_META_KEY,
  ServerRecordSchema,
  ServerStatusSchema,
} from './ServerRecordSchema.js';
export { ServerListResponseSchema } from './ServerListResponseSchema.js';
