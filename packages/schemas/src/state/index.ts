export {
  ServerStateEntrySchema,
  WatchStateFileSchema,
} from './WatchStateFileSchema.js';
