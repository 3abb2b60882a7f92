export type {
  GenerateOptions,
  GenerateRequest,
  GenerateResult,
  PackGenerator,
  PackOutputType,
} from './types.js';
export { PackExistsError, isPackExistsError } from './errors.js';
export type { PackExistsKind } from './errors.js';
export { computePackName, sanitizeServerName } from './pack-name.js';
export { DryRunPackGenerator } from './dry-run-generator.js';
