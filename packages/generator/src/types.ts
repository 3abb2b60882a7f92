import type { ServerPackage, ServerRecord } from '@packsync/models';

export type PackOutputType = 'packdir' | 'archive';

/**
 * Where and how a generator writes a pack.
 */
export interface GenerateOptions {
  outputDir: string;
  outputType: PackOutputType;
  /** Report what would be written without touching disk */
  dryRun: boolean;
  /** Replace an existing pack instead of failing with PackExistsError */
  forceOverwrite: boolean;
}

export interface GenerateRequest {
  server: ServerRecord;
  pkg: ServerPackage;
  /** Registry-side transport name of `pkg` (e.g. `streamable-http`) */
  transportType: string;
  options: GenerateOptions;
}

export interface GenerateResult {
  packName: string;
  /** Directory or archive path of the pack */
  path: string;
}

/**
 * Renders one server package into a deployable pack.
 *
 * Implementations receive the caller's AbortSignal and should stop at the
 * next safe point once it aborts. An existing pack that may not be replaced
 * is reported with `PackExistsError`.
 * @public
 */
export interface PackGenerator {
  generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResult>;
}
