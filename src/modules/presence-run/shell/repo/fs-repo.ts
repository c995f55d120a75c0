import { TypeCompiler } from '@sinclair/typebox/compiler';

import { readValidatedFile } from '@/infra/files/read-validated-file.js';

import { RunConfigFileSchema, SourceRowsFileSchema, type RunConfig } from '../../core/types.js';

import type { PresenceInputRepo } from '../../core/ports.js';
import type { FileLoadError } from '@/common/types/errors.js';
import type { SourceRow } from '@/common/types/rows.js';
import type { Result } from 'neverthrow';

const configValidator = TypeCompiler.Compile(RunConfigFileSchema);
const rowsValidator = TypeCompiler.Compile(SourceRowsFileSchema);

export interface PresenceInputRepoOptions {
  /** YAML or JSON run configuration */
  configPath: string;
  /** JSON array of decoded source rows */
  rowsPath: string;
}

export const createPresenceInputRepo = (options: PresenceInputRepoOptions): PresenceInputRepo => ({
  async loadConfig(): Promise<Result<RunConfig, FileLoadError>> {
    return readValidatedFile(options.configPath, configValidator);
  },

  async loadRows(): Promise<Result<SourceRow[], FileLoadError>> {
    return readValidatedFile(options.rowsPath, rowsValidator);
  },
});
