import type { RunConfig } from './types.js';
import type { FileLoadError } from '@/common/types/errors.js';
import type { SourceRow } from '@/common/types/rows.js';
import type { Result } from 'neverthrow';

export interface PresenceInputRepo {
  /** Load and validate the run configuration */
  loadConfig(): Promise<Result<RunConfig, FileLoadError>>;

  /** Load and validate the decoded source rows */
  loadRows(): Promise<Result<SourceRow[], FileLoadError>>;
}
