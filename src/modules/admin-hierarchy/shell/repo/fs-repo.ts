import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readValidatedFile } from '@/infra/files/read-validated-file.js';

import { ReferenceHierarchyFileSchema, type AdminUnitRecord } from '../../core/types.js';

import type { AdminReferenceRepoError } from '../../core/errors.js';
import type { AdminReferenceRepo } from '../../core/ports.js';

const validator = TypeCompiler.Compile(ReferenceHierarchyFileSchema);

export interface AdminReferenceRepoOptions {
  /** Path of the YAML or JSON reference hierarchy file */
  filePath: string;
}

export const createAdminReferenceRepo = (options: AdminReferenceRepoOptions): AdminReferenceRepo => {
  let cached: AdminUnitRecord[] | null = null;

  return {
    async loadUnits(): Promise<Result<AdminUnitRecord[], AdminReferenceRepoError>> {
      if (cached !== null) {
        return ok(cached);
      }

      const result = await readValidatedFile(options.filePath, validator);
      if (result.isErr()) {
        return err(result.error);
      }

      cached = result.value.units;
      return ok(cached);
    },
  };
};
