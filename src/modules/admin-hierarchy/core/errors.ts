/**
 * Configuration errors raised while building the admin hierarchy index.
 *
 * Any of these aborts the run before a single row is processed.
 */

import type { FileLoadError } from '@/common/types/errors.js';

export interface DuplicateCodeError {
  readonly type: 'DuplicateCode';
  readonly message: string;
  readonly code: string;
  readonly levels: readonly number[];
}

export interface OrphanUnitError {
  readonly type: 'OrphanUnit';
  readonly message: string;
  readonly code: string;
  readonly parentCode: string | null;
}

export interface InvalidParentError {
  readonly type: 'InvalidParent';
  readonly message: string;
  readonly code: string;
  readonly parentCode: string;
}

export interface InvalidLevelError {
  readonly type: 'InvalidLevel';
  readonly message: string;
  readonly code: string;
  readonly level: number;
}

export type AdminHierarchyConfigError =
  | DuplicateCodeError
  | OrphanUnitError
  | InvalidParentError
  | InvalidLevelError;

export type AdminReferenceRepoError = FileLoadError;

export const createDuplicateCodeError = (
  code: string,
  levels: readonly number[]
): DuplicateCodeError => ({
  type: 'DuplicateCode',
  message: `Admin unit code '${code}' is defined more than once (levels ${levels.join(', ')})`,
  code,
  levels,
});

export const createOrphanUnitError = (code: string, parentCode: string | null): OrphanUnitError => ({
  type: 'OrphanUnit',
  message:
    parentCode === null
      ? `Admin unit '${code}' has no parent code`
      : `Admin unit '${code}' references missing parent '${parentCode}'`,
  code,
  parentCode,
});

export const createInvalidParentError = (
  code: string,
  parentCode: string,
  detail: string
): InvalidParentError => ({
  type: 'InvalidParent',
  message: `Admin unit '${code}' has invalid parent '${parentCode}': ${detail}`,
  code,
  parentCode,
});

export const createInvalidLevelError = (code: string, level: number): InvalidLevelError => ({
  type: 'InvalidLevel',
  message: `Admin unit '${code}' has invalid level ${String(level)}`,
  code,
  level,
});
