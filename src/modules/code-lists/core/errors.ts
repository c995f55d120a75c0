export interface DuplicateListCodeError {
  readonly type: 'DuplicateListCode';
  readonly message: string;
  readonly kind: string;
  readonly code: string;
}

export interface ConflictingListKeyError {
  readonly type: 'ConflictingListKey';
  readonly message: string;
  readonly kind: string;
  readonly key: string;
  readonly codes: readonly string[];
}

export type CodeListConfigError = DuplicateListCodeError | ConflictingListKeyError;

export const createDuplicateListCodeError = (kind: string, code: string): DuplicateListCodeError => ({
  type: 'DuplicateListCode',
  message: `${kind} code '${code}' is defined more than once`,
  kind,
  code,
});

export const createConflictingListKeyError = (
  kind: string,
  key: string,
  codes: readonly string[]
): ConflictingListKeyError => ({
  type: 'ConflictingListKey',
  message: `${kind} value '${key}' maps to several codes: ${codes.join(', ')}`,
  kind,
  key,
  codes,
});
