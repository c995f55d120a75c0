// Use cases
export { createCodeList } from './core/usecases/create-code-list.js';

// Types
export { CodeListEntrySchema } from './core/types.js';
export type {
  CodeList,
  CodeListEntry,
  CodeListOptions,
  CodeMatch,
  CodeMatchVia,
} from './core/types.js';

// Errors
export type {
  CodeListConfigError,
  ConflictingListKeyError,
  DuplicateListCodeError,
} from './core/errors.js';
