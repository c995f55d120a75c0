// Use cases
export { resolveLocation } from './core/usecases/resolve-location.js';
export { resolveRowLocation } from './core/usecases/resolve-row-location.js';

// Types
export type {
  LocationFailure,
  LocationFailureReason,
  LocationMatch,
  LocationResolution,
  LocationResolverOptions,
  ResolveLocationInput,
  ResolveRowLocationInput,
} from './core/types.js';
