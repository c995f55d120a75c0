// Use cases
export { buildClaims, claimKey, mergeClaimSets } from './core/usecases/build-claims.js';
export { aggregateClaims, aggregatePresence } from './core/usecases/aggregate-presence.js';

// Types
export type {
  AggregateOptions,
  AggregateRecord,
  AggregationInvariantViolation,
  ClaimSet,
  PresenceAggregation,
  PresenceClaim,
} from './core/types.js';
