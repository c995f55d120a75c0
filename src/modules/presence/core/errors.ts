import type { AggregationInvariantViolation, PresenceClaim } from './types.js';

export const createAggregationInvariantViolation = (
  claim: PresenceClaim
): AggregationInvariantViolation => ({
  type: 'AggregationInvariantViolation',
  message: `Claim of '${claim.organizationId}' in sector '${claim.sectorCode}' references unknown admin unit '${claim.unitCode}'`,
  claim,
});
