/**
 * Resolve Row Location Use Case
 *
 * A row can carry several admin cells (admin1, admin2, ...). They are resolved
 * top-down and each resolved unit becomes the parent hint of the next level.
 * The row's location is the outcome of its deepest filled cell. A row with no
 * filled cell is a national presence and resolves to the country itself.
 */

import { resolveLocation } from './resolve-location.js';

import type {
  LocationResolution,
  LocationResolverOptions,
  ResolveRowLocationInput,
} from '../types.js';
import type { AdminIndex } from '@/modules/admin-hierarchy/index.js';

export const resolveRowLocation = (
  index: AdminIndex,
  input: ResolveRowLocationInput,
  options: LocationResolverOptions = {}
): LocationResolution => {
  let targetIndex = input.locations.length - 1;
  while (targetIndex >= 0 && (input.locations[targetIndex] ?? '').trim() === '') {
    targetIndex--;
  }

  if (targetIndex < 0) {
    const country = index.lookupByCode(input.countryCode, input.countryCode);
    if (country?.level === 0) {
      return { status: 'resolved', unit: country, confidence: 'exact' };
    }
    return {
      status: 'unresolved',
      confidence: 'unresolved',
      reason: 'UnknownCountry',
      rawLocation: '',
      level: 0,
      candidates: [],
    };
  }

  let parentCode: string | undefined;
  let outcome: LocationResolution | undefined;

  for (let i = 0; i <= targetIndex; i++) {
    const cell = input.locations[i] ?? '';
    if (cell.trim() === '') continue;

    outcome = resolveLocation(
      index,
      {
        countryCode: input.countryCode,
        rawLocation: cell,
        expectedLevel: i + 1,
        parentCode,
      },
      options
    );

    if (outcome.status === 'resolved') {
      parentCode = outcome.unit.code;
    }
  }

  // targetIndex points at a filled cell, so the loop always assigns an outcome.
  return (
    outcome ?? {
      status: 'unresolved',
      confidence: 'unresolved',
      reason: 'EmptyLocation',
      rawLocation: '',
      level: targetIndex + 1,
      candidates: [],
    }
  );
};
