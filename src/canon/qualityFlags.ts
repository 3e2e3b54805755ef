import { isCanonicalBorough } from '../config/cleaningRules.js';
import type { CoordinateResult } from './fields.js';
import { normalizeNullableString } from './rules.js';

export interface QualityFlags {
  has_valid_borough: boolean;
  has_valid_coordinates: boolean;
  has_valid_created_date: boolean;
  has_closed_date: boolean;
}

// has_valid_created_date reports presence of the raw value only; a present
// but unparseable date still counts and is surfaced as a quality issue instead.
export function computeQualityFlags(input: {
  borough: string | null;
  coordinates: CoordinateResult;
  rawCreatedDate: string | null;
  rawClosedDate: string | null;
}): QualityFlags {
  return {
    has_valid_borough: isCanonicalBorough(input.borough),
    has_valid_coordinates: input.coordinates.status === 'valid',
    has_valid_created_date: normalizeNullableString(input.rawCreatedDate) !== null,
    has_closed_date: normalizeNullableString(input.rawClosedDate) !== null
  };
}
