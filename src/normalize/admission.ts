import { extractYear } from '../canon/fields.js';
import { normalizeNullableString, withinBounds } from '../canon/rules.js';
import { defaultCleaningRules, type CleaningRules } from '../config/cleaningRules.js';

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; reason: 'created_year_out_of_range'; year: number | null };

/**
 * Rows with no created date are admitted. Otherwise the positional year must
 * fall inside the configured range; an unreadable year counts as out of range.
 */
export function admitByCreatedYear(
  rawCreatedDate: string | null,
  rules: CleaningRules = defaultCleaningRules
): AdmissionDecision {
  if (normalizeNullableString(rawCreatedDate) === null) {
    return { admitted: true };
  }
  const year = extractYear(rawCreatedDate);
  if (year !== null && withinBounds(year, rules.createdYear)) {
    return { admitted: true };
  }
  return { admitted: false, reason: 'created_year_out_of_range', year };
}
