import { normalizeBorough, validateCoordinates } from '../../canon/fields.js';
import { normalizeNullableString } from '../../canon/rules.js';
import { timestampToEpochMs, type ServiceRequest } from '../../canon/serviceRequest.js';
import { defaultCleaningRules, isCanonicalBorough, type CleaningRules } from '../../config/cleaningRules.js';
import { RAW_COLUMNS, rawValue, type RawRecord } from '../../ingress/rawRecord.js';
import { createIssue } from './issue.js';
import type { QualityIssue } from './types.js';

export interface CleanedRow {
  raw: RawRecord;
  cleaned: ServiceRequest;
}

/** Field-level checks on admitted rows. None of these remove a record. */
export function evaluateServiceRequestsQuality(args: {
  rows: CleanedRow[];
  runDate: string;
  rules?: CleaningRules;
}): { issues: QualityIssue[] } {
  const rules = args.rules ?? defaultCleaningRules;
  const issues: QualityIssue[] = [];

  for (const { raw, cleaned } of args.rows) {
    const entityId = cleaned.unique_key;

    if (cleaned.created_date_raw !== null && cleaned.created_at === null) {
      issues.push(
        createIssue({
          runDate: args.runDate,
          entityId,
          severity: 'warn',
          rule: 'UNPARSEABLE_CREATED_DATE',
          message: 'Created date is present but does not match MM/DD/YYYY HH:MM:SS AM/PM.',
          sample: { created_date_raw: cleaned.created_date_raw }
        })
      );
    }

    if (cleaned.closed_date_raw !== null && cleaned.closed_at === null) {
      issues.push(
        createIssue({
          runDate: args.runDate,
          entityId,
          severity: 'warn',
          rule: 'UNPARSEABLE_CLOSED_DATE',
          message: 'Closed date is present but does not match MM/DD/YYYY HH:MM:SS AM/PM.',
          sample: { closed_date_raw: cleaned.closed_date_raw }
        })
      );
    }

    const rawLatitude = rawValue(raw, RAW_COLUMNS.latitude);
    const rawLongitude = rawValue(raw, RAW_COLUMNS.longitude);
    const coordinates = validateCoordinates(rawLatitude, rawLongitude, rules);
    if (coordinates.status === 'malformed' || coordinates.status === 'out_of_bounds') {
      const malformed = coordinates.status === 'malformed';
      issues.push(
        createIssue({
          runDate: args.runDate,
          entityId,
          severity: 'warn',
          rule: malformed ? 'MALFORMED_COORDINATES' : 'COORDINATES_OUT_OF_BOUNDS',
          message: malformed
            ? 'Latitude or longitude is not numeric; both were dropped.'
            : 'Coordinates fall outside the NYC bounding box; both were dropped.',
          sample: { latitude: rawLatitude, longitude: rawLongitude }
        })
      );
    }

    const rawBorough = rawValue(raw, RAW_COLUMNS.borough);
    const borough = normalizeBorough(rawBorough, rules);
    if (borough !== null && !isCanonicalBorough(borough)) {
      issues.push(
        createIssue({
          runDate: args.runDate,
          entityId,
          severity: 'warn',
          rule: 'UNRECOGNIZED_BOROUGH',
          message: 'Borough is not one of the five NYC boroughs or a known alias.',
          sample: { borough: normalizeNullableString(rawBorough) }
        })
      );
    }

    const startMs = timestampToEpochMs(cleaned.created_at);
    const endMs = timestampToEpochMs(cleaned.closed_at);
    if (startMs !== null && endMs !== null && endMs < startMs) {
      issues.push(
        createIssue({
          runDate: args.runDate,
          entityId,
          severity: 'warn',
          rule: 'NEGATIVE_RESPONSE_TIME',
          message: 'Closed date is earlier than created date.',
          sample: { created_at: cleaned.created_at, closed_at: cleaned.closed_at }
        })
      );
    }
  }

  return { issues };
}
