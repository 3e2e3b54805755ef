import { z } from 'zod';
import {
  CANONICAL_BOROUGHS,
  defaultCleaningRules,
  isCanonicalBorough,
  type CleaningRules
} from '../config/cleaningRules.js';
import { RAW_COLUMNS, rawValue, type RawColumnName, type RawRecord } from '../ingress/rawRecord.js';
import { bucketCategory, normalizeBorough, parseDate, validateCoordinates } from './fields.js';
import { computeQualityFlags } from './qualityFlags.js';
import { normalizeNullableString, roundTo } from './rules.js';

export const serviceRequestSchema = z.object({
  unique_key: z.string().min(1),
  created_date_raw: z.string().nullable(),
  closed_date_raw: z.string().nullable(),
  created_at: z.string().nullable(),
  closed_at: z.string().nullable(),
  agency: z.string().nullable(),
  agency_name: z.string().nullable(),
  complaint_type: z.string().nullable(),
  complaint_category: z.string(),
  descriptor: z.string().nullable(),
  location_type: z.string().nullable(),
  incident_zip: z.string().nullable(),
  incident_address: z.string().nullable(),
  city: z.string().nullable(),
  borough: z.enum(CANONICAL_BOROUGHS).nullable(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  status: z.string().nullable(),
  resolution_description: z.string().nullable(),
  resolution_action_date: z.string().nullable(),
  community_board: z.string().nullable(),
  response_time_hours: z.number().nullable(),
  has_valid_borough: z.boolean(),
  has_valid_coordinates: z.boolean(),
  has_valid_created_date: z.boolean(),
  has_closed_date: z.boolean()
});

export type ServiceRequest = z.infer<typeof serviceRequestSchema>;

const HOUR_MS = 60 * 60 * 1000;

export function timestampToEpochMs(timestamp: string | null): number | null {
  if (timestamp === null) {
    return null;
  }
  const iso = timestamp.length === 10 ? `${timestamp}T00:00:00Z` : `${timestamp}Z`;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : ms;
}

export function computeResponseTimeHours(createdAt: string | null, closedAt: string | null): number | null {
  const startMs = timestampToEpochMs(createdAt);
  const endMs = timestampToEpochMs(closedAt);
  if (startMs === null || endMs === null || endMs < startMs) {
    return null;
  }
  return roundTo((endMs - startMs) / HOUR_MS, 2);
}

function text(record: RawRecord, column: RawColumnName): string | null {
  return normalizeNullableString(rawValue(record, column));
}

/** Returns null when the row has no unique key; such rows never reach the cleaned table. */
export function buildServiceRequest(
  record: RawRecord,
  rules: CleaningRules = defaultCleaningRules
): ServiceRequest | null {
  const uniqueKey = text(record, RAW_COLUMNS.uniqueKey);
  if (uniqueKey === null) {
    return null;
  }

  const createdDateRaw = rawValue(record, RAW_COLUMNS.createdDate);
  const closedDateRaw = rawValue(record, RAW_COLUMNS.closedDate);
  const createdAt = parseDate(createdDateRaw);
  const closedAt = parseDate(closedDateRaw);

  const complaintType = text(record, RAW_COLUMNS.complaintType);
  const borough = normalizeBorough(rawValue(record, RAW_COLUMNS.borough), rules);
  const coordinates = validateCoordinates(
    rawValue(record, RAW_COLUMNS.latitude),
    rawValue(record, RAW_COLUMNS.longitude),
    rules
  );
  const flags = computeQualityFlags({
    borough,
    coordinates,
    rawCreatedDate: createdDateRaw,
    rawClosedDate: closedDateRaw
  });

  return serviceRequestSchema.parse({
    unique_key: uniqueKey,
    created_date_raw: normalizeNullableString(createdDateRaw),
    closed_date_raw: normalizeNullableString(closedDateRaw),
    created_at: createdAt,
    closed_at: closedAt,
    agency: text(record, RAW_COLUMNS.agency),
    agency_name: text(record, RAW_COLUMNS.agencyName),
    complaint_type: complaintType,
    complaint_category: bucketCategory(complaintType, rules),
    descriptor: text(record, RAW_COLUMNS.descriptor),
    location_type: text(record, RAW_COLUMNS.locationType),
    incident_zip: text(record, RAW_COLUMNS.incidentZip),
    incident_address: text(record, RAW_COLUMNS.incidentAddress),
    city: text(record, RAW_COLUMNS.city),
    borough: isCanonicalBorough(borough) ? borough : null,
    latitude: coordinates.status === 'valid' ? coordinates.latitude : null,
    longitude: coordinates.status === 'valid' ? coordinates.longitude : null,
    status: text(record, RAW_COLUMNS.status),
    resolution_description: text(record, RAW_COLUMNS.resolutionDescription),
    resolution_action_date: text(record, RAW_COLUMNS.resolutionActionDate),
    community_board: text(record, RAW_COLUMNS.communityBoard),
    response_time_hours: computeResponseTimeHours(createdAt, closedAt),
    ...flags
  });
}
