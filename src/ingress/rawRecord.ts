import { z } from 'zod';

export const RAW_COLUMNS = {
  uniqueKey: 'Unique Key',
  createdDate: 'Created Date',
  closedDate: 'Closed Date',
  agency: 'Agency',
  agencyName: 'Agency Name',
  complaintType: 'Complaint Type',
  descriptor: 'Descriptor',
  locationType: 'Location Type',
  incidentZip: 'Incident Zip',
  incidentAddress: 'Incident Address',
  city: 'City',
  borough: 'Borough',
  latitude: 'Latitude',
  longitude: 'Longitude',
  status: 'Status',
  resolutionDescription: 'Resolution Description',
  resolutionActionDate: 'Resolution Action Updated Date',
  communityBoard: 'Community Board'
} as const;

export type RawColumnKey = keyof typeof RAW_COLUMNS;
export type RawColumnName = (typeof RAW_COLUMNS)[RawColumnKey];

export const REQUIRED_COLUMNS: readonly RawColumnName[] = Object.values(RAW_COLUMNS);

export const rawRecordSchema = z.record(z.string(), z.string().nullable());

/** One ingested row, column header -> raw cell text. Empty string and null both mean "absent". */
export type RawRecord = z.infer<typeof rawRecordSchema>;

export class SchemaViolationError extends Error {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      `Input is missing required column(s): ${missingColumns.join(', ')}. ` +
        'The cleaning pipeline needs the full 311 column set.'
    );
    this.name = 'SchemaViolationError';
    this.missingColumns = missingColumns;
  }
}

export function rawValue(record: RawRecord, column: RawColumnName): string | null {
  const value = record[column];
  return typeof value === 'string' ? value : null;
}

/**
 * Fails when a required column appears in none of the rows. A row that only
 * lacks some cells (a short CSV line) is not a schema problem; `rawValue`
 * reads those cells as absent.
 */
export function assertRequiredColumns(records: readonly RawRecord[]): void {
  if (records.length === 0) {
    return;
  }
  const seen = new Set<string>();
  for (const record of records) {
    for (const column of Object.keys(record)) {
      seen.add(column);
    }
  }
  const missing = REQUIRED_COLUMNS.filter((column) => !seen.has(column));
  if (missing.length > 0) {
    throw new SchemaViolationError(missing);
  }
}
