export type QualityRule =
  | 'MISSING_UNIQUE_KEY'
  | 'DUPLICATE_UNIQUE_KEY'
  | 'CREATED_YEAR_OUT_OF_RANGE'
  | 'UNPARSEABLE_CREATED_DATE'
  | 'UNPARSEABLE_CLOSED_DATE'
  | 'MALFORMED_COORDINATES'
  | 'COORDINATES_OUT_OF_BOUNDS'
  | 'UNRECOGNIZED_BOROUGH'
  | 'NEGATIVE_RESPONSE_TIME';

export interface QualityIssue {
  issue_id: string;
  run_date: string;
  dataset: 'serviceRequests';
  entity_id: string;
  severity: 'warn' | 'error';
  rule: QualityRule;
  message: string;
  sample?: Record<string, unknown>;
}

export interface RunQualityReport {
  run_date: string;
  counts: {
    raw_total: number;
    duplicates_dropped: number;
    excluded_missing_unique_key: number;
    excluded_created_year_out_of_range: number;
    cleaned_total: number;
    issues_total: number;
    issues_by_rule: Partial<Record<QualityRule, number>>;
  };
  flags: {
    records_with_valid_borough: number;
    records_with_valid_coordinates: number;
    records_with_valid_created_date: number;
    records_with_closed_date: number;
  };
}
