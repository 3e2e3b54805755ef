import { buildServiceRequest, type ServiceRequest } from '../canon/serviceRequest.js';
import { defaultCleaningRules, type CleaningRules } from '../config/cleaningRules.js';
import { RAW_COLUMNS, assertRequiredColumns, rawValue, type RawRecord } from '../ingress/rawRecord.js';
import { admitByCreatedYear } from './admission.js';
import { dedupeByUniqueKey } from './dedupe.js';
import { evaluateQuality, type ExcludedRow } from './quality/index.js';
import { getNewYorkRunDate } from './quality/issue.js';
import type { CleanedRow } from './quality/serviceRequests.js';
import type { QualityIssue, RunQualityReport } from './quality/types.js';

export interface CleanOptions {
  rules?: CleaningRules;
  runDate?: string;
}

export interface CleanedOutput {
  serviceRequests: ServiceRequest[];
}

export interface CleanedWithQuality extends CleanedOutput {
  qualityIssues: QualityIssue[];
  qualityReport: RunQualityReport;
}

/**
 * Runs the full batch: schema check, dedupe on Unique Key, created-year
 * admission, then field normalization and flags for every admitted row.
 *
 * A missing column throws `SchemaViolationError` before any row is touched.
 * Problems inside a row only ever show up as nulls, false flags and quality
 * issues.
 */
export function cleanAndValidateServiceRequests(
  rawRecords: readonly RawRecord[],
  options: CleanOptions = {}
): CleanedWithQuality {
  const rules = options.rules ?? defaultCleaningRules;
  const runDate = options.runDate ?? getNewYorkRunDate();

  assertRequiredColumns(rawRecords);

  // A key with any in-range row keeps one of those, never an excluded one.
  const dedupe = dedupeByUniqueKey(rawRecords, {
    prefer: (record) => admitByCreatedYear(rawValue(record, RAW_COLUMNS.createdDate), rules).admitted
  });
  const excluded: ExcludedRow[] = [];
  const rows: CleanedRow[] = [];

  for (const survivor of dedupe.survivors) {
    const createdDateRaw = rawValue(survivor.record, RAW_COLUMNS.createdDate);
    const decision = admitByCreatedYear(createdDateRaw, rules);
    if (!decision.admitted) {
      excluded.push({
        uniqueKey: survivor.uniqueKey,
        rowNumber: survivor.rowNumber,
        createdDateRaw,
        year: decision.year
      });
      continue;
    }

    const cleaned = buildServiceRequest(survivor.record, rules);
    if (cleaned !== null) {
      rows.push({ raw: survivor.record, cleaned });
    }
  }

  const quality = evaluateQuality({
    rawTotal: rawRecords.length,
    dedupe,
    excluded,
    rows,
    runDate,
    rules
  });

  return {
    serviceRequests: rows.map((row) => row.cleaned),
    qualityIssues: quality.issues,
    qualityReport: quality.report
  };
}

export function cleanServiceRequests(
  rawRecords: readonly RawRecord[],
  options: CleanOptions = {}
): CleanedOutput {
  const { serviceRequests } = cleanAndValidateServiceRequests(rawRecords, options);
  return { serviceRequests };
}
