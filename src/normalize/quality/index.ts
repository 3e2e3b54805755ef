import type { QualityFlags } from '../../canon/qualityFlags.js';
import type { CleaningRules } from '../../config/cleaningRules.js';
import type { DedupeResult } from '../dedupe.js';
import { createIssue, rowEntityId } from './issue.js';
import { evaluateServiceRequestsQuality, type CleanedRow } from './serviceRequests.js';
import type { QualityIssue, QualityRule, RunQualityReport } from './types.js';

export interface ExcludedRow {
  uniqueKey: string;
  rowNumber: number;
  createdDateRaw: string | null;
  year: number | null;
}

export function evaluateQuality(input: {
  rawTotal: number;
  dedupe: DedupeResult;
  excluded: ExcludedRow[];
  rows: CleanedRow[];
  runDate: string;
  rules?: CleaningRules;
}): { issues: QualityIssue[]; report: RunQualityReport } {
  const { runDate } = input;
  const structuralIssues: QualityIssue[] = [];

  for (const rowNumber of input.dedupe.missingKeyRowNumbers) {
    structuralIssues.push(
      createIssue({
        runDate,
        entityId: rowEntityId(rowNumber),
        severity: 'error',
        rule: 'MISSING_UNIQUE_KEY',
        message: 'Row has no Unique Key and will be excluded.',
        sample: { row_number: rowNumber }
      })
    );
  }

  for (const group of input.dedupe.duplicates) {
    structuralIssues.push(
      createIssue({
        runDate,
        entityId: group.uniqueKey,
        severity: 'warn',
        rule: 'DUPLICATE_UNIQUE_KEY',
        message: `Unique Key appears ${group.droppedRowNumbers.length + 1} times; one row was kept.`,
        sample: {
          kept_row_number: group.keptRowNumber,
          dropped_row_numbers: group.droppedRowNumbers
        }
      })
    );
  }

  for (const row of input.excluded) {
    structuralIssues.push(
      createIssue({
        runDate,
        entityId: row.uniqueKey,
        severity: 'error',
        rule: 'CREATED_YEAR_OUT_OF_RANGE',
        message: 'Created date year is unreadable or outside the accepted range; row will be excluded.',
        sample: { created_date_raw: row.createdDateRaw, year: row.year, row_number: row.rowNumber }
      })
    );
  }

  const fieldResult = evaluateServiceRequestsQuality({
    rows: input.rows,
    runDate,
    rules: input.rules
  });

  const issues = [...structuralIssues, ...fieldResult.issues];
  const issuesByRule = issues.reduce<Partial<Record<QualityRule, number>>>((acc, issue) => {
    acc[issue.rule] = (acc[issue.rule] ?? 0) + 1;
    return acc;
  }, {});

  const cleaned = input.rows.map((row) => row.cleaned);
  const countFlag = (flag: keyof QualityFlags): number => cleaned.filter((record) => record[flag]).length;

  return {
    issues,
    report: {
      run_date: runDate,
      counts: {
        raw_total: input.rawTotal,
        duplicates_dropped: input.dedupe.duplicates.reduce(
          (total, group) => total + group.droppedRowNumbers.length,
          0
        ),
        excluded_missing_unique_key: input.dedupe.missingKeyRowNumbers.length,
        excluded_created_year_out_of_range: input.excluded.length,
        cleaned_total: cleaned.length,
        issues_total: issues.length,
        issues_by_rule: issuesByRule
      },
      flags: {
        records_with_valid_borough: countFlag('has_valid_borough'),
        records_with_valid_coordinates: countFlag('has_valid_coordinates'),
        records_with_valid_created_date: countFlag('has_valid_created_date'),
        records_with_closed_date: countFlag('has_closed_date')
      }
    }
  };
}
