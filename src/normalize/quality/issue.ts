import { sha256 } from '../../lib/hash.js';
import type { QualityIssue, QualityRule } from './types.js';

const NEW_YORK_DATE_FORMATTER = new Intl.DateTimeFormat('en-CA', {
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  timeZone: 'America/New_York'
});

export function getNewYorkRunDate(now: Date = new Date()): string {
  return NEW_YORK_DATE_FORMATTER.format(now);
}

export function rowEntityId(rowNumber: number): string {
  return `row_${rowNumber}`;
}

export function createIssue(input: {
  runDate: string;
  entityId: string;
  severity: 'warn' | 'error';
  rule: QualityRule;
  message: string;
  sample?: Record<string, unknown>;
}): QualityIssue {
  return {
    issue_id: sha256(`${input.runDate}|serviceRequests|${input.entityId}|${input.rule}`),
    run_date: input.runDate,
    dataset: 'serviceRequests',
    entity_id: input.entityId,
    severity: input.severity,
    rule: input.rule,
    message: input.message,
    sample: input.sample
  };
}
