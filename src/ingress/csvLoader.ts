import { parse } from 'csv-parse/sync';
import { readText } from '../lib/fs.js';
import { rawRecordSchema, type RawRecord } from './rawRecord.js';

export function parseServiceRequestCsv(csvContent: string): RawRecord[] {
  const content = csvContent.replace(/^\uFEFF/, '');

  const rows: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: false
  });

  return rawRecordSchema.array().parse(rows);
}

export async function loadServiceRequestCsv(filePath: string): Promise<RawRecord[]> {
  return parseServiceRequestCsv(await readText(filePath));
}
