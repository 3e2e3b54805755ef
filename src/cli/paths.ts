import path from 'node:path';

export const DATASET_NAMES = {
  raw: 'service_requests',
  canon: 'service_requests',
  qualityIssues: 'qualityIssues'
} as const;

export function rawRecordsPath(dataDir: string, day: string): string {
  return path.join(dataDir, 'raw', DATASET_NAMES.raw, day, 'records.jsonl');
}

/** Both outputs of one `clean` run land under the same date directory. */
export function cleanOutputPaths(dataDir: string, day: string): { records: string; qualityIssues: string } {
  const canonBase = path.join(dataDir, 'canon');
  return {
    records: path.join(canonBase, DATASET_NAMES.canon, day, 'records.jsonl'),
    qualityIssues: path.join(canonBase, DATASET_NAMES.qualityIssues, day, 'qualityIssues.jsonl')
  };
}
