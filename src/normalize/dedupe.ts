import { normalizeNullableString } from '../canon/rules.js';
import { RAW_COLUMNS, rawValue, type RawRecord } from '../ingress/rawRecord.js';

export interface KeyedRawRecord {
  uniqueKey: string;
  /** 1-based position in the ingested input. */
  rowNumber: number;
  record: RawRecord;
}

export interface DuplicateGroup {
  uniqueKey: string;
  keptRowNumber: number;
  droppedRowNumbers: number[];
}

export interface DedupeOptions {
  /**
   * Rows this returns true for win over rows it returns false for, whatever
   * their content. The fingerprint only decides between rows that agree.
   */
  prefer?: (record: RawRecord) => boolean;
}

export interface DedupeResult {
  survivors: KeyedRawRecord[];
  duplicates: DuplicateGroup[];
  missingKeyRowNumbers: number[];
}

// Column order and input position do not take part, so the survivor of a
// duplicate group depends only on the rows' content.
export function contentFingerprint(record: RawRecord): string {
  const entries = Object.keys(record)
    .sort()
    .map((column) => [column, record[column] ?? null]);
  return JSON.stringify(entries);
}

function preferred(
  candidate: KeyedRawRecord,
  current: KeyedRawRecord,
  prefer: DedupeOptions['prefer']
): boolean {
  if (prefer) {
    const candidatePreferred = prefer(candidate.record);
    if (candidatePreferred !== prefer(current.record)) {
      return candidatePreferred;
    }
  }
  const left = contentFingerprint(candidate.record);
  const right = contentFingerprint(current.record);
  if (left !== right) {
    return left < right;
  }
  return candidate.rowNumber < current.rowNumber;
}

/**
 * Reduces the raw rows to one per unique key. Groups come back in the order
 * their key first appears; rows without a key are reported, not kept.
 */
export function dedupeByUniqueKey(
  records: readonly RawRecord[],
  options: DedupeOptions = {}
): DedupeResult {
  const groups = new Map<string, KeyedRawRecord[]>();
  const missingKeyRowNumbers: number[] = [];

  records.forEach((record, index) => {
    const rowNumber = index + 1;
    const uniqueKey = normalizeNullableString(rawValue(record, RAW_COLUMNS.uniqueKey));
    if (uniqueKey === null) {
      missingKeyRowNumbers.push(rowNumber);
      return;
    }
    const group = groups.get(uniqueKey);
    const keyed = { uniqueKey, rowNumber, record };
    if (group) {
      group.push(keyed);
    } else {
      groups.set(uniqueKey, [keyed]);
    }
  });

  const survivors: KeyedRawRecord[] = [];
  const duplicates: DuplicateGroup[] = [];

  for (const [uniqueKey, group] of groups) {
    let kept = group[0];
    for (const candidate of group.slice(1)) {
      if (preferred(candidate, kept, options.prefer)) {
        kept = candidate;
      }
    }
    survivors.push(kept);

    if (group.length > 1) {
      duplicates.push({
        uniqueKey,
        keptRowNumber: kept.rowNumber,
        droppedRowNumbers: group
          .filter((entry) => entry !== kept)
          .map((entry) => entry.rowNumber)
      });
    }
  }

  return { survivors, duplicates, missingKeyRowNumbers };
}
