import type { ServiceRequest } from '../canon/serviceRequest.js';
import type { Borough } from '../config/cleaningRules.js';

export interface CreatedRange {
  /** Inclusive lower bound, `YYYY-MM-DD` or a full `YYYY-MM-DDTHH:MM:SS`. */
  from?: string;
  /** Exclusive upper bound, same formats as `from`. */
  to?: string;
}

function pushInto<K>(map: Map<K, ServiceRequest[]>, key: K, record: ServiceRequest): void {
  const bucket = map.get(key);
  if (bucket) {
    bucket.push(record);
  } else {
    map.set(key, [record]);
  }
}

// First position whose created_at is >= bound.
function lowerBound(sorted: readonly ServiceRequest[], bound: string): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const createdAt = sorted[mid].created_at ?? '';
    if (createdAt < bound) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * In-memory lookup structures over a cleaned table: unique key, complaint
 * type, borough and parsed created date. Rebuild after every pipeline run.
 */
export class ServiceRequestIndex {
  private readonly byUniqueKey = new Map<string, ServiceRequest>();
  private readonly byComplaintType = new Map<string, ServiceRequest[]>();
  private readonly byBorough = new Map<Borough, ServiceRequest[]>();
  private readonly byCreatedAt: ServiceRequest[];
  private readonly withoutCreatedAt: ServiceRequest[] = [];

  constructor(records: readonly ServiceRequest[]) {
    const dated: ServiceRequest[] = [];

    for (const record of records) {
      if (this.byUniqueKey.has(record.unique_key)) {
        throw new Error(`Cannot index service requests: unique_key "${record.unique_key}" appears twice.`);
      }
      this.byUniqueKey.set(record.unique_key, record);

      if (record.complaint_type !== null) {
        pushInto(this.byComplaintType, record.complaint_type, record);
      }
      if (record.borough !== null) {
        pushInto(this.byBorough, record.borough, record);
      }
      if (record.created_at !== null) {
        dated.push(record);
      } else {
        this.withoutCreatedAt.push(record);
      }
    }

    this.byCreatedAt = dated.sort((left, right) => {
      const a = left.created_at ?? '';
      const b = right.created_at ?? '';
      if (a !== b) {
        return a < b ? -1 : 1;
      }
      return left.unique_key < right.unique_key ? -1 : left.unique_key > right.unique_key ? 1 : 0;
    });
  }

  get size(): number {
    return this.byUniqueKey.size;
  }

  getByUniqueKey(uniqueKey: string): ServiceRequest | undefined {
    return this.byUniqueKey.get(uniqueKey);
  }

  findByComplaintType(complaintType: string): readonly ServiceRequest[] {
    return this.byComplaintType.get(complaintType) ?? [];
  }

  findByBorough(borough: Borough): readonly ServiceRequest[] {
    return this.byBorough.get(borough) ?? [];
  }

  findCreatedInRange(range: CreatedRange): readonly ServiceRequest[] {
    const start = range.from === undefined ? 0 : lowerBound(this.byCreatedAt, range.from);
    const end = range.to === undefined ? this.byCreatedAt.length : lowerBound(this.byCreatedAt, range.to);
    return end > start ? this.byCreatedAt.slice(start, end) : [];
  }

  findWithCreatedDate(present: boolean): readonly ServiceRequest[] {
    return present ? this.byCreatedAt : this.withoutCreatedAt;
  }

  complaintTypeCounts(): Map<string, number> {
    return new Map([...this.byComplaintType].map(([type, records]) => [type, records.length]));
  }

  boroughCounts(): Map<Borough, number> {
    return new Map([...this.byBorough].map(([borough, records]) => [borough, records.length]));
  }

  /** Records per `YYYY-MM` of the parsed created date, in calendar order. */
  monthlyVolume(): Array<{ month: string; count: number }> {
    const volume: Array<{ month: string; count: number }> = [];
    for (const record of this.byCreatedAt) {
      const month = (record.created_at ?? '').slice(0, 7);
      const last = volume[volume.length - 1];
      if (last && last.month === month) {
        last.count += 1;
      } else {
        volume.push({ month, count: 1 });
      }
    }
    return volume;
  }
}
