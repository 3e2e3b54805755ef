import { roundTo } from '../canon/rules.js';
import type { ServiceRequest } from '../canon/serviceRequest.js';
import type { Borough } from '../config/cleaningRules.js';
import { ServiceRequestIndex } from './indexes.js';

export interface BoroughShare {
  borough: Borough;
  count: number;
  percentage: number;
}

export interface ComplaintTypeShare {
  complaint_type: string;
  count: number;
  percentage: number;
}

export interface ServiceRequestSummary {
  total_records: number;
  records_with_borough: number;
  records_with_coordinates: number;
  records_with_closed_date: number;
  distinct_boroughs: number;
  distinct_complaint_types: number;
  borough_distribution: BoroughShare[];
  top_complaint_types: ComplaintTypeShare[];
  monthly_volume: Array<{ month: string; count: number }>;
  response_time_hours: {
    records: number;
    mean: number | null;
    median: number | null;
  };
}

export function percentageOf(count: number, total: number): number {
  return total === 0 ? 0 : roundTo((100 * count) / total, 2);
}

// Descending count; equal counts fall back to ascending name.
function rankCounts<K extends string>(counts: Map<K, number>): Array<[K, number]> {
  return [...counts].sort(([leftName, leftCount], [rightName, rightCount]) => {
    if (leftCount !== rightCount) {
      return rightCount - leftCount;
    }
    return leftName < rightName ? -1 : leftName > rightName ? 1 : 0;
  });
}

function median(sorted: readonly number[]): number | null {
  if (sorted.length === 0) {
    return null;
  }
  const mid = sorted.length >>> 1;
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function summarizeServiceRequests(
  records: readonly ServiceRequest[],
  options: { topN?: number; index?: ServiceRequestIndex } = {}
): ServiceRequestSummary {
  const topN = options.topN ?? 15;
  const index = options.index ?? new ServiceRequestIndex(records);
  const total = records.length;

  const boroughCounts = index.boroughCounts();
  const complaintTypeCounts = index.complaintTypeCounts();

  const responseTimes = records
    .map((record) => record.response_time_hours)
    .filter((hours): hours is number => hours !== null)
    .sort((left, right) => left - right);
  const responseMedian = median(responseTimes);

  return {
    total_records: total,
    records_with_borough: records.filter((record) => record.has_valid_borough).length,
    records_with_coordinates: records.filter((record) => record.has_valid_coordinates).length,
    records_with_closed_date: records.filter((record) => record.has_closed_date).length,
    distinct_boroughs: boroughCounts.size,
    distinct_complaint_types: complaintTypeCounts.size,
    borough_distribution: rankCounts(boroughCounts).map(([borough, count]) => ({
      borough,
      count,
      percentage: percentageOf(count, total)
    })),
    top_complaint_types: rankCounts(complaintTypeCounts)
      .slice(0, topN)
      .map(([complaintType, count]) => ({
        complaint_type: complaintType,
        count,
        percentage: percentageOf(count, total)
      })),
    monthly_volume: index.monthlyVolume(),
    response_time_hours: {
      records: responseTimes.length,
      mean:
        responseTimes.length === 0
          ? null
          : roundTo(responseTimes.reduce((sum, hours) => sum + hours, 0) / responseTimes.length, 2),
      median: responseMedian === null ? null : roundTo(responseMedian, 2)
    }
  };
}
