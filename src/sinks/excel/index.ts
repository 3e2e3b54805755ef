import path from 'node:path';
import ExcelJS from 'exceljs';
import type { ServiceRequestSummary } from '../../aggregate/summary.js';
import type { ServiceRequest } from '../../canon/serviceRequest.js';
import { ensureDir } from '../../lib/fs.js';

export type SheetCell = string | number | boolean | null;
export type SheetRow = Record<string, SheetCell>;

export interface WriteExcelInput {
  sheets: Record<string, SheetRow[]>;
  outputPath: string;
}

export function buildWorkbookSheets(input: {
  serviceRequests: readonly ServiceRequest[];
  summary: ServiceRequestSummary;
}): Record<string, SheetRow[]> {
  const { summary } = input;

  return {
    ServiceRequests: input.serviceRequests.map((record) => ({ ...record })),
    Summary: [
      { metric: 'total_records', value: summary.total_records },
      { metric: 'records_with_borough', value: summary.records_with_borough },
      { metric: 'records_with_coordinates', value: summary.records_with_coordinates },
      { metric: 'records_with_closed_date', value: summary.records_with_closed_date },
      { metric: 'distinct_boroughs', value: summary.distinct_boroughs },
      { metric: 'distinct_complaint_types', value: summary.distinct_complaint_types },
      { metric: 'response_time_mean_hours', value: summary.response_time_hours.mean },
      { metric: 'response_time_median_hours', value: summary.response_time_hours.median }
    ],
    BoroughDistribution: summary.borough_distribution.map((share) => ({ ...share })),
    TopComplaintTypes: summary.top_complaint_types.map((share) => ({ ...share })),
    MonthlyVolume: summary.monthly_volume.map((entry) => ({ ...entry }))
  };
}

export async function writeExcelFile(input: WriteExcelInput): Promise<void> {
  const workbook = new ExcelJS.Workbook();

  for (const [sheetName, rows] of Object.entries(input.sheets)) {
    const worksheet = workbook.addWorksheet(sheetName);
    const firstRow = rows[0];
    if (!firstRow) {
      worksheet.addRow([]);
      continue;
    }

    const columnNames = Object.keys(firstRow);
    worksheet.addRow(columnNames);

    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' }
    };

    for (const row of rows) {
      // Excel has no null; blank cells read back as empty.
      worksheet.addRow(columnNames.map((columnName) => row[columnName] ?? ''));
    }

    worksheet.columns.forEach((column) => {
      column.width = Math.max(column.width ?? 10, 15);
    });
  }

  await ensureDir(path.dirname(input.outputPath));
  await workbook.xlsx.writeFile(input.outputPath);
}
