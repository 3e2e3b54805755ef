#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import { loadConfig, requireSourceCsv, type AppConfig } from '../config/env.js';
import { utcDateStamp } from '../lib/time.js';
import { log, setLogLevel } from '../lib/log.js';
import { loadServiceRequestCsv } from '../ingress/csvLoader.js';
import { rawRecordSchema } from '../ingress/rawRecord.js';
import { readLatestDataset } from '../normalize/io.js';
import { cleanAndValidateServiceRequests } from '../normalize/cleanServiceRequests.js';
import { serviceRequestSchema } from '../canon/serviceRequest.js';
import { summarizeServiceRequests } from '../aggregate/summary.js';
import { writeJsonlSink } from '../sinks/jsonlSink.js';
import { buildWorkbookSheets, writeExcelFile } from '../sinks/excel/index.js';
import { DATASET_NAMES, cleanOutputPaths, rawRecordsPath } from './paths.js';


function setup(): AppConfig {
  const config = loadConfig();
  setLogLevel(config.LOG_LEVEL);
  return config;
}

async function runIngest(options: { file?: string }): Promise<void> {
  const config = setup();
  const sourcePath = requireSourceCsv(config, options.file);

  log.info('reading service request extract', { sourcePath });
  const rawRecords = await loadServiceRequestCsv(sourcePath);

  const outPath = rawRecordsPath(config.resolvedDataDir, utcDateStamp());
  await writeJsonlSink(outPath, rawRecords);
  log.info('wrote raw service requests', { count: rawRecords.length, outPath });
}

async function runClean(): Promise<void> {
  const config = setup();
  const rawBase = path.join(config.resolvedDataDir, 'raw');

  const { dateDir, records: rawRecords } = await readLatestDataset(
    rawBase,
    DATASET_NAMES.raw,
    rawRecordSchema,
    'Run ingest first.'
  );
  log.info('cleaning raw service requests', { pull: dateDir, count: rawRecords.length });

  const day = utcDateStamp();
  // Throws on a schema violation before anything below is written.
  const cleaned = cleanAndValidateServiceRequests(rawRecords, { runDate: day });
  const outputs = cleanOutputPaths(config.resolvedDataDir, day);

  await writeJsonlSink(outputs.records, cleaned.serviceRequests);
  await writeJsonlSink(outputs.qualityIssues, cleaned.qualityIssues);

  const { counts, flags } = cleaned.qualityReport;
  console.log(
    `[quality] raw_total=${counts.raw_total} duplicates_dropped=${counts.duplicates_dropped} excluded_missing_unique_key=${counts.excluded_missing_unique_key} excluded_created_year_out_of_range=${counts.excluded_created_year_out_of_range} cleaned_total=${counts.cleaned_total} issues_total=${counts.issues_total}`
  );
  console.log(
    `[flags] valid_borough=${flags.records_with_valid_borough} valid_coordinates=${flags.records_with_valid_coordinates} valid_created_date=${flags.records_with_valid_created_date} closed_date=${flags.records_with_closed_date}`
  );

  log.info('cleaning finished', {
    serviceRequests: cleaned.serviceRequests.length,
    qualityIssues: cleaned.qualityIssues.length,
    issuesByRule: counts.issues_by_rule
  });
}

async function loadLatestCanon(config: AppConfig) {
  const canonBase = path.join(config.resolvedDataDir, 'canon');
  return readLatestDataset(canonBase, DATASET_NAMES.canon, serviceRequestSchema, 'Run clean first.');
}

async function runSummary(): Promise<void> {
  const config = setup();
  const { dateDir, records } = await loadLatestCanon(config);
  const summary = summarizeServiceRequests(records, { topN: config.TOP_N_COMPLAINT_TYPES });

  log.info('summary of cleaned service requests', { pull: dateDir });
  console.log(JSON.stringify(summary, null, 2));
}

async function runExportExcel(options: { out?: string }): Promise<void> {
  const config = setup();
  const { dateDir, records } = await loadLatestCanon(config);
  const summary = summarizeServiceRequests(records, { topN: config.TOP_N_COMPLAINT_TYPES });

  const outputPath = options.out
    ? path.resolve(options.out)
    : path.join(config.resolvedDataDir, 'exports', dateDir, 'service-requests.xlsx');
  await writeExcelFile({
    sheets: buildWorkbookSheets({ serviceRequests: records, summary }),
    outputPath
  });
  log.info('wrote excel export', { outputPath, rows: records.length });
}

async function runAll(options: { file?: string }): Promise<void> {
  await runIngest(options);
  await runClean();
  await runSummary();
}

const program = new Command();
program.name('sr-etl').description('Clean and summarize NYC 311 service requests').version('0.1.0');

program
  .command('ingest')
  .description('Load the 311 CSV extract into raw JSONL records')
  .option('-f, --file <path>', 'CSV file to read (defaults to SOURCE_CSV)')
  .action(runIngest);
program.command('clean').description('Dedupe, filter, normalize and flag the latest raw pull').action(runClean);
program.command('summary').description('Print summary statistics for the latest cleaned table').action(runSummary);
program
  .command('export:excel')
  .description('Write the latest cleaned table and its summary to an Excel workbook')
  .option('-o, --out <path>', 'Workbook path')
  .action(runExportExcel);
program
  .command('run')
  .description('Run ingest, clean, then summary')
  .option('-f, --file <path>', 'CSV file to read (defaults to SOURCE_CSV)')
  .action(runAll);

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error('command failed', error);
  process.exitCode = 1;
});
