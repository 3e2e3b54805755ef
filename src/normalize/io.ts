import path from 'node:path';
import type { z } from 'zod';
import { readJsonl, listFiles, listSubdirs } from '../lib/fs.js';

export class DatasetNotFoundError extends Error {
  constructor(baseDir: string, dataset: string, hint: string) {
    super(`No "${dataset}" pull found under ${baseDir}. ${hint}`);
    this.name = 'DatasetNotFoundError';
  }
}

export async function latestDatasetDateDir(baseDir: string, dataset: string): Promise<string | null> {
  const datasetPath = path.join(baseDir, dataset);
  const dirs = await listSubdirs(datasetPath);
  if (dirs.length === 0) {
    return null;
  }
  return dirs[dirs.length - 1] ?? null;
}

export async function readDatasetJsonlForDate<T>(
  baseDir: string,
  dataset: string,
  dateDir: string,
  schema: z.ZodType<T>
): Promise<T[]> {
  const targetDir = path.join(baseDir, dataset, dateDir);
  const files = await listFiles(targetDir);
  const jsonlFiles = files.filter((file) => file.endsWith('.jsonl'));

  const all: T[] = [];
  for (const file of jsonlFiles) {
    const records = await readJsonl(path.join(targetDir, file));
    all.push(...schema.array().parse(records));
  }

  return all;
}

export async function readLatestDataset<T>(
  baseDir: string,
  dataset: string,
  schema: z.ZodType<T>,
  hint: string
): Promise<{ dateDir: string; records: T[] }> {
  const dateDir = await latestDatasetDateDir(baseDir, dataset);
  if (!dateDir) {
    throw new DatasetNotFoundError(baseDir, dataset, hint);
  }
  return { dateDir, records: await readDatasetJsonlForDate(baseDir, dataset, dateDir, schema) };
}
