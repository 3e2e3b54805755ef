import { writeJsonl } from '../lib/fs.js';
import { log } from '../lib/log.js';

export async function writeJsonlSink(filePath: string, records: readonly unknown[]): Promise<number> {
  await writeJsonl(filePath, [...records]);
  log.debug('jsonl sink written', { filePath, count: records.length });
  return records.length;
}
