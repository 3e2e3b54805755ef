import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  DATA_DIR: z.string().min(1).default('./data'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  TOP_N_COMPLAINT_TYPES: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().positive().default(15)
  ),
  SOURCE_CSV: z.string().optional()
});

export type AppConfig = z.infer<typeof envSchema> & {
  resolvedDataDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const sourceCsv = parsed.SOURCE_CSV?.trim();

  return {
    ...parsed,
    SOURCE_CSV: sourceCsv && sourceCsv.length > 0 ? sourceCsv : undefined,
    resolvedDataDir: path.resolve(parsed.DATA_DIR)
  };
}

export function requireSourceCsv(config: AppConfig, override?: string): string {
  const candidate = override?.trim() || config.SOURCE_CSV;
  if (!candidate) {
    throw new Error('No source CSV given. Pass --file <path> or set SOURCE_CSV in the environment.');
  }
  return path.resolve(candidate);
}
