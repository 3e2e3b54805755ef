import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig, requireSourceCsv } from '../config/env.js';

describe('loadConfig', () => {
  it('fills defaults', () => {
    const config = loadConfig({});

    expect(config.DATA_DIR).toBe('./data');
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.TOP_N_COMPLAINT_TYPES).toBe(15);
    expect(config.SOURCE_CSV).toBeUndefined();
    expect(config.resolvedDataDir).toBe(path.resolve('./data'));
  });

  it('coerces numeric settings and validates the log level', () => {
    expect(loadConfig({ TOP_N_COMPLAINT_TYPES: '5', LOG_LEVEL: 'debug' })).toMatchObject({
      TOP_N_COMPLAINT_TYPES: 5,
      LOG_LEVEL: 'debug'
    });
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow();
    expect(() => loadConfig({ TOP_N_COMPLAINT_TYPES: '0' })).toThrow();
  });

  it('falls back to the default when a numeric setting is left empty', () => {
    expect(loadConfig({ TOP_N_COMPLAINT_TYPES: '' }).TOP_N_COMPLAINT_TYPES).toBe(15);
    expect(loadConfig({ TOP_N_COMPLAINT_TYPES: '  ' }).TOP_N_COMPLAINT_TYPES).toBe(15);
  });

  it('resolves the source CSV from an override or the environment', () => {
    const config = loadConfig({ SOURCE_CSV: 'extract.csv' });

    expect(requireSourceCsv(config)).toBe(path.resolve('extract.csv'));
    expect(requireSourceCsv(config, 'other.csv')).toBe(path.resolve('other.csv'));
    expect(() => requireSourceCsv(loadConfig({ SOURCE_CSV: '  ' }))).toThrow(/No source CSV given/);
  });
});
