import { describe, expect, it } from 'vitest';
import {
  bucketCategory,
  extractYear,
  normalizeBorough,
  parseDate,
  validateCoordinates
} from '../canon/fields.js';
import { defaultCleaningRules, type Borough, type CleaningRules } from '../config/cleaningRules.js';

describe('parseDate', () => {
  it('reformats the source layout into a sortable 24-hour timestamp', () => {
    expect(parseDate('03/15/2015 10:00:00 AM')).toBe('2015-03-15T10:00:00');
    expect(parseDate('03/15/2015 01:05:00 PM')).toBe('2015-03-15T13:05:00');
    expect(parseDate('12/31/2019 12:00:00 PM')).toBe('2019-12-31T12:00:00');
    expect(parseDate('01/01/2020 12:30:05 AM')).toBe('2020-01-01T00:30:05');
  });

  it('accepts a bare date and a 24-hour time without marker', () => {
    expect(parseDate('07/04/2016')).toBe('2016-07-04');
    expect(parseDate('07/04/2016 18:45:00')).toBe('2016-07-04T18:45:00');
  });

  it('returns null for absent values', () => {
    expect(parseDate('')).toBeNull();
    expect(parseDate('   ')).toBeNull();
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
  });

  it('returns null instead of garbage for values of the wrong shape', () => {
    expect(parseDate('2015-03-15 10:00:00')).toBeNull();
    expect(parseDate('3/15/2015 10:00:00 AM')).toBeNull();
    expect(parseDate('13/15/2015 10:00:00 AM')).toBeNull();
    expect(parseDate('03/15/2015 13:00:00 PM')).toBeNull();
    expect(parseDate('not a date')).toBeNull();
  });

  it('rejects days past the end of the month', () => {
    expect(parseDate('02/31/2015 10:00:00 AM')).toBeNull();
    expect(parseDate('04/31/2015')).toBeNull();
    expect(parseDate('02/29/2015')).toBeNull();
    expect(parseDate('02/29/2016 10:00:00 AM')).toBe('2016-02-29T10:00:00');
    expect(parseDate('02/29/2000')).toBe('2000-02-29');
    expect(parseDate('02/29/1900')).toBeNull();
    expect(parseDate('04/30/2015')).toBe('2015-04-30');
  });
});

describe('extractYear', () => {
  it('reads the year from characters 7-10', () => {
    expect(extractYear('03/15/2009 10:00:00 AM')).toBe(2009);
    expect(extractYear('03/15/2015')).toBe(2015);
  });

  it('returns null when that slice does not start with digits', () => {
    expect(extractYear('')).toBeNull();
    expect(extractYear('unknown')).toBeNull();
  });
});

describe('normalizeBorough', () => {
  it('maps aliases case-insensitively onto canonical boroughs', () => {
    expect(normalizeBorough('the bronx')).toBe('BRONX');
    expect(normalizeBorough('Kings')).toBe('BROOKLYN');
    expect(normalizeBorough('new york')).toBe('MANHATTAN');
    expect(normalizeBorough('queens')).toBe('QUEENS');
    expect(normalizeBorough('Richmond')).toBe('STATEN ISLAND');
    expect(normalizeBorough('staten island')).toBe('STATEN ISLAND');
  });

  it('treats empty and unspecified values as absent', () => {
    expect(normalizeBorough('')).toBeNull();
    expect(normalizeBorough(null)).toBeNull();
    expect(normalizeBorough('Unspecified')).toBeNull();
  });

  it('passes unknown values through uppercased', () => {
    expect(normalizeBorough('Yonkers')).toBe('YONKERS');
  });

  it('uses injected alias tables', () => {
    const rules: CleaningRules = {
      ...defaultCleaningRules,
      boroughAliases: new Map<string, Borough>([['BX', 'BRONX']])
    };
    expect(normalizeBorough('bx', rules)).toBe('BRONX');
    expect(normalizeBorough('the bronx', rules)).toBe('THE BRONX');
  });
});

describe('validateCoordinates', () => {
  it('keeps a pair inside the bounding box', () => {
    expect(validateCoordinates('40.7128', '-74.0060')).toEqual({
      status: 'valid',
      latitude: 40.7128,
      longitude: -74.006
    });
  });

  it('includes the box edges', () => {
    expect(validateCoordinates('40.4', '-73.6').status).toBe('valid');
    expect(validateCoordinates('40.95', '-74.3').status).toBe('valid');
  });

  it('drops both values when either is out of bounds', () => {
    expect(validateCoordinates('41.5', '-73.9')).toEqual({ status: 'out_of_bounds' });
    expect(validateCoordinates('40.7', '-75.0')).toEqual({ status: 'out_of_bounds' });
  });

  it('distinguishes missing from malformed input', () => {
    expect(validateCoordinates('', '-73.9')).toEqual({ status: 'missing' });
    expect(validateCoordinates('40.7', null)).toEqual({ status: 'missing' });
    expect(validateCoordinates('north', '-73.9')).toEqual({ status: 'malformed' });
  });
});

describe('bucketCategory', () => {
  it('keeps allow-listed complaint types', () => {
    expect(bucketCategory('Rodent')).toBe('Rodent');
    expect(bucketCategory('HEAT/HOT WATER')).toBe('HEAT/HOT WATER');
  });

  it('groups everything else as Other', () => {
    expect(bucketCategory('Graffiti')).toBe('Other');
    expect(bucketCategory('rodent')).toBe('Other');
    expect(bucketCategory(null)).toBe('Other');
  });

  it('uses an injected allow-list', () => {
    const rules: CleaningRules = { ...defaultCleaningRules, categoryAllowList: new Set(['Graffiti']) };
    expect(bucketCategory('Graffiti', rules)).toBe('Graffiti');
    expect(bucketCategory('Rodent', rules)).toBe('Other');
  });
});
