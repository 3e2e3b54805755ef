import { OTHER_CATEGORY, defaultCleaningRules, type CleaningRules } from '../config/cleaningRules.js';
import { normalizeNullableNumber, normalizeNullableString, withinBounds } from './rules.js';

// MM/DD/YYYY, optionally followed by HH:MM:SS and an AM/PM marker.
const SOURCE_DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})(?:\s+(\d{2}):(\d{2}):(\d{2})(?:\s*([AaPp][Mm]))?)?$/;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Reformats a source timestamp (`03/15/2015 01:05:00 PM`) into a sortable
 * `2015-03-15T13:05:00`. Dates without a time part come back as `2015-03-15`.
 * Anything that does not match the source layout yields null.
 */
export function parseDate(raw: string | null | undefined): string | null {
  const value = normalizeNullableString(raw);
  if (value === null) {
    return null;
  }

  const match = SOURCE_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const month = Number(match[1]);
  const day = Number(match[2]);
  const year = match[3];
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(Number(year), month)) {
    return null;
  }
  const datePart = `${year}-${pad2(month)}-${pad2(day)}`;

  const hourText: string | undefined = match[4];
  if (hourText === undefined) {
    return datePart;
  }

  let hour = Number(hourText);
  const minute = Number(match[5]);
  const second = Number(match[6]);
  const meridiem: string | undefined = match[7];
  if (minute > 59 || second > 59) {
    return null;
  }

  if (meridiem === undefined) {
    if (hour > 23) {
      return null;
    }
  } else {
    if (hour < 1 || hour > 12) {
      return null;
    }
    const isPm = meridiem.toUpperCase() === 'PM';
    if (hour === 12) {
      hour = isPm ? 12 : 0;
    } else if (isPm) {
      hour += 12;
    }
  }

  return `${datePart}T${pad2(hour)}:${pad2(minute)}:${pad2(second)}`;
}

/**
 * Year taken from characters 7-10 of the raw created date, the way the
 * admission filter has always read it. Returns null when those characters do
 * not start with digits.
 */
export function extractYear(raw: string | null | undefined): number | null {
  const value = normalizeNullableString(raw);
  if (value === null) {
    return null;
  }
  const year = Number.parseInt(value.slice(6, 10), 10);
  return Number.isNaN(year) ? null : year;
}

export function normalizeBorough(
  raw: string | null | undefined,
  rules: CleaningRules = defaultCleaningRules
): string | null {
  const value = normalizeNullableString(raw);
  if (value === null) {
    return null;
  }
  const upper = value.toUpperCase();
  if (rules.unspecifiedBoroughs.has(upper)) {
    return null;
  }
  return rules.boroughAliases.get(upper) ?? upper;
}

export type CoordinateResult =
  | { status: 'valid'; latitude: number; longitude: number }
  | { status: 'missing' | 'malformed' | 'out_of_bounds' };

export function validateCoordinates(
  rawLatitude: string | null | undefined,
  rawLongitude: string | null | undefined,
  rules: CleaningRules = defaultCleaningRules
): CoordinateResult {
  const latitudeText = normalizeNullableString(rawLatitude);
  const longitudeText = normalizeNullableString(rawLongitude);
  if (latitudeText === null || longitudeText === null) {
    return { status: 'missing' };
  }

  const latitude = normalizeNullableNumber(latitudeText);
  const longitude = normalizeNullableNumber(longitudeText);
  if (latitude === null || longitude === null) {
    return { status: 'malformed' };
  }

  if (!withinBounds(latitude, rules.latitude) || !withinBounds(longitude, rules.longitude)) {
    return { status: 'out_of_bounds' };
  }

  return { status: 'valid', latitude, longitude };
}

export function bucketCategory(
  complaintType: string | null | undefined,
  rules: CleaningRules = defaultCleaningRules
): string {
  if (typeof complaintType !== 'string') {
    return OTHER_CATEGORY;
  }
  return rules.categoryAllowList.has(complaintType) ? complaintType : OTHER_CATEGORY;
}
