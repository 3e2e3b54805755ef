export const CANONICAL_BOROUGHS = [
  'BRONX',
  'BROOKLYN',
  'MANHATTAN',
  'QUEENS',
  'STATEN ISLAND'
] as const;

export type Borough = (typeof CANONICAL_BOROUGHS)[number];

export interface Bounds {
  min: number;
  max: number;
}

export interface CleaningRules {
  /** Complaint types that keep their own category; everything else becomes "Other". */
  categoryAllowList: ReadonlySet<string>;
  /** Uppercased raw borough spelling -> canonical borough. */
  boroughAliases: ReadonlyMap<string, Borough>;
  /** Uppercased values that mean "no borough". */
  unspecifiedBoroughs: ReadonlySet<string>;
  latitude: Bounds;
  longitude: Bounds;
  createdYear: Bounds;
}

export const OTHER_CATEGORY = 'Other';

export const defaultCleaningRules: CleaningRules = Object.freeze({
  categoryAllowList: new Set([
    'HEAT/HOT WATER',
    'Noise - Residential',
    'Noise - Street/Sidewalk',
    'Blocked Driveway',
    'Illegal Parking',
    'Street Condition',
    'Street Light Condition',
    'UNSANITARY CONDITION',
    'Water System',
    'PLUMBING',
    'PAINT/PLASTER',
    'Noise - Commercial',
    'Noise',
    'Rodent',
    'Sewer',
    'Dirty Conditions'
  ]),
  boroughAliases: new Map<string, Borough>([
    ['BRONX', 'BRONX'],
    ['THE BRONX', 'BRONX'],
    ['BROOKLYN', 'BROOKLYN'],
    ['KINGS', 'BROOKLYN'],
    ['MANHATTAN', 'MANHATTAN'],
    ['NEW YORK', 'MANHATTAN'],
    ['QUEENS', 'QUEENS'],
    ['STATEN ISLAND', 'STATEN ISLAND'],
    ['RICHMOND', 'STATEN ISLAND']
  ]),
  unspecifiedBoroughs: new Set(['UNSPECIFIED']),
  latitude: { min: 40.4, max: 40.95 },
  longitude: { min: -74.3, max: -73.6 },
  createdYear: { min: 2010, max: 2026 }
});

const CANONICAL_BOROUGH_SET: ReadonlySet<string> = new Set(CANONICAL_BOROUGHS);

export function isCanonicalBorough(value: string | null): value is Borough {
  return value !== null && CANONICAL_BOROUGH_SET.has(value);
}
