export type FactorName = 'temperature' | 'windSpeed' | 'precipitation' | 'cloudCover' | 'visibility';

export const FACTOR_NAMES: readonly FactorName[] = ['temperature', 'windSpeed', 'precipitation', 'cloudCover', 'visibility'];

export type NumericRange = readonly [min: number, max: number];

/** Scored against an optimal band and a wider acceptable band. */
export interface RangeThreshold {
  kind: 'range';
  weight: number;
  optimal: NumericRange;
  acceptable: NumericRange;
}

/** Lower is better: precipitation. */
export interface CeilingThreshold {
  kind: 'ceiling';
  weight: number;
  optimal: number;
  acceptable: number;
}

/** Higher is better: visibility. */
export interface FloorThreshold {
  kind: 'floor';
  weight: number;
  optimal: number;
  acceptable: number;
}

export type FactorThreshold = RangeThreshold | CeilingThreshold | FloorThreshold;

export interface EventTypeProfile {
  label: string;
  temperature: RangeThreshold;
  windSpeed: RangeThreshold;
  precipitation: CeilingThreshold;
  cloudCover: RangeThreshold;
  visibility?: FloorThreshold;
}

export type ProfileTable = Readonly<Record<string, EventTypeProfile>>;

const range = (weight: number, optimal: NumericRange, acceptable: NumericRange): RangeThreshold => ({
  kind: 'range',
  weight,
  optimal,
  acceptable,
});

const ceiling = (weight: number, optimal: number, acceptable: number): CeilingThreshold => ({
  kind: 'ceiling',
  weight,
  optimal,
  acceptable,
});

const floor = (weight: number, optimal: number, acceptable: number): FloorThreshold => ({
  kind: 'floor',
  weight,
  optimal,
  acceptable,
});

export const DEFAULT_EVENT_TYPE = 'other';

// Units: temperature °C, wind m/s, precipitation mm, cloud cover %, visibility m.
export const EVENT_TYPE_PROFILES = {
  outdoor_sports: {
    label: 'Outdoor sports',
    temperature: range(0.3, [18, 25], [15, 30]),
    windSpeed: range(0.2, [0, 15], [0, 20]),
    precipitation: ceiling(0.3, 0, 0.5),
    cloudCover: range(0.2, [0, 30], [0, 50]),
  },
  formal_events: {
    label: 'Formal event',
    temperature: range(0.25, [20, 24], [18, 26]),
    windSpeed: range(0.15, [0, 10], [0, 15]),
    precipitation: ceiling(0.3, 0, 1),
    cloudCover: range(0.15, [0, 40], [0, 60]),
    visibility: floor(0.15, 8000, 5000),
  },
  cricket: {
    label: 'Cricket',
    temperature: range(0.25, [18, 28], [15, 30]),
    windSpeed: range(0.2, [0, 8], [0, 12]),
    precipitation: ceiling(0.3, 0, 0.5),
    cloudCover: range(0.1, [0, 50], [0, 70]),
    visibility: floor(0.15, 10000, 6000),
  },
  wedding: {
    label: 'Wedding',
    temperature: range(0.3, [18, 28], [15, 30]),
    windSpeed: range(0.2, [0, 6], [0, 10]),
    precipitation: ceiling(0.35, 0, 0.2),
    cloudCover: range(0.15, [0, 30], [0, 60]),
  },
  hiking: {
    label: 'Hiking',
    temperature: range(0.25, [10, 25], [5, 30]),
    windSpeed: range(0.2, [0, 10], [0, 15]),
    precipitation: ceiling(0.25, 0, 2),
    cloudCover: range(0.1, [0, 70], [0, 90]),
    visibility: floor(0.2, 8000, 3000),
  },
  corporate: {
    label: 'Corporate',
    temperature: range(0.3, [18, 26], [12, 32]),
    windSpeed: range(0.2, [0, 12], [0, 18]),
    precipitation: ceiling(0.3, 0, 1),
    cloudCover: range(0.2, [0, 80], [0, 100]),
  },
  other: {
    label: 'Other',
    temperature: range(0.3, [15, 30], [10, 35]),
    windSpeed: range(0.2, [0, 12], [0, 20]),
    precipitation: ceiling(0.3, 0, 1),
    cloudCover: range(0.2, [0, 70], [0, 90]),
  },
} as const satisfies ProfileTable;

export type KnownEventType = keyof typeof EVENT_TYPE_PROFILES;

export const EVENT_TYPES: readonly KnownEventType[] = [
  'outdoor_sports',
  'formal_events',
  'cricket',
  'wedding',
  'hiking',
  'corporate',
  'other',
];

export interface ResolvedProfile {
  eventType: string;
  profile: EventTypeProfile;
}

/**
 * Looks up a profile by event type, case-insensitively. Unknown types resolve
 * to the default profile of the table.
 */
export const resolveProfile = (eventType: string, profiles: ProfileTable = EVENT_TYPE_PROFILES): ResolvedProfile => {
  if (typeof eventType !== 'string') {
    throw new TypeError('eventType must be a string');
  }
  const key = eventType.trim().toLowerCase();
  if (Object.prototype.hasOwnProperty.call(profiles, key)) {
    return { eventType: key, profile: profiles[key] };
  }
  if (Object.prototype.hasOwnProperty.call(profiles, DEFAULT_EVENT_TYPE)) {
    return { eventType: DEFAULT_EVENT_TYPE, profile: profiles[DEFAULT_EVENT_TYPE] };
  }
  return { eventType: DEFAULT_EVENT_TYPE, profile: EVENT_TYPE_PROFILES.other };
};

export const activeFactors = (profile: EventTypeProfile): { factor: FactorName; threshold: FactorThreshold }[] =>
  FACTOR_NAMES.flatMap((factor) => {
    const threshold = profile[factor];
    return threshold && threshold.weight > 0 ? [{ factor, threshold }] : [];
  });
