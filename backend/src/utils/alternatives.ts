import { createObservation, type WeatherObservation } from './observation.js';
import { computeSuitability, type ConditionLabel, type ScoreBreakdown, type SuitabilityOptions } from './scoring.js';
import { dateKeyInTimeZone, daysBetweenIsoDates, parseIsoTimeToMs } from './time.js';

export const MAX_ALTERNATIVES = 5;

export interface AlternativeCandidate {
  date: string;
  location: string;
  observation: WeatherObservation;
  score: number;
  condition: ConditionLabel;
  breakdown: ScoreBreakdown;
}

export interface RankAlternativesOptions extends SuitabilityOptions {
  baseLocation: string;
  baseDate: string | Date;
  eventType: string;
  forecast: readonly WeatherObservation[];
  currentScore?: number | null;
  limit?: number;
  timeZone?: string | null;
}

const mean = (values: number[]): number | null =>
  values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : null;

const presentValues = (samples: readonly WeatherObservation[], pick: (sample: WeatherObservation) => number | null): number[] =>
  samples.map(pick).filter((value): value is number => value !== null);

const mostFrequentDescription = (samples: readonly WeatherObservation[]): string => {
  const counts = new Map<string, number>();
  for (const sample of samples) {
    if (sample.description) {
      counts.set(sample.description, (counts.get(sample.description) ?? 0) + 1);
    }
  }
  let best = '';
  let bestCount = 0;
  // Map iteration follows insertion order, so the first-seen description wins ties.
  for (const [description, count] of counts) {
    if (count > bestCount) {
      best = description;
      bestCount = count;
    }
  }
  return best;
};

/**
 * Collapses same-day samples into one daily observation: mean temperature,
 * wind, cloud cover and visibility, summed precipitation, peak precipitation
 * chance and the most frequent description.
 */
export const collapseDailySamples = (samples: readonly WeatherObservation[]): WeatherObservation => {
  if (samples.length === 1) {
    return samples[0];
  }
  const precipitation = presentValues(samples, (sample) => sample.precipitation);
  const chances = presentValues(samples, (sample) => sample.precipitationChance);
  const timestamps = samples
    .map((sample) => ({ timestamp: sample.timestamp, ms: parseIsoTimeToMs(sample.timestamp) ?? Number.POSITIVE_INFINITY }))
    .sort((a, b) => a.ms - b.ms);

  return createObservation({
    temperature: mean(presentValues(samples, (sample) => sample.temperature)),
    windSpeed: mean(presentValues(samples, (sample) => sample.windSpeed)),
    cloudCover: mean(presentValues(samples, (sample) => sample.cloudCover)),
    visibility: mean(presentValues(samples, (sample) => sample.visibility)),
    precipitation: precipitation.length ? precipitation.reduce((sum, value) => sum + value, 0) : null,
    precipitationChance: chances.length ? Math.max(...chances) : null,
    description: mostFrequentDescription(samples),
    timestamp: timestamps[0]?.timestamp ?? null,
  });
};

export const groupByDate = (
  forecast: readonly WeatherObservation[],
  timeZone: string | null = 'UTC',
): Map<string, WeatherObservation[]> => {
  const groups = new Map<string, WeatherObservation[]>();
  for (const sample of forecast) {
    if (parseIsoTimeToMs(sample.timestamp) === null) {
      continue;
    }
    const key = dateKeyInTimeZone(sample.timestamp, timeZone);
    if (!key) {
      continue;
    }
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(sample);
    } else {
      groups.set(key, [sample]);
    }
  }
  return groups;
};

const compareCandidates = (baseKey: string) => (a: AlternativeCandidate, b: AlternativeCandidate): number => {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  const distanceA = Math.abs(daysBetweenIsoDates(baseKey, a.date) ?? 0);
  const distanceB = Math.abs(daysBetweenIsoDates(baseKey, b.date) ?? 0);
  if (distanceA !== distanceB) {
    return distanceA - distanceB;
  }
  return a.date.localeCompare(b.date);
};

const clampLimit = (limit: number | undefined): number => {
  const numeric = Number(limit);
  return Number.isFinite(numeric) ? Math.max(0, Math.min(MAX_ALTERNATIVES, Math.floor(numeric))) : MAX_ALTERNATIVES;
};

/**
 * Ranks the days of a forecast window other than the base date. Returns at
 * most five candidates, best score first, ties going to the date nearest the
 * base date and then to the earlier one.
 */
export const rankAlternatives = ({
  baseLocation,
  baseDate,
  eventType,
  forecast,
  currentScore = null,
  limit,
  timeZone = 'UTC',
  ...suitabilityOptions
}: RankAlternativesOptions): AlternativeCandidate[] => {
  if (!Array.isArray(forecast)) {
    throw new TypeError('rankAlternatives requires a forecast array');
  }
  const baseKey = dateKeyInTimeZone(baseDate, timeZone);
  if (!baseKey) {
    throw new TypeError('rankAlternatives requires a valid base date');
  }

  const candidates: AlternativeCandidate[] = [];
  for (const [date, samples] of groupByDate(forecast, timeZone)) {
    if (date === baseKey) {
      continue;
    }
    const observation = collapseDailySamples(samples);
    const breakdown = computeSuitability(observation, eventType, suitabilityOptions);
    if (typeof currentScore === 'number' && !(breakdown.score > currentScore)) {
      continue;
    }
    candidates.push({
      date,
      location: baseLocation,
      observation,
      score: breakdown.score,
      condition: breakdown.condition,
      breakdown,
    });
  }

  return candidates.sort(compareCandidates(baseKey)).slice(0, clampLimit(limit));
};

export interface NearbyLocationInput {
  location: string;
  observation: WeatherObservation | null;
}

export interface RankNearbyLocationsOptions extends SuitabilityOptions {
  baseDate: string | Date;
  eventType: string;
  candidates: readonly NearbyLocationInput[];
  currentScore?: number | null;
  limit?: number;
  timeZone?: string | null;
}

/** Same ranking for other locations on the event's own date. */
export const rankNearbyLocations = ({
  baseDate,
  eventType,
  candidates,
  currentScore = null,
  limit,
  timeZone = 'UTC',
  ...suitabilityOptions
}: RankNearbyLocationsOptions): AlternativeCandidate[] => {
  const baseKey = dateKeyInTimeZone(baseDate, timeZone);
  if (!baseKey) {
    throw new TypeError('rankNearbyLocations requires a valid base date');
  }

  const ranked: AlternativeCandidate[] = [];
  for (const { location, observation } of candidates) {
    if (!observation) {
      continue;
    }
    const breakdown = computeSuitability(observation, eventType, suitabilityOptions);
    if (typeof currentScore === 'number' && !(breakdown.score > currentScore)) {
      continue;
    }
    ranked.push({ date: baseKey, location, observation, score: breakdown.score, condition: breakdown.condition, breakdown });
  }

  return ranked
    .sort((a, b) => (b.score !== a.score ? b.score - a.score : a.location.localeCompare(b.location)))
    .slice(0, clampLimit(limit));
};
