export interface WeatherObservation {
  readonly temperature: number | null;
  readonly precipitation: number | null;
  readonly precipitationChance: number | null;
  readonly windSpeed: number | null;
  readonly cloudCover: number | null;
  readonly visibility: number | null;
  readonly description: string;
  readonly timestamp: string;
}

export type ObservationMetric = 'temperature' | 'precipitation' | 'windSpeed' | 'cloudCover' | 'visibility';

export const OBSERVATION_METRICS: readonly ObservationMetric[] = [
  'temperature',
  'precipitation',
  'windSpeed',
  'cloudCover',
  'visibility',
];

export const parseFiniteNumber = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : null;
};

export type ObservationInput = Partial<Record<ObservationMetric | 'precipitationChance', number | null>> & {
  description?: string | null;
  timestamp?: string | null;
};

/**
 * Builds an immutable observation. Missing numeric fields become `null`;
 * a missing timestamp falls back to the epoch so the value stays comparable.
 */
export const createObservation = (input: ObservationInput): WeatherObservation =>
  Object.freeze({
    temperature: parseFiniteNumber(input.temperature),
    precipitation: parseFiniteNumber(input.precipitation),
    precipitationChance: parseFiniteNumber(input.precipitationChance),
    windSpeed: parseFiniteNumber(input.windSpeed),
    cloudCover: parseFiniteNumber(input.cloudCover),
    visibility: parseFiniteNumber(input.visibility),
    description: typeof input.description === 'string' ? input.description.trim() : '',
    timestamp: typeof input.timestamp === 'string' && input.timestamp ? input.timestamp : new Date(0).toISOString(),
  });

export const countPresentFields = (observation: WeatherObservation): { present: number; total: number } => {
  const present =
    OBSERVATION_METRICS.filter((metric) => observation[metric] !== null).length + (observation.description ? 1 : 0);
  return { present, total: OBSERVATION_METRICS.length + 1 };
};
