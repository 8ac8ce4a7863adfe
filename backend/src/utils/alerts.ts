import type { WeatherObservation } from './observation.js';
import type { ConditionLabel } from './scoring.js';

export type AlertPolicy = 'score' | 'thresholds' | 'both';

export const ALERT_POLICIES: readonly AlertPolicy[] = ['score', 'thresholds', 'both'];

export const DEFAULT_SCORE_CHANGE_THRESHOLD_PCT = 20;

export interface ScoredSnapshot {
  score: number;
  condition: ConditionLabel;
}

export interface SignificantChange {
  significant: boolean;
  scoreDelta: number;
  conditionChanged: boolean;
}

export const detectSignificantChange = (
  previous: ScoredSnapshot | null,
  next: ScoredSnapshot,
  scoreDeltaPct: number = DEFAULT_SCORE_CHANGE_THRESHOLD_PCT,
): SignificantChange => {
  if (!previous) {
    return { significant: false, scoreDelta: 0, conditionChanged: false };
  }
  const scoreDelta = Math.round((next.score - previous.score) * 10) / 10;
  const conditionChanged = previous.condition !== next.condition;
  return {
    significant: Math.abs(scoreDelta) >= scoreDeltaPct || conditionChanged,
    scoreDelta,
    conditionChanged,
  };
};

export interface FieldThresholds {
  temperatureMin: number | null;
  temperatureMax: number | null;
  windSpeedMax: number | null;
  precipitationMax: number | null;
}

export const DEFAULT_FIELD_THRESHOLDS: FieldThresholds = {
  temperatureMin: 10,
  temperatureMax: 35,
  windSpeedMax: 30,
  precipitationMax: null,
};

export interface ThresholdBreach {
  field: 'temperature' | 'windSpeed' | 'precipitation';
  bound: 'min' | 'max';
  value: number;
  limit: number;
}

export const findThresholdBreaches = (
  observation: WeatherObservation | null,
  thresholds: Partial<FieldThresholds> = {},
): ThresholdBreach[] => {
  if (!observation) {
    return [];
  }
  const limits = { ...DEFAULT_FIELD_THRESHOLDS, ...thresholds };
  const breaches: ThresholdBreach[] = [];

  const below = (field: ThresholdBreach['field'], value: number | null, limit: number | null) => {
    if (value !== null && limit !== null && value < limit) breaches.push({ field, bound: 'min', value, limit });
  };
  const above = (field: ThresholdBreach['field'], value: number | null, limit: number | null) => {
    if (value !== null && limit !== null && value > limit) breaches.push({ field, bound: 'max', value, limit });
  };

  below('temperature', observation.temperature, limits.temperatureMin);
  above('temperature', observation.temperature, limits.temperatureMax);
  above('windSpeed', observation.windSpeed, limits.windSpeedMax);
  above('precipitation', observation.precipitation, limits.precipitationMax);
  return breaches;
};

export interface AlertDecision {
  shouldAlert: boolean;
  change: SignificantChange;
  breaches: ThresholdBreach[];
}

interface DecideAlertOptions {
  policy: AlertPolicy;
  previous: ScoredSnapshot | null;
  next: ScoredSnapshot;
  observation: WeatherObservation | null;
  scoreDeltaPct?: number;
  thresholds?: Partial<FieldThresholds>;
}

export const decideAlert = ({
  policy,
  previous,
  next,
  observation,
  scoreDeltaPct = DEFAULT_SCORE_CHANGE_THRESHOLD_PCT,
  thresholds = {},
}: DecideAlertOptions): AlertDecision => {
  const change = detectSignificantChange(previous, next, scoreDeltaPct);
  const breaches = policy === 'score' ? [] : findThresholdBreaches(observation, thresholds);
  const byScore = policy !== 'thresholds' && change.significant;
  const byThreshold = policy !== 'score' && breaches.length > 0;
  return { shouldAlert: byScore || byThreshold, change, breaches };
};
