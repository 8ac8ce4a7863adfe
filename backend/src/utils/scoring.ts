import type { WeatherObservation } from './observation.js';
import {
  activeFactors,
  resolveProfile,
  EVENT_TYPE_PROFILES,
  type FactorName,
  type FactorThreshold,
  type ProfileTable,
} from './profiles.js';

export type ScoringMode = 'banded' | 'linear';
export type ConditionBands = 'four-tier' | 'three-tier';
export type ConditionLabel = 'excellent' | 'good' | 'fair' | 'okay' | 'poor';

export const SCORING_MODES: readonly ScoringMode[] = ['banded', 'linear'];
export const CONDITION_BAND_VARIANTS: readonly ConditionBands[] = ['four-tier', 'three-tier'];

export const BANDED_SCORES = {
  optimal: 100,
  acceptable: 70,
  outside: 30,
} as const;

// Points lost per unit outside the optimal band in linear mode.
export const LINEAR_PENALTY_PER_UNIT: Record<FactorName, number> = {
  temperature: 5,
  windSpeed: 4,
  precipitation: 10,
  cloudCover: 1,
  visibility: 0.01,
};

const CONDITION_THRESHOLDS: Record<ConditionBands, { label: ConditionLabel; min: number }[]> = {
  'four-tier': [
    { label: 'excellent', min: 80 },
    { label: 'good', min: 60 },
    { label: 'fair', min: 40 },
  ],
  'three-tier': [
    { label: 'good', min: 70 },
    { label: 'okay', min: 49 },
  ],
};

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const roundToTenth = (value: number): number => Math.round(value * 10) / 10;

const sanitizeFactorValue = (factor: FactorName, value: number | null | undefined): number | null => {
  if (value === null || value === undefined || Number.isNaN(value)) {
    return null;
  }
  switch (factor) {
    case 'cloudCover':
      return clamp(value, 0, 100);
    case 'precipitation':
    case 'windSpeed':
    case 'visibility':
      return Math.max(0, value);
    default:
      return value;
  }
};

const bandedScore = (threshold: FactorThreshold, value: number): number => {
  switch (threshold.kind) {
    case 'range':
      if (value >= threshold.optimal[0] && value <= threshold.optimal[1]) return BANDED_SCORES.optimal;
      if (value >= threshold.acceptable[0] && value <= threshold.acceptable[1]) return BANDED_SCORES.acceptable;
      return BANDED_SCORES.outside;
    case 'ceiling':
      if (value <= threshold.optimal) return BANDED_SCORES.optimal;
      if (value <= threshold.acceptable) return BANDED_SCORES.acceptable;
      return BANDED_SCORES.outside;
    case 'floor':
      if (value >= threshold.optimal) return BANDED_SCORES.optimal;
      if (value >= threshold.acceptable) return BANDED_SCORES.acceptable;
      return BANDED_SCORES.outside;
  }
};

const excessOutsideOptimal = (threshold: FactorThreshold, value: number): number => {
  switch (threshold.kind) {
    case 'range':
      if (value < threshold.optimal[0]) return threshold.optimal[0] - value;
      if (value > threshold.optimal[1]) return value - threshold.optimal[1];
      return 0;
    case 'ceiling':
      return Math.max(0, value - threshold.optimal);
    case 'floor':
      return Math.max(0, threshold.optimal - value);
  }
};

/**
 * Scores one weather factor on a 0-100 scale. Absent values score 0. Never
 * throws for numeric input: physically impossible values are clamped first.
 */
export const scoreFactor = (
  factor: FactorName,
  rawValue: number | null | undefined,
  threshold: FactorThreshold,
  mode: ScoringMode = 'banded',
): number => {
  const value = sanitizeFactorValue(factor, rawValue);
  if (value === null) {
    return 0;
  }
  if (mode === 'linear') {
    const penalty = LINEAR_PENALTY_PER_UNIT[factor] * excessOutsideOptimal(threshold, value);
    return clamp(100 - penalty, 0, 100);
  }
  return bandedScore(threshold, value);
};

export const conditionForScore = (score: number, bands: ConditionBands = 'four-tier'): ConditionLabel => {
  const match = CONDITION_THRESHOLDS[bands].find((band) => score >= band.min);
  return match ? match.label : 'poor';
};

export interface FactorScore {
  factor: FactorName;
  score: number;
  value: number | null;
  weight: number;
}

export const aggregateScore = (
  factors: readonly Pick<FactorScore, 'score' | 'weight'>[],
  bands: ConditionBands = 'four-tier',
): { score: number; condition: ConditionLabel } => {
  const weighted = factors.reduce((sum, entry) => sum + entry.score * entry.weight, 0);
  const score = roundToTenth(clamp(Number.isFinite(weighted) ? weighted : 0, 0, 100));
  return { score, condition: conditionForScore(score, bands) };
};

export interface SuitabilityOptions {
  scoringMode?: ScoringMode;
  conditionBands?: ConditionBands;
  profiles?: ProfileTable;
}

export interface ScoreBreakdown {
  eventType: string;
  scoringMode: ScoringMode;
  score: number;
  condition: ConditionLabel;
  factors: FactorScore[];
}

export const computeSuitability = (
  observation: WeatherObservation,
  eventType: string,
  { scoringMode = 'banded', conditionBands = 'four-tier', profiles = EVENT_TYPE_PROFILES }: SuitabilityOptions = {},
): ScoreBreakdown => {
  if (!observation || typeof observation !== 'object') {
    throw new TypeError('computeSuitability requires a weather observation');
  }
  const resolved = resolveProfile(eventType, profiles);

  const factors: FactorScore[] = activeFactors(resolved.profile).map(({ factor, threshold }) => ({
    factor,
    score: roundToTenth(scoreFactor(factor, observation[factor], threshold, scoringMode)),
    value: sanitizeFactorValue(factor, observation[factor]),
    weight: threshold.weight,
  }));

  const { score, condition } = aggregateScore(factors, conditionBands);
  return {
    eventType: resolved.eventType,
    scoringMode,
    score,
    condition,
    factors,
  };
};
