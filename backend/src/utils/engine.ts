import {
  rankAlternatives,
  rankNearbyLocations,
  type AlternativeCandidate,
  type RankAlternativesOptions,
  type RankNearbyLocationsOptions,
} from './alternatives.js';
import type { WeatherObservation } from './observation.js';
import { EVENT_TYPE_PROFILES, type ProfileTable } from './profiles.js';
import { computeSuitability, type ConditionBands, type ScoreBreakdown, type ScoringMode } from './scoring.js';
import { analyzeSeriesTrend, analyzeTrend, type SeriesTrend, type SeriesTrendOptions, type TrendMethod, type TrendResult } from './trend.js';

export interface SuitabilityEngineOptions {
  scoringMode?: ScoringMode;
  conditionBands?: ConditionBands;
  trendMethod?: TrendMethod;
  trendThreshold?: number;
  profiles?: ProfileTable;
  timeZone?: string | null;
}

type EngineBoundKeys = 'scoringMode' | 'conditionBands' | 'profiles';

export interface SuitabilityEngine {
  readonly scoringMode: ScoringMode;
  readonly conditionBands: ConditionBands;
  readonly profiles: ProfileTable;
  computeSuitability: (observation: WeatherObservation, eventType: string) => ScoreBreakdown;
  rankAlternatives: (options: Omit<RankAlternativesOptions, EngineBoundKeys>) => AlternativeCandidate[];
  rankNearbyLocations: (options: Omit<RankNearbyLocationsOptions, EngineBoundKeys>) => AlternativeCandidate[];
  analyzeTrend: (observations: readonly WeatherObservation[]) => TrendResult;
  analyzeSeriesTrend: (samples: readonly (number | null)[], options?: Pick<SeriesTrendOptions, 'polarity'>) => SeriesTrend;
}

/**
 * Binds the scoring mode, condition bands and trend method once so every
 * consumer scores the same way. Holds no mutable state.
 */
export const createSuitabilityEngine = ({
  scoringMode = 'banded',
  conditionBands = 'four-tier',
  trendMethod = 'delta',
  trendThreshold,
  profiles = EVENT_TYPE_PROFILES,
  timeZone = 'UTC',
}: SuitabilityEngineOptions = {}): SuitabilityEngine => {
  const scoring = { scoringMode, conditionBands, profiles };
  const trendOptions = { method: trendMethod, threshold: trendThreshold };

  return Object.freeze({
    scoringMode,
    conditionBands,
    profiles,
    computeSuitability: (observation: WeatherObservation, eventType: string) =>
      computeSuitability(observation, eventType, scoring),
    rankAlternatives: (options: Omit<RankAlternativesOptions, EngineBoundKeys>) =>
      rankAlternatives({ timeZone, ...options, ...scoring }),
    rankNearbyLocations: (options: Omit<RankNearbyLocationsOptions, EngineBoundKeys>) =>
      rankNearbyLocations({ timeZone, ...options, ...scoring }),
    analyzeTrend: (observations: readonly WeatherObservation[]) => analyzeTrend(observations, trendOptions),
    analyzeSeriesTrend: (samples: readonly (number | null)[], options: Pick<SeriesTrendOptions, 'polarity'> = {}) =>
      analyzeSeriesTrend(samples, { ...trendOptions, ...options }),
  });
};
