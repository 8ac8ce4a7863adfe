import { countPresentFields, type ObservationMetric, type WeatherObservation } from './observation.js';
import { roundToTenth } from './scoring.js';

export type TrendDirection = 'increasing' | 'decreasing' | 'stable' | 'variable' | 'unknown';
export type TrendImpact = 'improving' | 'worsening' | 'neutral';
export type TrendConfidence = 'low' | 'medium' | 'high';
export type TrendMethod = 'delta' | 'regression';
export type MetricPolarity = 'higher-is-worse' | 'higher-is-better' | 'neutral';

export const TREND_METHODS: readonly TrendMethod[] = ['delta', 'regression'];

export const DEFAULT_DELTA_THRESHOLD = 1;
export const DEFAULT_SLOPE_THRESHOLD = 0.1;
export const MIN_CONFIDENT_SAMPLES = 4;

export const METRIC_POLARITY: Record<ObservationMetric, MetricPolarity> = {
  temperature: 'neutral',
  precipitation: 'higher-is-worse',
  windSpeed: 'higher-is-worse',
  cloudCover: 'higher-is-worse',
  visibility: 'higher-is-better',
};

export interface SeriesTrendOptions {
  method?: TrendMethod;
  threshold?: number;
  polarity?: MetricPolarity;
}

export interface SeriesTrend {
  direction: TrendDirection;
  impact: TrendImpact;
  confidence: TrendConfidence;
  change: number;
  samples: number;
}

const quantityScore = (samples: number): number => {
  if (samples >= 24) return 1;
  if (samples >= 8) return 0.8;
  if (samples >= 4) return 0.6;
  return 0.4;
};

/**
 * Combines sample count with field completeness. Below four samples the
 * result is always low.
 */
export const confidenceFromSamples = (samples: number, presentFields: number, totalFields: number): TrendConfidence => {
  if (samples < MIN_CONFIDENT_SAMPLES) {
    return 'low';
  }
  const completeness = totalFields > 0 ? presentFields / totalFields : 0;
  const combined = (quantityScore(samples) + completeness) / 2;
  if (combined >= 0.8) return 'high';
  if (combined >= 0.6) return 'medium';
  return 'low';
};

const impactFor = (direction: TrendDirection, polarity: MetricPolarity): TrendImpact => {
  if (polarity === 'neutral' || (direction !== 'increasing' && direction !== 'decreasing')) {
    return 'neutral';
  }
  const risingIsBad = polarity === 'higher-is-worse';
  return (direction === 'increasing') === risingIsBad ? 'worsening' : 'improving';
};

const deltaDirection = (values: number[], threshold: number): TrendDirection => {
  const deltas = values.slice(1).map((value, index) => value - values[index]);
  const meanDelta = deltas.reduce((sum, delta) => sum + delta, 0) / deltas.length;
  const variance = deltas.reduce((sum, delta) => sum + (delta - meanDelta) ** 2, 0) / deltas.length;
  if (Math.sqrt(variance) > threshold * 2) return 'variable';
  if (meanDelta > threshold) return 'increasing';
  if (meanDelta < -threshold) return 'decreasing';
  return 'stable';
};

export const regressionSlope = (values: readonly number[]): number | null => {
  const n = values.length;
  if (n < 2) {
    return null;
  }
  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;
  values.forEach((y, x) => {
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumXX += x * x;
  });
  const denominator = n * sumXX - sumX * sumX;
  return denominator === 0 ? null : (n * sumXY - sumX * sumY) / denominator;
};

const regressionDirection = (values: number[], threshold: number): TrendDirection => {
  const slope = regressionSlope(values);
  if (slope === null || Math.abs(slope) < threshold) return 'stable';
  return slope > 0 ? 'increasing' : 'decreasing';
};

export const analyzeSeriesTrend = (
  samples: readonly (number | null | undefined)[],
  { method = 'delta', threshold, polarity = 'neutral' }: SeriesTrendOptions = {},
): SeriesTrend => {
  if (!Array.isArray(samples)) {
    throw new TypeError('analyzeSeriesTrend requires an array of samples');
  }
  const values = samples.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
  const confidence = confidenceFromSamples(values.length, values.length, samples.length);

  if (values.length === 0) {
    return { direction: 'unknown', impact: 'neutral', confidence, change: 0, samples: 0 };
  }
  if (values.length === 1) {
    return { direction: 'stable', impact: 'neutral', confidence, change: 0, samples: 1 };
  }

  const effectiveThreshold = typeof threshold === 'number' && Number.isFinite(threshold) && threshold >= 0
    ? threshold
    : method === 'regression' ? DEFAULT_SLOPE_THRESHOLD : DEFAULT_DELTA_THRESHOLD;
  const direction = method === 'regression'
    ? regressionDirection(values, effectiveThreshold)
    : deltaDirection(values, effectiveThreshold);

  return {
    direction,
    impact: impactFor(direction, polarity),
    confidence,
    change: roundToTenth(values[values.length - 1] - values[0]),
    samples: values.length,
  };
};

export interface MetricTrend {
  direction: TrendDirection;
  impact: TrendImpact;
  change: number;
  samples: number;
}

export interface TrendResult {
  metrics: Record<ObservationMetric, MetricTrend>;
  confidence: TrendConfidence;
  samples: number;
}

export interface AnalyzeTrendOptions {
  method?: TrendMethod;
  threshold?: number;
}

/**
 * Per-metric trend over a time-ordered observation sequence. Confidence is
 * computed once across every field of every observation.
 */
export const analyzeTrend = (
  observations: readonly WeatherObservation[],
  options: AnalyzeTrendOptions = {},
): TrendResult => {
  if (!Array.isArray(observations)) {
    throw new TypeError('analyzeTrend requires an array of observations');
  }

  const metricTrend = (metric: ObservationMetric): MetricTrend => {
    const series = analyzeSeriesTrend(
      observations.map((observation) => observation[metric]),
      { ...options, polarity: METRIC_POLARITY[metric] },
    );
    return { direction: series.direction, impact: series.impact, change: series.change, samples: series.samples };
  };

  const metrics: Record<ObservationMetric, MetricTrend> = {
    temperature: metricTrend('temperature'),
    precipitation: metricTrend('precipitation'),
    windSpeed: metricTrend('windSpeed'),
    cloudCover: metricTrend('cloudCover'),
    visibility: metricTrend('visibility'),
  };

  const completeness = observations.reduce(
    (totals, observation) => {
      const counts = countPresentFields(observation);
      return { present: totals.present + counts.present, total: totals.total + counts.total };
    },
    { present: 0, total: 0 },
  );

  return {
    metrics,
    confidence: confidenceFromSamples(observations.length, completeness.present, completeness.total),
    samples: observations.length,
  };
};
