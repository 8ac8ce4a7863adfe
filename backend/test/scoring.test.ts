import { createObservation } from '../src/utils/observation.js';
import {
  EVENT_TYPE_PROFILES,
  EVENT_TYPES,
  activeFactors,
  resolveProfile,
  type FactorName,
  type FactorThreshold,
} from '../src/utils/profiles.js';
import { SCORING_MODES, aggregateScore, computeSuitability, conditionForScore, scoreFactor } from '../src/utils/scoring.js';

const idealDay = createObservation({
  temperature: 22,
  precipitation: 0,
  windSpeed: 5,
  cloudCover: 20,
  description: 'clear sky',
  timestamp: '2025-06-10T12:00:00Z',
});

describe('computeSuitability', () => {
  test('ideal conditions for outdoor sports score 100 and excellent', () => {
    const result = computeSuitability(idealDay, 'outdoor_sports');
    expect(result.score).toBe(100);
    expect(result.condition).toBe('excellent');
    expect(result.eventType).toBe('outdoor_sports');
    expect(result.factors.map((entry) => entry.factor)).toEqual(['temperature', 'windSpeed', 'precipitation', 'cloudCover']);
  });

  test('a temperature far outside the acceptable band drops the score to 79', () => {
    const result = computeSuitability(createObservation({ ...idealDay, temperature: 40 }), 'outdoor_sports');
    expect(result.score).toBe(79);
    expect(result.condition).toBe('good');
    expect(result.factors[0]).toEqual({ factor: 'temperature', score: 30, value: 40, weight: 0.3 });
  });

  test('missing fields score zero instead of failing', () => {
    const result = computeSuitability(createObservation({ temperature: 22 }), 'outdoor_sports');
    expect(result.score).toBe(30);
    expect(result.condition).toBe('poor');
  });

  test('unknown and differently-cased event types resolve to a profile', () => {
    expect(computeSuitability(idealDay, 'birthday party').eventType).toBe('other');
    expect(computeSuitability(idealDay, '  WEDDING ').eventType).toBe('wedding');
  });

  test('linear mode subtracts a per-unit penalty outside the optimal band', () => {
    const result = computeSuitability(createObservation({ ...idealDay, temperature: 27 }), 'outdoor_sports', {
      scoringMode: 'linear',
    });
    expect(result.factors[0].score).toBe(90);
    expect(result.score).toBe(97);
    expect(result.scoringMode).toBe('linear');
  });

  test('three-tier bands relabel the same score', () => {
    const result = computeSuitability(createObservation({ ...idealDay, temperature: 40 }), 'outdoor_sports', {
      conditionBands: 'three-tier',
    });
    expect(result.condition).toBe('good');
  });
});

describe('scoreFactor', () => {
  const { temperature, precipitation, cloudCover, windSpeed } = EVENT_TYPE_PROFILES.outdoor_sports;

  test('banded scoring distinguishes optimal, acceptable and outside', () => {
    expect(scoreFactor('temperature', 20, temperature)).toBe(100);
    expect(scoreFactor('temperature', 17, temperature)).toBe(70);
    expect(scoreFactor('temperature', 5, temperature)).toBe(30);
    expect(scoreFactor('precipitation', 0.4, precipitation)).toBe(70);
  });

  test('absent values score zero', () => {
    expect(scoreFactor('temperature', null, temperature)).toBe(0);
    expect(scoreFactor('temperature', Number.NaN, temperature)).toBe(0);
  });

  test('impossible values are clamped before scoring', () => {
    expect(scoreFactor('cloudCover', 150, cloudCover)).toBe(30);
    expect(scoreFactor('windSpeed', -5, windSpeed)).toBe(100);
  });

  test('linear scoring never goes below zero', () => {
    expect(scoreFactor('temperature', -60, temperature, 'linear')).toBe(0);
    expect(scoreFactor('precipitation', 0.3, precipitation, 'linear')).toBeCloseTo(97, 6);
  });
});

describe('condition bands', () => {
  test('four-tier boundaries are inclusive at the lower edge', () => {
    expect(conditionForScore(80)).toBe('excellent');
    expect(conditionForScore(79.9)).toBe('good');
    expect(conditionForScore(60)).toBe('good');
    expect(conditionForScore(59.9)).toBe('fair');
    expect(conditionForScore(40)).toBe('fair');
    expect(conditionForScore(39.9)).toBe('poor');
  });

  test('three-tier boundaries', () => {
    expect(conditionForScore(70, 'three-tier')).toBe('good');
    expect(conditionForScore(69.9, 'three-tier')).toBe('okay');
    expect(conditionForScore(49, 'three-tier')).toBe('okay');
    expect(conditionForScore(48.9, 'three-tier')).toBe('poor');
  });

  test('aggregate scores are clamped and rounded to one decimal', () => {
    expect(aggregateScore([{ score: 33.33, weight: 1 }]).score).toBe(33.3);
    expect(aggregateScore([{ score: 100, weight: 1.5 }]).score).toBe(100);
    expect(aggregateScore([]).score).toBe(0);
  });
});

describe('profiles', () => {
  test.each(EVENT_TYPES)('active weights of %s sum to 1', (eventType) => {
    const total = activeFactors(EVENT_TYPE_PROFILES[eventType]).reduce((sum, entry) => sum + entry.threshold.weight, 0);
    expect(total).toBeCloseTo(1, 10);
  });

  test('resolveProfile falls back to other', () => {
    expect(resolveProfile('unknown').eventType).toBe('other');
    expect(resolveProfile('Hiking').profile.visibility?.optimal).toBe(8000);
  });
});

describe.each(SCORING_MODES)('%s scoring properties', (scoringMode) => {
  test.each(EVENT_TYPES)('%s scores the same observation the same way twice', (eventType) => {
    const observation = createObservation({ ...idealDay, temperature: 31, precipitation: 0.7, visibility: 4000 });
    expect(computeSuitability(observation, eventType, { scoringMode })).toEqual(
      computeSuitability(observation, eventType, { scoringMode }),
    );
  });

  test.each(EVENT_TYPES)('%s keeps every score between 0 and 100', (eventType) => {
    const temperatures = [-60, -10, 0, 15, 22, 30, 45, 70];
    const precipitations = [-1, 0, 0.4, 3, 50];
    const winds = [-5, 0, 10, 25, 60];
    const clouds = [-10, 0, 50, 100, 150];
    const visibilities = [0, 2000, 9000, 50000];

    temperatures.forEach((temperature, i) => {
      precipitations.forEach((precipitation, j) => {
        const result = computeSuitability(
          createObservation({
            temperature,
            precipitation,
            windSpeed: winds[(i + j) % winds.length],
            cloudCover: clouds[(i * 2 + j) % clouds.length],
            visibility: visibilities[(i + j * 3) % visibilities.length],
          }),
          eventType,
          { scoringMode },
        );
        expect(result.score).toBeGreaterThanOrEqual(0);
        expect(result.score).toBeLessThanOrEqual(100);
        for (const factor of result.factors) {
          expect(factor.score).toBeGreaterThanOrEqual(0);
          expect(factor.score).toBeLessThanOrEqual(100);
        }
      });
    });
  });

  const { outdoor_sports: outdoor, hiking } = EVENT_TYPE_PROFILES;
  const awayFromOptimal: { kind: string; factor: FactorName; threshold: FactorThreshold; values: number[] }[] = [
    { kind: 'range above', factor: 'temperature', threshold: outdoor.temperature, values: [25, 27, 30, 35, 45] },
    { kind: 'range below', factor: 'temperature', threshold: outdoor.temperature, values: [18, 16, 15, 10, -5] },
    { kind: 'ceiling', factor: 'precipitation', threshold: outdoor.precipitation, values: [0, 0.3, 0.5, 1, 5] },
    { kind: 'floor', factor: 'visibility', threshold: hiking.visibility, values: [8000, 6000, 3000, 1000, 0] },
  ];

  test.each(awayFromOptimal)('$kind never scores higher further from the optimal band', ({ factor, threshold, values }) => {
    const scores = values.map((value) => scoreFactor(factor, value, threshold, scoringMode));
    expect(scores[0]).toBe(100);
    expect(scores[scores.length - 1]).toBeLessThan(100);
    scores.slice(1).forEach((score, index) => {
      expect(score).toBeLessThanOrEqual(scores[index]);
    });
  });
});
