import { decideAlert, detectSignificantChange, findThresholdBreaches } from '../src/utils/alerts.js';
import { createObservation } from '../src/utils/observation.js';

describe('detectSignificantChange', () => {
  test('nothing to compare against is never significant', () => {
    expect(detectSignificantChange(null, { score: 40, condition: 'fair' })).toEqual({
      significant: false,
      scoreDelta: 0,
      conditionChanged: false,
    });
  });

  test('a drop of twenty points is significant', () => {
    expect(detectSignificantChange({ score: 80, condition: 'excellent' }, { score: 60, condition: 'good' })).toEqual({
      significant: true,
      scoreDelta: -20,
      conditionChanged: true,
    });
  });

  test('small moves inside the same condition are not significant', () => {
    const change = detectSignificantChange({ score: 61, condition: 'good' }, { score: 79, condition: 'good' });
    expect(change.significant).toBe(false);
    expect(change.scoreDelta).toBe(18);
  });

  test('a condition change is significant even for a small delta', () => {
    const change = detectSignificantChange({ score: 81, condition: 'excellent' }, { score: 79, condition: 'good' });
    expect(change.significant).toBe(true);
    expect(change.scoreDelta).toBe(-2);
  });
});

describe('findThresholdBreaches', () => {
  test('reports each breached limit', () => {
    const observation = createObservation({ temperature: 5, windSpeed: 35, precipitation: 3 });
    expect(findThresholdBreaches(observation)).toEqual([
      { field: 'temperature', bound: 'min', value: 5, limit: 10 },
      { field: 'windSpeed', bound: 'max', value: 35, limit: 30 },
    ]);
  });

  test('custom limits override the defaults', () => {
    const observation = createObservation({ temperature: 36, windSpeed: 10, precipitation: 3 });
    expect(findThresholdBreaches(observation, { temperatureMax: null, precipitationMax: 2 })).toEqual([
      { field: 'precipitation', bound: 'max', value: 3, limit: 2 },
    ]);
  });

  test('no observation means no breaches', () => {
    expect(findThresholdBreaches(null)).toEqual([]);
  });
});

describe('decideAlert', () => {
  const hot = createObservation({ temperature: 38, windSpeed: 4, precipitation: 0 });
  const steady = { score: 75, condition: 'good' } as const;

  test('the score policy ignores thresholds', () => {
    const decision = decideAlert({ policy: 'score', previous: steady, next: steady, observation: hot });
    expect(decision.shouldAlert).toBe(false);
    expect(decision.breaches).toEqual([]);
  });

  test('the thresholds policy alerts on a breach alone', () => {
    const decision = decideAlert({ policy: 'thresholds', previous: steady, next: steady, observation: hot });
    expect(decision.shouldAlert).toBe(true);
    expect(decision.breaches).toEqual([{ field: 'temperature', bound: 'max', value: 38, limit: 35 }]);
  });

  test('the combined policy alerts on a score change without breaches', () => {
    const mild = createObservation({ temperature: 22, windSpeed: 4, precipitation: 0 });
    const decision = decideAlert({
      policy: 'both',
      previous: steady,
      next: { score: 45, condition: 'fair' },
      observation: mild,
    });
    expect(decision.shouldAlert).toBe(true);
    expect(decision.change.scoreDelta).toBe(-30);
  });
});
