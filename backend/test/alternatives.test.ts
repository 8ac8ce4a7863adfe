import { collapseDailySamples, rankAlternatives, rankNearbyLocations } from '../src/utils/alternatives.js';
import { createObservation, type ObservationInput } from '../src/utils/observation.js';

const sample = (timestamp: string, overrides: ObservationInput = {}) =>
  createObservation({
    temperature: 22,
    precipitation: 0,
    precipitationChance: 0,
    windSpeed: 5,
    cloudCover: 20,
    description: 'clear sky',
    timestamp,
    ...overrides,
  });

const rank = (forecast: ReturnType<typeof sample>[], currentScore: number | null = null) =>
  rankAlternatives({
    baseLocation: 'Lisbon',
    baseDate: '2025-06-10',
    eventType: 'outdoor_sports',
    forecast,
    currentScore,
  });

// Eight three-hourly samples on June 11: mean temperature 21.5, two light showers.
const june11 = [18, 19, 20, 21, 22, 23, 24, 25].map((temperature, index) =>
  sample(`2025-06-11T${String(index * 3).padStart(2, '0')}:00:00.000Z`, {
    temperature,
    precipitation: index === 2 || index === 5 ? 0.1 : 0,
    precipitationChance: index * 10,
    description: index < 5 ? 'light rain' : 'clear sky',
  }),
);

describe('collapseDailySamples', () => {
  test('averages, sums and keeps the earliest timestamp', () => {
    const daily = collapseDailySamples(june11);
    expect(daily.temperature).toBe(21.5);
    expect(daily.precipitation).toBeCloseTo(0.2, 10);
    expect(daily.precipitationChance).toBe(70);
    expect(daily.description).toBe('light rain');
    expect(daily.timestamp).toBe('2025-06-11T00:00:00.000Z');
  });
});

describe('rankAlternatives', () => {
  test('collapses many samples per day into one candidate per date', () => {
    const result = rank([...june11, sample('2025-06-12T12:00:00.000Z')]);
    expect(result.map((candidate) => candidate.date)).toEqual(['2025-06-12', '2025-06-11']);
    expect(result.map((candidate) => candidate.score)).toEqual([100, 91]);
    expect(result[1].condition).toBe('excellent');
    expect(result[1].location).toBe('Lisbon');
  });

  test('never proposes the base date', () => {
    const result = rank([sample('2025-06-10T09:00:00Z'), sample('2025-06-10T15:00:00Z')]);
    expect(result).toEqual([]);
  });

  test('returns an empty list for an empty forecast', () => {
    expect(rank([])).toEqual([]);
  });

  test('keeps only dates strictly better than the current score', () => {
    const forecast = [...june11, sample('2025-06-12T12:00:00.000Z')];
    expect(rank(forecast, 100)).toEqual([]);
    expect(rank(forecast, 91).map((candidate) => candidate.date)).toEqual(['2025-06-12']);
  });

  test('returns at most five candidates, nearest dates first on equal scores', () => {
    const forecast = [11, 12, 13, 14, 15, 16, 17].map((day) => sample(`2025-06-${day}T12:00:00Z`));
    expect(rank(forecast).map((candidate) => candidate.date)).toEqual([
      '2025-06-11',
      '2025-06-12',
      '2025-06-13',
      '2025-06-14',
      '2025-06-15',
    ]);
  });

  test('breaks equal distance ties toward the earlier date', () => {
    const result = rank([sample('2025-06-11T12:00:00Z'), sample('2025-06-09T12:00:00Z')]);
    expect(result.map((candidate) => candidate.date)).toEqual(['2025-06-09', '2025-06-11']);
  });

  test('honours a smaller limit', () => {
    const forecast = [11, 12, 13].map((day) => sample(`2025-06-${day}T12:00:00Z`));
    const result = rankAlternatives({
      baseLocation: 'Lisbon',
      baseDate: '2025-06-10',
      eventType: 'outdoor_sports',
      forecast,
      limit: 1,
    });
    expect(result).toHaveLength(1);
    expect(result[0].date).toBe('2025-06-11');
  });
});

describe('rankNearbyLocations', () => {
  test('ranks other locations on the base date and skips missing forecasts', () => {
    const result = rankNearbyLocations({
      baseDate: '2025-06-10',
      eventType: 'outdoor_sports',
      candidates: [
        { location: 'Sintra', observation: sample('2025-06-10T12:00:00Z', { temperature: 40 }) },
        { location: 'Cascais', observation: sample('2025-06-10T12:00:00Z') },
        { location: 'Almada', observation: sample('2025-06-10T12:00:00Z') },
        { location: 'Nowhere', observation: null },
      ],
    });
    expect(result.map((candidate) => [candidate.location, candidate.score])).toEqual([
      ['Almada', 100],
      ['Cascais', 100],
      ['Sintra', 79],
    ]);
    expect(result[0].date).toBe('2025-06-10');
  });
});
