import { createSuitabilityEngine } from '../src/utils/engine.js';
import { EventNotFoundError, WeatherUnavailableError } from '../src/utils/errors.js';
import { createEventService } from '../src/utils/event-service.js';
import { createEventStore } from '../src/utils/event-store.js';
import { createFakeProvider, observationAt, stormyOverrides } from './helpers.js';

const setup = (initial: Parameters<typeof createFakeProvider>[0] = {}) => {
  const { provider, state } = createFakeProvider(initial);
  const store = createEventStore({ filePath: null });
  const service = createEventService({
    store,
    weatherProvider: provider,
    engine: createSuitabilityEngine(),
    now: () => new Date('2025-06-10T00:00:00Z'),
  });
  return { provider, state, store, service };
};

const picnic = { name: 'Picnic', location: 'Lisbon', date: '2025-06-12', eventType: 'Outdoor_Sports' };

describe('createEvent', () => {
  test('normalizes the event type and scores the forecast at midday', async () => {
    const { service, provider } = setup();
    const event = await service.createEvent(picnic);

    expect(event.eventType).toBe('outdoor_sports');
    expect(event.suitability).toMatchObject({ score: 100, condition: 'excellent', checkedAt: '2025-06-10T00:00:00.000Z' });
    expect(provider.getObservation).toHaveBeenCalledWith('Lisbon', '2025-06-12T12:00:00Z');
  });

  test('unknown event types are stored as other', async () => {
    const { service } = setup();
    const event = await service.createEvent({ ...picnic, eventType: 'birthday' });
    expect(event.eventType).toBe('other');
  });

  test('saves the event without weather when the provider is unavailable', async () => {
    const { service } = setup({ failure: new WeatherUnavailableError('upstream', 'down') });
    const event = await service.createEvent(picnic);
    expect(event.weather).toBeNull();
    expect(event.suitability).toBeNull();
    expect(service.listEvents()).toHaveLength(1);
  });

  test('dates beyond the forecast horizon have no weather yet', async () => {
    const { service } = setup({ observation: null });
    const event = await service.createEvent(picnic);
    expect(event.weather).toBeNull();
  });
});

describe('updateEvent', () => {
  test('re-scores without a new lookup when only the event type changes', async () => {
    const { service, provider } = setup({ observation: observationAt('2025-06-12T12:00:00Z', { temperature: 29 }) });
    const event = await service.createEvent(picnic);
    expect(event.suitability?.score).toBe(91);

    const updated = await service.updateEvent(event.id, { eventType: 'other' });
    expect(updated.eventType).toBe('other');
    expect(updated.suitability?.score).toBe(100);
    expect(provider.getObservation).toHaveBeenCalledTimes(1);
  });

  test('fetches weather again when the date moves', async () => {
    const { service, provider, state } = setup();
    const event = await service.createEvent(picnic);
    state.observation = observationAt('2025-06-13T12:00:00Z', stormyOverrides);

    const updated = await service.updateEvent(event.id, { date: '2025-06-13' });
    expect(provider.getObservation).toHaveBeenLastCalledWith('Lisbon', '2025-06-13T12:00:00Z');
    expect(updated.suitability?.score).toBe(30);
  });

  test('unknown ids are rejected', async () => {
    const { service } = setup();
    await expect(service.updateEvent('missing', { name: 'x' })).rejects.toBeInstanceOf(EventNotFoundError);
  });
});

describe('checkWeather', () => {
  test('returns previous and current scores and stores the new one', async () => {
    const { service, state } = setup();
    const event = await service.createEvent(picnic);
    state.observation = observationAt('2025-06-12T12:00:00Z', stormyOverrides);

    const result = await service.checkWeather(event.id);
    expect(result.previous?.score).toBe(100);
    expect(result.current?.score).toBe(30);
    expect(result.current?.condition).toBe('poor');
    expect(service.getEvent(event.id).suitability?.score).toBe(30);
  });

  test('propagates provider failures', async () => {
    const { service, state } = setup();
    const event = await service.createEvent(picnic);
    state.failure = new WeatherUnavailableError('rate_limited', 'slow down', 60);
    await expect(service.checkWeather(event.id)).rejects.toMatchObject({ reason: 'rate_limited' });
  });
});

describe('getAlternatives', () => {
  test('offers only dates that beat the stored score', async () => {
    const { service, state } = setup({ observation: observationAt('2025-06-12T12:00:00Z', { temperature: 29 }) });
    const event = await service.createEvent(picnic);
    state.forecast = [
      observationAt('2025-06-11T12:00:00Z'),
      observationAt('2025-06-12T12:00:00Z', { temperature: 29 }),
      observationAt('2025-06-13T12:00:00Z', stormyOverrides),
    ];

    const result = await service.getAlternatives(event.id);
    expect(result.currentScore).toBe(91);
    expect(result.dates.map((candidate) => [candidate.date, candidate.score])).toEqual([['2025-06-11', 100]]);

    const everything = await service.getAlternatives(event.id, { betterOnly: false });
    expect(everything.dates.map((candidate) => candidate.date)).toEqual(['2025-06-11', '2025-06-13']);
  });

  test('ranks nearby locations and skips the event location', async () => {
    const { service, provider } = setup();
    const event = await service.createEvent(picnic);

    const result = await service.getAlternatives(event.id, { nearbyLocations: ['Cascais', 'lisbon', ' Cascais '], betterOnly: false });
    expect(result.locations.map((candidate) => candidate.location)).toEqual(['Cascais']);
    expect(provider.getObservation).toHaveBeenCalledTimes(2);
  });
});

describe('trends and listing', () => {
  test('getTrend analyses the forecast and the score series', async () => {
    const { service, state } = setup();
    const event = await service.createEvent(picnic);
    state.forecast = [18, 20, 22, 24].map((temperature, index) =>
      observationAt(`2025-06-1${index}T12:00:00Z`, { temperature }),
    );

    const trend = await service.getTrend(event.id);
    expect(trend.source).toBe('forecast');
    expect(trend.trend.metrics.temperature.direction).toBe('increasing');
    expect(trend.trend.metrics.precipitation.direction).toBe('stable');
    expect(trend.suitability).toMatchObject({ direction: 'stable', samples: 4 });
  });

  test('listUpcoming skips past events and deleteEvent removes', async () => {
    const { service } = setup();
    const past = await service.createEvent({ ...picnic, date: '2025-06-01' });
    const future = await service.createEvent(picnic);

    expect(service.listUpcoming().map((event) => event.id)).toEqual([future.id]);
    service.deleteEvent(past.id);
    expect(() => service.deleteEvent(past.id)).toThrow(EventNotFoundError);
  });
});

describe('getHourlyBreakdown', () => {
  test('scores each forecast sample on the event day', async () => {
    const { service, state } = setup();
    const event = await service.createEvent(picnic);
    state.forecast = [
      observationAt('2025-06-11T21:00:00Z'),
      observationAt('2025-06-12T09:00:00Z'),
      observationAt('2025-06-12T15:00:00Z', stormyOverrides),
      observationAt('2025-06-13T00:00:00Z'),
    ];

    const breakdown = await service.getHourlyBreakdown(event.id);
    expect(breakdown.date).toBe('2025-06-12');
    expect(breakdown.slots).toEqual([
      {
        time: '09:00',
        timestamp: '2025-06-12T09:00:00Z',
        temperature: 22,
        description: 'clear sky',
        score: 100,
        condition: 'excellent',
      },
      {
        time: '15:00',
        timestamp: '2025-06-12T15:00:00Z',
        temperature: 40,
        description: 'thunderstorm',
        score: 30,
        condition: 'poor',
      },
    ]);
  });
});

describe('getHistoricalComparison', () => {
  test('compares the event day with the same day a week earlier', async () => {
    const { service, state, provider } = setup();
    const event = await service.createEvent(picnic);
    state.forecast = [observationAt('2025-06-05T12:00:00Z', { temperature: 18.5, precipitation: 1.2, windSpeed: 9 })];

    const comparison = await service.getHistoricalComparison(event.id);
    expect(comparison.target.at).toBe('2025-06-12T12:00:00.000Z');
    expect(comparison.lastWeek.at).toBe('2025-06-05T12:00:00.000Z');
    expect(comparison.lastWeek.weather?.temperature).toBe(18.5);
    expect(comparison.differences).toEqual({ temperature: 3.5, precipitation: -1.2, windSpeed: -4 });
    expect(provider.getHistory).toHaveBeenCalledWith('Lisbon', new Date('2025-06-06T00:00:00Z'), 1, {
      fallbackToCurrent: false,
    });
  });

  test('leaves the differences empty when history is unavailable', async () => {
    const { service, provider } = setup();
    const event = await service.createEvent(picnic);
    vi.mocked(provider.getHistory).mockRejectedValue(new WeatherUnavailableError('unauthorized', 'history needs a paid plan'));

    const comparison = await service.getHistoricalComparison(event.id);
    expect(comparison.target.weather?.temperature).toBe(22);
    expect(comparison.lastWeek.weather).toBeNull();
    expect(comparison.differences).toBeNull();
  });
});

describe('checkWeather without persisting', () => {
  test('keeps the stored score until saveWeather commits it', async () => {
    const { service, state } = setup();
    const event = await service.createEvent(picnic);
    state.observation = observationAt('2025-06-12T12:00:00Z', stormyOverrides);

    const result = await service.checkWeather(event.id, { persist: false });
    expect(result.current?.score).toBe(30);
    expect(service.getEvent(event.id).suitability?.score).toBe(100);

    if (!result.observation || !result.current) {
      throw new Error('expected a scored observation');
    }
    expect(service.saveWeather(event.id, result.observation, result.current).suitability?.score).toBe(30);
  });
});
