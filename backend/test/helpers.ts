import { createObservation, type ObservationInput, type WeatherObservation } from '../src/utils/observation.js';
import type { NotificationMessage, Notifier } from '../src/utils/notifier.js';
import type { WeatherProvider } from '../src/utils/weather-service.js';

export const observationAt = (timestamp: string, overrides: ObservationInput = {}): WeatherObservation =>
  createObservation({
    temperature: 22,
    precipitation: 0,
    precipitationChance: 0,
    windSpeed: 5,
    cloudCover: 20,
    visibility: 10000,
    description: 'clear sky',
    timestamp,
    ...overrides,
  });

// Scores 30 (poor) for outdoor_sports and breaches the 35 °C alert limit.
export const stormyOverrides: ObservationInput = {
  temperature: 40,
  precipitation: 2,
  windSpeed: 25,
  cloudCover: 80,
  description: 'thunderstorm',
};

export interface FakeProviderState {
  observation: WeatherObservation | null;
  forecast: WeatherObservation[];
  failure: Error | null;
  failingLocations: Set<string>;
}

/** In-process stand-in for the OpenWeather provider. */
export const createFakeProvider = (initial: Partial<FakeProviderState> = {}) => {
  const state: FakeProviderState = {
    observation: observationAt('2025-06-12T12:00:00Z'),
    forecast: [],
    failure: null,
    failingLocations: new Set(),
    ...initial,
  };

  const guard = (location: string) => {
    if (state.failure) {
      throw state.failure;
    }
    if (state.failingLocations.has(location)) {
      throw new Error(`lookup exploded for ${location}`);
    }
  };

  const provider: WeatherProvider = {
    getCoordinates: vi.fn(async (location: string) => ({ lat: 38.7, lon: -9.1, name: location, country: 'PT' })),
    getObservation: vi.fn(async (location: string) => {
      guard(location);
      return state.observation;
    }),
    getForecast: vi.fn(async (location: string) => {
      guard(location);
      return state.forecast;
    }),
    getHistory: vi.fn(async (location: string) => {
      guard(location);
      return { observations: state.forecast, source: 'history' as const };
    }),
  };

  return { provider, state };
};

export const createRecordingNotifier = () => {
  const sent: NotificationMessage[] = [];
  const notifier: Notifier = {
    enabled: true,
    send: async (message) => {
      sent.push(message);
      return true;
    },
  };
  return { notifier, sent };
};
