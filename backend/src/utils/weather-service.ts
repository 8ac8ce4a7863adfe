import { createObservation, parseFiniteNumber, type WeatherObservation } from './observation.js';
import { errorMessage, isAbortError, WeatherUnavailableError } from './errors.js';
import type { FetchRequestInit, FetchResponseLike, FetchWithTimeout } from './http-client.js';
import { parseIsoTimeToMs } from './time.js';

export interface Coordinates {
  lat: number;
  lon: number;
  name: string;
  country: string | null;
}

export interface HistoryOptions {
  fallbackToCurrent?: boolean;
}

export interface HistoryResult {
  observations: WeatherObservation[];
  source: 'history' | 'current-fallback';
}

export interface WeatherProvider {
  getCoordinates(location: string): Promise<Coordinates | null>;
  getObservation(location: string, at: string | Date): Promise<WeatherObservation | null>;
  getForecast(location: string, daysAhead?: number): Promise<WeatherObservation[]>;
  getHistory(location: string, endDate: string | Date, days: number, options?: HistoryOptions): Promise<HistoryResult>;
}

export const OPENWEATHER_API_HOST = 'https://api.openweathermap.org';
export const OPENWEATHER_HISTORY_HOST = 'https://history.openweathermap.org';
export const MAX_FORECAST_DAYS = 5;
export const MAX_OBSERVATION_DISTANCE_MS = 24 * 60 * 60 * 1000;

const DAY_MS = 24 * 60 * 60 * 1000;

interface CacheEntry<T> {
  fetchedAt: number;
  value: T;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const recordOf = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

/**
 * Maps one OpenWeather forecast, history or current-weather entry into an
 * observation. OpenWeather omits the `rain`/`snow` blocks on dry periods, so
 * missing precipitation reads as 0 mm.
 */
export const parseOpenWeatherEntry = (entry: unknown): WeatherObservation | null => {
  const record = recordOf(entry);
  const dt = parseFiniteNumber(record.dt);
  if (dt === null) {
    return null;
  }
  const main = recordOf(record.main);
  const wind = recordOf(record.wind);
  const clouds = recordOf(record.clouds);
  const rain = recordOf(record.rain);
  const snow = recordOf(record.snow);
  const weatherList = Array.isArray(record.weather) ? record.weather : [];
  const conditions = recordOf(weatherList[0]);
  const rainMm = parseFiniteNumber(rain['3h']) ?? parseFiniteNumber(rain['1h']) ?? 0;
  const snowMm = parseFiniteNumber(snow['3h']) ?? parseFiniteNumber(snow['1h']) ?? 0;
  const pop = parseFiniteNumber(record.pop);

  return createObservation({
    temperature: parseFiniteNumber(main.temp),
    precipitation: Math.round((rainMm + snowMm) * 100) / 100,
    precipitationChance: pop === null ? null : Math.round(pop * 100),
    windSpeed: parseFiniteNumber(wind.speed),
    cloudCover: parseFiniteNumber(clouds.all),
    visibility: parseFiniteNumber(record.visibility),
    description: typeof conditions.description === 'string' ? conditions.description : '',
    timestamp: new Date(dt * 1000).toISOString(),
  });
};

export const parseOpenWeatherList = (payload: unknown): WeatherObservation[] => {
  const list = recordOf(payload).list;
  if (!Array.isArray(list)) {
    return [];
  }
  return list
    .map(parseOpenWeatherEntry)
    .filter((observation): observation is WeatherObservation => observation !== null)
    .sort((a, b) => (parseIsoTimeToMs(a.timestamp) ?? 0) - (parseIsoTimeToMs(b.timestamp) ?? 0));
};

export const findClosestObservation = (
  observations: readonly WeatherObservation[],
  targetMs: number,
  maxDistanceMs: number = MAX_OBSERVATION_DISTANCE_MS,
): WeatherObservation | null => {
  let best: WeatherObservation | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const observation of observations) {
    const sampleMs = parseIsoTimeToMs(observation.timestamp);
    if (sampleMs === null) {
      continue;
    }
    const distance = Math.abs(sampleMs - targetMs);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = observation;
    }
  }
  return bestDistance <= maxDistanceMs ? best : null;
};

const parseRetryAfterSeconds = (response: FetchResponseLike): number | null => {
  const header = response.headers.get('retry-after');
  const seconds = Number(header);
  return header !== null && Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds) : null;
};

interface CreateOpenWeatherProviderOptions {
  apiKey: string;
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: FetchRequestInit;
  cacheTtlMs?: number;
  now?: () => number;
  log?: (...args: unknown[]) => void;
}

export const createOpenWeatherProvider = ({
  apiKey,
  fetchWithTimeout,
  fetchOptions = {},
  cacheTtlMs = 6 * 60 * 60 * 1000,
  now = () => Date.now(),
  log,
}: CreateOpenWeatherProviderOptions): WeatherProvider => {
  const coordinatesCache = new Map<string, CacheEntry<Coordinates | null>>();
  const forecastCache = new Map<string, CacheEntry<WeatherObservation[]>>();
  const historyCache = new Map<string, CacheEntry<WeatherObservation[]>>();

  const readCache = <T>(cache: Map<string, CacheEntry<T>>, key: string): CacheEntry<T> | null => {
    const hit = cache.get(key);
    if (!hit) {
      return null;
    }
    if (now() - hit.fetchedAt >= cacheTtlMs) {
      cache.delete(key);
      return null;
    }
    return hit;
  };

  const requestJson = async (url: string, label: string): Promise<unknown> => {
    if (!apiKey) {
      throw new WeatherUnavailableError('unauthorized', 'OpenWeather API key is not configured.');
    }

    let response: FetchResponseLike;
    try {
      response = await fetchWithTimeout(url, fetchOptions);
    } catch (error) {
      const reason = isAbortError(error) ? 'timed out' : errorMessage(error);
      throw new WeatherUnavailableError('upstream', `OpenWeather ${label} request failed: ${reason}`);
    }

    if (response.status === 429) {
      const retryAfter = parseRetryAfterSeconds(response);
      log?.(`[weather] ${label} rate limited, retry after ${retryAfter ?? 'unknown'}s`);
      throw new WeatherUnavailableError('rate_limited', `OpenWeather ${label} rate limit reached.`, retryAfter);
    }
    if (response.status === 401 || response.status === 403) {
      throw new WeatherUnavailableError('unauthorized', `OpenWeather ${label} rejected the API key (status ${response.status}).`);
    }
    if (response.status === 404) {
      throw new WeatherUnavailableError('not_found', `OpenWeather ${label} found no data.`);
    }
    if (!response.ok) {
      throw new WeatherUnavailableError('upstream', `OpenWeather ${label} failed with status ${response.status}`);
    }
    return response.json();
  };

  const withKey = (path: string, params: Record<string, string>, host: string = OPENWEATHER_API_HOST): string => {
    const search = new URLSearchParams({ ...params, appid: apiKey });
    return `${host}${path}?${search.toString()}`;
  };

  const getCoordinates = async (location: string): Promise<Coordinates | null> => {
    const query = String(location || '').trim();
    if (!query) {
      return null;
    }
    const cacheKey = query.toLowerCase();
    const cached = readCache(coordinatesCache, cacheKey);
    if (cached) {
      return cached.value;
    }

    const payload = await requestJson(withKey('/geo/1.0/direct', { q: query, limit: '1' }), 'geocoding');
    const first = recordOf(Array.isArray(payload) ? payload[0] : null);
    const lat = parseFiniteNumber(first.lat);
    const lon = parseFiniteNumber(first.lon);
    const coordinates: Coordinates | null = lat !== null && lon !== null
      ? {
          lat,
          lon,
          name: typeof first.name === 'string' ? first.name : query,
          country: typeof first.country === 'string' ? first.country : null,
        }
      : null;

    coordinatesCache.set(cacheKey, { fetchedAt: now(), value: coordinates });
    log?.(`[weather] geocoded "${query}" ->`, coordinates);
    return coordinates;
  };

  const requireCoordinates = async (location: string): Promise<Coordinates> => {
    const coordinates = await getCoordinates(location);
    if (!coordinates) {
      throw new WeatherUnavailableError('not_found', `Location not found: ${location}`);
    }
    return coordinates;
  };

  const fetchForecastSamples = async (coordinates: Coordinates): Promise<WeatherObservation[]> => {
    const cacheKey = `${coordinates.lat},${coordinates.lon}`;
    const cached = readCache(forecastCache, cacheKey);
    if (cached) {
      return cached.value;
    }
    const payload = await requestJson(
      withKey('/data/2.5/forecast', { lat: String(coordinates.lat), lon: String(coordinates.lon), units: 'metric' }),
      'forecast',
    );
    const samples = parseOpenWeatherList(payload);
    forecastCache.set(cacheKey, { fetchedAt: now(), value: samples });
    return samples;
  };

  const getForecast = async (location: string, daysAhead: number = MAX_FORECAST_DAYS): Promise<WeatherObservation[]> => {
    const coordinates = await requireCoordinates(location);
    const samples = await fetchForecastSamples(coordinates);
    const horizonDays = Math.max(1, Math.min(MAX_FORECAST_DAYS, Math.floor(Number(daysAhead) || MAX_FORECAST_DAYS)));
    const horizonMs = now() + horizonDays * DAY_MS;
    return samples.filter((sample) => (parseIsoTimeToMs(sample.timestamp) ?? Number.POSITIVE_INFINITY) <= horizonMs);
  };

  const getObservation = async (location: string, at: string | Date): Promise<WeatherObservation | null> => {
    const targetMs = parseIsoTimeToMs(at);
    if (targetMs === null) {
      throw new TypeError('getObservation requires a valid date');
    }
    const coordinates = await requireCoordinates(location);
    return findClosestObservation(await fetchForecastSamples(coordinates), targetMs);
  };

  const getCurrentObservation = async (coordinates: Coordinates): Promise<WeatherObservation | null> => {
    const payload = await requestJson(
      withKey('/data/2.5/weather', { lat: String(coordinates.lat), lon: String(coordinates.lon), units: 'metric' }),
      'current weather',
    );
    return parseOpenWeatherEntry(payload);
  };

  const getHistory = async (
    location: string,
    endDate: string | Date,
    days: number,
    { fallbackToCurrent = false }: HistoryOptions = {},
  ): Promise<HistoryResult> => {
    const endMs = parseIsoTimeToMs(endDate);
    if (endMs === null) {
      throw new TypeError('getHistory requires a valid end date');
    }
    const coordinates = await requireCoordinates(location);
    const spanDays = Math.max(1, Math.min(7, Math.floor(Number(days) || 1)));
    const start = Math.floor((endMs - spanDays * DAY_MS) / 1000);
    const end = Math.floor(endMs / 1000);
    const cacheKey = `${coordinates.lat},${coordinates.lon}:${start}-${end}`;
    const cached = readCache(historyCache, cacheKey);
    if (cached) {
      return { observations: cached.value, source: 'history' };
    }

    try {
      const payload = await requestJson(
        withKey(
          '/data/2.5/history/city',
          {
            lat: String(coordinates.lat),
            lon: String(coordinates.lon),
            type: 'hour',
            start: String(start),
            end: String(end),
            units: 'metric',
          },
          OPENWEATHER_HISTORY_HOST,
        ),
        'history',
      );
      const observations = parseOpenWeatherList(payload);
      historyCache.set(cacheKey, { fetchedAt: now(), value: observations });
      return { observations, source: 'history' };
    } catch (error) {
      if (!(error instanceof WeatherUnavailableError) || error.reason !== 'unauthorized' || !fallbackToCurrent) {
        throw error;
      }
      console.warn(`[weather] history unavailable for ${location} (${error.message}); serving current conditions instead.`);
      const current = await getCurrentObservation(coordinates);
      return { observations: current ? [current] : [], source: 'current-fallback' };
    }
  };

  return { getCoordinates, getObservation, getForecast, getHistory };
};
