import type { AlternativeCandidate } from './alternatives.js';
import type { SuitabilityEngine } from './engine.js';
import { EventNotFoundError, WeatherUnavailableError, errorMessage } from './errors.js';
import type { EventStore, NewPlannedEvent, PlannedEvent, PlannedEventPatch, StoredSuitability } from './event-store.js';
import type { WeatherObservation } from './observation.js';
import { resolveProfile } from './profiles.js';
import type { ConditionLabel } from './scoring.js';
import type { SeriesTrend, TrendResult } from './trend.js';
import { dateKeyInTimeZone, eventTimeToMs, observationTimeForEvent } from './time.js';
import { findClosestObservation, type HistoryResult, type WeatherProvider } from './weather-service.js';

export interface EventInput {
  name: string;
  location: string;
  date: string;
  eventType?: string;
  description?: string;
  email?: string | null;
}

export type EventUpdate = Partial<EventInput>;

export interface WeatherCheckResult {
  event: PlannedEvent;
  observation: WeatherObservation | null;
  previous: StoredSuitability | null;
  current: StoredSuitability | null;
}

export interface CheckWeatherOptions {
  // When false the caller commits the result later with saveWeather.
  persist?: boolean;
}

export interface AlternativesOptions {
  nearbyLocations?: readonly string[];
  betterOnly?: boolean;
  limit?: number;
}

export interface AlternativesResult {
  eventId: string;
  baseDate: string;
  currentScore: number | null;
  dates: AlternativeCandidate[];
  locations: AlternativeCandidate[];
}

export type TrendSource = 'forecast' | 'history';

export interface LocationTrendOptions {
  eventType?: string;
  source?: TrendSource;
  days?: number;
}

export interface LocationTrend {
  location: string;
  source: TrendSource | HistoryResult['source'];
  trend: TrendResult;
  suitability: SeriesTrend | null;
}

export interface HourlySlot {
  time: string;
  timestamp: string;
  temperature: number | null;
  description: string;
  score: number;
  condition: ConditionLabel;
}

export interface HourlyBreakdown {
  eventId: string;
  date: string;
  slots: HourlySlot[];
}

export interface ComparedDay {
  at: string;
  weather: WeatherObservation | null;
}

export interface WeatherDifferences {
  temperature: number | null;
  precipitation: number | null;
  windSpeed: number | null;
}

export interface HistoricalComparison {
  eventId: string;
  location: string;
  target: ComparedDay;
  lastWeek: ComparedDay;
  differences: WeatherDifferences | null;
}

export interface EventService {
  createEvent(input: EventInput): Promise<PlannedEvent>;
  listEvents(): PlannedEvent[];
  listBetween(start: string | Date, end: string | Date): PlannedEvent[];
  listUpcoming(now?: Date): PlannedEvent[];
  getEvent(id: string): PlannedEvent;
  updateEvent(id: string, update: EventUpdate): Promise<PlannedEvent>;
  deleteEvent(id: string): void;
  markNotified(id: string, field: 'lastAlertAt' | 'lastReminderAt', at: Date): PlannedEvent;
  checkWeather(id: string, options?: CheckWeatherOptions): Promise<WeatherCheckResult>;
  saveWeather(id: string, observation: WeatherObservation, suitability: StoredSuitability): PlannedEvent;
  getAlternatives(id: string, options?: AlternativesOptions): Promise<AlternativesResult>;
  getTrend(id: string, options?: Omit<LocationTrendOptions, 'eventType'>): Promise<LocationTrend>;
  getLocationTrend(location: string, options?: LocationTrendOptions): Promise<LocationTrend>;
  getHourlyBreakdown(id: string): Promise<HourlyBreakdown>;
  getHistoricalComparison(id: string): Promise<HistoricalComparison>;
}

interface CreateEventServiceOptions {
  store: EventStore;
  weatherProvider: WeatherProvider;
  engine: SuitabilityEngine;
  historyFallbackToCurrent?: boolean;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const WEEK_MS = 7 * DAY_MS;

const difference = (a: number | null, b: number | null): number | null =>
  a === null || b === null ? null : Math.round((a - b) * 10) / 10;

export const createEventService = ({
  store,
  weatherProvider,
  engine,
  historyFallbackToCurrent = false,
  now = () => new Date(),
}: CreateEventServiceOptions): EventService => {
  const requireEvent = (id: string): PlannedEvent => {
    const event = store.get(id);
    if (!event) {
      throw new EventNotFoundError(id);
    }
    return event;
  };

  const score = (observation: WeatherObservation, eventType: string): StoredSuitability => ({
    ...engine.computeSuitability(observation, eventType),
    checkedAt: now().toISOString(),
  });

  const normalizeEventType = (eventType: string | undefined): string =>
    resolveProfile(eventType ?? '', engine.profiles).eventType;

  // Create and update tolerate provider failures; the event is saved without weather.
  const tryFetchWeather = async (
    location: string,
    date: string,
    eventType: string,
  ): Promise<Pick<PlannedEvent, 'weather' | 'suitability'>> => {
    try {
      const observation = await weatherProvider.getObservation(location, observationTimeForEvent(date));
      return {
        weather: observation,
        suitability: observation ? score(observation, eventType) : null,
      };
    } catch (error) {
      if (!(error instanceof WeatherUnavailableError)) {
        throw error;
      }
      console.warn(`[events] weather unavailable for ${location} on ${date}: ${errorMessage(error)}`);
      return { weather: null, suitability: null };
    }
  };

  const createEvent = async (input: EventInput): Promise<PlannedEvent> => {
    const eventType = normalizeEventType(input.eventType);
    const weather = await tryFetchWeather(input.location, input.date, eventType);
    const record: NewPlannedEvent = {
      name: input.name,
      location: input.location,
      date: input.date,
      eventType,
      description: input.description ?? '',
      email: input.email ?? null,
      ...weather,
    };
    const created = store.create(record);
    console.log(`[events] created ${created.id} "${created.name}" at ${created.location} on ${created.date}`);
    return created;
  };

  const updateEvent = async (id: string, update: EventUpdate): Promise<PlannedEvent> => {
    const existing = requireEvent(id);
    const patch: PlannedEventPatch = {};
    if (update.name !== undefined) patch.name = update.name;
    if (update.description !== undefined) patch.description = update.description;
    if (update.email !== undefined) patch.email = update.email;
    if (update.location !== undefined) patch.location = update.location;
    if (update.date !== undefined) patch.date = update.date;
    if (update.eventType !== undefined) patch.eventType = normalizeEventType(update.eventType);

    const location = patch.location ?? existing.location;
    const date = patch.date ?? existing.date;
    const eventType = patch.eventType ?? existing.eventType;

    if (location !== existing.location || date !== existing.date) {
      Object.assign(patch, await tryFetchWeather(location, date, eventType), { lastAlertAt: null, lastReminderAt: null });
    } else if (eventType !== existing.eventType && existing.weather) {
      patch.suitability = score(existing.weather, eventType);
    }

    const updated = store.update(id, patch);
    if (!updated) {
      throw new EventNotFoundError(id);
    }
    return updated;
  };

  const deleteEvent = (id: string): void => {
    if (!store.remove(id)) {
      throw new EventNotFoundError(id);
    }
    console.log(`[events] deleted ${id}`);
  };

  const listUpcoming = (at: Date = now()): PlannedEvent[] =>
    store.list().filter((event) => {
      const eventMs = eventTimeToMs(event.date);
      return eventMs !== null && eventMs >= at.getTime();
    });

  const markNotified = (id: string, field: 'lastAlertAt' | 'lastReminderAt', at: Date): PlannedEvent => {
    const timestamp = at.toISOString();
    const updated = store.update(id, field === 'lastAlertAt' ? { lastAlertAt: timestamp } : { lastReminderAt: timestamp });
    if (!updated) {
      throw new EventNotFoundError(id);
    }
    return updated;
  };

  const saveWeather = (id: string, observation: WeatherObservation, suitability: StoredSuitability): PlannedEvent => {
    const updated = store.update(id, { weather: observation, suitability });
    if (!updated) {
      throw new EventNotFoundError(id);
    }
    return updated;
  };

  const checkWeather = async (id: string, { persist = true }: CheckWeatherOptions = {}): Promise<WeatherCheckResult> => {
    const event = requireEvent(id);
    const observation = await weatherProvider.getObservation(event.location, observationTimeForEvent(event.date));
    if (!observation) {
      return { event, observation: null, previous: event.suitability, current: null };
    }
    const current = score(observation, event.eventType);
    const latest = persist ? saveWeather(id, observation, current) : event;
    return { event: latest, observation, previous: event.suitability, current };
  };

  const lookupNearby = async (location: string, date: string): Promise<WeatherObservation | null> => {
    try {
      return await weatherProvider.getObservation(location, observationTimeForEvent(date));
    } catch (error) {
      if (error instanceof WeatherUnavailableError && error.reason === 'not_found') {
        return null;
      }
      throw error;
    }
  };

  const getAlternatives = async (
    id: string,
    { nearbyLocations = [], betterOnly = true, limit }: AlternativesOptions = {},
  ): Promise<AlternativesResult> => {
    const event = requireEvent(id);
    const currentScore = betterOnly ? event.suitability?.score ?? null : null;
    const forecast = await weatherProvider.getForecast(event.location);
    const dates = engine.rankAlternatives({
      baseLocation: event.location,
      baseDate: event.date,
      eventType: event.eventType,
      forecast,
      currentScore,
      limit,
    });

    const uniqueNearby = [...new Set(nearbyLocations.map((location) => location.trim()).filter(Boolean))]
      .filter((location) => location.toLowerCase() !== event.location.trim().toLowerCase());
    const candidates = await Promise.all(
      uniqueNearby.map(async (location) => ({ location, observation: await lookupNearby(location, event.date) })),
    );
    const locations = engine.rankNearbyLocations({
      baseDate: event.date,
      eventType: event.eventType,
      candidates,
      currentScore,
      limit,
    });

    return { eventId: event.id, baseDate: event.date, currentScore, dates, locations };
  };

  const getLocationTrend = async (
    location: string,
    { eventType, source = 'forecast', days = 5 }: LocationTrendOptions = {},
  ): Promise<LocationTrend> => {
    let observations: WeatherObservation[];
    let resolvedSource: LocationTrend['source'] = source;
    if (source === 'history') {
      const history = await weatherProvider.getHistory(location, now(), days, { fallbackToCurrent: historyFallbackToCurrent });
      observations = history.observations;
      resolvedSource = history.source;
    } else {
      observations = await weatherProvider.getForecast(location, days);
    }

    const suitability = eventType
      ? engine.analyzeSeriesTrend(
          observations.map((observation) => engine.computeSuitability(observation, eventType).score),
          { polarity: 'higher-is-better' },
        )
      : null;

    return { location, source: resolvedSource, trend: engine.analyzeTrend(observations), suitability };
  };

  const getTrend = async (id: string, options: Omit<LocationTrendOptions, 'eventType'> = {}): Promise<LocationTrend> => {
    const event = requireEvent(id);
    return getLocationTrend(event.location, { ...options, eventType: event.eventType });
  };

  const getHourlyBreakdown = async (id: string): Promise<HourlyBreakdown> => {
    const event = requireEvent(id);
    const dayKey = dateKeyInTimeZone(observationTimeForEvent(event.date));
    const forecast = await weatherProvider.getForecast(event.location);
    const slots = forecast
      .filter((sample) => dayKey !== null && dateKeyInTimeZone(sample.timestamp) === dayKey)
      .map((sample): HourlySlot => {
        const { score: sampleScore, condition } = engine.computeSuitability(sample, event.eventType);
        return {
          time: sample.timestamp.slice(11, 16),
          timestamp: sample.timestamp,
          temperature: sample.temperature,
          description: sample.description,
          score: sampleScore,
          condition,
        };
      });
    return { eventId: event.id, date: dayKey ?? event.date, slots };
  };

  // Past instants come from the history endpoint, later ones from the forecast.
  const observeAt = async (location: string, atMs: number): Promise<WeatherObservation | null> => {
    const nowMs = now().getTime();
    if (atMs >= nowMs) {
      return weatherProvider.getObservation(location, new Date(atMs));
    }
    const history = await weatherProvider.getHistory(location, new Date(Math.min(atMs + DAY_MS / 2, nowMs)), 1, {
      fallbackToCurrent: false,
    });
    return findClosestObservation(history.observations, atMs, DAY_MS / 2);
  };

  const getHistoricalComparison = async (id: string): Promise<HistoricalComparison> => {
    const event = requireEvent(id);
    const targetMs = eventTimeToMs(event.date);
    if (targetMs === null) {
      throw new TypeError(`Event ${id} has an unreadable date: ${event.date}`);
    }
    const lastWeekMs = targetMs - WEEK_MS;

    const target = await observeAt(event.location, targetMs);
    let lastWeek: WeatherObservation | null = null;
    try {
      lastWeek = await observeAt(event.location, lastWeekMs);
    } catch (error) {
      if (!(error instanceof WeatherUnavailableError)) {
        throw error;
      }
      console.warn(`[events] last week's weather unavailable for ${event.location}: ${errorMessage(error)}`);
    }

    return {
      eventId: event.id,
      location: event.location,
      target: { at: new Date(targetMs).toISOString(), weather: target },
      lastWeek: { at: new Date(lastWeekMs).toISOString(), weather: lastWeek },
      differences:
        target && lastWeek
          ? {
              temperature: difference(target.temperature, lastWeek.temperature),
              precipitation: difference(target.precipitation, lastWeek.precipitation),
              windSpeed: difference(target.windSpeed, lastWeek.windSpeed),
            }
          : null,
    };
  };

  return {
    createEvent,
    listEvents: () => store.list(),
    listBetween: (start, end) => store.listBetween(start, end),
    listUpcoming,
    getEvent: requireEvent,
    updateEvent,
    deleteEvent,
    markNotified,
    checkWeather,
    saveWeather,
    getAlternatives,
    getTrend,
    getLocationTrend,
    getHourlyBreakdown,
    getHistoricalComparison,
  };
};
