import type { Express } from 'express';
import { registerEventRoutes } from '../routes/events.js';
import { registerHealthRoutes } from '../routes/health.js';
import { registerWeatherRoutes } from '../routes/weather.js';
import { createSuitabilityEngine, type SuitabilityEngine } from '../utils/engine.js';
import { createEventService, type EventService } from '../utils/event-service.js';
import { createEventStore, type EventStore } from '../utils/event-store.js';
import { DEFAULT_FETCH_HEADERS, createFetchWithTimeout } from '../utils/http-client.js';
import { createNotificationLoop, type NotificationLoop } from '../utils/notification-loop.js';
import { createNotifier, type Notifier } from '../utils/notifier.js';
import { createOpenWeatherProvider, type WeatherProvider } from '../utils/weather-service.js';
import { createApp, registerFallbackHandlers } from './create-app.js';
import {
  ALERT_POLICY,
  ALERT_TEMP_MAX_C,
  ALERT_TEMP_MIN_C,
  ALERT_WIND_MAX_MS,
  CACHE_TTL_MS,
  CHECK_INTERVAL_MS,
  CONDITION_BANDS,
  CORS_ALLOWLIST,
  DEBUG_WEATHER,
  EVENTS_FILE,
  HISTORY_FALLBACK_TO_CURRENT,
  IS_PRODUCTION,
  IS_TEST,
  NOTIFICATIONS_ENABLED,
  OPENWEATHER_API_KEY,
  RATE_LIMIT_MAX_REQUESTS,
  RATE_LIMIT_WINDOW_MS,
  REMINDER_HOURS_BEFORE,
  REQUEST_TIMEOUT_MS,
  SCORE_CHANGE_THRESHOLD_PCT,
  SCORING_MODE,
  SERVICE_VERSION,
  SMTP_FROM,
  SMTP_HOST,
  SMTP_PASS,
  SMTP_PORT,
  SMTP_USER,
  TREND_METHOD,
  TREND_THRESHOLD,
} from './runtime.js';

const weatherLog = (...args: unknown[]) => {
  if (DEBUG_WEATHER) {
    console.log(...args);
  }
};

export interface BackendOverrides {
  weatherProvider?: WeatherProvider;
  store?: EventStore;
  notifier?: Notifier;
  engine?: SuitabilityEngine;
  now?: () => Date;
}

export interface Backend {
  app: Express;
  engine: SuitabilityEngine;
  weatherProvider: WeatherProvider;
  store: EventStore;
  eventService: EventService;
  notificationLoop: NotificationLoop;
}

/**
 * Builds every component once and wires them into an Express app. Tests pass
 * in-process stand-ins for the provider, store and notifier.
 */
export const createBackend = (overrides: BackendOverrides = {}): Backend => {
  const now = overrides.now ?? (() => new Date());
  const engine = overrides.engine ?? createSuitabilityEngine({
    scoringMode: SCORING_MODE,
    conditionBands: CONDITION_BANDS,
    trendMethod: TREND_METHOD,
    trendThreshold: TREND_THRESHOLD,
  });

  const weatherProvider = overrides.weatherProvider ?? createOpenWeatherProvider({
    apiKey: OPENWEATHER_API_KEY,
    fetchWithTimeout: createFetchWithTimeout(REQUEST_TIMEOUT_MS),
    fetchOptions: { headers: DEFAULT_FETCH_HEADERS },
    cacheTtlMs: CACHE_TTL_MS,
    log: weatherLog,
  });

  const store = overrides.store ?? createEventStore({ filePath: IS_TEST ? null : EVENTS_FILE });

  const eventService = createEventService({
    store,
    weatherProvider,
    engine,
    historyFallbackToCurrent: HISTORY_FALLBACK_TO_CURRENT,
    now,
  });

  const notifier = overrides.notifier ?? createNotifier({
    enabled: NOTIFICATIONS_ENABLED,
    host: SMTP_HOST,
    port: SMTP_PORT,
    user: SMTP_USER,
    pass: SMTP_PASS,
    from: SMTP_FROM,
  });

  const notificationLoop = createNotificationLoop({
    eventService,
    notifier,
    intervalMs: CHECK_INTERVAL_MS,
    reminderHoursBefore: REMINDER_HOURS_BEFORE,
    alertPolicy: ALERT_POLICY,
    scoreChangeThresholdPct: SCORE_CHANGE_THRESHOLD_PCT,
    fieldThresholds: {
      temperatureMin: ALERT_TEMP_MIN_C,
      temperatureMax: ALERT_TEMP_MAX_C,
      windSpeedMax: ALERT_WIND_MAX_MS,
    },
    now,
  });

  const app = createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  });

  registerHealthRoutes({ app, version: SERVICE_VERSION, notificationLoop });
  registerWeatherRoutes({ app, engine, weatherProvider, eventService });
  registerEventRoutes({ app, eventService });
  registerFallbackHandlers(app);

  return { app, engine, weatherProvider, store, eventService, notificationLoop };
};
