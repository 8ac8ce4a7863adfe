import dotenv from 'dotenv';
import { ALERT_POLICIES, type AlertPolicy } from '../utils/alerts.js';
import { CONDITION_BAND_VARIANTS, SCORING_MODES, type ConditionBands, type ScoringMode } from '../utils/scoring.js';
import { TREND_METHODS, type TrendMethod } from '../utils/trend.js';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseNonNegativeNumber = (rawValue: string | undefined, fallback: number): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const parseNumber = (rawValue: string | undefined, fallback: number): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseChoice = <T extends string>(rawValue: string | undefined, choices: readonly T[], fallback: T): T => {
  const normalized = (rawValue || '').trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
};

const parseFlag = (rawValue: string | undefined, fallback: boolean): boolean => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(rawValue.trim().toLowerCase());
};

export const PORT = parsePositiveInt(process.env.PORT, 3001);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const IS_TEST = process.env.NODE_ENV === 'test';
export const DEBUG_WEATHER = process.env.DEBUG_WEATHER === 'true';
export const SERVICE_VERSION = process.env.npm_package_version || '1.0.0';

export const OPENWEATHER_API_KEY = (process.env.OPENWEATHER_API_KEY || '').trim();
export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const CACHE_TTL_MS = parsePositiveInt(process.env.CACHE_TTL_MS, 6 * 60 * 60 * 1000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const EVENTS_FILE = (process.env.EVENTS_FILE || 'data/events.json').trim();

export const SCORING_MODE: ScoringMode = parseChoice(process.env.SCORING_MODE, SCORING_MODES, 'banded');
export const CONDITION_BANDS: ConditionBands = parseChoice(process.env.CONDITION_BANDS, CONDITION_BAND_VARIANTS, 'four-tier');
export const TREND_METHOD: TrendMethod = parseChoice(process.env.TREND_METHOD, TREND_METHODS, 'delta');
export const TREND_THRESHOLD = parseNonNegativeNumber(process.env.TREND_THRESHOLD, TREND_METHOD === 'regression' ? 0.1 : 1);

export const ALERT_POLICY: AlertPolicy = parseChoice(process.env.ALERT_POLICY, ALERT_POLICIES, 'both');
export const SCORE_CHANGE_THRESHOLD_PCT = parseNonNegativeNumber(process.env.SCORE_CHANGE_THRESHOLD_PCT, 20);
export const ALERT_TEMP_MIN_C = parseNumber(process.env.ALERT_TEMP_MIN_C, 10);
export const ALERT_TEMP_MAX_C = parseNumber(process.env.ALERT_TEMP_MAX_C, 35);
export const ALERT_WIND_MAX_MS = parseNonNegativeNumber(process.env.ALERT_WIND_MAX_MS, 30);

export const CHECK_INTERVAL_MS = parsePositiveInt(process.env.CHECK_INTERVAL_MS, 60 * 60 * 1000);
export const REMINDER_HOURS_BEFORE = parsePositiveInt(process.env.REMINDER_HOURS_BEFORE, 24);
export const HISTORY_FALLBACK_TO_CURRENT = parseFlag(process.env.HISTORY_FALLBACK_TO_CURRENT, false);
export const NOTIFICATIONS_ENABLED = parseFlag(process.env.NOTIFICATIONS_ENABLED, true);

export const SMTP_HOST = (process.env.SMTP_HOST || '').trim();
export const SMTP_PORT = parsePositiveInt(process.env.SMTP_PORT, 587);
export const SMTP_USER = (process.env.SMTP_USER || '').trim();
export const SMTP_PASS = process.env.SMTP_PASS || '';
export const SMTP_FROM = (process.env.SMTP_FROM || SMTP_USER).trim();
