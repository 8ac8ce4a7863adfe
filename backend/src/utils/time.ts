const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

// Rejects dates the calendar does not have, such as 2025-02-30.
const calendarDateMs = (value: string): number | null => {
  const ms = Date.parse(`${value}T00:00:00Z`);
  return Number.isFinite(ms) && new Date(ms).toISOString().slice(0, 10) === value ? ms : null;
};

export const isIsoDate = (value: unknown): value is string =>
  typeof value === 'string' && ISO_DATE_PATTERN.test(value) && calendarDateMs(value) !== null;

export const parseIsoTimeToMs = (value: string | Date | null | undefined): number | null => {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? ms : null;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  if (ISO_DATE_PATTERN.test(trimmed)) {
    return calendarDateMs(trimmed);
  }
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

// Date-only events are looked up, listed and reminded about at midday UTC.
export const observationTimeForEvent = (date: string): string => (isIsoDate(date) ? `${date}T12:00:00Z` : date);

export const eventTimeToMs = (date: string): number | null => parseIsoTimeToMs(observationTimeForEvent(date));

/** Upper bound of a listing window: a date-only bound covers the whole day. */
export const endOfRangeMs = (end: string | Date): number | null => {
  const ms = parseIsoTimeToMs(end);
  if (ms === null) {
    return null;
  }
  return typeof end === 'string' && isIsoDate(end.trim()) ? ms + DAY_MS - 1 : ms;
};

export const daysBetweenIsoDates = (fromIsoDate: string, toIsoDate: string): number | null => {
  if (!isIsoDate(fromIsoDate) || !isIsoDate(toIsoDate)) {
    return null;
  }
  const fromMs = Date.parse(`${fromIsoDate}T00:00:00Z`);
  const toMs = Date.parse(`${toIsoDate}T00:00:00Z`);
  if (!Number.isFinite(fromMs) || !Number.isFinite(toMs)) {
    return null;
  }
  return Math.round((toMs - fromMs) / DAY_MS);
};

export const dateKeyInTimeZone = (value: Date | string | number, timeZone: string | null = 'UTC'): string | null => {
  if (typeof value === 'string' && isIsoDate(value.trim())) {
    return value.trim();
  }
  const date = value instanceof Date ? value : new Date(typeof value === 'string' ? parseIsoTimeToMs(value) ?? Number.NaN : value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }

  const formatWithZone = (zone: string | null): string | null => {
    try {
      const formatter = new Intl.DateTimeFormat('en-US', {
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        ...(zone ? { timeZone: zone } : {}),
      });
      const parts = formatter.formatToParts(date);
      const year = parts.find((part) => part.type === 'year')?.value;
      const month = parts.find((part) => part.type === 'month')?.value;
      const day = parts.find((part) => part.type === 'day')?.value;
      if (!year || !month || !day) {
        return null;
      }
      // MM/DD/YYYY -> YYYY-MM-DD
      return `${year}-${month}-${day}`;
    } catch {
      return null;
    }
  };

  const normalizedTimeZone = typeof timeZone === 'string' ? timeZone.trim() : '';
  return formatWithZone(normalizedTimeZone || 'UTC') || formatWithZone('UTC') || date.toISOString().slice(0, 10);
};

export const hoursUntil = (targetIso: string, now: Date): number | null => {
  const targetMs = parseIsoTimeToMs(targetIso);
  if (targetMs === null) {
    return null;
  }
  return (targetMs - now.getTime()) / (60 * 60 * 1000);
};
