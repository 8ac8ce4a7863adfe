export type WeatherUnavailableReason = 'not_found' | 'rate_limited' | 'unauthorized' | 'upstream';

export class WeatherUnavailableError extends Error {
  readonly reason: WeatherUnavailableReason;
  readonly retryAfterSeconds: number | null;

  constructor(reason: WeatherUnavailableReason, message: string, retryAfterSeconds: number | null = null) {
    super(message);
    this.name = 'WeatherUnavailableError';
    this.reason = reason;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class EventNotFoundError extends Error {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`Event ${eventId} not found`);
    this.name = 'EventNotFoundError';
    this.eventId = eventId;
  }
}

export const isAbortError = (error: unknown): boolean => {
  if (error == null || typeof error !== 'object') {
    return false;
  }
  return 'name' in error && error.name === 'AbortError';
};

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
};

export interface HttpErrorBody {
  statusCode: number;
  body: { error: string; details?: string; reason?: string };
  retryAfterSeconds: number | null;
}

export const toHttpError = (error: unknown, fallbackMessage: string): HttpErrorBody => {
  if (error instanceof EventNotFoundError) {
    return { statusCode: 404, body: { error: 'Event not found' }, retryAfterSeconds: null };
  }
  if (error instanceof WeatherUnavailableError) {
    return {
      statusCode: error.reason === 'not_found' ? 404 : 503,
      body: { error: 'Weather data unavailable', reason: error.reason, details: error.message },
      retryAfterSeconds: error.retryAfterSeconds,
    };
  }
  return {
    statusCode: 500,
    body: { error: fallbackMessage, details: errorMessage(error) },
    retryAfterSeconds: null,
  };
};
