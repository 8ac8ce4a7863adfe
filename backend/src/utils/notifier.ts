import nodemailer from 'nodemailer';
import type { AlternativeCandidate } from './alternatives.js';
import type { ThresholdBreach } from './alerts.js';
import type { PlannedEvent, StoredSuitability } from './event-store.js';
import type { WeatherObservation } from './observation.js';
import type { TrendResult } from './trend.js';

export interface NotificationMessage {
  to: string;
  subject: string;
  text: string;
}

export interface Notifier {
  readonly enabled: boolean;
  send(message: NotificationMessage): Promise<boolean>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
}

export const createDisabledNotifier = (reason = 'SMTP is not configured'): Notifier => ({
  enabled: false,
  send: async ({ to, subject }) => {
    console.log(`[notify] skipped "${subject}" to ${to}: ${reason}`);
    return false;
  },
});

export const createSmtpNotifier = ({ host, port, user, pass, from }: SmtpSettings): Notifier => {
  const transport = nodemailer.createTransport({
    host,
    port,
    secure: port === 465,
    auth: { user, pass },
  });

  return {
    enabled: true,
    send: async ({ to, subject, text }) => {
      const info = await transport.sendMail({ from: from || user, to, subject, text });
      console.log(`[notify] sent "${subject}" to ${to} (${info.messageId})`);
      return true;
    },
  };
};

export const createNotifier = (settings: SmtpSettings & { enabled: boolean }): Notifier => {
  if (!settings.enabled) {
    return createDisabledNotifier('notifications are disabled');
  }
  if (!settings.host || !settings.user) {
    return createDisabledNotifier();
  }
  return createSmtpNotifier(settings);
};

const formatValue = (value: number | null, unit: string): string => (value === null ? 'n/a' : `${value}${unit}`);

const describeObservation = (observation: WeatherObservation): string[] => [
  `Conditions: ${observation.description || 'n/a'}`,
  `Temperature: ${formatValue(observation.temperature, '°C')}`,
  `Precipitation: ${formatValue(observation.precipitation, ' mm')} (chance ${formatValue(observation.precipitationChance, '%')})`,
  `Wind: ${formatValue(observation.windSpeed, ' m/s')}`,
  `Cloud cover: ${formatValue(observation.cloudCover, '%')}`,
];

const describeBreach = ({ field, bound, value, limit }: ThresholdBreach): string =>
  `${field} ${value} is ${bound === 'min' ? 'below' : 'above'} the limit of ${limit}`;

const eventHeader = (event: PlannedEvent): string[] => [
  `Event: ${event.name}`,
  `Date: ${event.date}`,
  `Location: ${event.location}`,
];

interface WeatherAlertInput {
  event: PlannedEvent;
  previous: StoredSuitability | null;
  current: StoredSuitability;
  observation: WeatherObservation;
  breaches: readonly ThresholdBreach[];
}

export const buildWeatherAlertMessage = ({ event, previous, current, observation, breaches }: WeatherAlertInput): string => {
  const lines = [...eventHeader(event), ''];
  if (previous) {
    lines.push(`Previous score: ${previous.score}/100 (${previous.condition})`);
  }
  lines.push(`New score: ${current.score}/100 (${current.condition})`, '', ...describeObservation(observation));
  if (breaches.length > 0) {
    lines.push('', 'Thresholds crossed:', ...breaches.map((breach) => `- ${describeBreach(breach)}`));
  }
  return lines.join('\n');
};

export const buildReminderMessage = (event: PlannedEvent, trend: TrendResult | null): string => {
  const lines = [...eventHeader(event), ''];
  if (event.weather) {
    lines.push(...describeObservation(event.weather));
  } else {
    lines.push('No forecast is available for the event time yet.');
  }
  if (event.suitability) {
    lines.push(`Suitability: ${event.suitability.score}/100 (${event.suitability.condition})`);
  }
  if (trend && trend.samples > 0) {
    const { temperature, precipitation, windSpeed } = trend.metrics;
    lines.push(
      '',
      `Outlook (${trend.confidence} confidence):`,
      `- temperature ${temperature.direction}`,
      `- precipitation ${precipitation.direction} (${precipitation.impact})`,
      `- wind ${windSpeed.direction} (${windSpeed.impact})`,
    );
  }
  return lines.join('\n');
};

export const buildAlternativesMessage = (event: PlannedEvent, alternatives: readonly AlternativeCandidate[]): string => {
  const lines = [...eventHeader(event), '', 'These dates look better for your event:'];
  for (const alternative of alternatives) {
    lines.push(
      `- ${alternative.date} at ${alternative.location}: ${alternative.score}/100 (${alternative.condition}), ${alternative.observation.description || 'n/a'}`,
    );
  }
  return lines.join('\n');
};
