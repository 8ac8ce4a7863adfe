import { decideAlert, type AlertPolicy, type FieldThresholds } from './alerts.js';
import { errorMessage } from './errors.js';
import type { EventService } from './event-service.js';
import type { PlannedEvent } from './event-store.js';
import { buildAlternativesMessage, buildReminderMessage, buildWeatherAlertMessage, type Notifier } from './notifier.js';
import type { TrendResult } from './trend.js';
import { hoursUntil, observationTimeForEvent, parseIsoTimeToMs } from './time.js';

export interface CycleSummary {
  skipped: boolean;
  checked: number;
  alerts: number;
  reminders: number;
  failures: number;
}

export interface NotificationLoop {
  start(): void;
  stop(): void;
  isRunning(): boolean;
  runCycle(at?: Date): Promise<CycleSummary>;
}

interface CreateNotificationLoopOptions {
  eventService: EventService;
  notifier: Notifier;
  intervalMs: number;
  reminderHoursBefore: number;
  alertPolicy: AlertPolicy;
  scoreChangeThresholdPct: number;
  fieldThresholds?: Partial<FieldThresholds>;
  alertCooldownMs?: number;
  alternativesLimit?: number;
  now?: () => Date;
}

const emptySummary = (skipped: boolean): CycleSummary => ({ skipped, checked: 0, alerts: 0, reminders: 0, failures: 0 });

/**
 * Periodically re-checks upcoming events that have an email address, sends
 * weather alerts when the alert policy fires and a single reminder once the
 * event is within the reminder window.
 *
 * Threshold-only alerts repeat at most once per `alertCooldownMs`; a
 * significant score or condition change always alerts. A new score is only
 * stored once its alert went out, so a failed send is retried next cycle.
 * The alert and reminder steps fail independently.
 */
export const createNotificationLoop = ({
  eventService,
  notifier,
  intervalMs,
  reminderHoursBefore,
  alertPolicy,
  scoreChangeThresholdPct,
  fieldThresholds = {},
  alertCooldownMs = 6 * 60 * 60 * 1000,
  alternativesLimit = 3,
  now = () => new Date(),
}: CreateNotificationLoopOptions): NotificationLoop => {
  let timer: NodeJS.Timeout | null = null;
  let cycleInFlight = false;

  const alertedRecently = (event: PlannedEvent, at: Date): boolean => {
    const lastMs = parseIsoTimeToMs(event.lastAlertAt);
    return lastMs !== null && at.getTime() - lastMs < alertCooldownMs;
  };

  const processAlert = async (event: PlannedEvent, at: Date, to: string): Promise<{ event: PlannedEvent; alerted: boolean }> => {
    const check = await eventService.checkWeather(event.id, { persist: false });
    const { observation, current, previous } = check;
    if (!current || !observation) {
      return { event: check.event, alerted: false };
    }

    const decision = decideAlert({
      policy: alertPolicy,
      previous,
      next: current,
      observation,
      scoreDeltaPct: scoreChangeThresholdPct,
      thresholds: fieldThresholds,
    });
    if (!decision.shouldAlert || (!decision.change.significant && alertedRecently(check.event, at))) {
      return { event: eventService.saveWeather(event.id, observation, current), alerted: false };
    }

    await notifier.send({
      to,
      subject: `Weather alert for ${check.event.name}`,
      text: buildWeatherAlertMessage({
        event: check.event,
        previous,
        current,
        observation,
        breaches: decision.breaches,
      }),
    });
    eventService.saveWeather(event.id, observation, current);
    const latest = eventService.markNotified(event.id, 'lastAlertAt', at);

    try {
      const alternatives = await eventService.getAlternatives(event.id, { betterOnly: true, limit: alternativesLimit });
      if (alternatives.dates.length > 0) {
        await notifier.send({
          to,
          subject: `Better dates for ${latest.name}`,
          text: buildAlternativesMessage(latest, alternatives.dates),
        });
      }
    } catch (error) {
      console.warn(`[loop] better dates unavailable for ${event.id}: ${errorMessage(error)}`);
    }

    return { event: latest, alerted: true };
  };

  const processReminder = async (event: PlannedEvent, at: Date, to: string): Promise<boolean> => {
    const hours = hoursUntil(observationTimeForEvent(event.date), at);
    if (hours === null || hours < 0 || hours > reminderHoursBefore || event.lastReminderAt) {
      return false;
    }

    let trend: TrendResult | null = null;
    try {
      trend = (await eventService.getTrend(event.id)).trend;
    } catch (error) {
      console.warn(`[loop] trend unavailable for ${event.id}: ${errorMessage(error)}`);
    }

    await notifier.send({
      to,
      subject: `Reminder: ${event.name} is coming up`,
      text: buildReminderMessage(event, trend),
    });
    eventService.markNotified(event.id, 'lastReminderAt', at);
    return true;
  };

  const runCycle = async (at: Date = now()): Promise<CycleSummary> => {
    if (cycleInFlight) {
      console.warn('[loop] previous cycle still running, skipping');
      return emptySummary(true);
    }
    cycleInFlight = true;
    const summary = emptySummary(false);
    try {
      for (const event of eventService.listUpcoming(at)) {
        const to = event.email;
        if (!to) {
          continue;
        }
        summary.checked += 1;
        let latest = event;
        try {
          const result = await processAlert(event, at, to);
          latest = result.event;
          if (result.alerted) summary.alerts += 1;
        } catch (error) {
          summary.failures += 1;
          console.error(`[loop] weather check for ${event.id} failed: ${errorMessage(error)}`);
        }
        try {
          if (await processReminder(latest, at, to)) summary.reminders += 1;
        } catch (error) {
          summary.failures += 1;
          console.error(`[loop] reminder for ${event.id} failed: ${errorMessage(error)}`);
        }
      }
    } finally {
      cycleInFlight = false;
    }
    console.log(
      `[loop] cycle done: checked=${summary.checked} alerts=${summary.alerts} reminders=${summary.reminders} failures=${summary.failures}`,
    );
    return summary;
  };

  const start = () => {
    if (timer) {
      return;
    }
    timer = setInterval(() => {
      runCycle().catch((error: unknown) => {
        console.error('[loop] cycle crashed:', errorMessage(error));
      });
    }, intervalMs);
    timer.unref();
    console.log(`[loop] started, interval ${intervalMs}ms, notifications ${notifier.enabled ? 'enabled' : 'disabled'}`);
  };

  const stop = () => {
    if (timer) {
      clearInterval(timer);
      timer = null;
      console.log('[loop] stopped');
    }
  };

  return { start, stop, isRunning: () => timer !== null, runCycle };
};
