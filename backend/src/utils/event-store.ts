import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { WeatherObservation } from './observation.js';
import type { ScoreBreakdown } from './scoring.js';
import { endOfRangeMs, eventTimeToMs, parseIsoTimeToMs } from './time.js';

export interface StoredSuitability extends ScoreBreakdown {
  checkedAt: string;
}

export interface PlannedEvent {
  id: string;
  name: string;
  location: string;
  date: string;
  eventType: string;
  description: string;
  email: string | null;
  weather: WeatherObservation | null;
  suitability: StoredSuitability | null;
  lastAlertAt: string | null;
  lastReminderAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type NewPlannedEvent = Pick<PlannedEvent, 'name' | 'location' | 'date' | 'eventType'> &
  Partial<Pick<PlannedEvent, 'description' | 'email' | 'weather' | 'suitability'>>;

export type PlannedEventPatch = Partial<Omit<PlannedEvent, 'id' | 'createdAt' | 'updatedAt'>>;

export interface EventStore {
  list(): PlannedEvent[];
  get(id: string): PlannedEvent | null;
  create(event: NewPlannedEvent): PlannedEvent;
  update(id: string, patch: PlannedEventPatch): PlannedEvent | null;
  remove(id: string): boolean;
  listBetween(start: string | Date, end: string | Date): PlannedEvent[];
}

interface CreateEventStoreOptions {
  filePath: string | null;
  now?: () => Date;
  generateId?: () => string;
}

const byDate = (a: PlannedEvent, b: PlannedEvent): number =>
  (eventTimeToMs(a.date) ?? 0) - (eventTimeToMs(b.date) ?? 0) || a.createdAt.localeCompare(b.createdAt);

const isStoredEvent = (value: unknown): value is PlannedEvent => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'id' in value && typeof value.id === 'string'
    && 'name' in value && typeof value.name === 'string'
    && 'location' in value && typeof value.location === 'string'
    && 'date' in value && typeof value.date === 'string'
    && 'eventType' in value && typeof value.eventType === 'string';
};

/**
 * Events live in memory and the whole collection is rewritten to `filePath`
 * after each mutation. A mutation is applied to a copy of the collection and
 * only replaces it once the file write succeeded. A `null` path never touches
 * the disk.
 */
export const createEventStore = ({
  filePath,
  now = () => new Date(),
  generateId = () => crypto.randomUUID(),
}: CreateEventStoreOptions): EventStore => {
  let events = new Map<string, PlannedEvent>();
  const resolvedPath = filePath ? path.resolve(filePath) : null;

  const commit = (next: Map<string, PlannedEvent>) => {
    if (resolvedPath) {
      const content = JSON.stringify([...next.values()], null, 2) + '\n';
      const tempPath = `${resolvedPath}.tmp`;
      fs.writeFileSync(tempPath, content, 'utf8');
      fs.renameSync(tempPath, resolvedPath);
    }
    events = next;
  };

  if (resolvedPath) {
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    if (fs.existsSync(resolvedPath)) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(resolvedPath, 'utf8'));
        const records = Array.isArray(parsed) ? parsed.filter(isStoredEvent) : [];
        for (const record of records) {
          events.set(record.id, {
            ...record,
            description: record.description ?? '',
            email: record.email ?? null,
            weather: record.weather ?? null,
            suitability: record.suitability ?? null,
            lastAlertAt: record.lastAlertAt ?? null,
            lastReminderAt: record.lastReminderAt ?? null,
          });
        }
        console.log(`[event-store] loaded ${events.size} event(s) from ${resolvedPath}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[event-store] could not read ${resolvedPath}, starting empty:`, message);
      }
    }
  }

  const list = () => [...events.values()].sort(byDate).map((event) => ({ ...event }));

  const get = (id: string) => {
    const event = events.get(id);
    return event ? { ...event } : null;
  };

  const create = (input: NewPlannedEvent): PlannedEvent => {
    const timestamp = now().toISOString();
    const event: PlannedEvent = {
      id: generateId(),
      name: input.name,
      location: input.location,
      date: input.date,
      eventType: input.eventType,
      description: input.description ?? '',
      email: input.email ?? null,
      weather: input.weather ?? null,
      suitability: input.suitability ?? null,
      lastAlertAt: null,
      lastReminderAt: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    commit(new Map(events).set(event.id, event));
    return { ...event };
  };

  const update = (id: string, patch: PlannedEventPatch): PlannedEvent | null => {
    const existing = events.get(id);
    if (!existing) {
      return null;
    }
    const updated: PlannedEvent = {
      ...existing,
      ...patch,
      id: existing.id,
      createdAt: existing.createdAt,
      updatedAt: now().toISOString(),
    };
    commit(new Map(events).set(id, updated));
    return { ...updated };
  };

  const remove = (id: string): boolean => {
    if (!events.has(id)) {
      return false;
    }
    const next = new Map(events);
    next.delete(id);
    commit(next);
    return true;
  };

  const listBetween = (start: string | Date, end: string | Date): PlannedEvent[] => {
    const startMs = parseIsoTimeToMs(start) ?? Number.NEGATIVE_INFINITY;
    const endMs = endOfRangeMs(end) ?? Number.POSITIVE_INFINITY;
    return list().filter((event) => {
      const eventMs = eventTimeToMs(event.date);
      return eventMs !== null && eventMs >= startMs && eventMs <= endMs;
    });
  };

  return { list, get, create, update, remove, listBetween };
};
