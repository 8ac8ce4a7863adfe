import { z } from 'zod';
import { parseIsoTimeToMs } from '../utils/time.js';

const isoDateTime = z
  .string()
  .trim()
  .refine((value) => parseIsoTimeToMs(value) !== null, { message: 'Expected an ISO 8601 date or date-time' });

const nullableNumber = z.number().finite().nullable().optional();

export const EventCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  location: z.string().trim().min(1).max(200),
  date: isoDateTime,
  eventType: z.string().trim().max(60).optional(),
  description: z.string().max(2000).optional(),
  email: z.string().trim().email().nullable().optional(),
});

export const EventUpdateSchema = EventCreateSchema.partial().refine((value) => Object.keys(value).length > 0, {
  message: 'At least one field must be provided',
});

export const SuitabilityRequestSchema = z.object({
  eventType: z.string().trim().max(60).default('other'),
  observation: z.object({
    temperature: nullableNumber,
    precipitation: nullableNumber,
    precipitationChance: nullableNumber,
    windSpeed: nullableNumber,
    cloudCover: nullableNumber,
    visibility: nullableNumber,
    description: z.string().optional(),
    timestamp: z.string().optional(),
  }),
});

export const EventRangeQuerySchema = z.object({
  from: isoDateTime.optional(),
  to: isoDateTime.optional(),
});

const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

export const AlternativesQuerySchema = z.object({
  nearby: z.string().max(1000).optional().transform(splitList),
  betterOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value !== 'false'),
  limit: z.coerce.number().int().min(1).max(5).optional(),
});

export const TrendQuerySchema = z.object({
  source: z.enum(['forecast', 'history']).default('forecast'),
  days: z.coerce.number().int().min(1).max(5).default(5),
  eventType: z.string().trim().max(60).optional(),
});
