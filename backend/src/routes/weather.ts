import type { Express, Request, Response } from 'express';
import type { SuitabilityEngine } from '../utils/engine.js';
import type { EventService } from '../utils/event-service.js';
import { createObservation } from '../utils/observation.js';
import { activeFactors } from '../utils/profiles.js';
import { observationTimeForEvent, parseIsoTimeToMs } from '../utils/time.js';
import type { WeatherProvider } from '../utils/weather-service.js';
import { parseOrReject, sendError } from './respond.js';
import { SuitabilityRequestSchema, TrendQuerySchema } from './schemas.js';

interface RegisterWeatherRoutesOptions {
  app: Express;
  engine: SuitabilityEngine;
  weatherProvider: WeatherProvider;
  eventService: EventService;
}

export const registerWeatherRoutes = ({ app, engine, weatherProvider, eventService }: RegisterWeatherRoutesOptions) => {
  app.get('/api/event-types', (_req: Request, res: Response) => {
    res.json(
      Object.entries(engine.profiles).map(([eventType, profile]) => ({
        eventType,
        label: profile.label,
        factors: activeFactors(profile).map(({ factor, threshold }) => ({ factor, ...threshold })),
      })),
    );
  });

  app.post('/api/suitability', (req: Request, res: Response) => {
    const body = parseOrReject(SuitabilityRequestSchema, req.body, res);
    if (!body) return;
    res.json(engine.computeSuitability(createObservation(body.observation), body.eventType));
  });

  // Registered before the date route so "trend" is not read as a date.
  app.get('/api/weather/:location/trend', async (req: Request, res: Response) => {
    const query = parseOrReject(TrendQuerySchema, req.query, res);
    if (!query) return;
    try {
      res.json(await eventService.getLocationTrend(req.params.location, query));
    } catch (error) {
      sendError(res, error, 'Failed to analyze trend');
    }
  });

  app.get('/api/weather/:location/:date', async (req: Request, res: Response) => {
    const { location, date } = req.params;
    if (parseIsoTimeToMs(date) === null) {
      return res.status(400).json({ error: 'Invalid date. Use YYYY-MM-DD or an ISO 8601 date-time.' });
    }
    const eventType = typeof req.query.eventType === 'string' ? req.query.eventType : 'other';
    try {
      const observation = await weatherProvider.getObservation(location, observationTimeForEvent(date));
      if (!observation) {
        return res.status(404).json({ error: 'No forecast available for the requested date', location, date });
      }
      return res.json({ location, date, observation, suitability: engine.computeSuitability(observation, eventType) });
    } catch (error) {
      return sendError(res, error, 'Failed to fetch weather');
    }
  });
};
