import type { Express, Request, Response } from 'express';
import type { EventService } from '../utils/event-service.js';
import { AlternativesQuerySchema, EventCreateSchema, EventRangeQuerySchema, EventUpdateSchema, TrendQuerySchema } from './schemas.js';
import { parseOrReject, sendError } from './respond.js';

interface RegisterEventRoutesOptions {
  app: Express;
  eventService: EventService;
}

export const registerEventRoutes = ({ app, eventService }: RegisterEventRoutesOptions) => {
  app.get('/api/events', (req: Request, res: Response) => {
    const range = parseOrReject(EventRangeQuerySchema, req.query, res);
    if (!range) return;
    try {
      const events = range.from || range.to
        ? eventService.listBetween(range.from ?? '', range.to ?? '')
        : eventService.listEvents();
      res.json(events);
    } catch (error) {
      sendError(res, error, 'Failed to list events');
    }
  });

  app.post('/api/events', async (req: Request, res: Response) => {
    const body = parseOrReject(EventCreateSchema, req.body, res);
    if (!body) return;
    try {
      res.status(201).json(await eventService.createEvent(body));
    } catch (error) {
      sendError(res, error, 'Failed to create event');
    }
  });

  app.get('/api/events/:id', (req: Request, res: Response) => {
    try {
      res.json(eventService.getEvent(req.params.id));
    } catch (error) {
      sendError(res, error, 'Failed to load event');
    }
  });

  app.put('/api/events/:id', async (req: Request, res: Response) => {
    const body = parseOrReject(EventUpdateSchema, req.body, res);
    if (!body) return;
    try {
      res.json(await eventService.updateEvent(req.params.id, body));
    } catch (error) {
      sendError(res, error, 'Failed to update event');
    }
  });

  app.delete('/api/events/:id', (req: Request, res: Response) => {
    try {
      eventService.deleteEvent(req.params.id);
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'Failed to delete event');
    }
  });

  app.post('/api/events/:id/weather-check', async (req: Request, res: Response) => {
    try {
      const result = await eventService.checkWeather(req.params.id);
      res.json({
        event: result.event,
        observation: result.observation,
        previous: result.previous,
        current: result.current,
        available: result.current !== null,
      });
    } catch (error) {
      sendError(res, error, 'Failed to check weather');
    }
  });

  app.get('/api/events/:id/alternatives', async (req: Request, res: Response) => {
    const query = parseOrReject(AlternativesQuerySchema, req.query, res);
    if (!query) return;
    try {
      res.json(
        await eventService.getAlternatives(req.params.id, {
          nearbyLocations: query.nearby,
          betterOnly: query.betterOnly,
          limit: query.limit,
        }),
      );
    } catch (error) {
      sendError(res, error, 'Failed to rank alternatives');
    }
  });

  app.get('/api/events/:id/trend', async (req: Request, res: Response) => {
    const query = parseOrReject(TrendQuerySchema, req.query, res);
    if (!query) return;
    try {
      res.json(await eventService.getTrend(req.params.id, { source: query.source, days: query.days }));
    } catch (error) {
      sendError(res, error, 'Failed to analyze trend');
    }
  });

  app.get('/api/events/:id/hourly', async (req: Request, res: Response) => {
    try {
      res.json(await eventService.getHourlyBreakdown(req.params.id));
    } catch (error) {
      sendError(res, error, 'Failed to build hourly breakdown');
    }
  });

  app.get('/api/events/:id/history-comparison', async (req: Request, res: Response) => {
    try {
      res.json(await eventService.getHistoricalComparison(req.params.id));
    } catch (error) {
      sendError(res, error, 'Failed to compare with last week');
    }
  });
};
