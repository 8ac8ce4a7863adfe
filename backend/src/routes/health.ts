import type { Express, Request, Response } from 'express';
import type { NotificationLoop } from '../utils/notification-loop.js';

interface RegisterHealthRoutesOptions {
  app: Express;
  version: string;
  notificationLoop?: NotificationLoop;
}

export const registerHealthRoutes = ({ app, version, notificationLoop }: RegisterHealthRoutesOptions) => {
  const healthPayload = () => {
    const mem = process.memoryUsage();
    return {
      ok: true,
      service: 'fairday-backend',
      version,
      env: process.env.NODE_ENV || 'development',
      uptime: Math.floor(process.uptime()),
      nodeVersion: process.version,
      notificationLoop: notificationLoop?.isRunning() ? 'running' : 'stopped',
      memory: {
        heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
        rssMb: Math.round(mem.rss / 1024 / 1024),
      },
      timestamp: new Date().toISOString(),
    };
  };

  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload());
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
  app.get('/api/healthz', respond);
  app.get('/api/health', respond);
};
