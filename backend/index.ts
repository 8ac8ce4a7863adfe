import { createBackend } from './src/server/create-backend.js';
import { startServer as startBackendServer } from './src/server/start-server.js';
import { OPENWEATHER_API_KEY, PORT } from './src/server/runtime.js';

const backend = createBackend();

export const app = backend.app;

if (process.env.NODE_ENV !== 'test') {
  if (!OPENWEATHER_API_KEY) {
    console.warn('[weather] OPENWEATHER_API_KEY is not set; weather lookups will fail with "unauthorized".');
  }
  backend.notificationLoop.start();
  startBackendServer({ app, port: PORT, onShutdown: backend.notificationLoop.stop });
}
