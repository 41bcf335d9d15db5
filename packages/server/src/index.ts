export { createApp, startServer } from './app.js';
export type { AppOptions } from './app.js';
export { memoriesRoutes } from './routes/memories.js';
export { healthRoutes } from './routes/health.js';
export { apiKeyMiddleware } from './auth/middleware.js';
