import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { Logger } from 'pino';
import { OptimisticConflictError, RecordNotFoundError, ValidationError, type ServerConfig } from '@tempora/shared';
import { silentLogger, type TemporalMemory } from '@tempora/core';
import { memoriesRoutes } from './routes/memories.js';
import { healthRoutes } from './routes/health.js';
import { apiKeyMiddleware } from './auth/middleware.js';

export interface AppOptions {
  /** When set, every /memories request must carry `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
  vectorBackend: string;
  logger?: Logger;
}

export function createApp(memory: TemporalMemory, options: AppOptions) {
  const app = new Hono();
  const logger = options.logger ?? silentLogger();

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    logger.info({ method: c.req.method, path: c.req.path, status: c.res.status, ms: Date.now() - start }, 'request');
  });

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, code: err.code }, 400);
    }
    if (err instanceof RecordNotFoundError) {
      return c.json({ error: err.message, code: err.code }, 404);
    }
    if (err instanceof OptimisticConflictError) {
      return c.json({ error: err.message, code: err.code }, 409);
    }
    logger.error({ err, method: c.req.method, path: c.req.path }, 'request failed');
    return c.json({ error: 'Internal server error' }, 500);
  });

  const memories = new Hono();
  if (options.apiKey) memories.use('*', apiKeyMiddleware(options.apiKey));
  memories.route('/', memoriesRoutes(memory));

  app.route('/memories', memories);
  app.route('/health', healthRoutes({ vectorBackend: options.vectorBackend }));

  return app;
}

export function startServer(
  memory: TemporalMemory,
  config: ServerConfig & { vectorBackend: string },
  logger: Logger,
): ServerType {
  const { port, host, apiKey, vectorBackend } = config;
  const app = createApp(memory, { apiKey, vectorBackend, logger });

  return serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ host, port: info.port, auth: Boolean(apiKey) }, `tempora server listening on http://${host}:${info.port}`);
  });
}
