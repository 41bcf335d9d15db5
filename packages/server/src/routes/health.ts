import { Hono } from 'hono';
import { TEMPORA_VERSION } from '@tempora/shared';

export function healthRoutes(info: { vectorBackend: string }) {
  const router = new Hono();

  router.get('/', (c) => {
    return c.json({
      status: 'ok',
      version: TEMPORA_VERSION,
      vectorBackend: info.vectorBackend,
    });
  });

  return router;
}
